import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import type { ScoringConfig } from './interfaces/domain/ScoringConfig';
import { sessionContext, SESSION_HEADER } from './middleware/sessionContext.middleware';
import { errorMiddleware, notFoundHandler } from './middleware/error.middleware';
import type { SessionStore } from './models/session/session.store';
import { sessionRoutes } from './models/session/session.routes';
import { ResumeService } from './models/resume/resume.service';
import { resumeRoutes } from './models/resume/resume.routes';
import { JobsService } from './models/jobs/jobs.service';
import { jobsRoutes } from './models/jobs/jobs.routes';
import { MatchingService } from './models/matching/matching.service';
import { matchingRoutes } from './models/matching/matching.routes';
import type { ResumeAnalyzer } from './utils/resumeAnalyzer';
import type { JobSource } from './utils/jobSource';

export interface AppDependencies {
  analyzer: ResumeAnalyzer;
  jobSource: JobSource;
  sessionStore: SessionStore;
  scoringConfig: ScoringConfig;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Basic middleware
  app.use(cors({ origin: true, credentials: true, exposedHeaders: [SESSION_HEADER] }));
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Session context middleware
  app.use('/api', sessionContext(deps.sessionStore));

  // Routes
  app.use('/api', sessionRoutes(deps.sessionStore));
  app.use('/api', resumeRoutes(new ResumeService(deps.analyzer, deps.sessionStore)));
  app.use('/api', jobsRoutes(new JobsService(deps.jobSource, deps.sessionStore)));
  app.use('/api', matchingRoutes(new MatchingService(deps.scoringConfig)));

  // Error handling
  app.use('*', notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
