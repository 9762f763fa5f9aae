import type { JobListing } from '../../interfaces/domain/JobListing';
import type { SessionContext } from '../../interfaces/domain/SessionContext';
import type { SearchPreferencesDto } from '../../interfaces/dto/SearchPreferencesDto';
import type { ConnectionStatus, JobSource } from '../../utils/jobSource';
import { toCandidateProfile } from '../../utils/resumeAnalyzer';
import { logger } from '../../utils/logger';
import type { SessionStore } from '../session/session.store';

export class JobsService {
  constructor(
    private readonly jobSource: JobSource,
    private readonly sessions: SessionStore
  ) {}

  async searchJobs(session: SessionContext, preferences: SearchPreferencesDto): Promise<{
    count: number;
    jobs: JobListing[];
  }> {
    const jobs = await this.jobSource.searchJobs(preferences, session.analysis);

    session.preferences = preferences;
    session.jobs = jobs;
    if (session.analysis) {
      session.profile = toCandidateProfile(session.analysis, preferences);
    }
    this.sessions.save(session);

    if (jobs.length === 0) {
      logger.info('No jobs found for search', { sessionId: session.id });
    }

    return { count: jobs.length, jobs };
  }

  testConnection(): Promise<ConnectionStatus> {
    return this.jobSource.testConnection();
  }
}
