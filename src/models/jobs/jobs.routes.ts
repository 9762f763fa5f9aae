import { Router } from 'express';
import { JobsController } from './jobs.controller';
import type { JobsService } from './jobs.service';

export function jobsRoutes(service: JobsService): Router {
  const router = Router();
  const controller = new JobsController(service);

  // POST /api/jobs/search - Search listings and keep them in the session
  router.post('/jobs/search', controller.searchJobs.bind(controller));

  // GET /api/jobs/source/status - Check the job listings API connection
  router.get('/jobs/source/status', controller.getSourceStatus.bind(controller));

  return router;
}
