import { Router } from 'express';
import { MatchingController } from './matching.controller';
import type { MatchingService } from './matching.service';

export function matchingRoutes(service: MatchingService): Router {
  const router = Router();
  const controller = new MatchingController(service);

  // GET /api/matches - Rank the session's jobs against its profile
  router.get('/matches', controller.getSessionMatches.bind(controller));

  // POST /api/matches/score - Score one job for a given candidate
  router.post('/matches/score', controller.scoreJob.bind(controller));

  // POST /api/matches/rank - Rank a batch of jobs for a given candidate
  router.post('/matches/rank', controller.rankJobs.bind(controller));

  return router;
}
