import { Router } from 'express';
import type { Request, Response } from 'express';
import type { SessionStore } from './session.store';

export function sessionRoutes(store: SessionStore): Router {
  const router = Router();

  // GET /api/session - Summary of what the session holds
  router.get('/session', (req: Request, res: Response) => {
    const session = req.sessionContext;
    res.json({
      sessionId: session.id,
      hasAnalysis: session.analysis !== null,
      hasProfile: session.profile !== null,
      preferences: session.preferences,
      jobCount: session.jobs.length
    });
  });

  // DELETE /api/session - Start over
  router.delete('/session', (req: Request, res: Response) => {
    store.delete(req.sessionContext.id);
    res.status(204).end();
  });

  return router;
}
