import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { SessionContext } from '../interfaces/domain/SessionContext';
import type { SessionStore } from '../models/session/session.store';

export const SESSION_HEADER = 'x-session-id';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

declare global {
  namespace Express {
    interface Request {
      sessionContext: SessionContext;
    }
  }
}

export function sessionContext(store: SessionStore): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.get(SESSION_HEADER);

    // Unknown or malformed ids get a fresh session instead of an error.
    // It is only stored once a handler writes to it.
    const requestedId = header && SESSION_ID_PATTERN.test(header) ? header : undefined;

    const session = store.resolve(requestedId);
    req.sessionContext = session;
    res.setHeader(SESSION_HEADER, session.id);

    next();
  };
}
