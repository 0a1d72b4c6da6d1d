// Express provides the middleware types.
import express from 'express';
import { HttpError } from '../errors/httpError';
import { SessionRepository } from '../storage/sessionRepository';

export const SESSION_COOKIE = 'session_id';

// Resolves the caller's session from its cookie, minting a new session when the cookie is absent or unknown.
export function sessionCookie(sessions: SessionRepository, options: { secure: boolean }): express.RequestHandler {
  return async (req, res, next) => {
    try {
      const supplied: unknown = req.cookies?.[SESSION_COOKIE];
      if (typeof supplied === 'string' && (await sessions.exists(supplied))) {
        res.locals.sessionId = supplied;
      } else {
        const rec = await sessions.create();
        res.cookie(SESSION_COOKIE, rec.id, { httpOnly: true, sameSite: 'lax', secure: options.secure });
        res.locals.sessionId = rec.id;
      }
      next();
    } catch (e) {
      next(e);
    }
  };
}

// Reads the session id stored by sessionCookie; route handlers never see the cookie itself.
export function sessionIdOf(res: express.Response): string {
  const id: unknown = res.locals.sessionId;
  if (typeof id !== 'string') {
    throw new HttpError(500, 'Session was not resolved for this request', 'INTERNAL_FAILURE');
  }
  return id;
}
