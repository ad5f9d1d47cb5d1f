import type { Request, Response, NextFunction, RequestHandler } from 'express';

type BearerResult =
  | { ok: true; token: string }
  | { ok: false; message: string };

/**
 * Pull the token out of an Authorization header
 */
export function readBearerToken(header: string | undefined): BearerResult {
  if (!header) {
    return { ok: false, message: 'Missing Authorization header' };
  }
  const token = /^Bearer (.+)$/i.exec(header)?.[1];
  if (token === undefined) {
    return { ok: false, message: 'Invalid Authorization header format. Expected: Bearer <token>' };
  }
  return { ok: true, token };
}

/**
 * Require one of the configured bearer tokens on every request.
 * Without configured tokens the API is open.
 */
export function createAuthMiddleware(authTokens: string[] = []): RequestHandler {
  const accepted = new Set(authTokens);

  return (req: Request, res: Response, next: NextFunction): void => {
    if (accepted.size === 0) {
      next();
      return;
    }

    const result = readBearerToken(req.headers.authorization);
    const message = !result.ok
      ? result.message
      : accepted.has(result.token)
        ? null
        : 'Invalid authentication token';

    if (message !== null) {
      res.status(401).json({ error: 'Unauthorized', message });
      return;
    }
    next();
  };
}
