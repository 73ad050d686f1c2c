import { createHash, timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

const BEARER_PREFIX = 'Bearer ';

function readBearerToken(authorization?: string): string | null {
  if (!authorization || !authorization.startsWith(BEARER_PREFIX)) {
    return null;
  }
  return authorization.slice(BEARER_PREFIX.length).trim() || null;
}

// Constant time regardless of the provided token length
function matchesToken(provided: string, expected: string): boolean {
  const digest = (value: string) => createHash('sha256').update(value).digest();
  return timingSafeEqual(digest(provided), digest(expected));
}

export interface ApiAuthOptions {
  token: string | null;
  production: boolean;
}

export function createApiAuth({ token, production }: ApiAuthOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!token) {
      if (production) {
        res.status(500).json({ message: 'Server auth is not configured. Set API_AUTH_TOKEN.' });
        return;
      }

      next();
      return;
    }

    const tokenFromAuthHeader = readBearerToken(req.headers.authorization);
    const tokenFromApiKeyHeader = req.header('x-api-key');
    const providedToken = tokenFromAuthHeader ?? tokenFromApiKeyHeader ?? null;

    if (!providedToken || !matchesToken(providedToken, token)) {
      res.status(401).json({ message: 'Unauthorized' });
      return;
    }

    next();
  };
}
