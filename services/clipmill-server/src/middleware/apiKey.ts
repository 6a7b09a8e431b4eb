import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { AuthenticationError } from 'clipmill';

function matches(incoming: string, expected: string): boolean {
  const a = Buffer.from(incoming, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

/** No-op when `apiKey` is empty. */
export function createApiKeyMiddleware(apiKey: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!apiKey) {
      next();
      return;
    }

    const incoming = req.header('x-api-key') || '';
    if (!matches(incoming, apiKey)) {
      next(new AuthenticationError());
      return;
    }

    next();
  };
}
