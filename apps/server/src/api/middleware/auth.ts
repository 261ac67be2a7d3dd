import type { NextFunction, Request, RequestHandler, Response } from 'express';

const BEARER_PREFIX = 'Bearer ';

export interface ApiAuthOptions {
  token: string | null;
  nodeEnv: string;
}

function readBearerToken(authorization?: string): string | null {
  if (!authorization || !authorization.startsWith(BEARER_PREFIX)) {
    return null;
  }
  return authorization.slice(BEARER_PREFIX.length).trim() || null;
}

// Without a configured token the API is open outside production and closed in it.
export function createApiAuth(options: ApiAuthOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const expectedToken = options.token;

    if (!expectedToken) {
      if (options.nodeEnv === 'production') {
        res.status(500).json({
          message: 'Server auth is not configured. Set API_AUTH_TOKEN.',
        });
        return;
      }

      next();
      return;
    }

    const tokenFromAuthHeader = readBearerToken(req.headers.authorization);
    const tokenFromApiKeyHeader = req.header('x-api-key');
    const providedToken = tokenFromAuthHeader ?? tokenFromApiKeyHeader ?? null;

    if (!providedToken || providedToken !== expectedToken) {
      res.status(401).json({ message: 'Unauthorized' });
      return;
    }

    next();
  };
}
