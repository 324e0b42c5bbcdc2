/**
 * Dashboard Authentication
 *
 * HTTP Basic credentials for the reporting API. Credentials are compared in
 * constant time; the webhook route has its own HMAC check and never passes
 * through here.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, timingSafeEqual } from 'crypto';
import { AuthenticationError } from '../models/errors/api-error';
import { logHelpers } from '../utils/logger';

export interface DashboardCredentials {
  username: string;
  password: string;
}

const REALM = 'fleet-safety-alerts';

function safeEqual(a: string, b: string): boolean {
  // Hash first so differing lengths don't short-circuit the comparison
  const left = createHash('sha256').update(a).digest();
  const right = createHash('sha256').update(b).digest();
  return timingSafeEqual(left, right);
}

export function parseBasicAuth(header: string | undefined): DashboardCredentials | null {
  if (!header) return null;

  const [scheme, encoded] = header.split(' ');
  if (!scheme || scheme.toLowerCase() !== 'basic' || !encoded) return null;

  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator === -1) return null;

  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

export function basicAuth(expected: DashboardCredentials): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const credentials = parseBasicAuth(req.headers.authorization);

    let valid = false;
    if (credentials) {
      const usernameMatches = safeEqual(credentials.username, expected.username);
      const passwordMatches = safeEqual(credentials.password, expected.password);
      valid = usernameMatches && passwordMatches;
    }

    if (!credentials || !valid) {
      logHelpers.security('dashboard_auth_failed', 'low', {
        path: req.path,
        ip: req.ip,
        hasCredentials: credentials !== null,
      });
      res.setHeader('WWW-Authenticate', `Basic realm="${REALM}", charset="UTF-8"`);
      next(new AuthenticationError(credentials ? 'Invalid credentials' : 'Missing credentials'));
      return;
    }

    next();
  };
}
