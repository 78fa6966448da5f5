import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { UserRepository } from './users';
import { AccountsDisabledError, AuthenticationError, toError } from './errors';

const BCRYPT_ROUNDS = 10;
const JWT_ALGORITHM = 'HS256';

export interface AuthUser {
  id: string;
  username: string;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_ROUNDS);
}

export function verifyPassword(password: string, passwordHash: string): Promise<boolean> {
  return bcrypt.compare(password, passwordHash);
}

// ── Session tokens ────────────────────────────────────────────────────────────

const SessionClaims = z.object({
  sub: z.string().min(1),
  username: z.string(),
});

export type SessionClaims = z.infer<typeof SessionClaims>;

export interface SessionTokens {
  issue(user: AuthUser): string;
  verify(token: string): SessionClaims;
}

export function createSessionTokens(secret: string, expirationHours = 24): SessionTokens {
  return {
    issue(user) {
      return jwt.sign({ username: user.username }, secret, {
        subject: user.id,
        algorithm: JWT_ALGORITHM,
        expiresIn: Math.round(expirationHours * 3600),
      });
    },

    verify(token) {
      let payload: unknown;
      try {
        payload = jwt.verify(token, secret, { algorithms: [JWT_ALGORITHM] });
      } catch (err) {
        throw new AuthenticationError('Invalid or expired token', toError(err));
      }
      const claims = SessionClaims.safeParse(payload);
      if (!claims.success) throw new AuthenticationError('Invalid or expired token');
      return claims.data;
    },
  };
}

// ── Middleware ────────────────────────────────────────────────────────────────

function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header) return undefined;
  const [scheme, token] = header.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) return undefined;
  return token;
}

/**
 * Resolves `req.user` from the bearer header.
 *
 * With `required` unset a request without a header passes through anonymously;
 * a header that is present but invalid is rejected. When accounts are disabled
 * (no session secret) the optional variant ignores the header altogether.
 */
export function authenticate(
  sessions: SessionTokens | undefined,
  users: UserRepository,
  options: { required: boolean }
): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const hasHeader = req.headers.authorization !== undefined;
    if (!sessions && !options.required) return next();
    if (!hasHeader) {
      if (options.required) return next(new AuthenticationError('Not authenticated'));
      return next();
    }

    const token = bearerToken(req);
    if (!token) return next(new AuthenticationError('Invalid authorization header'));
    if (!sessions) return next(new AccountsDisabledError());

    try {
      const claims = sessions.verify(token);
      const user = users.findById(claims.sub);
      if (!user) return next(new AuthenticationError('User not found'));
      req.user = { id: user.id, username: user.username };
      return next();
    } catch (err) {
      return next(err);
    }
  };
}
