import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import type { Logger } from './logger';
import type { PostLog } from './postLog';
import type { Publisher } from './publisher';
import type { TokenRepository } from './credentials';
import type { TikTokOAuth, TokenGrant } from './oauth';
import type { OAuthStateRepository, UserRepository } from './users';
import { authenticate, hashPassword, verifyPassword } from './auth';
import type { SessionTokens } from './auth';
import {
  AccountsDisabledError,
  AuthenticationError,
  ClipcastError,
  InvalidInputError,
  MissingOAuthConfigError,
  PlatformRejectedError,
  toError,
} from './errors';

export interface RouteDeps {
  users: UserRepository;
  sessions?: SessionTokens;
  oauth: TikTokOAuth;
  oauthStates: OAuthStateRepository;
  tokens: TokenRepository;
  publisher: Publisher;
  postLog: PostLog;
  logger: Logger;
  maxUploadBytes: number;
}

const Credentials = z.object({
  username: z.string().trim().min(3).max(64),
  password: z.string().min(8).max(256),
});

function parseCredentials(body: unknown) {
  const parsed = Credentials.safeParse(body ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new InvalidInputError(problems);
  }
  return parsed.data;
}

function queryString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export function createRouter(deps: RouteDeps) {
  const router = express.Router();
  const requireUser = authenticate(deps.sessions, deps.users, { required: true });
  const optionalUser = authenticate(deps.sessions, deps.users, { required: false });
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes, files: 1 },
  });

  function sessions(): SessionTokens {
    if (!deps.sessions) throw new AccountsDisabledError();
    return deps.sessions;
  }

  router.get('/health', (_req, res) => {
    res.send({ status: 'healthy' });
  });

  // --- Accounts ---------------------------------------------------------------

  router.post('/auth/register', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const tokens = sessions();
      const { username, password } = parseCredentials(req.body);
      if (deps.users.findByUsername(username)) throw new InvalidInputError('Username already exists');

      // checked again by create: another registration may have taken the name while hashing
      const passwordHash = await hashPassword(password);
      const user = deps.users.create(username, passwordHash);
      deps.logger.info('user registered', { userId: user.id });
      res.send({ access_token: tokens.issue(user), token_type: 'bearer', username: user.username });
    } catch (err) {
      next(err);
    }
  });

  router.post('/auth/login', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const tokens = sessions();
      const { username, password } = parseCredentials(req.body);
      const user = deps.users.findByUsername(username);
      if (!user || !(await verifyPassword(password, user.passwordHash))) {
        throw new AuthenticationError('Invalid username or password');
      }
      res.send({ access_token: tokens.issue(user), token_type: 'bearer', username: user.username });
    } catch (err) {
      next(err);
    }
  });

  router.get('/auth/me', requireUser, (req: Request, res: Response, next: NextFunction) => {
    if (!req.user) return next(new AuthenticationError('Not authenticated'));
    res.send({
      id: req.user.id,
      username: req.user.username,
      tiktok_linked: deps.tokens.find(req.user.id) !== undefined,
    });
  });

  // --- TikTok account linking -------------------------------------------------

  router.get('/auth/tiktok/login', requireUser, (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.user) throw new AuthenticationError('Not authenticated');
      if (!deps.oauth.configured) throw new MissingOAuthConfigError();
      const state = deps.oauthStates.issue(req.user.id);
      res.send({ authorization_url: deps.oauth.generateAuthUrl(state) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/auth/tiktok/callback', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const code = queryString(req.query.code);
      const state = queryString(req.query.state);
      if (!code || !state) throw new InvalidInputError('Missing code or state parameter');

      // the code is only exchanged for a state this server issued
      const issued = deps.oauthStates.consume(state);
      if (!issued) throw new InvalidInputError('Invalid or expired state parameter');

      let grant: TokenGrant;
      try {
        grant = await deps.oauth.exchangeCodeForToken(code);
      } catch (err) {
        const cause = toError(err);
        if (cause instanceof ClipcastError && !(cause instanceof PlatformRejectedError)) throw cause;
        throw new PlatformRejectedError(`Failed to link TikTok account: ${cause.message}`, 'token_exchange_failed', cause);
      }

      deps.tokens.save(issued.userId, grant);
      deps.logger.info('tiktok account linked', { userId: issued.userId });
      res.send({ success: true, message: 'TikTok account linked successfully' });
    } catch (err) {
      next(err);
    }
  });

  // --- Publishing -------------------------------------------------------------

  router.post('/upload', optionalUser, upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const title = typeof req.body?.title === 'string' ? req.body.title : undefined;
      const outcome = await deps.publisher.handle({ file: req.file, user: req.user, title });
      res.status(outcome.httpStatus).send(outcome.body);
    } catch (err) {
      next(err);
    }
  });

  router.get('/posts', requireUser, (req: Request, res: Response, next: NextFunction) => {
    if (!req.user) return next(new AuthenticationError('Not authenticated'));
    res.send(deps.postLog.list(req.user.id));
  });

  return router;
}
