import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import multer from 'multer';
import type { Config } from './config';
import type { Database } from './db';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { createSessionTokens } from './auth';
import { CredentialStore, StaticCredentials, createTokenRepository } from './credentials';
import { createTikTokOAuth } from './oauth';
import { createPostLog } from './postLog';
import { Publisher } from './publisher';
import { createRouter } from './routes';
import type { RouteDeps } from './routes';
import { TikTokPublishClient } from './social/tiktok';
import { createOAuthStateRepository, createUserRepository } from './users';
import { ClipcastError, httpStatusFor, toError } from './errors';

export interface AppOptions {
  db: Database;
  http?: AxiosInstance;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

// Wires every service from config. Tests pass an in-memory db and a stubbed axios instance.
export function buildServices(config: Config, options: AppOptions): RouteDeps {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? Date.now;
  const http = options.http ?? axios.create({ timeout: config.publish.requestTimeoutMs });

  const oauth = createTikTokOAuth(config.oauth, { apiBase: config.publish.apiBase, http, now });
  const tokens = createTokenRepository(options.db, now);
  const userCredentials = oauth.configured
    ? new CredentialStore(tokens, {
        refresh: (refreshToken) => oauth.refreshAccessToken(refreshToken),
        safetyMarginMs: config.tokenRefreshMarginMs,
        now,
        logger,
      })
    : undefined;

  const postLog = createPostLog(options.db, now);
  const client = new TikTokPublishClient({ ...config.publish, http, logger, sleep: options.sleep });
  const publisher = new Publisher({
    userCredentials,
    staticCredentials: new StaticCredentials(config.staticAccessToken),
    client,
    postLog,
    logger,
  });

  return {
    users: createUserRepository(options.db, now),
    sessions: config.jwt.secret ? createSessionTokens(config.jwt.secret, config.jwt.expirationHours) : undefined,
    oauth,
    oauthStates: createOAuthStateRepository(options.db, now),
    tokens,
    publisher,
    postLog,
    logger,
    maxUploadBytes: config.maxUploadBytes,
  };
}

// body-parser and other http-errors style failures carry their own status
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(deps: RouteDeps): Express {
  const app = express();
  app.use(express.json());
  app.use('/', createRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).send({ status: 'failed', error: 'not found' });
  });

  // Every failure leaves as { status: 'failed', error }.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      return res.status(status).send({ status: 'failed', error: err.message });
    }
    if (err instanceof ClipcastError) {
      return res.status(httpStatusFor(err.code)).send({ status: 'failed', error: err.message });
    }
    if (err instanceof SyntaxError) {
      return res.status(400).send({ status: 'failed', error: 'malformed JSON body' });
    }
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== undefined) {
      return res.status(clientStatus).send({ status: 'failed', error: toError(err).message });
    }
    const cause = toError(err);
    deps.logger.error('unhandled request error', { error: cause });
    return res.status(500).send({ status: 'failed', error: 'internal error' });
  });

  return app;
}
