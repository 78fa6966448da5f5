import type { Database } from './db';
import type { TokenRecord } from './models';
import type { TokenGrant } from './oauth';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { CredentialRefreshFailedError, NotLinkedError, toError } from './errors';

export interface CredentialProvider {
  getToken(identity: string): Promise<string>;
}

export type RefreshFn = (refreshToken: string) => Promise<TokenGrant>;

// ── Token persistence ─────────────────────────────────────────────────────────

export interface TokenRepository {
  find(userId: string): TokenRecord | undefined;
  save(userId: string, grant: TokenGrant): TokenRecord;
}

export function createTokenRepository(db: Database, now: () => number = Date.now): TokenRepository {
  return {
    find(userId) {
      db.read();
      return db.data.tokens.find((t) => t.userId === userId);
    },

    // Upsert by user: a new grant supersedes whatever was stored.
    save(userId, grant) {
      db.read();
      const rec: TokenRecord = {
        userId,
        accessToken: grant.accessToken,
        refreshToken: grant.refreshToken,
        expiresAt: grant.expiresAt,
        refreshExpiresAt: grant.refreshExpiresAt,
        openId: grant.openId,
        scope: grant.scope,
        updatedAt: now(),
      };
      const idx = db.data.tokens.findIndex((t) => t.userId === userId);
      if (idx !== -1) db.data.tokens[idx] = rec;
      else db.data.tokens.push(rec);
      db.write();
      return rec;
    },
  };
}

// ── Per-user store ────────────────────────────────────────────────────────────

export interface CredentialStoreOptions {
  refresh: RefreshFn;
  safetyMarginMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Hands out access tokens that will not expire within `safetyMarginMs`.
 *
 * A token inside the margin is refreshed and persisted before it is returned.
 * Concurrent callers for the same identity share one in-flight refresh.
 */
export class CredentialStore implements CredentialProvider {
  private readonly inflight = new Map<string, Promise<string>>();
  private readonly safetyMarginMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly repo: TokenRepository, private readonly options: CredentialStoreOptions) {
    this.safetyMarginMs = options.safetyMarginMs ?? 60_000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  async getToken(userId: string): Promise<string> {
    const pending = this.inflight.get(userId);
    if (pending) return pending;

    const rec = this.repo.find(userId);
    if (!rec) throw new NotLinkedError();
    if (!this.needsRefresh(rec)) return rec.accessToken;

    const refresh = this.refresh(rec).finally(() => this.inflight.delete(userId));
    this.inflight.set(userId, refresh);
    return refresh;
  }

  isLinked(userId: string): boolean {
    return this.repo.find(userId) !== undefined;
  }

  private needsRefresh(rec: TokenRecord): boolean {
    return rec.expiresAt !== undefined && rec.expiresAt - this.now() < this.safetyMarginMs;
  }

  private async refresh(rec: TokenRecord): Promise<string> {
    if (!rec.refreshToken) {
      throw new CredentialRefreshFailedError('access token expired and no refresh token is stored');
    }
    if (rec.refreshExpiresAt !== undefined && rec.refreshExpiresAt <= this.now()) {
      throw new CredentialRefreshFailedError('refresh token expired, re-authorize the tiktok account');
    }

    this.logger.info('refreshing tiktok access token', { userId: rec.userId });
    let grant: TokenGrant;
    try {
      grant = await this.options.refresh(rec.refreshToken);
    } catch (err) {
      const cause = toError(err);
      this.logger.warn('tiktok token refresh failed', { userId: rec.userId, error: cause });
      throw new CredentialRefreshFailedError(`token refresh failed: ${cause.message}`, cause);
    }

    const saved = this.repo.save(rec.userId, {
      ...grant,
      refreshToken: grant.refreshToken ?? rec.refreshToken,
      openId: grant.openId ?? rec.openId,
    });
    if (this.needsRefresh(saved)) {
      this.logger.warn('refreshed tiktok token is already near expiry', { userId: rec.userId, expiresAt: saved.expiresAt });
      throw new CredentialRefreshFailedError('refreshed access token expires within the safety margin');
    }
    return saved.accessToken;
  }
}

// ── Process-wide token ────────────────────────────────────────────────────────

export const STATIC_IDENTITY = 'static';

// Serves the configured token for anonymous uploads, keyed by a constant identity.
export class StaticCredentials implements CredentialProvider {
  constructor(private readonly token: string | undefined) {}

  async getToken(_identity: string = STATIC_IDENTITY): Promise<string> {
    if (!this.token) throw new NotLinkedError('missing token');
    return this.token;
  }
}
