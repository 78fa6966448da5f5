import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { OAuthConfig } from './config';
import { MissingOAuthConfigError, PlatformRejectedError } from './errors';

export const TIKTOK_AUTH_URL = 'https://www.tiktok.com/v2/auth/authorize/';
export const TIKTOK_TOKEN_PATH = '/v2/oauth/token/';

export interface TokenGrant {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: number; // epoch ms
  refreshExpiresAt?: number; // epoch ms
  openId?: string;
  scope?: string;
}

export interface TikTokOAuth {
  readonly configured: boolean;
  generateAuthUrl(state: string): string;
  exchangeCodeForToken(code: string): Promise<TokenGrant>;
  refreshAccessToken(refreshToken: string): Promise<TokenGrant>;
}

const TokenResponse = z.object({
  access_token: z.string().min(1).optional(),
  refresh_token: z.string().optional(),
  expires_in: z.coerce.number().optional(),
  refresh_expires_in: z.coerce.number().optional(),
  open_id: z.string().optional(),
  scope: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

export interface TikTokOAuthOptions {
  apiBase: string;
  http: AxiosInstance;
  now?: () => number;
}

export function createTikTokOAuth(config: OAuthConfig | undefined, options: TikTokOAuthOptions): TikTokOAuth {
  const now = options.now ?? Date.now;
  const tokenUrl = `${options.apiBase}${TIKTOK_TOKEN_PATH}`;

  function requireConfig(): OAuthConfig {
    if (!config) throw new MissingOAuthConfigError();
    return config;
  }

  // Both grants share the token endpoint and its response envelope.
  async function postTokenRequest(params: URLSearchParams, fallbackRefreshToken?: string): Promise<TokenGrant> {
    const resp = await options.http.post(tokenUrl, params.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      validateStatus: () => true,
    });

    const parsed = TokenResponse.safeParse(resp.data);
    if (!parsed.success) {
      throw new PlatformRejectedError(`unexpected token response (HTTP ${resp.status})`, 'invalid_response');
    }
    const data = parsed.data;
    if (data.error || !data.access_token) {
      throw new PlatformRejectedError(
        data.error_description || data.error || `token request failed with HTTP ${resp.status}`,
        data.error || 'unknown'
      );
    }

    const issuedAt = now();
    return {
      accessToken: data.access_token,
      refreshToken: data.refresh_token || fallbackRefreshToken,
      expiresAt: data.expires_in ? issuedAt + data.expires_in * 1000 : undefined,
      refreshExpiresAt: data.refresh_expires_in ? issuedAt + data.refresh_expires_in * 1000 : undefined,
      openId: data.open_id,
      scope: data.scope,
    };
  }

  return {
    configured: config !== undefined,

    generateAuthUrl(state: string) {
      const cfg = requireConfig();
      const params = new URLSearchParams({
        client_key: cfg.clientKey,
        scope: cfg.scope,
        response_type: 'code',
        redirect_uri: cfg.redirectUri,
        state,
      });
      return `${TIKTOK_AUTH_URL}?${params.toString()}`;
    },

    async exchangeCodeForToken(code: string) {
      const cfg = requireConfig();
      const params = new URLSearchParams();
      params.append('client_key', cfg.clientKey);
      params.append('client_secret', cfg.clientSecret);
      params.append('code', code);
      params.append('grant_type', 'authorization_code');
      params.append('redirect_uri', cfg.redirectUri);
      return postTokenRequest(params);
    },

    async refreshAccessToken(refreshToken: string) {
      const cfg = requireConfig();
      const params = new URLSearchParams();
      params.append('client_key', cfg.clientKey);
      params.append('client_secret', cfg.clientSecret);
      params.append('grant_type', 'refresh_token');
      params.append('refresh_token', refreshToken);
      // TikTok may rotate the refresh token; keep the old one when it does not
      return postTokenRequest(params, refreshToken);
    },
  };
}
