import { describe, expect, it } from 'vitest';
import { createTikTokOAuth } from './oauth';
import { MissingOAuthConfigError, PlatformRejectedError } from './errors';
import { MockTikTokPlatform } from './social/mockPlatform';

const NOW = 1_700_000_000_000;
const config = {
  clientKey: 'test-key',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:3000/auth/tiktok/callback',
  scope: 'user.info.basic,video.publish',
};

function oauthWith(platform: MockTikTokPlatform, cfg: typeof config | undefined = config) {
  return createTikTokOAuth(cfg, { apiBase: 'https://open.tiktokapis.com', http: platform.http, now: () => NOW });
}

describe('TikTok OAuth', () => {
  it('builds the authorize url with the issued state', () => {
    const url = new URL(oauthWith(new MockTikTokPlatform()).generateAuthUrl('state-123'));

    expect(url.origin + url.pathname).toBe('https://www.tiktok.com/v2/auth/authorize/');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      client_key: 'test-key',
      scope: 'user.info.basic,video.publish',
      response_type: 'code',
      redirect_uri: 'http://localhost:3000/auth/tiktok/callback',
      state: 'state-123',
    });
  });

  it('exchanges an authorization code as a form post', async () => {
    const platform = new MockTikTokPlatform();

    const grant = await oauthWith(platform).exchangeCodeForToken('code-abc');

    expect(grant).toEqual({
      accessToken: 'act.test-access',
      refreshToken: 'rft.test-refresh',
      expiresAt: NOW + 86_400_000,
      refreshExpiresAt: NOW + 31_536_000_000,
      openId: 'open-test',
      scope: 'user.info.basic,video.publish',
    });
    const [call] = platform.tokenCalls;
    expect(call.url).toBe('https://open.tiktokapis.com/v2/oauth/token/');
    expect(call.headers['content-type']).toBe('application/x-www-form-urlencoded');
    expect(Object.fromEntries(new URLSearchParams(String(call.body)))).toEqual({
      client_key: 'test-key',
      client_secret: 'test-secret',
      code: 'code-abc',
      grant_type: 'authorization_code',
      redirect_uri: 'http://localhost:3000/auth/tiktok/callback',
    });
  });

  it('sends the refresh grant and keeps an unrotated refresh token', async () => {
    const platform = new MockTikTokPlatform({
      token: () => ({ status: 200, data: { access_token: 'act.renewed', expires_in: 3600 } }),
    });

    const grant = await oauthWith(platform).refreshAccessToken('rft.current');

    expect(grant).toMatchObject({ accessToken: 'act.renewed', refreshToken: 'rft.current', expiresAt: NOW + 3_600_000 });
    expect(Object.fromEntries(new URLSearchParams(String(platform.tokenCalls[0].body)))).toEqual({
      client_key: 'test-key',
      client_secret: 'test-secret',
      grant_type: 'refresh_token',
      refresh_token: 'rft.current',
    });
  });

  it('turns an error body into PlatformRejected with the vendor description', async () => {
    const platform = new MockTikTokPlatform({
      token: () => ({ status: 400, data: { error: 'invalid_grant', error_description: 'Authorization code is expired.' } }),
    });

    const err = await oauthWith(platform).exchangeCodeForToken('stale').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PlatformRejectedError);
    expect(err).toMatchObject({ vendorCode: 'invalid_grant', message: 'Authorization code is expired.' });
  });

  it('refuses to run without client configuration', async () => {
    const oauth = oauthWith(new MockTikTokPlatform(), undefined);

    expect(oauth.configured).toBe(false);
    expect(() => oauth.generateAuthUrl('s')).toThrow(MissingOAuthConfigError);
    await expect(oauth.exchangeCodeForToken('c')).rejects.toBeInstanceOf(MissingOAuthConfigError);
  });
});
