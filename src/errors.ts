export class ClipcastError extends Error {
  constructor(message: string, public code: string, public cause?: Error) {
    super(message);
    this.name = 'ClipcastError';
  }
}

export class ConfigError extends ClipcastError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class InvalidInputError extends ClipcastError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class AuthenticationError extends ClipcastError {
  constructor(message: string, cause?: Error) {
    super(message, 'UNAUTHORIZED', cause);
    this.name = 'AuthenticationError';
  }
}

// The caller has no platform credentials at all: send them through the link flow.
export class NotLinkedError extends ClipcastError {
  constructor(message = 'tiktok account not linked') {
    super(message, 'NOT_LINKED');
    this.name = 'NotLinkedError';
  }
}

// Credentials exist but could not be renewed: the user has to re-authorize.
export class CredentialRefreshFailedError extends ClipcastError {
  constructor(message: string, cause?: Error) {
    super(message, 'CREDENTIAL_REFRESH_FAILED', cause);
    this.name = 'CredentialRefreshFailedError';
  }
}

export class PlatformRejectedError extends ClipcastError {
  constructor(message: string, public vendorCode = 'unknown', cause?: Error) {
    super(message, 'PLATFORM_REJECTED', cause);
    this.name = 'PlatformRejectedError';
  }
}

export class PublishTimeoutError extends ClipcastError {
  constructor(message = 'timeout') {
    super(message, 'TIMEOUT');
    this.name = 'PublishTimeoutError';
  }
}

export class StorageUnavailableError extends ClipcastError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORAGE_UNAVAILABLE', cause);
    this.name = 'StorageUnavailableError';
  }
}

export class MissingOAuthConfigError extends ClipcastError {
  constructor() {
    super(
      'TikTok OAuth is not configured. Set TIKTOK_CLIENT_KEY, TIKTOK_CLIENT_SECRET and TIKTOK_REDIRECT_URI.',
      'OAUTH_NOT_CONFIGURED'
    );
    this.name = 'MissingOAuthConfigError';
  }
}

export class AccountsDisabledError extends ClipcastError {
  constructor() {
    super('Accounts are not enabled on this server. Set JWT_SECRET_KEY.', 'ACCOUNTS_DISABLED');
    this.name = 'AccountsDisabledError';
  }
}

export const ERROR_CODES = {
  INVALID_INPUT: 'INVALID_INPUT',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_LINKED: 'NOT_LINKED',
  CREDENTIAL_REFRESH_FAILED: 'CREDENTIAL_REFRESH_FAILED',
  PLATFORM_REJECTED: 'PLATFORM_REJECTED',
  TIMEOUT: 'TIMEOUT',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',
  OAUTH_NOT_CONFIGURED: 'OAUTH_NOT_CONFIGURED',
  ACCOUNTS_DISABLED: 'ACCOUNTS_DISABLED',
  INTERNAL: 'INTERNAL'
} as const;

const HTTP_STATUS: Record<string, number> = {
  INVALID_INPUT: 400,
  UNAUTHORIZED: 401,
  NOT_LINKED: 401,
  CREDENTIAL_REFRESH_FAILED: 401,
  PLATFORM_REJECTED: 502,
  TIMEOUT: 504,
  STORAGE_UNAVAILABLE: 500,
  OAUTH_NOT_CONFIGURED: 500,
  ACCOUNTS_DISABLED: 503
};

export function httpStatusFor(code: string): number {
  return HTTP_STATUS[code] ?? 500;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
