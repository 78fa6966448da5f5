import type { AuthUser } from './auth';
import type { CredentialProvider } from './credentials';
import { STATIC_IDENTITY } from './credentials';
import type { PostEntry, PostLog } from './postLog';
import type { PostRecord, Platform } from './models';
import type { PublishClient, PublishResult } from './social/tiktok';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { ClipcastError, ERROR_CODES, InvalidInputError, NotLinkedError, httpStatusFor, toError } from './errors';

const PLATFORM: Platform = 'tiktok';

export interface IncomingVideo {
  originalname: string;
  size: number;
  buffer: Buffer;
}

export interface UploadRequest {
  file?: IncomingVideo;
  user?: AuthUser;
  title?: string;
}

export interface UploadResponseBody {
  status: 'posted' | 'failed';
  error?: string;
}

export interface UploadOutcome {
  httpStatus: number;
  body: UploadResponseBody;
  record?: PostRecord;
}

export interface PublisherDeps {
  userCredentials?: CredentialProvider;
  staticCredentials: CredentialProvider;
  client: PublishClient;
  postLog: PostLog;
  logger?: Logger;
}

function failed(httpStatus: number, error: string, record?: PostRecord): UploadOutcome {
  return { httpStatus, body: { status: 'failed', error }, record };
}

/**
 * Upload endpoint orchestration: validate, resolve a token, publish, log.
 *
 * Every outcome past validation writes exactly one post log row, and a post log
 * failure never changes what the caller is told about the publish.
 */
export class Publisher {
  private readonly logger: Logger;

  constructor(private readonly deps: PublisherDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async handle(req: UploadRequest): Promise<UploadOutcome> {
    let file: IncomingVideo;
    try {
      file = this.validate(req.file);
    } catch (err) {
      const cause = toError(err);
      return failed(httpStatusFor(ERROR_CODES.INVALID_INPUT), cause.message);
    }

    const userId = req.user?.id;
    let token: string;
    try {
      token = await this.resolveToken(userId);
    } catch (err) {
      const cause = toError(err);
      const code = cause instanceof ClipcastError ? cause.code : ERROR_CODES.INTERNAL;
      this.logger.warn('upload rejected before publish', { filename: file.originalname, userId, code });
      const record = this.safeRecord({ filename: file.originalname, platform: PLATFORM, status: 'failed', errorCode: code, error: cause.message, userId });
      return failed(httpStatusFor(code), cause.message, record);
    }

    let result: PublishResult;
    try {
      result = await this.deps.client.publish(token, { filename: file.originalname, data: file.buffer, title: req.title });
    } catch (err) {
      const cause = toError(err);
      this.logger.error('publish client threw', { filename: file.originalname, error: cause });
      result = { outcome: 'failed', code: ERROR_CODES.INTERNAL, reason: cause.message };
    }

    if (result.outcome === 'posted') {
      this.logger.info('video posted', { filename: file.originalname, publishId: result.publishId, userId });
      const record = this.safeRecord({ filename: file.originalname, platform: PLATFORM, status: 'posted', publishId: result.publishId, userId });
      return { httpStatus: 200, body: { status: 'posted' }, record };
    }

    const record = this.safeRecord({
      filename: file.originalname,
      platform: PLATFORM,
      status: 'failed',
      errorCode: result.code,
      error: result.reason,
      publishId: result.publishId,
      userId,
    });
    return failed(httpStatusFor(result.code), result.reason, record);
  }

  private validate(file: IncomingVideo | undefined): IncomingVideo {
    if (!file) throw new InvalidInputError('No file provided');
    if (!file.originalname) throw new InvalidInputError('No filename provided');
    if (file.size <= 0 || file.buffer.length === 0) throw new InvalidInputError('Uploaded file is empty');
    return file;
  }

  private resolveToken(userId: string | undefined): Promise<string> {
    if (userId === undefined) return this.deps.staticCredentials.getToken(STATIC_IDENTITY);
    if (!this.deps.userCredentials) return Promise.reject(new NotLinkedError());
    return this.deps.userCredentials.getToken(userId);
  }

  private safeRecord(entry: PostEntry): PostRecord | undefined {
    try {
      return this.deps.postLog.record(entry);
    } catch (err) {
      this.logger.warn('post log unavailable, outcome not recorded', { filename: entry.filename, status: entry.status, error: toError(err) });
      return undefined;
    }
  }
}
