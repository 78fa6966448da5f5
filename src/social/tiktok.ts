import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { PublishConfig } from '../config';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { ClipcastError, ERROR_CODES, PlatformRejectedError, PublishTimeoutError, toError } from '../errors';
import { contentRange, planChunks, sliceChunk } from './chunks';
import type { ChunkPlan } from './chunks';

export const INIT_PATH = '/v2/post/publish/video/init/';
export const STATUS_PATH = '/v2/post/publish/status/fetch/';

const UPLOAD_OK = new Set([200, 201, 206]);

export interface VideoFile {
  filename: string;
  data: Buffer;
  title?: string;
}

export type PublishResult =
  | { outcome: 'posted'; publishId: string }
  | { outcome: 'failed'; code: string; reason: string; publishId?: string };

// One upload's walk through the three vendor calls.
export type PublishSession =
  | { stage: 'initialized'; publishId: string; uploadUrl: string; plan: ChunkPlan }
  | { stage: 'uploaded'; publishId: string; uploadUrl: string; chunkCount: number }
  | { stage: 'status-checked'; publishId: string; polls: number; result: PublishResult };

// ── Vendor envelopes ──────────────────────────────────────────────────────────

const ErrorEnvelope = z.object({
  code: z.string(),
  message: z.string().optional().default(''),
  log_id: z.string().optional(),
});

const InitResponse = z.object({
  data: z
    .object({ publish_id: z.string().optional(), upload_url: z.string().optional() })
    .optional(),
  error: ErrorEnvelope.optional(),
});

const StatusResponse = z.object({
  data: z
    .object({ status: z.string().optional(), fail_reason: z.string().optional() })
    .optional(),
  error: ErrorEnvelope.optional(),
});

type Envelope = { error?: z.infer<typeof ErrorEnvelope> };

function assertOk(body: Envelope, httpStatus: number, step: string): void {
  if (!body.error) {
    throw new PlatformRejectedError(`${step}: unexpected response (HTTP ${httpStatus})`, 'invalid_response');
  }
  if (body.error.code !== 'ok') {
    throw new PlatformRejectedError(body.error.message || `${step} failed`, body.error.code);
  }
}

function bearer(token: string) {
  return { Authorization: `Bearer ${token}`, 'Content-Type': 'application/json; charset=UTF-8' };
}

// ── Client ────────────────────────────────────────────────────────────────────

export interface PublishClientOptions extends PublishConfig {
  http: AxiosInstance;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface PublishClient {
  publish(token: string, file: VideoFile): Promise<PublishResult>;
}

export class TikTokPublishClient implements PublishClient {
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: PublishClientOptions) {
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? ((ms) => new Promise((r) => setTimeout(r, ms)));
  }

  async publish(token: string, file: VideoFile): Promise<PublishResult> {
    let publishId: string | undefined;
    try {
      const initialized = await this.initialize(token, file);
      publishId = initialized.publishId;
      const uploaded = await this.upload(initialized, file);
      const checked = await this.checkStatus(token, uploaded);
      return checked.result;
    } catch (err) {
      const result = this.toFailure(err, publishId);
      this.logger.warn('tiktok publish failed', { filename: file.filename, code: result.code, reason: result.reason });
      return result;
    }
  }

  async initialize(token: string, file: VideoFile): Promise<Extract<PublishSession, { stage: 'initialized' }>> {
    const plan = planChunks(file.data.length, this.options.chunkSize);
    const payload = {
      post_info: {
        title: file.title ?? titleFromFilename(file.filename),
        privacy_level: this.options.privacyLevel,
        disable_duet: false,
        disable_comment: false,
        disable_stitch: false,
      },
      source_info: {
        source: 'FILE_UPLOAD',
        video_size: plan.videoSize,
        chunk_size: plan.chunkSize,
        total_chunk_count: plan.totalChunkCount,
      },
    };

    this.logger.info('tiktok publish init', { filename: file.filename, size: plan.videoSize, chunks: plan.totalChunkCount });
    const resp = await this.options.http.post(`${this.options.apiBase}${INIT_PATH}`, payload, {
      headers: bearer(token),
      timeout: this.options.requestTimeoutMs,
      validateStatus: () => true,
    });

    const body = InitResponse.safeParse(resp.data);
    if (!body.success) {
      throw new PlatformRejectedError(`init: unexpected response (HTTP ${resp.status})`, 'invalid_response');
    }
    assertOk(body.data, resp.status, 'init');

    const publishId = body.data.data?.publish_id;
    const uploadUrl = body.data.data?.upload_url;
    if (!publishId || !uploadUrl) {
      throw new PlatformRejectedError('init: response is missing publish_id or upload_url', 'invalid_response');
    }
    return { stage: 'initialized', publishId, uploadUrl, plan };
  }

  async upload(
    session: Extract<PublishSession, { stage: 'initialized' }>,
    file: VideoFile
  ): Promise<Extract<PublishSession, { stage: 'uploaded' }>> {
    const { plan } = session;
    for (const chunk of plan.chunks) {
      const body = sliceChunk(file.data, chunk);
      this.logger.debug('tiktok upload chunk', { publishId: session.publishId, index: chunk.index, bytes: body.length });

      const resp = await this.options.http.put(session.uploadUrl, body, {
        headers: {
          'Content-Type': 'video/mp4',
          'Content-Length': String(body.length),
          'Content-Range': contentRange(chunk, plan.videoSize),
        },
        timeout: this.options.requestTimeoutMs,
        maxBodyLength: Infinity,
        validateStatus: () => true,
      });

      if (!UPLOAD_OK.has(resp.status)) {
        throw new PlatformRejectedError(
          `Chunk ${chunk.index} upload failed with status ${resp.status}`,
          'upload_failed'
        );
      }
    }
    return {
      stage: 'uploaded',
      publishId: session.publishId,
      uploadUrl: session.uploadUrl,
      chunkCount: plan.totalChunkCount,
    };
  }

  async checkStatus(
    token: string,
    session: Extract<PublishSession, { stage: 'uploaded' }>
  ): Promise<Extract<PublishSession, { stage: 'status-checked' }>> {
    const { publishId } = session;
    const maxPolls = this.options.maxStatusPolls;

    for (let poll = 1; poll <= maxPolls; poll++) {
      const status = await this.fetchStatus(token, publishId);
      this.logger.debug('tiktok publish status', { publishId, poll, status: status.status });

      if (status.status === 'PUBLISH_COMPLETE') {
        return { stage: 'status-checked', publishId, polls: poll, result: { outcome: 'posted', publishId } };
      }
      if (status.status === 'FAILED') {
        return {
          stage: 'status-checked',
          publishId,
          polls: poll,
          result: {
            outcome: 'failed',
            code: ERROR_CODES.PLATFORM_REJECTED,
            reason: status.failReason || 'FAILED',
            publishId,
          },
        };
      }
      if (poll < maxPolls) await this.sleep(this.options.statusPollIntervalMs);
    }

    throw new PublishTimeoutError();
  }

  private async fetchStatus(token: string, publishId: string): Promise<{ status?: string; failReason?: string }> {
    const resp = await this.options.http.post(
      `${this.options.apiBase}${STATUS_PATH}`,
      { publish_id: publishId },
      { headers: bearer(token), timeout: this.options.requestTimeoutMs, validateStatus: () => true }
    );

    const body = StatusResponse.safeParse(resp.data);
    if (!body.success) {
      throw new PlatformRejectedError(`status: unexpected response (HTTP ${resp.status})`, 'invalid_response');
    }
    assertOk(body.data, resp.status, 'status');
    return { status: body.data.data?.status, failReason: body.data.data?.fail_reason };
  }

  private toFailure(err: unknown, publishId?: string): Extract<PublishResult, { outcome: 'failed' }> {
    if (err instanceof ClipcastError) {
      return { outcome: 'failed', code: err.code, reason: err.message, publishId };
    }
    if (axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')) {
      return { outcome: 'failed', code: ERROR_CODES.TIMEOUT, reason: 'timeout', publishId };
    }
    const cause = toError(err);
    return { outcome: 'failed', code: ERROR_CODES.PLATFORM_REJECTED, reason: cause.message, publishId };
  }
}

export function titleFromFilename(filename: string): string {
  const base = filename.replace(/\.[^.]+$/, '').trim();
  // code points, so a surrogate pair is never split
  return base.length > 0 ? Array.from(base).slice(0, 150).join('') : 'Untitled video';
}
