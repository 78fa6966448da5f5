import axios, { AxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { INIT_PATH, STATUS_PATH } from './tiktok';
import { TIKTOK_TOKEN_PATH } from '../oauth';

// In-process stand-in for the TikTok API, plugged into axios as an adapter.

export interface RecordedCall {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: unknown; // parsed JSON, a Buffer for uploads, or the raw string
}

export interface MockReply {
  status?: number;
  data?: unknown;
}

export type StatusStep = string | { status: string; fail_reason?: string };

export interface MockPlatformOptions {
  publishId?: string;
  uploadUrl?: string;
  init?: (call: RecordedCall) => MockReply;
  upload?: (call: RecordedCall, index: number) => MockReply;
  // consumed one per poll; the last entry repeats
  statuses?: StatusStep[];
  token?: (call: RecordedCall) => MockReply;
}

export function ok(data: unknown): MockReply {
  return { status: 200, data: { data, error: { code: 'ok', message: '', log_id: 'log-test' } } };
}

export function vendorError(code: string, message: string, status = 400): MockReply {
  return { status, data: { data: {}, error: { code, message, log_id: 'log-test' } } };
}

function headerMap(config: InternalAxiosRequestConfig): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(config.headers.toJSON())) {
    if (value !== undefined && value !== null) out[key.toLowerCase()] = String(value);
  }
  return out;
}

function decodeBody(data: unknown): unknown {
  if (Buffer.isBuffer(data)) return data;
  if (typeof data !== 'string') return data;
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

export class MockTikTokPlatform {
  readonly calls: RecordedCall[] = [];
  readonly http: AxiosInstance;
  readonly publishId: string;
  readonly uploadUrl: string;
  private readonly chunks: Array<{ start: number; data: Buffer }> = [];
  private statusPolls = 0;

  constructor(private readonly options: MockPlatformOptions = {}) {
    this.publishId = options.publishId ?? 'p1';
    this.uploadUrl = options.uploadUrl ?? 'https://x/up';
    this.http = axios.create({ adapter: (config) => this.handle(config) });
  }

  callsTo(suffix: string): RecordedCall[] {
    return this.calls.filter((c) => c.url.endsWith(suffix));
  }

  get initCalls() {
    return this.callsTo(INIT_PATH);
  }

  get uploadCalls() {
    return this.calls.filter((c) => c.method === 'PUT');
  }

  get statusCalls() {
    return this.callsTo(STATUS_PATH);
  }

  get tokenCalls() {
    return this.callsTo(TIKTOK_TOKEN_PATH);
  }

  // Reassembles uploaded chunks at the offsets their Content-Range declared.
  reassembled(): Buffer {
    const ordered = [...this.chunks].sort((a, b) => a.start - b.start);
    return Buffer.concat(ordered.map((c) => c.data));
  }

  private async handle(config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
    const call: RecordedCall = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      headers: headerMap(config),
      body: decodeBody(config.data),
    };
    this.calls.push(call);

    const reply = this.route(call);
    const response: AxiosResponse = {
      data: reply.data ?? {},
      status: reply.status ?? 200,
      statusText: String(reply.status ?? 200),
      headers: {},
      config,
      request: {},
    };

    const validate = config.validateStatus;
    if (validate && !validate(response.status)) {
      throw new AxiosError(`Request failed with status code ${response.status}`, AxiosError.ERR_BAD_RESPONSE, config, {}, response);
    }
    return response;
  }

  private route(call: RecordedCall): MockReply {
    if (call.method === 'PUT' && call.url === this.uploadUrl) {
      const index = this.uploadCalls.length - 1;
      const reply = this.options.upload ? this.options.upload(call, index) : { status: 201 };
      if (Buffer.isBuffer(call.body) && (reply.status ?? 200) < 300) {
        const range = /^bytes (\d+)-(\d+)\/(\d+)$/.exec(call.headers['content-range'] ?? '');
        this.chunks.push({ start: range ? Number(range[1]) : 0, data: Buffer.from(call.body) });
      }
      return reply;
    }
    if (call.url.endsWith(INIT_PATH)) {
      return this.options.init
        ? this.options.init(call)
        : ok({ publish_id: this.publishId, upload_url: this.uploadUrl });
    }
    if (call.url.endsWith(STATUS_PATH)) {
      const steps = this.options.statuses ?? ['PUBLISH_COMPLETE'];
      const step = steps[Math.min(this.statusPolls, steps.length - 1)];
      this.statusPolls++;
      const body = typeof step === 'string' ? { status: step } : step;
      return ok({ ...body, publish_id: this.publishId });
    }
    if (call.url.endsWith(TIKTOK_TOKEN_PATH)) {
      if (this.options.token) return this.options.token(call);
      return {
        status: 200,
        data: {
          access_token: 'act.test-access',
          refresh_token: 'rft.test-refresh',
          expires_in: 86400,
          refresh_expires_in: 31536000,
          open_id: 'open-test',
          scope: 'user.info.basic,video.publish',
          token_type: 'Bearer',
        },
      };
    }
    return { status: 404, data: { error: { code: 'not_found', message: `no route for ${call.method} ${call.url}` } } };
  }
}
