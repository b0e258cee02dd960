/**
 * Intelligence X Search Provider
 * Implements the search provider interface over the IntelX HTTP API
 */

import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { z } from 'zod';
import {
  PollResult,
  PreviewPayload,
  SearchProvider,
  SearchSubmitOptions,
  normalizeContentType,
} from './provider.interface';
import { BucketVisibility, LeakRecord, Target } from '../../types';
import { createLogger } from '../../utils/logger';
import { PreviewFailure, PreviewUnsupportedError, ProviderHttpError } from '../../utils/errors';
import { toProviderHttpError } from '../../utils/http';

const logger = createLogger('intelx-provider');

const PROVIDER_NAME = 'intelx';
const USER_AGENT = 'leak-triage/1.0';

// IntelX result endpoint status codes
const RESULT_STATUS = {
  OK_MORE_PENDING: 0,
  FINISHED: 1,
  ID_NOT_FOUND: 2,
  NO_RESULTS_YET: 3,
} as const;

// IntelX search submission status codes
const SUBMIT_STATUS = {
  OK: 0,
  INVALID_TERM: 1,
  MAX_CONCURRENT: 2,
} as const;

// Sort by date, newest first
const SORT_DATE_DESC = 4;

export interface IntelXConfig {
  apiKey: string;
  baseUrl: string;
  buckets: string[];
  requestTimeoutMs: number;
}

const SubmitResponseSchema = z.object({
  id: z.string().min(1),
  status: z.number().int().default(SUBMIT_STATUS.OK),
});

/**
 * Raw record as returned by /intelligent/search/result
 */
const IntelXRecordSchema = z
  .object({
    systemid: z.string().min(1),
    storageid: z.string().optional(),
    bucket: z.string().default(''),
    name: z.string().optional(),
    description: z.string().optional(),
    size: z.number().nonnegative().default(0),
    date: z.string().optional(),
    added: z.string().optional(),
    media: z.number().int().optional(),
  })
  .passthrough();

export type IntelXRecord = z.infer<typeof IntelXRecordSchema>;

const ResultResponseSchema = z.object({
  status: z.number().int(),
  records: z.array(z.unknown()).nullable().default([]),
});

interface SessionState {
  maxResults: number;
  records: LeakRecord[];
}

export class IntelXProvider implements SearchProvider {
  readonly name = PROVIDER_NAME;

  private apiKey: string;
  private baseUrl: string;
  private buckets: string[];
  private timeout: number;
  private http: AxiosInstance;
  private sessions: Map<string, SessionState> = new Map();

  constructor(config: IntelXConfig, http: AxiosInstance = axios.create()) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.buckets = config.buckets;
    this.timeout = config.requestTimeoutMs;
    this.http = http;
  }

  /**
   * Submit a leak search for the target
   */
  async submit(target: Target, options: SearchSubmitOptions): Promise<string> {
    logger.debug('Submitting IntelX search', { kind: target.kind, maxResults: options.maxResults });

    const data = await this.request(() =>
      this.http.post(
        `${this.baseUrl}/intelligent/search`,
        {
          term: target.value,
          buckets: options.buckets ?? this.buckets,
          lookuplevel: 0,
          maxresults: options.maxResults,
          timeout: options.timeoutSeconds ?? 5,
          datefrom: '',
          dateto: '',
          sort: SORT_DATE_DESC,
          media: 0,
          terminate: [],
        },
        { headers: this.headers(), timeout: this.timeout }
      )
    );

    const parsed = SubmitResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderHttpError(PROVIDER_NAME, 'Search submission returned no search id', 502);
    }

    if (parsed.data.status === SUBMIT_STATUS.INVALID_TERM) {
      throw new ProviderHttpError(PROVIDER_NAME, 'Search term rejected as invalid', 400);
    }
    if (parsed.data.status === SUBMIT_STATUS.MAX_CONCURRENT) {
      throw new ProviderHttpError(PROVIDER_NAME, 'Maximum concurrent searches reached', 429);
    }

    this.sessions.set(parsed.data.id, { maxResults: options.maxResults, records: [] });
    return parsed.data.id;
  }

  /**
   * Fetch the next batch of results; records accumulate until IntelX reports the search finished
   */
  async poll(sessionId: string): Promise<PollResult> {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return { status: 'Failed', message: `Unknown search session ${sessionId}` };
    }

    const data = await this.request(() =>
      this.http.get(`${this.baseUrl}/intelligent/search/result`, {
        params: {
          id: sessionId,
          limit: Math.max(1, state.maxResults - state.records.length),
          statistics: 0,
          previewlines: 0,
        },
        headers: this.headers(),
        timeout: this.timeout,
      })
    );

    const parsed = ResultResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderHttpError(PROVIDER_NAME, 'Malformed search result payload', 502);
    }

    for (const raw of parsed.data.records ?? []) {
      const record = toLeakRecord(raw);
      if (record) {
        state.records.push(record);
      }
    }

    const { status } = parsed.data;

    if (status === RESULT_STATUS.ID_NOT_FOUND) {
      this.sessions.delete(sessionId);
      return { status: 'Failed', message: 'Search id not found' };
    }

    if (status === RESULT_STATUS.FINISHED || state.records.length >= state.maxResults) {
      this.sessions.delete(sessionId);
      return { status: 'Complete', records: state.records.slice(0, state.maxResults) };
    }

    if (status === RESULT_STATUS.OK_MORE_PENDING || status === RESULT_STATUS.NO_RESULTS_YET) {
      return { status: 'Pending' };
    }

    this.sessions.delete(sessionId);
    return { status: 'Failed', message: `Unexpected result status ${status}` };
  }

  /**
   * Read the first bytes of a stored record with a Range request
   */
  async fetchPreview(record: LeakRecord, byteBudget: number, signal?: AbortSignal): Promise<PreviewPayload> {
    if (!record.storageId) {
      throw new PreviewFailure(record.id, 'Record has no storage identifier');
    }

    try {
      const response = await this.http.get<Readable>(`${this.baseUrl}/file/read`, {
        params: {
          type: 0,
          systemid: record.id,
          storageid: record.storageId,
          bucket: record.bucket,
        },
        headers: { ...this.headers(), Range: `bytes=0-${byteBudget - 1}` },
        responseType: 'stream',
        timeout: this.timeout,
        signal,
      });

      const content = await readAtMost(response.data, byteBudget);
      return {
        content,
        contentType: normalizeContentType(response.headers['content-type']),
      };
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      if (status === 416 || status === 501) {
        throw new PreviewUnsupportedError(`Partial reads not supported for bucket ${record.bucket} (status ${status})`);
      }
      throw this.toProviderError(error);
    }
  }

  /**
   * Terminate a running search
   */
  async cancel(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
    await this.request(() =>
      this.http.get(`${this.baseUrl}/intelligent/search/terminate`, {
        params: { id: sessionId },
        headers: this.headers(),
        timeout: this.timeout,
      })
    );
  }

  private headers(): Record<string, string> {
    return {
      'x-key': this.apiKey,
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
    };
  }

  private async request(call: () => Promise<{ data: unknown }>): Promise<unknown> {
    try {
      const response = await call();
      return response.data;
    } catch (error) {
      throw this.toProviderError(error);
    }
  }

  private toProviderError(error: unknown): Error {
    return toProviderHttpError(PROVIDER_NAME, error, {
      401: 'Invalid or unauthorized API key',
      402: 'Account has no remaining credits',
      403: 'Invalid or unauthorized API key',
    });
  }
}

/**
 * Map a raw IntelX record; malformed records are dropped with a warning
 */
export function toLeakRecord(raw: unknown): LeakRecord | null {
  const parsed = IntelXRecordSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Dropping malformed search record', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }

  const item = parsed.data;
  return {
    id: item.systemid,
    source: item.name?.trim() || item.description?.trim() || item.bucket || item.systemid,
    bucket: item.bucket,
    visibility: bucketVisibility(item.bucket),
    sizeBytes: item.size,
    discoveredAt: parseProviderDate(item.date ?? item.added),
    storageId: item.storageid,
    mediaType: item.media,
  };
}

/**
 * Infer visibility from the bucket name, e.g. leaks.public.general
 */
export function bucketVisibility(bucket: string): BucketVisibility {
  const segments = bucket.toLowerCase().split('.');
  if (segments.includes('public')) return 'Public';
  if (segments.includes('private')) return 'Private';
  return 'Unknown';
}

/**
 * Parse an IntelX timestamp; the zero date and garbage map to null
 */
export function parseProviderDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  if (Number.isNaN(date.getTime()) || date.getUTCFullYear() <= 1) {
    return null;
  }
  return date;
}

/**
 * Read at most `limit` bytes from a stream, then release it
 */
async function readAtMost(stream: Readable, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;

  try {
    for await (const chunk of stream) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      chunks.push(buffer);
      total += buffer.length;
      if (total >= limit) break;
    }
  } finally {
    stream.destroy();
  }

  return Buffer.concat(chunks).subarray(0, limit);
}
