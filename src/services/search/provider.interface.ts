/**
 * Search Provider Interface
 * Defines the contract for leak-intelligence search backends
 */

import { LeakRecord, Target } from '../../types';

/**
 * Options for submitting a search
 */
export interface SearchSubmitOptions {
  maxResults: number;
  /** Provider-side search timeout */
  timeoutSeconds?: number;
  buckets?: string[];
}

export type ProviderSessionStatus = 'Pending' | 'Complete' | 'Failed';

/**
 * One poll of a search session. `records` holds the full list once the
 * session is Complete.
 */
export interface PollResult {
  status: ProviderSessionStatus;
  records?: LeakRecord[];
  /** Provider explanation when Failed */
  message?: string;
}

/**
 * Raw bytes of a partial read
 */
export interface PreviewPayload {
  content: Buffer;
  /** Media type without parameters, lower-cased; empty when not reported */
  contentType: string;
}

/**
 * Search provider interface
 * Implementations throw ProviderHttpError for HTTP failures and
 * PreviewUnsupportedError when a record cannot be partially read
 */
export interface SearchProvider {
  /**
   * Provider name identifier
   */
  readonly name: string;

  /**
   * Submit a search and return the provider session identifier
   */
  submit(target: Target, options: SearchSubmitOptions): Promise<string>;

  /**
   * Check session status
   */
  poll(sessionId: string): Promise<PollResult>;

  /**
   * Read at most `byteBudget` bytes of a record without downloading it
   */
  fetchPreview(record: LeakRecord, byteBudget: number, signal?: AbortSignal): Promise<PreviewPayload>;

  /**
   * Stop a running search
   */
  cancel?(sessionId: string): Promise<void>;
}

/**
 * Strip parameters from a Content-Type header value
 */
export function normalizeContentType(header: unknown): string {
  if (typeof header !== 'string') return '';
  return header.split(';')[0].trim().toLowerCase();
}
