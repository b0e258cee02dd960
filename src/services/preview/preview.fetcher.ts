/**
 * Preview Fetcher
 * Retrieves a bounded content snippet for one leak record. Never rejects:
 * every failure degrades to an Unavailable or Unsupported preview.
 */

import { SearchProvider, normalizeContentType } from '../search/provider.interface';
import { LeakRecord, Preview } from '../../types';
import { RetryConfig } from '../../config/schema';
import { createLogger } from '../../utils/logger';
import { withRetry, isRetryableHttpError } from '../../utils/retry';
import { RateLimiter } from '../../utils/concurrency';
import { PreviewUnsupportedError, errorMessage } from '../../utils/errors';
import { sanitizeForLogging, stripControlCharacters } from '../../utils/validation';

const logger = createLogger('preview-fetcher');

export interface PreviewFetcherConfig {
  provider: SearchProvider;
  limiter: RateLimiter;
  byteBudget: number;
  supportedContentTypes: string[];
  retry: RetryConfig;
}

export class PreviewFetcher {
  private provider: SearchProvider;
  private limiter: RateLimiter;
  private byteBudget: number;
  private supportedContentTypes: Set<string>;
  private retry: RetryConfig;

  constructor(config: PreviewFetcherConfig) {
    this.provider = config.provider;
    this.limiter = config.limiter;
    this.byteBudget = config.byteBudget;
    this.supportedContentTypes = new Set(config.supportedContentTypes.map(type => normalizeContentType(type)));
    this.retry = config.retry;
  }

  /**
   * Fetch at most `byteBudget` bytes of the record
   */
  async fetch(record: LeakRecord, signal?: AbortSignal): Promise<Preview> {
    try {
      const payload = await withRetry(
        () => this.limiter.schedule(() => this.provider.fetchPreview(record, this.byteBudget, signal), signal),
        {
          maxRetries: this.retry.maxRetries,
          baseDelayMs: this.retry.baseDelayMs,
          maxDelayMs: this.retry.maxDelayMs,
          shouldRetry: isRetryableHttpError,
          signal,
        }
      );

      // Providers that send no content type are treated as plain text
      const contentType = payload.contentType || 'text/plain';
      if (!this.supportedContentTypes.has(contentType)) {
        logger.debug('Preview content type not supported', { recordId: record.id, contentType });
        return unsupported(record, `Content type ${contentType} is not supported`, contentType);
      }

      const bytes = payload.content.subarray(0, this.byteBudget);
      const content = stripControlCharacters(bytes.toString('utf8'));
      const truncated = bytes.length === this.byteBudget;

      logger.debug('Preview fetched', {
        recordId: record.id,
        bytes: bytes.length,
        truncated,
        sample: sanitizeForLogging(content, 60),
      });

      return {
        recordId: record.id,
        content,
        truncated,
        availability: 'Available',
        contentType,
      };
    } catch (error) {
      if (error instanceof PreviewUnsupportedError) {
        logger.debug('Partial read not supported', { recordId: record.id, visibility: record.visibility });
        return unsupported(record, error.message);
      }

      logger.warn('Preview unavailable', {
        recordId: record.id,
        visibility: record.visibility,
        error: errorMessage(error),
      });

      return {
        recordId: record.id,
        content: '',
        truncated: false,
        availability: 'Unavailable',
        reason: errorMessage(error),
      };
    }
  }
}

function unsupported(record: LeakRecord, reason: string, contentType?: string): Preview {
  return {
    recordId: record.id,
    content: '',
    truncated: false,
    availability: 'Unsupported',
    contentType,
    reason,
  };
}
