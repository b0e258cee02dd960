/**
 * Search Orchestrator
 * Submits a target, polls the session to completion and returns its
 * deduplicated records
 */

import { PollResult, SearchProvider } from './provider.interface';
import { Clock, LeakRecord, ResolvedSearch, SearchSession, Target } from '../../types';
import { PollingConfig, RetryConfig } from '../../config/schema';
import { createLogger } from '../../utils/logger';
import { withRetry, isRetryableHttpError } from '../../utils/retry';
import { RateLimiter, sleep } from '../../utils/concurrency';
import { SearchFailure, errorMessage, isAuthorizationError } from '../../utils/errors';

const logger = createLogger('search-orchestrator');

const RUN_DEADLINE_REASON = 'Run deadline reached before the search completed';

export interface SearchOrchestratorConfig {
  provider: SearchProvider;
  limiter: RateLimiter;
  polling: PollingConfig;
  retry: RetryConfig;
  maxRecords: number;
  timeoutSeconds?: number;
  buckets?: string[];
  clock?: Clock;
}

export class SearchOrchestrator {
  private provider: SearchProvider;
  private limiter: RateLimiter;
  private polling: PollingConfig;
  private retry: RetryConfig;
  private maxRecords: number;
  private timeoutSeconds?: number;
  private buckets?: string[];
  private clock: Clock;

  constructor(config: SearchOrchestratorConfig) {
    this.provider = config.provider;
    this.limiter = config.limiter;
    this.polling = config.polling;
    this.retry = config.retry;
    this.maxRecords = config.maxRecords;
    this.timeoutSeconds = config.timeoutSeconds;
    this.buckets = config.buckets;
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Resolve a target into its leak records, or fail with SearchFailure.
   * Polling also stops once `signal` (the run deadline) aborts.
   */
  async resolve(target: Target, signal?: AbortSignal): Promise<ResolvedSearch> {
    const sessionId = await this.submit(target);
    const session: SearchSession = {
      id: sessionId,
      status: 'Pending',
      createdAt: this.clock(),
    };

    logger.info('Search submitted', { provider: this.provider.name, sessionId, kind: target.kind });

    const records = await this.waitForCompletion(session, signal);
    const deduplicated = deduplicateRecords(records);

    logger.info('Search complete', {
      sessionId,
      received: records.length,
      unique: deduplicated.length,
    });

    return { session: { ...session }, records: deduplicated };
  }

  private async submit(target: Target): Promise<string> {
    try {
      return await this.call(() =>
        this.provider.submit(target, {
          maxResults: this.maxRecords,
          timeoutSeconds: this.timeoutSeconds,
          buckets: this.buckets,
        })
      );
    } catch (error) {
      throw toSearchFailure(error);
    }
  }

  /**
   * Poll with exponential backoff until Complete, Failed or the maximum wait
   */
  private async waitForCompletion(session: SearchSession, signal?: AbortSignal): Promise<LeakRecord[]> {
    const startedAt = Date.now();
    let interval = this.polling.initialIntervalMs;

    for (;;) {
      const elapsed = Date.now() - startedAt;
      const remaining = this.polling.maxWaitMs - elapsed;
      if (remaining <= 0) {
        return this.timeOut(session, `Search did not complete within ${this.polling.maxWaitMs}ms`);
      }
      if (signal?.aborted) {
        return this.timeOut(session, RUN_DEADLINE_REASON);
      }

      try {
        await sleep(Math.min(interval, remaining), signal);
      } catch (error) {
        if (!signal?.aborted) throw error;
        return this.timeOut(session, RUN_DEADLINE_REASON);
      }
      interval = Math.min(interval * 2, this.polling.maxIntervalMs);

      let result: PollResult;
      try {
        result = await this.call(() => this.provider.poll(session.id));
      } catch (error) {
        throw toSearchFailure(error, session.id);
      }

      logger.debug('Polled search session', { sessionId: session.id, status: result.status });

      if (result.status === 'Complete') {
        session.status = 'Complete';
        return result.records ?? [];
      }

      if (result.status === 'Failed') {
        session.status = 'Failed';
        throw new SearchFailure('ProviderError', result.message ?? 'Search failed at the provider', session.id);
      }
    }
  }

  private async timeOut(session: SearchSession, reason: string): Promise<never> {
    session.status = 'TimedOut';
    logger.warn('Search did not complete in time', {
      sessionId: session.id,
      maxWaitMs: this.polling.maxWaitMs,
      reason,
    });

    if (this.provider.cancel) {
      try {
        await this.limiter.schedule(() => this.cancelSession(session.id));
      } catch (error) {
        logger.warn('Failed to cancel search session', { sessionId: session.id, error: errorMessage(error) });
      }
    }

    throw new SearchFailure('Timeout', reason, session.id);
  }

  private async cancelSession(sessionId: string): Promise<void> {
    if (this.provider.cancel) {
      await this.provider.cancel(sessionId);
    }
  }

  /**
   * One rate-limited provider call, retried on transient errors only
   */
  private call<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(() => this.limiter.schedule(fn), {
      maxRetries: this.retry.maxRetries,
      baseDelayMs: this.retry.baseDelayMs,
      maxDelayMs: this.retry.maxDelayMs,
      shouldRetry: error => !isAuthorizationError(error) && isRetryableHttpError(error),
    });
  }
}

/**
 * Collapse records sharing an id. The last occurrence's fields win; the
 * position of the first occurrence is kept.
 */
export function deduplicateRecords(records: LeakRecord[]): LeakRecord[] {
  const byId = new Map<string, LeakRecord>();
  for (const record of records) {
    byId.set(record.id, record);
  }
  return Array.from(byId.values());
}

function toSearchFailure(error: unknown, sessionId?: string): SearchFailure {
  if (error instanceof SearchFailure) {
    return error;
  }
  if (isAuthorizationError(error)) {
    return new SearchFailure('Unauthorized', errorMessage(error), sessionId);
  }
  return new SearchFailure('ProviderError', errorMessage(error), sessionId);
}
