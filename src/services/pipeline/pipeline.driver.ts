/**
 * Pipeline Driver
 * Runs search, preview, classify and aggregate for one target
 */

import { SearchOrchestrator } from '../search/search.orchestrator';
import { SearchProvider } from '../search/provider.interface';
import { IntelXProvider } from '../search/intelx.provider';
import { PreviewFetcher } from '../preview/preview.fetcher';
import { RiskClassifier, unknownClassification } from '../ai/risk.classifier';
import { AIProvider } from '../ai/provider.interface';
import { OpenAIProvider } from '../ai/openai.provider';
import { AnthropicProvider } from '../ai/anthropic.provider';
import { BedrockProvider } from '../ai/bedrock.provider';
import { aggregate, summarizeCounts } from '../report/result.aggregator';
import { parseTarget } from '../../models/target.model';
import { AIProviderName, LeakTriageConfig } from '../../config/schema';
import { Classification, Clock, LeakRecord, Preview, Report, ResolvedSearch } from '../../types';
import { createLogger } from '../../utils/logger';
import { MAX_TIMER_MS, RateLimiter, runWithConcurrency, withTimeout } from '../../utils/concurrency';
import { RunTimeout, errorMessage } from '../../utils/errors';

const logger = createLogger('pipeline');

export const TIMED_OUT_SUMMARY = 'analysis timed out';

export interface PipelineOptions {
  concurrency: number;
  recordTimeoutMs: number;
  runDeadlineMs: number;
}

export interface LeakTriagePipelineConfig extends PipelineOptions {
  orchestrator: SearchOrchestrator;
  fetcher: PreviewFetcher;
  classifier: RiskClassifier;
  clock?: Clock;
}

interface RecordOutcome {
  preview: Preview;
  classification: Classification;
}

export class LeakTriagePipeline {
  private orchestrator: SearchOrchestrator;
  private fetcher: PreviewFetcher;
  private classifier: RiskClassifier;
  private options: PipelineOptions;
  private clock: Clock;

  constructor(config: LeakTriagePipelineConfig) {
    this.orchestrator = config.orchestrator;
    this.fetcher = config.fetcher;
    this.classifier = config.classifier;
    this.options = {
      concurrency: config.concurrency,
      recordTimeoutMs: config.recordTimeoutMs,
      runDeadlineMs: config.runDeadlineMs,
    };
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Produce the severity report for a raw target string.
   * Rejects with TargetError or SearchFailure; per-record failures degrade.
   */
  async run(rawTarget: string): Promise<Report> {
    const target = parseTarget(rawTarget);
    const startTime = Date.now();

    logger.info('Starting leak triage', { kind: target.kind });

    // The deadline covers the whole run, search included
    const deadline = new AbortController();
    const deadlineAt = startTime + this.options.runDeadlineMs;
    const expire = (): void => {
      if (!deadline.signal.aborted) {
        deadline.abort(new RunTimeout(this.options.runDeadlineMs, 'Run deadline exceeded'));
      }
    };
    const deadlineTimer = setTimeout(expire, Math.min(this.options.runDeadlineMs, MAX_TIMER_MS));

    const classifications = new Map<string, Classification>();
    const previews = new Map<string, Preview>();
    let forcedUnknown = 0;
    let resolved: ResolvedSearch;

    try {
      resolved = await this.orchestrator.resolve(target, deadline.signal);
      const { records } = resolved;

      await runWithConcurrency(records.length, this.options.concurrency, async index => {
        const record = records[index];
        const remaining = deadlineAt - Date.now();

        if (deadline.signal.aborted || remaining <= 0) {
          expire();
          classifications.set(record.id, unknownClassification(TIMED_OUT_SUMMARY));
          forcedUnknown++;
          return;
        }

        try {
          const outcome = await withTimeout(
            signal => this.processRecord(record, signal),
            Math.min(this.options.recordTimeoutMs, remaining),
            deadline.signal
          );
          previews.set(record.id, outcome.preview);
          classifications.set(record.id, outcome.classification);
        } catch (error) {
          // A record cut short by the remaining run time counts against the run deadline
          if (Date.now() >= deadlineAt) expire();
          logger.warn('Record stage abandoned', { recordId: record.id, error: errorMessage(error) });
          classifications.set(record.id, unknownClassification(TIMED_OUT_SUMMARY));
          forcedUnknown++;
        }
      });
    } finally {
      clearTimeout(deadlineTimer);
    }

    const { session, records } = resolved;
    const findings = aggregate(records, classifications, previews);
    const counts = summarizeCounts(findings);
    const timedOut = deadline.signal.aborted;

    logger.info('Leak triage complete', {
      sessionId: session.id,
      records: records.length,
      counts,
      timedOut,
      forcedUnknown,
      processingTimeMs: Date.now() - startTime,
    });

    return {
      target,
      session,
      totalRecords: records.length,
      counts,
      findings,
      timedOut,
      forcedUnknown,
      generatedAt: this.clock(),
    };
  }

  private async processRecord(record: LeakRecord, signal: AbortSignal): Promise<RecordOutcome> {
    const preview = await this.fetcher.fetch(record, signal);
    const classification = await this.classifier.classify(preview, record, signal);
    return { preview, classification };
  }
}

/**
 * Replacements for the parts createPipeline would otherwise build from config
 */
export interface PipelineOverrides {
  searchProvider?: SearchProvider;
  primaryProvider?: AIProvider;
  fallbackProvider?: AIProvider;
  clock?: Clock;
}

/**
 * Build a classification provider from its configuration section
 */
export function createAIProvider(name: AIProviderName, config: LeakTriageConfig): AIProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider({ ...config.ai.openai, retry: config.retry });
    case 'anthropic':
      return new AnthropicProvider({ ...config.ai.anthropic, retry: config.retry });
    case 'bedrock':
      return new BedrockProvider({ ...config.ai.bedrock, retry: config.retry });
  }
}

/**
 * Wire a pipeline from validated configuration. Rate limiters are shared by
 * every worker of the run.
 */
export function createPipeline(config: LeakTriageConfig, overrides: PipelineOverrides = {}): LeakTriagePipeline {
  const searchProvider =
    overrides.searchProvider ??
    new IntelXProvider({
      apiKey: config.search.apiKey,
      baseUrl: config.search.baseUrl,
      buckets: config.search.buckets,
      requestTimeoutMs: config.search.requestTimeoutMs,
    });

  const primaryProvider = overrides.primaryProvider ?? createAIProvider(config.ai.provider, config);
  const fallbackProvider =
    overrides.fallbackProvider ??
    (config.ai.fallbackProvider ? createAIProvider(config.ai.fallbackProvider, config) : undefined);

  const searchLimiter = new RateLimiter('search', config.rateLimits.search);
  const aiLimiter = new RateLimiter('ai', config.rateLimits.ai);

  const clock = overrides.clock;

  const orchestrator = new SearchOrchestrator({
    provider: searchProvider,
    limiter: searchLimiter,
    polling: config.search.polling,
    retry: config.retry,
    maxRecords: config.search.maxRecords,
    timeoutSeconds: config.search.timeoutSeconds,
    buckets: config.search.buckets,
    clock,
  });

  const fetcher = new PreviewFetcher({
    provider: searchProvider,
    limiter: searchLimiter,
    byteBudget: config.preview.byteBudget,
    supportedContentTypes: config.preview.supportedContentTypes,
    retry: config.retry,
  });

  const classifier = new RiskClassifier({
    primaryProvider,
    fallbackProvider,
    limiter: aiLimiter,
  });

  logger.debug('Pipeline created', {
    searchProvider: searchProvider.name,
    primaryProvider: primaryProvider.name,
    fallbackProvider: fallbackProvider?.name ?? 'none',
  });

  return new LeakTriagePipeline({
    orchestrator,
    fetcher,
    classifier,
    concurrency: config.pipeline.concurrency,
    recordTimeoutMs: config.pipeline.recordTimeoutMs,
    runDeadlineMs: config.pipeline.runDeadlineMs,
    clock,
  });
}
