/**
 * Leak Triage
 *
 * Searches leak intelligence for an email, domain or IP address, previews
 * each exposed record and asks a language model to rank its risk.
 *
 * @license GPL-3.0
 */

// Export handlers
export { runCli } from './handlers';
export type { CliDependencies, CliIO } from './handlers';

// Export types
export * from './types';

// Export pipeline
export { LeakTriagePipeline, createPipeline, createAIProvider, TIMED_OUT_SUMMARY } from './services/pipeline/pipeline.driver';
export type { PipelineOverrides } from './services/pipeline/pipeline.driver';
export { aggregate, compareFindings, summarizeCounts, buildRankKey, RISK_RANK } from './services/report/result.aggregator';

// Export services
export { SearchOrchestrator, deduplicateRecords } from './services/search/search.orchestrator';
export { IntelXProvider } from './services/search/intelx.provider';
export type { SearchProvider, PollResult, PreviewPayload } from './services/search/provider.interface';
export { PreviewFetcher } from './services/preview/preview.fetcher';
export {
  OpenAIProvider,
  AnthropicProvider,
  ANTHROPIC_CLAUDE_MODELS,
  BedrockProvider,
  BEDROCK_CLAUDE_MODELS,
  RiskClassifier,
  parseClassificationResponse,
} from './services/ai';
export type { AIProvider, PromptOptions, ProviderHealth } from './services/ai';

// Export rendering
export { buildPlainTextReport, buildJsonReport } from './templates/report.text';

// Export configuration
export { loadConfig } from './config';
export type { LeakTriageConfig } from './config/schema';

// Export models
export { parseTarget, inferTargetKind } from './models/target.model';

// Export errors
export {
  ConfigurationError,
  TargetError,
  SearchFailure,
  ProviderHttpError,
  RunTimeout,
} from './utils/errors';
