/**
 * Configuration Schema
 * Zod-based validation for Leak Triage configuration
 */

import { z } from 'zod';

export const AI_PROVIDERS = ['openai', 'anthropic', 'bedrock'] as const;
export type AIProviderName = (typeof AI_PROVIDERS)[number];

export const DEFAULT_SUPPORTED_CONTENT_TYPES = [
  'text/plain',
  'text/csv',
  'text/markdown',
  'text/xml',
  'text/yaml',
  'text/x-sql',
  'application/json',
  'application/xml',
  'application/x-yaml',
  'application/sql',
];

/**
 * Search provider (Intelligence X) configuration
 */
const PollingConfigSchema = z.object({
  initialIntervalMs: z.number().int().positive().default(500),
  maxIntervalMs: z.number().int().positive().default(5000),
  maxWaitMs: z.number().int().positive().default(30000),
});

const SearchConfigSchema = z.object({
  apiKey: z.string().min(1, 'Search provider key (INTELX_KEY) is required'),
  baseUrl: z.string().url().default('https://2.intelx.io'),
  buckets: z.array(z.string().min(1)).default(['leaks.private.general', 'leaks.public.general']),
  maxRecords: z.number().int().positive().max(1000).default(20),
  timeoutSeconds: z.number().int().positive().default(5),
  requestTimeoutMs: z.number().int().positive().default(10000),
  polling: PollingConfigSchema.default({}),
});

/**
 * Preview fetcher configuration
 */
const PreviewConfigSchema = z.object({
  byteBudget: z.number().int().positive().max(1024 * 1024).default(4096),
  supportedContentTypes: z.array(z.string().min(1)).default(DEFAULT_SUPPORTED_CONTENT_TYPES),
});

/**
 * AI Provider configuration schemas
 */
const OpenAIConfigSchema = z.object({
  apiKey: z.string().default(''),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  model: z.string().min(1).default('gpt-3.5-turbo'),
  temperature: z.number().min(0).max(2).default(0.2),
  maxTokens: z.number().positive().default(512),
  timeout: z.number().positive().default(60000),
});

const AnthropicConfigSchema = z.object({
  apiKey: z.string().default(''),
  model: z.string().min(1).default('claude-sonnet-4-5-20250514'),
  maxTokens: z.number().positive().default(512),
  timeout: z.number().positive().default(60000),
});

const BedrockConfigSchema = z.object({
  region: z.string().default('us-east-1'),
  modelId: z.string().default('anthropic.claude-sonnet-4-5-20250929-v1:0'),
  maxTokens: z.number().positive().default(512),
  timeout: z.number().positive().default(60000),
});

const AIConfigSchema = z.object({
  provider: z.enum(AI_PROVIDERS).default('openai'),
  fallbackProvider: z.enum(AI_PROVIDERS).optional(),
  openai: OpenAIConfigSchema.default({}),
  anthropic: AnthropicConfigSchema.default({}),
  bedrock: BedrockConfigSchema.default({}),
});

/**
 * Pipeline (worker pool and deadlines) configuration
 */
const PipelineConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(50).default(5),
  recordTimeoutMs: z.number().int().positive().default(60000),
  runDeadlineMs: z.number().int().positive().default(300000),
});

const RateLimitSchema = z.object({
  maxConcurrent: z.number().int().min(1),
  minIntervalMs: z.number().int().min(0),
});

const RateLimitsConfigSchema = z.object({
  search: RateLimitSchema.default({ maxConcurrent: 3, minIntervalMs: 250 }),
  ai: RateLimitSchema.default({ maxConcurrent: 3, minIntervalMs: 500 }),
});

const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().min(0).default(30000),
});

/**
 * Complete Leak Triage configuration schema
 */
export const LeakTriageConfigSchema = z
  .object({
    search: SearchConfigSchema,
    preview: PreviewConfigSchema.default({}),
    ai: AIConfigSchema.default({}),
    pipeline: PipelineConfigSchema.default({}),
    rateLimits: RateLimitsConfigSchema.default({}),
    retry: RetryConfigSchema.default({}),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    version: z.string().optional(),
  })
  .superRefine((config, ctx) => {
    const providers = new Set<AIProviderName>([config.ai.provider]);
    if (config.ai.fallbackProvider) {
      providers.add(config.ai.fallbackProvider);
    }

    // Bedrock authenticates through the AWS credential chain
    for (const provider of providers) {
      if (provider === 'openai' && !config.ai.openai.apiKey) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ai', 'openai', 'apiKey'],
          message: 'Classification provider key (OPENAI_API_KEY) is required',
        });
      }
      if (provider === 'anthropic' && !config.ai.anthropic.apiKey) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ai', 'anthropic', 'apiKey'],
          message: 'Classification provider key (ANTHROPIC_API_KEY) is required',
        });
      }
    }

    if (config.ai.fallbackProvider === config.ai.provider) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ai', 'fallbackProvider'],
        message: 'Fallback provider must differ from the primary provider',
      });
    }

    if (config.search.polling.maxIntervalMs < config.search.polling.initialIntervalMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['search', 'polling', 'maxIntervalMs'],
        message: 'maxIntervalMs must be at least initialIntervalMs',
      });
    }
  });

/**
 * Inferred TypeScript type from schema
 */
export type LeakTriageConfig = z.infer<typeof LeakTriageConfigSchema>;
export type SearchConfig = LeakTriageConfig['search'];
export type PollingConfig = SearchConfig['polling'];
export type PreviewConfig = LeakTriageConfig['preview'];
export type AIConfig = LeakTriageConfig['ai'];
export type OpenAIConfig = AIConfig['openai'];
export type AnthropicConfig = AIConfig['anthropic'];
export type BedrockConfig = AIConfig['bedrock'];
export type PipelineConfig = LeakTriageConfig['pipeline'];
export type RateLimitsConfig = LeakTriageConfig['rateLimits'];
export type RetryConfig = LeakTriageConfig['retry'];

/**
 * Partial configuration for merging
 */
export type PartialLeakTriageConfig = z.input<typeof LeakTriageConfigSchema>;

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): LeakTriageConfig {
  return LeakTriageConfigSchema.parse(config);
}

/**
 * Safely validate configuration, returning errors
 */
export function safeValidateConfig(config: unknown):
  | { success: true; data: LeakTriageConfig }
  | { success: false; errors: z.ZodError } {
  const result = LeakTriageConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: result.error };
}

/**
 * Render zod issues as `path: message` lines
 */
export function formatConfigIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
