/**
 * Configuration Loader
 * Loads configuration from multiple sources with priority chain
 */

import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import {
  LeakTriageConfig,
  formatConfigIssues,
  safeValidateConfig,
} from './schema';
import { createLogger } from '../utils/logger';
import { ConfigurationError, errorMessage } from '../utils/errors';

const logger = createLogger('config');

/**
 * Configuration priority (highest to lowest):
 * 1. Environment variables (runtime overrides)
 * 2. S3 configuration file (LEAK_TRIAGE_CONFIG_S3=s3://bucket/key)
 * 3. Default values
 */

type EnvValueType = 'string' | 'number' | 'list';

interface EnvMapping {
  path: string;
  type: EnvValueType;
}

/**
 * Environment variable mappings
 */
const ENV_MAPPINGS: Record<string, EnvMapping> = {
  // Search provider
  INTELX_KEY: { path: 'search.apiKey', type: 'string' },
  INTELX_BASE_URL: { path: 'search.baseUrl', type: 'string' },
  LEAK_TRIAGE_BUCKETS: { path: 'search.buckets', type: 'list' },
  LEAK_TRIAGE_MAX_RECORDS: { path: 'search.maxRecords', type: 'number' },
  LEAK_TRIAGE_SEARCH_MAX_WAIT_MS: { path: 'search.polling.maxWaitMs', type: 'number' },

  // Preview
  LEAK_TRIAGE_PREVIEW_BYTES: { path: 'preview.byteBudget', type: 'number' },

  // AI
  LEAK_TRIAGE_AI_PROVIDER: { path: 'ai.provider', type: 'string' },
  LEAK_TRIAGE_AI_FALLBACK: { path: 'ai.fallbackProvider', type: 'string' },
  OPENAI_API_KEY: { path: 'ai.openai.apiKey', type: 'string' },
  OPENAI_BASE_URL: { path: 'ai.openai.baseUrl', type: 'string' },
  LLM_MODEL: { path: 'ai.openai.model', type: 'string' },
  ANTHROPIC_API_KEY: { path: 'ai.anthropic.apiKey', type: 'string' },
  CLAUDE_MODEL: { path: 'ai.anthropic.model', type: 'string' },
  LEAK_TRIAGE_BEDROCK_REGION: { path: 'ai.bedrock.region', type: 'string' },
  LEAK_TRIAGE_BEDROCK_MODEL: { path: 'ai.bedrock.modelId', type: 'string' },

  // Pipeline
  LEAK_TRIAGE_CONCURRENCY: { path: 'pipeline.concurrency', type: 'number' },
  LEAK_TRIAGE_RECORD_TIMEOUT_MS: { path: 'pipeline.recordTimeoutMs', type: 'number' },
  LEAK_TRIAGE_RUN_DEADLINE_MS: { path: 'pipeline.runDeadlineMs', type: 'number' },

  // Logging
  LOG_LEVEL: { path: 'logLevel', type: 'string' },
};

/**
 * Load configuration from all sources
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<LeakTriageConfig> {
  logger.debug('Loading configuration');

  // Start with defaults
  let config = getDefaultConfig();

  // Try to load from S3 if configured
  const s3ConfigPath = env.LEAK_TRIAGE_CONFIG_S3;
  if (s3ConfigPath) {
    try {
      const s3Config = await loadConfigFromS3(s3ConfigPath, env.AWS_REGION ?? 'us-east-1');
      config = mergeConfigs(config, s3Config);
      logger.info('Loaded configuration from S3', { path: s3ConfigPath });
    } catch (error) {
      logger.warn('Failed to load S3 configuration', {
        path: s3ConfigPath,
        error: errorMessage(error),
      });
    }
  }

  // Apply environment variable overrides
  config = applyEnvironmentOverrides(config, env);

  return validateLoadedConfig(config);
}

/**
 * Validate a merged configuration, raising ConfigurationError with every issue
 */
export function validateLoadedConfig(config: unknown): LeakTriageConfig {
  const validation = safeValidateConfig(config);

  if (!validation.success) {
    const issues = formatConfigIssues(validation.errors);
    logger.error('Configuration validation failed', { issues });
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  logger.debug('Configuration loaded successfully', {
    aiProvider: validation.data.ai.provider,
    fallbackProvider: validation.data.ai.fallbackProvider ?? 'none',
    concurrency: validation.data.pipeline.concurrency,
    maxRecords: validation.data.search.maxRecords,
  });

  return validation.data;
}

/**
 * Get default configuration
 */
function getDefaultConfig(): Record<string, unknown> {
  return {
    search: {
      apiKey: '',
      baseUrl: 'https://2.intelx.io',
      buckets: ['leaks.private.general', 'leaks.public.general'],
      maxRecords: 20,
    },
    ai: {
      provider: 'openai',
    },
    logLevel: 'info',
  };
}

/**
 * Load configuration from S3
 */
async function loadConfigFromS3(s3Path: string, region: string): Promise<Record<string, unknown>> {
  // Parse S3 path: s3://bucket/key
  const match = s3Path.match(/^s3:\/\/([^/]+)\/(.+)$/);
  if (!match) {
    throw new Error(`Invalid S3 path: ${s3Path}`);
  }

  const [, bucket, key] = match;
  const client = new S3Client({ region });

  const response = await client.send(
    new GetObjectCommand({
      Bucket: bucket,
      Key: key,
    })
  );

  if (!response.Body) {
    throw new Error('Empty response from S3');
  }

  const parsed: unknown = JSON.parse(await response.Body.transformToString('utf-8'));
  if (!isPlainObject(parsed)) {
    throw new Error('S3 configuration must be a JSON object');
  }

  return parsed;
}

/**
 * Apply environment variable overrides to configuration
 */
function applyEnvironmentOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const result = structuredClone(config);

  for (const [envVar, mapping] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedValue(result, mapping.path, parseEnvValue(value, mapping.type));
    }
  }

  return result;
}

/**
 * Parse environment variable value to the type its setting expects
 */
function parseEnvValue(value: string, type: EnvValueType): unknown {
  switch (type) {
    case 'list':
      return value.split(',').map(s => s.trim()).filter(Boolean);
    case 'number':
      // Left as a string when not numeric so validation reports the setting
      return /^\d+$/.test(value.trim()) ? parseInt(value, 10) : value;
    case 'string':
      return value.trim();
  }
}

/**
 * Set a nested value in an object using dot notation path
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = obj;

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i];
    const existing = current[key];
    if (isPlainObject(existing)) {
      current = existing;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[keys[keys.length - 1]] = value;
}

/**
 * Deep merge two configuration objects
 */
export function mergeConfigs(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    if (isPlainObject(value) && isPlainObject(existing)) {
      result[key] = mergeConfigs(existing, value);
    } else if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// Re-export types
export type { LeakTriageConfig, PartialLeakTriageConfig } from './schema';
