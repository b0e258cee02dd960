/**
 * Configuration schema tests
 */

import {
  validateConfig,
  safeValidateConfig,
  formatConfigIssues,
  DEFAULT_SUPPORTED_CONTENT_TYPES,
} from '../../../src/config/schema';

describe('LeakTriageConfigSchema', () => {
  const validConfig = {
    search: {
      apiKey: 'test-intelx-key',
    },
    ai: {
      provider: 'anthropic',
      anthropic: {
        apiKey: 'test-anthropic-key',
      },
    },
  };

  describe('validateConfig', () => {
    it('should accept valid configuration', () => {
      const result = validateConfig(validConfig);
      expect(result.ai.provider).toBe('anthropic');
      expect(result.search.apiKey).toBe('test-intelx-key');
    });

    it('should apply defaults', () => {
      const result = validateConfig(validConfig);

      expect(result.search.baseUrl).toBe('https://2.intelx.io');
      expect(result.search.buckets).toEqual(['leaks.private.general', 'leaks.public.general']);
      expect(result.search.maxRecords).toBe(20);
      expect(result.search.polling).toEqual({ initialIntervalMs: 500, maxIntervalMs: 5000, maxWaitMs: 30000 });
      expect(result.preview).toEqual({ byteBudget: 4096, supportedContentTypes: DEFAULT_SUPPORTED_CONTENT_TYPES });
      expect(result.pipeline).toEqual({ concurrency: 5, recordTimeoutMs: 60000, runDeadlineMs: 300000 });
      expect(result.rateLimits.search).toEqual({ maxConcurrent: 3, minIntervalMs: 250 });
      expect(result.retry).toEqual({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 30000 });
      expect(result.ai.openai.model).toBe('gpt-3.5-turbo');
      expect(result.logLevel).toBe('info');
    });

    it('should default the classification provider to openai', () => {
      const result = validateConfig({
        search: { apiKey: 'test-intelx-key' },
        ai: { openai: { apiKey: 'test-openai-key' } },
      });

      expect(result.ai.provider).toBe('openai');
      expect(result.ai.openai.baseUrl).toBe('https://api.openai.com/v1');
    });

    it('should not require a key for bedrock', () => {
      const result = validateConfig({
        search: { apiKey: 'test-intelx-key' },
        ai: { provider: 'bedrock' },
      });

      expect(result.ai.bedrock.region).toBe('us-east-1');
    });

    it('should reject invalid provider', () => {
      expect(() =>
        validateConfig({
          ...validConfig,
          ai: { provider: 'invalid' },
        })
      ).toThrow();
    });
  });

  describe('safeValidateConfig', () => {
    it('should return success for valid config', () => {
      const result = safeValidateConfig(validConfig);
      expect(result.success).toBe(true);
    });

    it('should report a missing search key', () => {
      const result = safeValidateConfig({ search: { apiKey: '' }, ai: { provider: 'bedrock' } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatConfigIssues(result.errors)).toEqual([
          'search.apiKey: Search provider key (INTELX_KEY) is required',
        ]);
      }
    });

    it('should report a missing key for the selected provider', () => {
      const result = safeValidateConfig({ search: { apiKey: 'test-intelx-key' } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatConfigIssues(result.errors)).toEqual([
          'ai.openai.apiKey: Classification provider key (OPENAI_API_KEY) is required',
        ]);
      }
    });

    it('should report a missing key for the fallback provider', () => {
      const result = safeValidateConfig({
        search: { apiKey: 'test-intelx-key' },
        ai: { provider: 'bedrock', fallbackProvider: 'anthropic' },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatConfigIssues(result.errors)).toEqual([
          'ai.anthropic.apiKey: Classification provider key (ANTHROPIC_API_KEY) is required',
        ]);
      }
    });

    it('should reject a fallback equal to the primary provider', () => {
      const result = safeValidateConfig({
        search: { apiKey: 'test-intelx-key' },
        ai: { provider: 'bedrock', fallbackProvider: 'bedrock' },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatConfigIssues(result.errors)).toEqual([
          'ai.fallbackProvider: Fallback provider must differ from the primary provider',
        ]);
      }
    });

    it('should reject a polling cap below the first interval', () => {
      const result = safeValidateConfig({
        search: { apiKey: 'test-intelx-key', polling: { initialIntervalMs: 1000, maxIntervalMs: 100 } },
        ai: { provider: 'bedrock' },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatConfigIssues(result.errors)).toEqual([
          'search.polling.maxIntervalMs: maxIntervalMs must be at least initialIntervalMs',
        ]);
      }
    });

    it('should reject out-of-range pipeline settings', () => {
      const result = safeValidateConfig({
        ...validConfig,
        pipeline: { concurrency: 0 },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors.issues[0].path).toEqual(['pipeline', 'concurrency']);
      }
    });
  });
});
