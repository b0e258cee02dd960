/**
 * Risk Classifier
 * Turns a preview into a Classification using the configured providers with
 * fallback. Never rejects: every failure becomes an Unknown verdict.
 */

import {
  AIProvider,
  ProviderHealth,
  extractRationaleTags,
  parseClassificationResponse,
} from './provider.interface';
import { buildLeakClassificationPrompt, CLASSIFIER_SYSTEM_PROMPT } from './prompt.builder';
import { Classification, LeakRecord, Preview } from '../../types';
import { createLogger } from '../../utils/logger';
import { RateLimiter } from '../../utils/concurrency';
import { ClassificationFailure, errorMessage } from '../../utils/errors';

const logger = createLogger('risk-classifier');

export const UNAVAILABLE_SUMMARY = 'classification unavailable';

export interface RiskClassifierConfig {
  primaryProvider: AIProvider;
  fallbackProvider?: AIProvider;
  limiter: RateLimiter;
}

/**
 * Health of one configured provider, in fallback order
 */
export interface ProviderHealthReport {
  provider: string;
  model: string;
  health: ProviderHealth;
}

export class RiskClassifier {
  private primaryProvider: AIProvider;
  private fallbackProvider?: AIProvider;
  private limiter: RateLimiter;

  constructor(config: RiskClassifierConfig) {
    this.primaryProvider = config.primaryProvider;
    this.fallbackProvider = config.fallbackProvider;
    this.limiter = config.limiter;
  }

  /**
   * Classify one preview. Previews without content never reach a provider.
   */
  async classify(preview: Preview, record?: LeakRecord, signal?: AbortSignal): Promise<Classification> {
    if (preview.availability !== 'Available' || preview.content.trim() === '') {
      logger.debug('Skipping classification', {
        recordId: preview.recordId,
        availability: preview.availability,
      });
      return unknownClassification(UNAVAILABLE_SUMMARY);
    }

    const prompt = buildLeakClassificationPrompt(preview, record);

    try {
      const { provider, responseText } = await this.sendWithFallback(prompt, preview.recordId, signal);
      const parsed = parseClassificationResponse(responseText);

      if (!parsed) {
        throw new ClassificationFailure(`Response from ${provider.name} is outside the classification contract`);
      }

      logger.debug('Preview classified', {
        recordId: preview.recordId,
        risk: parsed.risk,
        provider: provider.name,
      });

      return {
        risk: parsed.risk,
        summary: parsed.summary,
        tags: extractRationaleTags(parsed.summary, parsed.credentialCount),
        credentialCount: parsed.credentialCount,
        credentialKinds: parsed.credentialKinds,
        provider: provider.name,
        model: provider.model,
      };
    } catch (error) {
      logger.warn('Classification failed', {
        recordId: preview.recordId,
        error: errorMessage(error),
      });
      return unknownClassification(UNAVAILABLE_SUMMARY);
    }
  }

  /**
   * Check every configured provider, primary first
   */
  async getHealthStatus(): Promise<ProviderHealthReport[]> {
    const reports: ProviderHealthReport[] = [];

    for (const provider of this.providers()) {
      reports.push({ provider: provider.name, model: provider.model, health: await provider.healthCheck() });
    }

    return reports;
  }

  private providers(): AIProvider[] {
    return this.fallbackProvider ? [this.primaryProvider, this.fallbackProvider] : [this.primaryProvider];
  }

  private async sendWithFallback(
    prompt: string,
    recordId: string,
    signal?: AbortSignal
  ): Promise<{ provider: AIProvider; responseText: string }> {
    const failures: string[] = [];

    for (const provider of this.providers()) {
      if (signal?.aborted) break;

      try {
        const responseText = await this.limiter.schedule(
          () =>
            provider.sendPrompt(prompt, {
              systemPrompt: CLASSIFIER_SYSTEM_PROMPT,
              signal,
            }),
          signal
        );
        return { provider, responseText };
      } catch (error) {
        failures.push(`${provider.name}: ${errorMessage(error)}`);
        logger.error('Provider failed', {
          recordId,
          provider: provider.name,
          error: errorMessage(error),
        });
      }
    }

    throw new ClassificationFailure(
      failures.length > 0 ? `All providers failed. ${failures.join('. ')}` : 'Classification aborted'
    );
  }
}

/**
 * Verdict for a record that could not be judged
 */
export function unknownClassification(summary: string): Classification {
  return {
    risk: 'Unknown',
    summary,
    tags: [],
    credentialCount: 0,
    credentialKinds: [],
  };
}
