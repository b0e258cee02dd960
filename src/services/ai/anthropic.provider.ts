/**
 * Anthropic API Provider
 * Implements AI provider interface for direct Anthropic API calls
 */

import axios, { AxiosInstance } from 'axios';
import { AIProvider, PromptOptions, ProviderHealth, checkProviderHealth } from './provider.interface';
import { createLogger } from '../../utils/logger';
import { withRetry, isRetryableHttpError, RetryOptions } from '../../utils/retry';
import { ProviderHttpError } from '../../utils/errors';
import { toProviderHttpError } from '../../utils/http';

const logger = createLogger('anthropic-provider');

const ANTHROPIC_API_ENDPOINT = 'https://api.anthropic.com/v1/messages';

/**
 * Supported Anthropic Claude models
 *
 * Haiku is enough for short excerpts; Sonnet reads messy dumps better.
 */
export const ANTHROPIC_CLAUDE_MODELS = {
  CLAUDE_SONNET_4_5: 'claude-sonnet-4-5-20250514',
  CLAUDE_HAIKU_4_5: 'claude-haiku-4-5-20250514',
  CLAUDE_SONNET_4: 'claude-sonnet-4-20250514',
  CLAUDE_3_5_SONNET: 'claude-3-5-sonnet-20241022',
  CLAUDE_3_HAIKU: 'claude-3-haiku-20240307',
} as const;

const DEFAULT_MODEL = ANTHROPIC_CLAUDE_MODELS.CLAUDE_SONNET_4_5;
const DEFAULT_MAX_TOKENS = 512;
const DEFAULT_TIMEOUT_MS = 60000;

export interface AnthropicProviderConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  timeout?: number;
  retry?: Partial<RetryOptions>;
}

interface AnthropicMessageResponse {
  content?: Array<{ type?: string; text?: string }>;
}

export class AnthropicProvider implements AIProvider {
  readonly name = 'anthropic';
  readonly model: string;

  private apiKey: string;
  private maxTokens: number;
  private timeout: number;
  private retry: Partial<RetryOptions>;
  private http: AxiosInstance;

  constructor(config: AnthropicProviderConfig, http: AxiosInstance = axios.create()) {
    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.retry = config.retry ?? {};
    this.http = http;
  }

  /**
   * Send a raw prompt to Anthropic API
   */
  async sendPrompt(prompt: string, options?: PromptOptions): Promise<string> {
    const maxTokens = options?.maxTokens ?? this.maxTokens;
    const timeout = options?.timeout ?? this.timeout;

    logger.debug('Sending prompt to Anthropic API', {
      model: this.model,
      promptLength: prompt.length,
      maxTokens,
    });

    return withRetry(
      async () => {
        try {
          const response = await this.http.post<AnthropicMessageResponse>(
            ANTHROPIC_API_ENDPOINT,
            {
              model: this.model,
              max_tokens: maxTokens,
              ...(options?.systemPrompt ? { system: options.systemPrompt } : {}),
              ...(options?.temperature !== undefined ? { temperature: options.temperature } : {}),
              messages: [{ role: 'user', content: prompt }],
            },
            {
              headers: {
                'Content-Type': 'application/json',
                'x-api-key': this.apiKey,
                'anthropic-version': '2023-06-01',
              },
              timeout,
              signal: options?.signal,
            }
          );

          const content = response.data?.content?.find(block => typeof block.text === 'string')?.text;
          if (!content) {
            throw new ProviderHttpError(this.name, 'Unexpected response format from Anthropic API', response.status);
          }

          logger.debug('Received response from Anthropic API', {
            responseLength: content.length,
          });

          return content;
        } catch (error) {
          if (axios.isAxiosError(error) && error.response?.status === 529) {
            logger.warn('Anthropic API is overloaded');
          }
          throw toProviderHttpError(this.name, error, {
            401: 'Invalid Anthropic API key',
            529: 'Anthropic API is currently overloaded',
          });
        }
      },
      {
        maxRetries: 3,
        baseDelayMs: 1000,
        ...this.retry,
        shouldRetry: isRetryableHttpError,
        signal: options?.signal,
      }
    );
  }

  /**
   * Get provider health status
   */
  async healthCheck(): Promise<ProviderHealth> {
    return checkProviderHealth(this);
  }
}
