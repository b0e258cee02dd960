/**
 * OpenAI-compatible Provider
 * Implements AI provider interface over the chat-completions API. The base
 * URL can point at OpenAI, OpenRouter or a local model server.
 */

import axios, { AxiosInstance } from 'axios';
import { AIProvider, PromptOptions, ProviderHealth, checkProviderHealth } from './provider.interface';
import { createLogger } from '../../utils/logger';
import { withRetry, isRetryableHttpError, RetryOptions } from '../../utils/retry';
import { ProviderHttpError } from '../../utils/errors';
import { toProviderHttpError } from '../../utils/http';

const logger = createLogger('openai-provider');

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_MODEL = 'gpt-3.5-turbo';
const DEFAULT_MAX_TOKENS = 512;
const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_TIMEOUT_MS = 60000;

export interface OpenAIProviderConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeout?: number;
  retry?: Partial<RetryOptions>;
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: { content?: string | null };
  }>;
}

export class OpenAIProvider implements AIProvider {
  readonly name = 'openai';
  readonly model: string;

  private apiKey: string;
  private endpoint: string;
  private maxTokens: number;
  private temperature: number;
  private timeout: number;
  private retry: Partial<RetryOptions>;
  private http: AxiosInstance;

  constructor(config: OpenAIProviderConfig, http: AxiosInstance = axios.create()) {
    this.apiKey = config.apiKey;
    this.endpoint = `${(config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')}/chat/completions`;
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.retry = config.retry ?? {};
    this.http = http;
  }

  /**
   * Send a raw prompt as a single user message
   */
  async sendPrompt(prompt: string, options?: PromptOptions): Promise<string> {
    const maxTokens = options?.maxTokens ?? this.maxTokens;

    logger.debug('Sending prompt to chat-completions API', {
      model: this.model,
      promptLength: prompt.length,
      maxTokens,
    });

    const messages = [
      ...(options?.systemPrompt ? [{ role: 'system', content: options.systemPrompt }] : []),
      { role: 'user', content: prompt },
    ];

    return withRetry(
      async () => {
        try {
          const response = await this.http.post<ChatCompletionResponse>(
            this.endpoint,
            {
              model: this.model,
              messages,
              max_tokens: maxTokens,
              temperature: options?.temperature ?? this.temperature,
            },
            {
              headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${this.apiKey}`,
              },
              timeout: options?.timeout ?? this.timeout,
              signal: options?.signal,
            }
          );

          const content = response.data?.choices?.[0]?.message?.content;
          if (!content) {
            throw new ProviderHttpError(this.name, 'Unexpected response format from chat-completions API', response.status);
          }

          logger.debug('Received chat-completions response', {
            responseLength: content.length,
          });

          return content;
        } catch (error) {
          throw toProviderHttpError(this.name, error, {
            401: 'Invalid classification provider API key',
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
