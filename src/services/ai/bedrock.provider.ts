/**
 * AWS Bedrock Provider
 * Implements AI provider interface for AWS Bedrock Claude models
 */

import {
  BedrockRuntimeClient,
  InvokeModelCommand,
} from '@aws-sdk/client-bedrock-runtime';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import * as https from 'https';
import { z } from 'zod';
import { AIProvider, PromptOptions, ProviderHealth, checkProviderHealth } from './provider.interface';
import { createLogger } from '../../utils/logger';
import { withRetry, isRetryableHttpError, RetryOptions } from '../../utils/retry';
import { ProviderHttpError } from '../../utils/errors';

const logger = createLogger('bedrock-provider');

/**
 * Supported Bedrock Claude models
 */
export const BEDROCK_CLAUDE_MODELS = {
  CLAUDE_SONNET_4_5: 'anthropic.claude-sonnet-4-5-20250929-v1:0',
  CLAUDE_HAIKU_4_5: 'anthropic.claude-haiku-4-5-20250929-v1:0',
  CLAUDE_SONNET_4: 'anthropic.claude-sonnet-4-20250514-v1:0',
  CLAUDE_3_5_SONNET: 'anthropic.claude-3-5-sonnet-20241022-v2:0',
  CLAUDE_3_HAIKU: 'anthropic.claude-3-haiku-20240307-v1:0',
} as const;

const DEFAULT_MODEL = BEDROCK_CLAUDE_MODELS.CLAUDE_SONNET_4_5;
const DEFAULT_MAX_TOKENS = 512;
const DEFAULT_TIMEOUT_MS = 60000;

// Errors that no retry will fix
const NON_RETRYABLE_ERRORS = ['AccessDeniedException', 'ResourceNotFoundException', 'ValidationException'];

export interface BedrockProviderConfig {
  region: string;
  modelId?: string;
  maxTokens?: number;
  timeout?: number;
  retry?: Partial<RetryOptions>;
}

const InvokeResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).optional(),
});

export class BedrockProvider implements AIProvider {
  readonly name = 'bedrock';
  readonly model: string;

  private client: BedrockRuntimeClient;
  private maxTokens: number;
  private timeout: number;
  private retry: Partial<RetryOptions>;

  constructor(config: BedrockProviderConfig, client?: BedrockRuntimeClient) {
    this.model = config.modelId ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.retry = config.retry ?? {};
    this.client = client ?? createBedrockClient(config.region, this.timeout);
  }

  /**
   * Send a raw prompt to Bedrock
   */
  async sendPrompt(prompt: string, options?: PromptOptions): Promise<string> {
    const maxTokens = options?.maxTokens ?? this.maxTokens;

    logger.debug('Sending prompt to Bedrock', {
      model: this.model,
      promptLength: prompt.length,
      maxTokens,
    });

    return withRetry(
      async () => {
        const requestBody = {
          anthropic_version: 'bedrock-2023-05-31',
          max_tokens: maxTokens,
          ...(options?.systemPrompt ? { system: options.systemPrompt } : {}),
          ...(options?.temperature !== undefined ? { temperature: options.temperature } : {}),
          messages: [
            {
              role: 'user',
              content: prompt,
            },
          ],
        };

        const command = new InvokeModelCommand({
          modelId: this.model,
          contentType: 'application/json',
          accept: 'application/json',
          body: JSON.stringify(requestBody),
        });

        let body: Uint8Array | undefined;
        try {
          const response = await this.client.send(command, { abortSignal: options?.signal });
          body = response.body;
        } catch (error) {
          throw toBedrockError(error);
        }

        if (!body) {
          throw new ProviderHttpError(this.name, 'Empty response from Bedrock', 502);
        }

        const parsed = InvokeResponseSchema.safeParse(parseJson(new TextDecoder().decode(body)));
        const content = parsed.success
          ? parsed.data.content?.find(block => typeof block.text === 'string')?.text
          : undefined;
        if (!content) {
          throw new ProviderHttpError(this.name, 'Unexpected response format from Bedrock', 502);
        }

        logger.debug('Received response from Bedrock', {
          responseLength: content.length,
        });

        return content;
      },
      {
        maxRetries: 3,
        baseDelayMs: 1000,
        ...this.retry,
        shouldRetry: error => {
          if (NON_RETRYABLE_ERRORS.some(name => error.name === name || error.message.includes(name))) {
            return false;
          }
          return isRetryableHttpError(error);
        },
        signal: options?.signal,
      }
    );
  }

  /**
   * Bedrock authenticates through the AWS credential chain, so a round trip
   * is the only availability check
   */
  async healthCheck(): Promise<ProviderHealth> {
    return checkProviderHealth(this);
  }
}

function createBedrockClient(region: string, timeoutMs: number): BedrockRuntimeClient {
  // HTTP/1.1 with keepalive; VPC endpoints drop HTTP/2 streams
  const requestHandler = new NodeHttpHandler({
    httpsAgent: new https.Agent({
      keepAlive: true,
      keepAliveMsecs: 10000,
      ALPNProtocols: ['http/1.1'],
    }),
    connectionTimeout: 10000,
    requestTimeout: timeoutMs,
  });

  return new BedrockRuntimeClient({ region, requestHandler });
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Carry the SDK's HTTP status so retry and authorization checks see it
 */
function toBedrockError(error: unknown): Error {
  if (!(error instanceof Error)) {
    return new Error(String(error));
  }
  if (error.name === 'AbortError') {
    return error;
  }

  const status = httpStatusOf(error);
  return new ProviderHttpError('bedrock', `${error.name}: ${error.message}`, status);
}

function httpStatusOf(error: Error): number | undefined {
  if (!('$metadata' in error)) return undefined;
  const metadata = error.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
}
