/**
 * Pipeline wiring tests
 */

import { createAIProvider, createPipeline, LeakTriagePipeline } from '../../../../src/services/pipeline/pipeline.driver';
import { OpenAIProvider } from '../../../../src/services/ai/openai.provider';
import { AnthropicProvider } from '../../../../src/services/ai/anthropic.provider';
import { BedrockProvider } from '../../../../src/services/ai/bedrock.provider';
import { createMockConfig } from '../../../integration/mocks/config.mocks';

describe('createAIProvider', () => {
  const config = createMockConfig({
    ai: {
      provider: 'openai',
      fallbackProvider: 'anthropic',
      openai: { apiKey: 'test-openai-key', model: 'gpt-4o-mini' },
      anthropic: { apiKey: 'test-anthropic-key' },
      bedrock: { region: 'eu-west-1', modelId: 'anthropic.claude-3-haiku-20240307-v1:0' },
    },
  });

  it('should build the provider named in the configuration', () => {
    const openai = createAIProvider('openai', config);
    const anthropic = createAIProvider('anthropic', config);
    const bedrock = createAIProvider('bedrock', config);

    expect(openai).toBeInstanceOf(OpenAIProvider);
    expect(openai.model).toBe('gpt-4o-mini');
    expect(anthropic).toBeInstanceOf(AnthropicProvider);
    expect(anthropic.model).toBe('claude-sonnet-4-5-20250514');
    expect(bedrock).toBeInstanceOf(BedrockProvider);
    expect(bedrock.model).toBe('anthropic.claude-3-haiku-20240307-v1:0');
  });

  it('should build a pipeline from configuration alone', () => {
    expect(createPipeline(config)).toBeInstanceOf(LeakTriagePipeline);
  });
});
