/**
 * Anthropic provider tests
 */

import { AnthropicProvider, ANTHROPIC_CLAUDE_MODELS } from '../../../../src/services/ai/anthropic.provider';
import { createMockHttp } from '../../../integration/mocks/http.mocks';

const FAST_RETRY = { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 2 };

function message(text: string): { status: number; data: unknown } {
  return { status: 200, data: { content: [{ type: 'text', text }] } };
}

describe('AnthropicProvider', () => {
  it('should call the Messages API with key, version and system prompt', async () => {
    const { http, requests } = createMockHttp(() => message('{"risk_level": "High"}'));
    const provider = new AnthropicProvider({ apiKey: 'test-anthropic-key', retry: FAST_RETRY }, http);

    const text = await provider.sendPrompt('classify', { systemPrompt: 'Output only valid JSON.', maxTokens: 100 });

    expect(text).toBe('{"risk_level": "High"}');
    expect(requests[0].url).toBe('https://api.anthropic.com/v1/messages');
    expect(requests[0].header('x-api-key')).toBe('test-anthropic-key');
    expect(requests[0].header('anthropic-version')).toBe('2023-06-01');
    expect(requests[0].data).toEqual({
      model: ANTHROPIC_CLAUDE_MODELS.CLAUDE_SONNET_4_5,
      max_tokens: 100,
      system: 'Output only valid JSON.',
      messages: [{ role: 'user', content: 'classify' }],
    });
  });

  it('should retry while the API is overloaded', async () => {
    let calls = 0;
    const { http } = createMockHttp(() => {
      calls++;
      return calls < 3 ? { status: 529, data: { type: 'error' } } : message('finally');
    });
    const provider = new AnthropicProvider({ apiKey: 'test-anthropic-key', retry: FAST_RETRY }, http);

    await expect(provider.sendPrompt('classify')).resolves.toBe('finally');
    expect(calls).toBe(3);
  });

  it('should surface the overload message after the last attempt', async () => {
    const { http, requests } = createMockHttp(() => ({ status: 529, data: { type: 'error' } }));
    const provider = new AnthropicProvider({ apiKey: 'test-anthropic-key', retry: FAST_RETRY }, http);

    await expect(provider.sendPrompt('classify')).rejects.toThrow(
      'anthropic error (status 529): Anthropic API is currently overloaded'
    );
    expect(requests).toHaveLength(3);
  });

  it('should not retry a rejected key', async () => {
    const { http, requests } = createMockHttp(() => ({ status: 401, data: {} }));
    const provider = new AnthropicProvider({ apiKey: 'test-anthropic-key', retry: FAST_RETRY }, http);

    await expect(provider.sendPrompt('classify')).rejects.toMatchObject({ status: 401 });
    expect(requests).toHaveLength(1);
  });

  it('should reject a response without a text block', async () => {
    const { http } = createMockHttp(() => ({ status: 200, data: { content: [{ type: 'tool_use' }] } }));
    const provider = new AnthropicProvider({ apiKey: 'test-anthropic-key', retry: FAST_RETRY }, http);

    await expect(provider.sendPrompt('classify')).rejects.toThrow('Unexpected response format from Anthropic API');
  });
});
