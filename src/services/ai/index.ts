/**
 * AI service exports
 */

export { OpenAIProvider } from './openai.provider';
export { AnthropicProvider, ANTHROPIC_CLAUDE_MODELS } from './anthropic.provider';
export { BedrockProvider, BEDROCK_CLAUDE_MODELS } from './bedrock.provider';
export { RiskClassifier, unknownClassification, UNAVAILABLE_SUMMARY } from './risk.classifier';
export * from './provider.interface';
export * from './prompt.builder';
