// src/providers/index.ts

export type { LLMProvider } from './llm-provider.interface.js';
export { ApiProviderBase, type ApiCallParams } from './api-provider-base.js';
export { AnthropicProvider } from './anthropic-provider.js';
export { OpenAIProvider } from './openai-provider.js';
export { OllamaProvider } from './ollama-provider.js';
