export { EmbeddingProvider } from './provider.js';
export type { EmbeddingProviderName } from './provider.js';
export { EmbeddingProviderRegistry, toEmbeddingFunction } from './registry.js';
export { createEmbeddingProvider } from './factory.js';
export { OllamaEmbeddingProvider } from './providers/ollama.js';
export type { OllamaEmbeddingConfig } from './providers/ollama.js';
export { OpenAIEmbeddingProvider } from './providers/openai.js';
export type { OpenAIEmbeddingConfig } from './providers/openai.js';
