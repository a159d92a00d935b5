import { ConfigError, type SynapticConfig } from '@synaptic/shared';
import type { EmbeddingProvider } from './provider.js';
import { OllamaEmbeddingProvider } from './providers/ollama.js';
import { OpenAIEmbeddingProvider } from './providers/openai.js';

/**
 * Builds the provider named by `embedding.provider`, sized to the configured
 * collection dimension. Returns undefined for `none`.
 */
export function createEmbeddingProvider(config: SynapticConfig): EmbeddingProvider | undefined {
  const { embedding, collections } = config;

  switch (embedding.provider) {
    case 'none':
      return undefined;
    case 'ollama':
      return new OllamaEmbeddingProvider({
        baseUrl: embedding.baseUrl,
        model: embedding.model,
        dimension: collections.vectorSize,
        timeoutMs: embedding.timeoutMs,
      });
    case 'openai':
      if (!embedding.apiKey) {
        throw new ConfigError('embedding.apiKey (or SYNAPTIC_OPENAI_API_KEY) is required for the openai provider');
      }
      return new OpenAIEmbeddingProvider({
        apiKey: embedding.apiKey,
        model: embedding.model,
        dimension: collections.vectorSize,
        timeoutMs: embedding.timeoutMs,
      });
  }
}
