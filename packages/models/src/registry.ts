import type { EmbeddingFunction } from '@synaptic/shared';
import type { EmbeddingProvider, EmbeddingProviderName } from './provider.js';

export class EmbeddingProviderRegistry {
  private providers = new Map<EmbeddingProviderName, EmbeddingProvider>();

  register(provider: EmbeddingProvider): void {
    this.providers.set(provider.name, provider);
  }

  get(name: EmbeddingProviderName): EmbeddingProvider | undefined {
    return this.providers.get(name);
  }

  /** First registered provider that answers its availability probe. */
  async getAvailable(): Promise<EmbeddingProvider | undefined> {
    for (const provider of this.providers.values()) {
      if (await provider.isAvailable()) {
        return provider;
      }
    }
    return undefined;
  }

  listAll(): EmbeddingProvider[] {
    return Array.from(this.providers.values());
  }

  has(name: EmbeddingProviderName): boolean {
    return this.providers.has(name);
  }
}

/** Adapts a provider to the plain function the store consumes. */
export function toEmbeddingFunction(provider: EmbeddingProvider): EmbeddingFunction {
  return (text, signal) => provider.embed(text, signal);
}
