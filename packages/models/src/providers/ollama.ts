import { z } from 'zod';
import { SynapticError } from '@synaptic/shared';
import { EmbeddingProvider, type EmbeddingProviderName } from '../provider.js';

const embeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

export interface OllamaEmbeddingConfig {
  baseUrl?: string;
  model?: string;
  dimension?: number;
  timeoutMs?: number;
}

export class OllamaEmbeddingProvider extends EmbeddingProvider {
  readonly name: EmbeddingProviderName = 'ollama';
  readonly model: string;
  readonly dimension: number;

  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: OllamaEmbeddingConfig = {}) {
    super();
    this.baseUrl = (config.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '');
    this.model = config.model ?? 'nomic-embed-text';
    this.dimension = config.dimension ?? 768;
    this.timeoutMs = config.timeoutMs ?? 30_000;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(3000),
      });
      return res.ok;
    } catch {
      return false;
    }
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/api/embeddings`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, prompt: text }),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    if (!res.ok) {
      const body = await res.text();
      throw new SynapticError(`Ollama API error (${res.status}): ${body}`);
    }

    const parsed = embeddingResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new SynapticError(`Ollama returned an unexpected embedding payload: ${parsed.error.message}`);
    }
    return this.checkDimension(parsed.data.embedding);
  }
}
