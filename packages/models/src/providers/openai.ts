import OpenAI from 'openai';
import { SynapticError } from '@synaptic/shared';
import { EmbeddingProvider, type EmbeddingProviderName } from '../provider.js';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
  /** Requested output size; text-embedding-3 models can shorten their vectors. */
  dimension?: number;
  baseUrl?: string;
  timeoutMs?: number;
}

export class OpenAIEmbeddingProvider extends EmbeddingProvider {
  readonly name: EmbeddingProviderName = 'openai';
  readonly model: string;
  readonly dimension: number;

  private client: OpenAI;
  private requestDimensions: boolean;

  constructor(config: OpenAIEmbeddingConfig) {
    super();
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
      timeout: config.timeoutMs ?? 30_000,
      maxRetries: 0,
    });
    this.model = config.model ?? 'text-embedding-3-small';
    this.dimension = config.dimension ?? 1536;
    this.requestDimensions = config.dimension !== undefined;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: text,
        ...(this.requestDimensions ? { dimensions: this.dimension } : {}),
      },
      signal ? { signal } : undefined,
    );

    const first = response.data[0];
    if (!first) {
      throw new SynapticError(`OpenAI returned no embedding for model ${this.model}`);
    }
    return this.checkDimension(first.embedding);
  }
}
