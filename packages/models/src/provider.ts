import { DimensionMismatchError } from '@synaptic/shared';

export type EmbeddingProviderName = 'ollama' | 'openai' | (string & {});

export abstract class EmbeddingProvider {
  abstract readonly name: EmbeddingProviderName;
  abstract readonly model: string;
  /** Length of every vector this provider returns. */
  abstract readonly dimension: number;

  abstract isAvailable(): Promise<boolean>;
  abstract embed(text: string, signal?: AbortSignal): Promise<number[]>;

  /** Embeds one text after another; providers with a batch endpoint may override. */
  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text, signal));
    }
    return vectors;
  }

  protected checkDimension(vector: number[]): number[] {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length, `${this.name} embedding (${this.model})`);
    }
    return vector;
  }
}
