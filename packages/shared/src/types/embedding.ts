/**
 * Text → vector. Implementations must return vectors of one fixed length.
 */
export type EmbeddingFunction = (text: string, signal?: AbortSignal) => Promise<number[]>;
