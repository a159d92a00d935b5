import type { ThoughtResult } from '@synaptic/shared';
import { decodeResult, encodeResult } from '../codecs.js';
import type { ParseFailureTracker } from '../parse-failures.js';
import type { VectorCollection } from '../vector-collection.js';

export class ResultRepository {
  constructor(
    readonly collection: VectorCollection,
    private failures: ParseFailureTracker,
  ) {}

  async upsert(sessionId: string, result: ThoughtResult, vector: number[], signal?: AbortSignal): Promise<void> {
    await this.collection.upsert([{ id: result.id, vector, payload: encodeResult(sessionId, result) }], signal);
  }

  async listForThought(thoughtId: string, signal?: AbortSignal): Promise<ThoughtResult[]> {
    const points = await this.collection.scrollAll({ must: [{ key: 'thought_id', match: thoughtId }] }, signal);
    return this.failures.decodeAll('result', points, decodeResult);
  }

  async listBySession(sessionId: string, signal?: AbortSignal): Promise<ThoughtResult[]> {
    const points = await this.collection.scrollAll({ must: [{ key: 'session_id', match: sessionId }] }, signal);
    return this.failures.decodeAll('result', points, decodeResult);
  }

  async deleteSession(sessionId: string, signal?: AbortSignal): Promise<void> {
    await this.collection.deleteWhere({ must: [{ key: 'session_id', match: sessionId }] }, signal);
  }
}
