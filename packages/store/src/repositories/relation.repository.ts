import type { RelationType, ThoughtRelation } from '@synaptic/shared';
import { decodeRelation, encodeRelation } from '../codecs.js';
import type { ParseFailureTracker } from '../parse-failures.js';
import type { VectorCollection } from '../vector-collection.js';

export class RelationRepository {
  constructor(
    readonly collection: VectorCollection,
    private failures: ParseFailureTracker,
  ) {}

  async upsert(sessionId: string, relation: ThoughtRelation, vector: number[], signal?: AbortSignal): Promise<void> {
    await this.collection.upsert([{ id: relation.id, vector, payload: encodeRelation(sessionId, relation) }], signal);
  }

  /** Incoming and outgoing, each relation once. */
  async listForThought(thoughtId: string, signal?: AbortSignal): Promise<ThoughtRelation[]> {
    const points = await this.collection.scrollAll(
      {
        should: [
          { key: 'source_thought_id', match: thoughtId },
          { key: 'target_thought_id', match: thoughtId },
        ],
      },
      signal,
    );
    const seen = new Set<string>();
    return this.failures.decodeAll('relation', points, decodeRelation).filter((r) => {
      if (seen.has(r.id)) return false;
      seen.add(r.id);
      return true;
    });
  }

  async listOutgoing(thoughtId: string, signal?: AbortSignal): Promise<ThoughtRelation[]> {
    const points = await this.collection.scrollAll({ must: [{ key: 'source_thought_id', match: thoughtId }] }, signal);
    return this.failures.decodeAll('relation', points, decodeRelation);
  }

  async listBySession(sessionId: string, signal?: AbortSignal): Promise<ThoughtRelation[]> {
    const points = await this.collection.scrollAll({ must: [{ key: 'session_id', match: sessionId }] }, signal);
    return this.failures.decodeAll('relation', points, decodeRelation);
  }

  async listByType(sessionId: string, type: RelationType, signal?: AbortSignal): Promise<ThoughtRelation[]> {
    const points = await this.collection.scrollAll(
      {
        must: [
          { key: 'session_id', match: sessionId },
          { key: 'relation_type', match: type },
        ],
      },
      signal,
    );
    return this.failures.decodeAll('relation', points, decodeRelation);
  }

  async deleteSession(sessionId: string, signal?: AbortSignal): Promise<void> {
    await this.collection.deleteWhere({ must: [{ key: 'session_id', match: sessionId }] }, signal);
  }
}
