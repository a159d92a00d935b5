import type { Thought } from '@synaptic/shared';
import { decodeThought, encodeThought } from '../codecs.js';
import type { ParseFailureTracker } from '../parse-failures.js';
import type { VectorCollection } from '../vector-collection.js';

export interface EmbeddedThought {
  thought: Thought;
  vector: number[];
}

export class ThoughtRepository {
  constructor(
    readonly collection: VectorCollection,
    private failures: ParseFailureTracker,
  ) {}

  async upsert(sessionId: string, entries: EmbeddedThought[], signal?: AbortSignal): Promise<void> {
    await this.collection.upsert(
      entries.map(({ thought, vector }) => ({
        id: thought.id,
        vector,
        payload: encodeThought(sessionId, thought),
      })),
      signal,
    );
  }

  async get(sessionId: string, id: string, signal?: AbortSignal): Promise<Thought | null> {
    const points = await this.collection.scrollAll(
      { must: [{ key: 'session_id', match: sessionId }, { key: 'id', match: id }] },
      signal,
    );
    return this.failures.decodeAll('thought', points, decodeThought)[0] ?? null;
  }

  async listBySession(sessionId: string, signal?: AbortSignal): Promise<Thought[]> {
    const points = await this.collection.scrollAll({ must: [{ key: 'session_id', match: sessionId }] }, signal);
    return this.failures.decodeAll('thought', points, decodeThought);
  }

  async listByType(sessionId: string, type: string, signal?: AbortSignal): Promise<Thought[]> {
    const points = await this.collection.scrollAll(
      { must: [{ key: 'session_id', match: sessionId }, { key: 'type', match: type }] },
      signal,
    );
    return this.failures.decodeAll('thought', points, decodeThought);
  }

  /** Nearest neighbours inside one session, best match first. */
  async search(sessionId: string, vector: number[], limit: number, signal?: AbortSignal): Promise<Thought[]> {
    const points = await this.collection.search(
      vector,
      { filter: { must: [{ key: 'session_id', match: sessionId }] }, limit },
      signal,
    );
    return this.failures.decodeAll('thought', points, decodeThought);
  }

  async listSessions(signal?: AbortSignal): Promise<string[]> {
    const points = await this.collection.scrollAll(undefined, signal);
    const sessions = new Set<string>();
    for (const point of points) {
      const session = point.payload.session_id;
      if (typeof session === 'string' && session !== '') sessions.add(session);
    }
    return [...sessions].sort();
  }

  async deleteSession(sessionId: string, signal?: AbortSignal): Promise<void> {
    await this.collection.deleteWhere({ must: [{ key: 'session_id', match: sessionId }] }, signal);
  }
}
