import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_DISTANCE,
  DEFAULT_PARENT_WALK_DEPTH,
  DEFAULT_VECTOR_SIZE,
  COLLECTIONS,
  DimensionMismatchError,
  ValidationError,
  generateId,
  relationSchema,
  resultSchema,
  thoughtIdSchema,
  thoughtInputSchema,
  toEpochMs,
  type DistanceMetric,
  type EmbeddingFunction,
  type ParseFailureCounters,
  type RelationType,
  type Thought,
  type ThoughtInput,
  type ThoughtRelation,
  type ThoughtResult,
  type ThoughtStatistics,
  type ThoughtType,
} from '@synaptic/shared';
import type { ZodError } from 'zod';
import type { VectorBackendClient } from './backends/types.js';
import { KeyedMutex } from './keyed-mutex.js';
import { ParseFailureTracker } from './parse-failures.js';
import { RelationRepository } from './repositories/relation.repository.js';
import { ResultRepository } from './repositories/result.repository.js';
import { ThoughtRepository, type EmbeddedThought } from './repositories/thought.repository.js';
import { VectorCollection } from './vector-collection.js';

export interface ThoughtStoreOptions {
  backend: VectorBackendClient;
  /** Without one, points get a zero vector and search falls back to substring matching. */
  embed?: EmbeddingFunction;
  collections?: {
    thoughts?: string;
    relations?: string;
    results?: string;
  };
  vectorSize?: number;
  distance?: DistanceMetric;
  batchSize?: number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Thoughts, relations and results of agent sessions over a vector backend.
 *
 * Writes to one session are serialized; writes to different sessions run
 * concurrently. Reads are lenient: a missing collection reads as empty and
 * points that fail to decode are skipped (see `parseFailures()`).
 */
export class ThoughtStore {
  readonly vectorSize: number;

  private readonly embedFn: EmbeddingFunction | undefined;
  private readonly locks = new KeyedMutex();
  private readonly failures = new ParseFailureTracker();
  private readonly thoughts: ThoughtRepository;
  private readonly relations: RelationRepository;
  private readonly results: ResultRepository;

  constructor(options: ThoughtStoreOptions) {
    this.vectorSize = options.vectorSize ?? DEFAULT_VECTOR_SIZE;
    this.embedFn = options.embed;

    const collectionOptions = {
      vectorSize: this.vectorSize,
      distance: options.distance ?? DEFAULT_DISTANCE,
      batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
    };
    const collection = (name: string) =>
      new VectorCollection(options.backend, name, collectionOptions, this.locks);

    this.thoughts = new ThoughtRepository(
      collection(options.collections?.thoughts ?? COLLECTIONS.thoughts),
      this.failures,
    );
    this.relations = new RelationRepository(
      collection(options.collections?.relations ?? COLLECTIONS.relations),
      this.failures,
    );
    this.results = new ResultRepository(
      collection(options.collections?.results ?? COLLECTIONS.results),
      this.failures,
    );
  }

  get hasEmbedder(): boolean {
    return this.embedFn !== undefined;
  }

  get collectionNames(): { thoughts: string; relations: string; results: string } {
    return {
      thoughts: this.thoughts.collection.name,
      relations: this.relations.collection.name,
      results: this.results.collection.name,
    };
  }

  /** Embeds `text`, or returns a zero vector when no embedder is configured. */
  async embedText(text: string, signal?: AbortSignal): Promise<number[]> {
    if (!this.embedFn) return new Array<number>(this.vectorSize).fill(0);
    const vector = await this.embedFn(text, signal);
    if (vector.length !== this.vectorSize) {
      throw new DimensionMismatchError(this.vectorSize, vector.length, 'embedding');
    }
    return vector;
  }

  // ── Thoughts: writes ───────────────────────────────────────────

  async saveThought(sessionId: string, thought: ThoughtInput, options: CallOptions = {}): Promise<Thought> {
    const [saved] = await this.saveThoughts(sessionId, [thought], options);
    return saved;
  }

  /** Embeds every thought, then upserts in sequential chunks. */
  async saveThoughts(sessionId: string, thoughts: ThoughtInput[], options: CallOptions = {}): Promise<Thought[]> {
    assertSession(sessionId);
    const validated = thoughts.map((t) => validateThought(sessionId, t));
    if (validated.length === 0) return [];

    return this.locks.runExclusive(sessionKey(sessionId), async () => {
      const entries: EmbeddedThought[] = [];
      for (const thought of validated) {
        entries.push({ thought, vector: await this.embedText(thought.content, options.signal) });
      }
      await this.thoughts.upsert(sessionId, entries, options.signal);
      return validated;
    });
  }

  async clearSession(sessionId: string, options: CallOptions = {}): Promise<void> {
    assertSession(sessionId);
    await this.locks.runExclusive(sessionKey(sessionId), async () => {
      await this.thoughts.deleteSession(sessionId, options.signal);
      await this.relations.deleteSession(sessionId, options.signal);
      await this.results.deleteSession(sessionId, options.signal);
    });
  }

  // ── Thoughts: reads ────────────────────────────────────────────

  async getThought(sessionId: string, id: string, options: CallOptions = {}): Promise<Thought | null> {
    assertId(id, 'thought id');
    return this.thoughts.get(sessionId, id, options.signal);
  }

  /** Every thought of the session, oldest first. */
  async getThoughts(sessionId: string, options: CallOptions = {}): Promise<Thought[]> {
    return chronological(await this.thoughts.listBySession(sessionId, options.signal));
  }

  /** Thoughts with `from <= timestamp <= to`, oldest first. */
  async getThoughtsInRange(
    sessionId: string,
    from: string | Date,
    to: string | Date,
    options: CallOptions = {},
  ): Promise<Thought[]> {
    const fromMs = toBoundary(from, 'from');
    const toMs = toBoundary(to, 'to');
    if (fromMs > toMs) {
      throw new ValidationError(`range start ${String(from)} is after its end ${String(to)}`);
    }
    const thoughts = await this.getThoughts(sessionId, options);
    return thoughts.filter((t) => {
      const at = toEpochMs(t.timestamp);
      return at >= fromMs && at <= toMs;
    });
  }

  async getThoughtsByType(
    sessionId: string,
    type: ThoughtType,
    limit = 100,
    options: CallOptions = {},
  ): Promise<Thought[]> {
    assertLimit(limit);
    const thoughts = await this.thoughts.listByType(sessionId, type, options.signal);
    return chronological(thoughts).slice(0, limit);
  }

  /** The `count` newest thoughts, newest first. */
  async getRecentThoughts(sessionId: string, count = 10, options: CallOptions = {}): Promise<Thought[]> {
    assertLimit(count);
    const thoughts = await this.getThoughts(sessionId, options);
    return thoughts.slice(Math.max(0, thoughts.length - count)).reverse();
  }

  /**
   * Semantic search inside the session when an embedder is configured,
   * otherwise a case-insensitive substring match over content (oldest first).
   */
  async searchThoughts(sessionId: string, query: string, limit = 20, options: CallOptions = {}): Promise<Thought[]> {
    assertLimit(limit);
    if (this.embedFn) {
      const vector = await this.embedText(query, options.signal);
      return this.thoughts.search(sessionId, vector, limit, options.signal);
    }
    const needle = query.toLowerCase();
    const thoughts = await this.getThoughts(sessionId, options);
    return thoughts.filter((t) => t.content.toLowerCase().includes(needle)).slice(0, limit);
  }

  /**
   * Descendants of `parentId` through `parentThoughtId` links, breadth first,
   * each at most once. The root itself is not included.
   */
  async getChainedThoughts(
    sessionId: string,
    parentId: string,
    maxDepth = DEFAULT_PARENT_WALK_DEPTH,
    options: CallOptions = {},
  ): Promise<Thought[]> {
    assertId(parentId, 'parent thought id');
    if (maxDepth < 1) return [];

    const children = new Map<string, Thought[]>();
    for (const thought of await this.getThoughts(sessionId, options)) {
      if (!thought.parentThoughtId) continue;
      const siblings = children.get(thought.parentThoughtId) ?? [];
      siblings.push(thought);
      children.set(thought.parentThoughtId, siblings);
    }

    const visited = new Set<string>([parentId]);
    const chain: Thought[] = [];
    let frontier = [parentId];
    for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const id of frontier) {
        for (const child of children.get(id) ?? []) {
          if (visited.has(child.id)) continue;
          visited.add(child.id);
          chain.push(child);
          next.push(child.id);
        }
      }
      frontier = next;
    }
    return chain;
  }

  async getStatistics(sessionId: string, options: CallOptions = {}): Promise<ThoughtStatistics> {
    const thoughts = await this.getThoughts(sessionId, options);
    const countByType: Record<string, number> = {};
    const countByOrigin: Record<string, number> = {};
    let confidence = 0;
    let relevance = 0;
    for (const t of thoughts) {
      countByType[t.type] = (countByType[t.type] ?? 0) + 1;
      countByOrigin[t.origin] = (countByOrigin[t.origin] ?? 0) + 1;
      confidence += t.confidence;
      relevance += t.relevance;
    }

    const n = thoughts.length;
    return {
      totalCount: n,
      countByType,
      countByOrigin,
      averageConfidence: n > 0 ? confidence / n : 0,
      averageRelevance: n > 0 ? relevance / n : 0,
      ...(n > 0 ? { earliest: thoughts[0].timestamp, latest: thoughts[n - 1].timestamp } : {}),
    };
  }

  /** Sessions that have at least one thought. */
  async listSessions(options: CallOptions = {}): Promise<string[]> {
    return this.thoughts.listSessions(options.signal);
  }

  // ── Relations ──────────────────────────────────────────────────

  async saveRelation(sessionId: string, relation: ThoughtRelation, options: CallOptions = {}): Promise<ThoughtRelation> {
    assertSession(sessionId);
    const validated = validateRelation(relation);
    return this.locks.runExclusive(sessionKey(sessionId), async () => {
      await this.writeRelation(sessionId, validated, options.signal);
      return validated;
    });
  }

  async getRelationsForThought(thoughtId: string, options: CallOptions = {}): Promise<ThoughtRelation[]> {
    assertId(thoughtId, 'thought id');
    return this.relations.listForThought(thoughtId, options.signal);
  }

  async getOutgoingRelations(thoughtId: string, options: CallOptions = {}): Promise<ThoughtRelation[]> {
    assertId(thoughtId, 'thought id');
    return this.relations.listOutgoing(thoughtId, options.signal);
  }

  async getRelations(sessionId: string, options: CallOptions = {}): Promise<ThoughtRelation[]> {
    return this.relations.listBySession(sessionId, options.signal);
  }

  async getRelationsByType(
    sessionId: string,
    type: RelationType,
    options: CallOptions = {},
  ): Promise<ThoughtRelation[]> {
    return this.relations.listByType(sessionId, type, options.signal);
  }

  // ── Results ────────────────────────────────────────────────────

  /**
   * Saves the result and a relation from its thought: `leads_to` on success,
   * `triggers` on failure, with the result's confidence as strength.
   */
  async saveResult(
    sessionId: string,
    result: ThoughtResult,
    options: CallOptions = {},
  ): Promise<{ result: ThoughtResult; relation: ThoughtRelation }> {
    assertSession(sessionId);
    const validated = validateResult(result);
    const relation: ThoughtRelation = {
      id: generateId(),
      sourceThoughtId: validated.thoughtId,
      targetThoughtId: validated.id,
      type: validated.success ? 'leads_to' : 'triggers',
      strength: validated.confidence,
      createdAt: validated.createdAt,
    };

    return this.locks.runExclusive(sessionKey(sessionId), async () => {
      const vector = await this.embedText(validated.content, options.signal);
      await this.results.upsert(sessionId, validated, vector, options.signal);
      await this.writeRelation(sessionId, relation, options.signal);
      return { result: validated, relation };
    });
  }

  async getResultsForThought(thoughtId: string, options: CallOptions = {}): Promise<ThoughtResult[]> {
    assertId(thoughtId, 'thought id');
    return this.results.listForThought(thoughtId, options.signal);
  }

  async getResults(sessionId: string, options: CallOptions = {}): Promise<ThoughtResult[]> {
    return this.results.listBySession(sessionId, options.signal);
  }

  /** Snapshot of points skipped because they could not be decoded. */
  parseFailures(): ParseFailureCounters {
    return this.failures.snapshot();
  }

  private async writeRelation(sessionId: string, relation: ThoughtRelation, signal?: AbortSignal): Promise<void> {
    const text = `${relation.type}: ${relation.sourceThoughtId} -> ${relation.targetThoughtId}`;
    const vector = await this.embedText(text, signal);
    await this.relations.upsert(sessionId, relation, vector, signal);
  }
}

// ── Validation ───────────────────────────────────────────────────

function sessionKey(sessionId: string): string {
  return `session:${sessionId}`;
}

function formatIssues(error: ZodError): string {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

function assertSession(sessionId: string): void {
  if (sessionId.trim() === '') {
    throw new ValidationError('session id must not be empty');
  }
}

function assertId(id: string, label: string): void {
  if (!thoughtIdSchema.safeParse(id).success) {
    throw new ValidationError(`${label} is not a UUID: ${id}`);
  }
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ValidationError(`limit must be a non-negative integer, got ${limit}`);
  }
}

function toBoundary(value: string | Date, label: string): number {
  const ms = value instanceof Date ? value.getTime() : toEpochMs(value);
  if (Number.isNaN(ms)) {
    throw new ValidationError(`${label} is not a valid timestamp: ${String(value)}`);
  }
  return ms;
}

function withoutEmptyMetadata(
  metadata: Record<string, unknown> | undefined,
): { metadata?: Record<string, unknown> } {
  return metadata && Object.keys(metadata).length > 0 ? { metadata } : {};
}

function validateThought(sessionId: string, input: ThoughtInput): Thought {
  const parsed = thoughtInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`thought ${String(input.id)}: ${formatIssues(parsed.error)}`);
  }
  // Empty optional fields are not stored, so they are dropped here too.
  const { topic, tags, metadata, ...rest } = parsed.data;
  return {
    ...rest,
    sessionId,
    ...(topic ? { topic } : {}),
    ...(tags && tags.length > 0 ? { tags } : {}),
    ...withoutEmptyMetadata(metadata),
  };
}

function validateRelation(input: ThoughtRelation): ThoughtRelation {
  const parsed = relationSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`relation ${String(input.id)}: ${formatIssues(parsed.error)}`);
  }
  const { metadata, ...rest } = parsed.data;
  return { ...rest, ...withoutEmptyMetadata(metadata) };
}

function validateResult(input: ThoughtResult): ThoughtResult {
  const parsed = resultSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`result ${String(input.id)}: ${formatIssues(parsed.error)}`);
  }
  const { metadata, ...rest } = parsed.data;
  return { ...rest, ...withoutEmptyMetadata(metadata) };
}

/** Oldest first; ties broken by id. */
function chronological(thoughts: Thought[]): Thought[] {
  return [...thoughts].sort(
    (a, b) => toEpochMs(a.timestamp) - toEpochMs(b.timestamp) || a.id.localeCompare(b.id),
  );
}
