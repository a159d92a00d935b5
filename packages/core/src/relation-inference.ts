import {
  DEFAULT_RECENT_WINDOW,
  DEFAULT_SIMILARITY_THRESHOLD,
  classifyThoughtType,
  cosineSimilarity,
  createLogger,
  generateId,
  isoNow,
  type KnownThoughtType,
  type RelationType,
  type Thought,
  type ThoughtInput,
  type ThoughtRelation,
  type ThoughtType,
} from '@synaptic/shared';
import type { ThoughtStore } from '@synaptic/store';

const log = createLogger('inference');

// ============================================================================
// Relation inference
//
// A new thought is compared with the most recent thoughts of its session.
// Pairs above the similarity threshold get a relation whose type comes from
// the first matching rule. The rule table is a heuristic; callers may pass
// their own.
// ============================================================================

export interface RelationRule {
  /** Type of the existing (earlier) thought, or `*`. */
  from: KnownThoughtType | '*';
  /** Type of the new thought, or `*`. */
  to: KnownThoughtType | '*';
  relation: RelationType;
}

export const DEFAULT_RELATION_RULES: readonly RelationRule[] = [
  { from: 'Observation', to: 'Analytical', relation: 'leads_to' },
  { from: 'Analytical', to: 'Decision', relation: 'leads_to' },
  { from: 'Emotional', to: 'SelfReflection', relation: 'triggers' },
  { from: 'MemoryRecall', to: '*', relation: 'supports' },
  { from: 'Strategic', to: 'Decision', relation: 'leads_to' },
  { from: 'Synthesis', to: '*', relation: 'abstracts' },
  { from: 'Creative', to: '*', relation: 'elaborates' },
  { from: '*', to: 'Synthesis', relation: 'part_of' },
  { from: '*', to: 'Decision', relation: 'leads_to' },
];

export const FALLBACK_RELATION: RelationType = 'similar_to';

function matchesSide(pattern: KnownThoughtType | '*', type: ThoughtType): boolean {
  if (pattern === '*') return true;
  const tag = classifyThoughtType(type);
  return tag.kind === 'known' && tag.type === pattern;
}

/** First rule matching `(existing, incoming)`, else `similar_to`. */
export function inferRelationType(
  existing: ThoughtType,
  incoming: ThoughtType,
  rules: readonly RelationRule[] = DEFAULT_RELATION_RULES,
): RelationType {
  const rule = rules.find((r) => matchesSide(r.from, existing) && matchesSide(r.to, incoming));
  return rule?.relation ?? FALLBACK_RELATION;
}

export interface RelationInferenceOptions {
  /** How many recent thoughts a new thought is compared with. */
  recentWindow?: number;
  /** Pairs must be strictly more similar than this. */
  similarityThreshold?: number;
  rules?: readonly RelationRule[];
}

export interface SaveWithRelationsOptions {
  autoInfer?: boolean;
  signal?: AbortSignal;
}

export class RelationInferenceEngine {
  private readonly recentWindow: number;
  private readonly threshold: number;
  private readonly rules: readonly RelationRule[];

  constructor(
    private store: ThoughtStore,
    options: RelationInferenceOptions = {},
  ) {
    this.recentWindow = options.recentWindow ?? DEFAULT_RECENT_WINDOW;
    this.threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    this.rules = options.rules ?? DEFAULT_RELATION_RULES;
  }

  /**
   * Persists the thought, then links it to similar recent thoughts. Returns the
   * saved thought and the relations created for it. Without an embedder no
   * relations are inferred.
   */
  async saveWithRelations(
    sessionId: string,
    input: ThoughtInput,
    options: SaveWithRelationsOptions = {},
  ): Promise<{ thought: Thought; relations: ThoughtRelation[] }> {
    const thought = await this.store.saveThought(sessionId, input, { signal: options.signal });
    if (options.autoInfer === false || !this.store.hasEmbedder) {
      return { thought, relations: [] };
    }
    const relations = await this.inferRelations(sessionId, thought, options.signal);
    return { thought, relations };
  }

  async inferRelations(sessionId: string, thought: Thought, signal?: AbortSignal): Promise<ThoughtRelation[]> {
    if (!this.store.hasEmbedder) return [];

    const recent = (await this.store.getRecentThoughts(sessionId, this.recentWindow + 1, { signal }))
      .filter((t) => t.id !== thought.id)
      .slice(0, this.recentWindow);
    if (recent.length === 0) return [];

    const vector = await this.store.embedText(thought.content, signal);
    const relations: ThoughtRelation[] = [];

    for (const existing of recent) {
      const similarity = cosineSimilarity(vector, await this.store.embedText(existing.content, signal));
      const isParent = thought.parentThoughtId === existing.id;
      if (!isParent && !(similarity > this.threshold)) continue;

      const relation: ThoughtRelation = {
        id: generateId(),
        sourceThoughtId: existing.id,
        targetThoughtId: thought.id,
        type: isParent ? 'refines' : inferRelationType(existing.type, thought.type, this.rules),
        strength: clamp01(similarity),
        createdAt: isoNow(),
        metadata: { inferred: true, similarity },
      };
      relations.push(await this.store.saveRelation(sessionId, relation, { signal }));
    }

    if (relations.length > 0) {
      log.debug(`Inferred ${relations.length} relation(s) for thought ${thought.id}`);
    }
    return relations;
  }
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
