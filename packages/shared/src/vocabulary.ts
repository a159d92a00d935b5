// ============================================================================
// Closed vocabularies shared by the store, the inference engine and the admin
// layer. Thought types and origins stay open: callers outside this engine may
// introduce new tags, so those classify into a known tag or an `other` value.
// ============================================================================

export const KNOWN_THOUGHT_TYPES = [
  'Observation',
  'Analytical',
  'Decision',
  'Emotional',
  'SelfReflection',
  'MemoryRecall',
  'Strategic',
  'Synthesis',
  'Creative',
] as const;

export const KNOWN_THOUGHT_ORIGINS = ['Reactive', 'Autonomous', 'Chained'] as const;

export const RELATION_TYPES = [
  'caused_by',
  'leads_to',
  'contradicts',
  'supports',
  'refines',
  'abstracts',
  'elaborates',
  'similar_to',
  'instance_of',
  'part_of',
  'triggers',
  'resolves',
] as const;

export const RESULT_TYPES = [
  'action',
  'response',
  'insight',
  'decision',
  'skill_learned',
  'fact_discovered',
  'error',
  'deferred',
] as const;

export const COLLECTION_LINK_TYPES = [
  'depends_on',
  'indexes',
  'extends',
  'mirrors',
  'aggregates',
  'part_of',
  'related_to',
] as const;

export const MEMORY_LAYERS = [
  'working',
  'episodic',
  'semantic',
  'procedural',
  'autobiographical',
] as const;

export const DISTANCE_METRICS = ['cosine', 'euclid', 'dot', 'manhattan'] as const;

export type KnownThoughtType = (typeof KNOWN_THOUGHT_TYPES)[number];
export type KnownThoughtOrigin = (typeof KNOWN_THOUGHT_ORIGINS)[number];
export type RelationType = (typeof RELATION_TYPES)[number];
export type ResultType = (typeof RESULT_TYPES)[number];
export type CollectionLinkType = (typeof COLLECTION_LINK_TYPES)[number];
export type MemoryLayer = (typeof MEMORY_LAYERS)[number];
export type DistanceMetric = (typeof DISTANCE_METRICS)[number];

/** Known tag, or any caller-defined tag. */
export type ThoughtType = KnownThoughtType | (string & {});
export type ThoughtOrigin = KnownThoughtOrigin | (string & {});

export type ThoughtTypeTag =
  | { kind: 'known'; type: KnownThoughtType }
  | { kind: 'other'; value: string };

export type ThoughtOriginTag =
  | { kind: 'known'; origin: KnownThoughtOrigin }
  | { kind: 'other'; value: string };

function includes<T extends string>(values: readonly T[], raw: string): raw is T {
  return (values as readonly string[]).includes(raw);
}

export function classifyThoughtType(raw: string): ThoughtTypeTag {
  return includes(KNOWN_THOUGHT_TYPES, raw)
    ? { kind: 'known', type: raw }
    : { kind: 'other', value: raw };
}

export function classifyThoughtOrigin(raw: string): ThoughtOriginTag {
  return includes(KNOWN_THOUGHT_ORIGINS, raw)
    ? { kind: 'known', origin: raw }
    : { kind: 'other', value: raw };
}

export function isRelationType(raw: string): raw is RelationType {
  return includes(RELATION_TYPES, raw);
}

export function isCollectionLinkType(raw: string): raw is CollectionLinkType {
  return includes(COLLECTION_LINK_TYPES, raw);
}

export function isMemoryLayer(raw: string): raw is MemoryLayer {
  return includes(MEMORY_LAYERS, raw);
}

export function isDistanceMetric(raw: string): raw is DistanceMetric {
  return includes(DISTANCE_METRICS, raw);
}
