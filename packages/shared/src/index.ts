// ── Vocabulary ───────────────────────────────────────────────────
export {
  KNOWN_THOUGHT_TYPES,
  KNOWN_THOUGHT_ORIGINS,
  RELATION_TYPES,
  RESULT_TYPES,
  COLLECTION_LINK_TYPES,
  MEMORY_LAYERS,
  DISTANCE_METRICS,
  classifyThoughtType,
  classifyThoughtOrigin,
  isRelationType,
  isCollectionLinkType,
  isMemoryLayer,
  isDistanceMetric,
} from './vocabulary.js';
export type {
  KnownThoughtType,
  KnownThoughtOrigin,
  ThoughtType,
  ThoughtOrigin,
  ThoughtTypeTag,
  ThoughtOriginTag,
  RelationType,
  ResultType,
  CollectionLinkType,
  MemoryLayer,
  DistanceMetric,
} from './vocabulary.js';

// ── Types ────────────────────────────────────────────────────────
export type {
  Thought,
  ThoughtInput,
  ThoughtRelation,
  ThoughtResult,
  ThoughtStatistics,
  NeuroSymbolicStats,
  RecordKind,
  ParseFailureCounters,
} from './types/thought.js';
export type {
  CollectionStatus,
  CollectionInfo,
  CollectionLink,
  CollectionHealthReport,
  AutoHealResult,
  MemoryStatistics,
} from './types/collection.js';
export type { MemoryLayerMapping, MemorySnapshot, MemoryHealthReport } from './types/memory.js';
export type { EmbeddingFunction } from './types/embedding.js';

// ── Schemas ──────────────────────────────────────────────────────
export {
  thoughtIdSchema,
  thoughtInputSchema,
  relationSchema,
  resultSchema,
  thoughtPayloadSchema,
  relationPayloadSchema,
  resultPayloadSchema,
} from './schemas/thought.schema.js';
export type { ThoughtPayload, RelationPayload, ResultPayload } from './schemas/thought.schema.js';
export {
  collectionNameSchema,
  collectionLinkSchema,
  distanceMetricSchema,
  memoryLayerMappingSchema,
} from './schemas/collection.schema.js';
export {
  synapticConfigSchema,
  backendConfigSchema,
  embeddingConfigSchema,
  collectionsConfigSchema,
  inferenceConfigSchema,
  causalConfigSchema,
  loggingConfigSchema,
  adminConfigSchema,
} from './schemas/config.schema.js';
export type {
  SynapticConfig,
  BackendConfig,
  EmbeddingConfig,
  CollectionsConfig,
  InferenceConfig,
  CausalConfig,
  LoggingConfig,
} from './schemas/config.schema.js';

// ── Constants & utilities ────────────────────────────────────────
export * from './constants.js';
export * from './utils/index.js';
