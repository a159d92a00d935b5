import type { CollectionLink } from './types/collection.js';
import type { MemoryLayerMapping } from './types/memory.js';
import type { DistanceMetric } from './vocabulary.js';
import { synapticConfigSchema, type SynapticConfig } from './schemas/config.schema.js';

export const DEFAULT_VECTOR_SIZE = 768;
export const DEFAULT_DISTANCE: DistanceMetric = 'cosine';
export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_RECENT_WINDOW = 10;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;
export const DEFAULT_CHAIN_DEPTH = 5;
export const MAX_CHAIN_DEPTH = 10;
export const DEFAULT_PARENT_WALK_DEPTH = 32;
export const MEMORY_MAP_LINK_LIMIT = 10;

// ── Known collections ────────────────────────────────────────────

export const COLLECTIONS = {
  thoughts: 'synaptic_thoughts',
  relations: 'synaptic_thought_relations',
  results: 'synaptic_thought_results',
  conversations: 'synaptic_conversations',
  skills: 'synaptic_skills',
  toolPatterns: 'synaptic_tool_patterns',
  personalities: 'synaptic_personalities',
  persons: 'synaptic_persons',
  selfIndex: 'synaptic_selfindex',
  fileHashes: 'synaptic_filehashes',
  pipelineVectors: 'pipeline_vectors',
  tools: 'tools',
  core: 'core',
  fullCore: 'fullcore',
  codebase: 'codebase',
  prefixCache: 'prefix_cache',
  vectorDocs: 'vector_docs',
} as const;

/** Purpose of every collection the agent is known to maintain. */
export const COLLECTION_PURPOSES: Record<string, string> = {
  [COLLECTIONS.thoughts]: 'Persisted reasoning units (thoughts) of every session',
  [COLLECTIONS.relations]: 'Typed relations between thoughts',
  [COLLECTIONS.results]: 'Outcomes produced by thoughts',
  [COLLECTIONS.conversations]: 'Conversation turns and summaries',
  [COLLECTIONS.skills]: 'Learned skills and their descriptions',
  [COLLECTIONS.toolPatterns]: 'Successful tool usage patterns',
  [COLLECTIONS.personalities]: 'Personality traits and behavioural profiles',
  [COLLECTIONS.persons]: 'People the agent has interacted with',
  [COLLECTIONS.selfIndex]: 'Index over the agent\'s own memories',
  [COLLECTIONS.fileHashes]: 'Content hashes of indexed files',
  [COLLECTIONS.pipelineVectors]: 'Intermediate vectors of processing pipelines',
  [COLLECTIONS.tools]: 'Tool descriptions for retrieval',
  [COLLECTIONS.core]: 'Core knowledge base',
  [COLLECTIONS.fullCore]: 'Full knowledge base including derived documents',
  [COLLECTIONS.codebase]: 'Source code chunks of the agent itself',
  [COLLECTIONS.prefixCache]: 'Cached prompt prefixes',
  [COLLECTIONS.vectorDocs]: 'General documents',
};

export const DEFAULT_COLLECTION_LINKS: CollectionLink[] = [
  {
    source: COLLECTIONS.thoughts,
    target: COLLECTIONS.relations,
    relationType: 'indexes',
    strength: 1,
    description: 'Relations reference thoughts by id',
  },
  {
    source: COLLECTIONS.thoughts,
    target: COLLECTIONS.results,
    relationType: 'extends',
    strength: 1,
    description: 'Results record what thoughts produced',
  },
  {
    source: COLLECTIONS.skills,
    target: COLLECTIONS.toolPatterns,
    relationType: 'related_to',
    strength: 0.8,
    description: 'Skills are carried out through tool patterns',
  },
  {
    source: COLLECTIONS.conversations,
    target: COLLECTIONS.thoughts,
    relationType: 'depends_on',
    strength: 0.9,
    description: 'Conversations give rise to thoughts',
  },
  {
    source: COLLECTIONS.personalities,
    target: COLLECTIONS.persons,
    relationType: 'related_to',
    strength: 0.7,
    description: 'Personality profiles describe known persons',
  },
  {
    source: COLLECTIONS.selfIndex,
    target: COLLECTIONS.thoughts,
    relationType: 'aggregates',
    strength: 1,
    description: 'The self index summarizes thoughts',
  },
  {
    source: COLLECTIONS.core,
    target: COLLECTIONS.fullCore,
    relationType: 'part_of',
    strength: 1,
  },
  {
    source: COLLECTIONS.codebase,
    target: COLLECTIONS.fullCore,
    relationType: 'part_of',
    strength: 1,
  },
];

export const DEFAULT_LAYER_MAPPINGS: MemoryLayerMapping[] = [
  {
    layer: 'working',
    collections: [COLLECTIONS.thoughts],
    description: 'Current reasoning and short-lived context',
    retentionPriority: 1.0,
  },
  {
    layer: 'episodic',
    collections: [COLLECTIONS.conversations, COLLECTIONS.results],
    description: 'Experiences: conversations and what came of them',
    retentionPriority: 0.9,
  },
  {
    layer: 'semantic',
    collections: [COLLECTIONS.core, COLLECTIONS.fullCore, COLLECTIONS.codebase, COLLECTIONS.vectorDocs],
    description: 'Facts and general knowledge',
    retentionPriority: 0.7,
  },
  {
    layer: 'procedural',
    collections: [COLLECTIONS.skills, COLLECTIONS.toolPatterns, COLLECTIONS.tools],
    description: 'Skills and how to use tools',
    retentionPriority: 0.8,
  },
  {
    layer: 'autobiographical',
    collections: [COLLECTIONS.personalities, COLLECTIONS.persons, COLLECTIONS.selfIndex],
    description: 'Identity, personality and relationships',
    retentionPriority: 0.95,
  },
];

export const DEFAULT_CONFIG: SynapticConfig = synapticConfigSchema.parse({});
