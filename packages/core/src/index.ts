export { ConfigManager, CONFIG_FILE_NAMES } from './config-manager.js';
export type { ConfigLoadOptions } from './config-manager.js';
export {
  RelationInferenceEngine,
  inferRelationType,
  DEFAULT_RELATION_RULES,
  FALLBACK_RELATION,
} from './relation-inference.js';
export type {
  RelationRule,
  RelationInferenceOptions,
  SaveWithRelationsOptions,
} from './relation-inference.js';
export { CausalChainFinder, clampDepth } from './causal-chain-finder.js';
export type { CausalChainOptions } from './causal-chain-finder.js';
export { NeuroSymbolicAnalyzer } from './neuro-symbolic-analyzer.js';
export type { StatsOptions, SymbolicMatch } from './neuro-symbolic-analyzer.js';
export { CollectionAdmin, toHealthReport, computeStatistics } from './collection-admin.js';
export type {
  CollectionAdminOptions,
  AdminCallOptions,
  CreateCollectionRequest,
  DestructiveCallOptions,
} from './collection-admin.js';
export { MemoryLayerManager } from './memory-layer-manager.js';
export type { MemoryLayerManagerOptions, HealthCheckOptions } from './memory-layer-manager.js';
export { MemoryEngine } from './engine.js';
export type { MemoryEngineOptions } from './engine.js';
