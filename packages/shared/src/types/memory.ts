// ============================================================================
// Cognitive memory layers over vector collections
// Layers: Working, Episodic, Semantic, Procedural, Autobiographical
// ============================================================================

import type { MemoryLayer } from '../vocabulary.js';
import type {
  CollectionHealthReport,
  CollectionInfo,
  CollectionLink,
  MemoryStatistics,
} from './collection.js';

export interface MemoryLayerMapping {
  layer: MemoryLayer;
  collections: string[];
  description: string;
  retentionPriority: number;  // 0-1
}

export interface MemorySnapshot {
  createdAt: string;
  collections: CollectionInfo[];
  links: CollectionLink[];
  layerVectorCounts: Record<MemoryLayer, number>;
  statistics: MemoryStatistics;
}

export interface MemoryHealthReport {
  healthyCollections: number;
  unhealthyCollections: number;
  healedCollections: string[];
  issues: CollectionHealthReport[];
  statistics: MemoryStatistics;
}
