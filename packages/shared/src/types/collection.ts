import type { CollectionLinkType, DistanceMetric } from '../vocabulary.js';

export type CollectionStatus = 'green' | 'yellow' | 'red';

export interface CollectionInfo {
  name: string;
  vectorSize: number;
  pointsCount: number;
  distanceMetric: DistanceMetric;
  status: CollectionStatus;
  purpose?: string;
  linkedCollections: string[];
}

/** Declared edge between two collections. Unrelated to thought relations. */
export interface CollectionLink {
  source: string;
  target: string;
  relationType: CollectionLinkType;
  strength: number;
  description?: string;
}

export interface CollectionHealthReport {
  collectionName: string;
  isHealthy: boolean;
  expectedDimension: number;
  actualDimension: number;
  dimensionMismatch: boolean;
  issue?: string;
  recommendation?: string;
}

export interface AutoHealResult {
  healed: string[];
  failed: Array<{ collection: string; error: string }>;
}

export interface MemoryStatistics {
  totalCollections: number;
  totalVectors: number;
  healthyCollections: number;
  unhealthyCollections: number;
  collectionLinks: number;
  /** vector size → number of collections */
  dimensionDistribution: Record<number, number>;
}
