import type { CollectionStatus, DistanceMetric } from '@synaptic/shared';

// ============================================================================
// Vector backend seam. Collections hold points: a UUID, a fixed-length
// vector and a JSON payload. Filters match payload keys exactly.
// ============================================================================

export type Payload = Record<string, unknown>;

export interface VectorPoint {
  id: string;
  vector: number[];
  payload: Payload;
}

export interface RetrievedPoint {
  id: string;
  payload: Payload;
}

export interface ScoredPoint extends RetrievedPoint {
  score: number;
}

export type MatchValue = string | number | boolean;

export interface FilterCondition {
  key: string;
  match: MatchValue;
}

/** Every `must` condition holds, and at least one `should` when any are given. */
export interface Filter {
  must?: FilterCondition[];
  should?: FilterCondition[];
}

export interface CreateCollectionOptions {
  vectorSize: number;
  distance: DistanceMetric;
}

export interface BackendCollectionInfo {
  vectorSize: number;
  pointsCount: number;
  distance: DistanceMetric;
  status: CollectionStatus;
}

export interface SearchOptions {
  filter?: Filter;
  limit?: number;
  /**
   * Minimum similarity for cosine/dot; maximum distance for euclid/manhattan.
   */
  scoreThreshold?: number;
}

export interface ScrollOptions {
  filter?: Filter;
  limit?: number;
  /** Opaque cursor returned as `nextOffset` by the previous page. */
  offset?: string | null;
}

export interface ScrollResult {
  points: RetrievedPoint[];
  nextOffset: string | null;
}

export type DeleteSelector = { ids: string[] } | { filter: Filter };

/**
 * Requests against a missing collection reject with `CollectionNotFoundError`.
 * Upserting a vector of the wrong length rejects with `DimensionMismatchError`.
 */
export interface VectorBackendClient {
  listCollections(): Promise<string[]>;
  collectionExists(name: string): Promise<boolean>;
  createCollection(name: string, options: CreateCollectionOptions): Promise<void>;
  /** Resolves false when the collection did not exist. */
  deleteCollection(name: string): Promise<boolean>;
  getCollectionInfo(name: string): Promise<BackendCollectionInfo | null>;
  upsert(collection: string, points: VectorPoint[]): Promise<void>;
  search(collection: string, vector: number[], options?: SearchOptions): Promise<ScoredPoint[]>;
  scroll(collection: string, options?: ScrollOptions): Promise<ScrollResult>;
  delete(collection: string, selector: DeleteSelector): Promise<void>;
  count(collection: string, filter?: Filter): Promise<number>;
  close?(): Promise<void>;
}

/** Higher scores are better for these metrics; lower for the rest. */
export function isSimilarityMetric(distance: DistanceMetric): boolean {
  return distance === 'cosine' || distance === 'dot';
}

export function matchesFilter(payload: Payload, filter: Filter | undefined): boolean {
  if (!filter) return true;
  const holds = (c: FilterCondition) => payload[c.key] === c.match;
  if (filter.must && !filter.must.every(holds)) return false;
  if (filter.should && filter.should.length > 0 && !filter.should.some(holds)) return false;
  return true;
}
