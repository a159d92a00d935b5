import {
  CollectionNotFoundError,
  DimensionMismatchError,
  SynapticError,
  cosineSimilarity,
  type DistanceMetric,
} from '@synaptic/shared';
import {
  isSimilarityMetric,
  matchesFilter,
  type BackendCollectionInfo,
  type CreateCollectionOptions,
  type DeleteSelector,
  type Filter,
  type Payload,
  type ScoredPoint,
  type ScrollOptions,
  type ScrollResult,
  type SearchOptions,
  type VectorBackendClient,
  type VectorPoint,
} from './types.js';

interface MemoryCollection {
  vectorSize: number;
  distance: DistanceMetric;
  points: Map<string, { vector: number[]; payload: Payload }>;
}

const DEFAULT_SCROLL_LIMIT = 100;
const DEFAULT_SEARCH_LIMIT = 10;

/**
 * In-process backend. Scroll pages are ordered by point id and the cursor is
 * the id of the first point of the next page.
 */
export class InMemoryVectorBackend implements VectorBackendClient {
  private collections = new Map<string, MemoryCollection>();

  async listCollections(): Promise<string[]> {
    return [...this.collections.keys()].sort();
  }

  async collectionExists(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async createCollection(name: string, options: CreateCollectionOptions): Promise<void> {
    if (this.collections.has(name)) {
      throw new SynapticError(`Collection already exists: ${name}`);
    }
    if (!Number.isInteger(options.vectorSize) || options.vectorSize <= 0) {
      throw new SynapticError(`Invalid vector size for ${name}: ${options.vectorSize}`);
    }
    this.collections.set(name, {
      vectorSize: options.vectorSize,
      distance: options.distance,
      points: new Map(),
    });
  }

  async deleteCollection(name: string): Promise<boolean> {
    return this.collections.delete(name);
  }

  async getCollectionInfo(name: string): Promise<BackendCollectionInfo | null> {
    const collection = this.collections.get(name);
    if (!collection) return null;
    return {
      vectorSize: collection.vectorSize,
      pointsCount: collection.points.size,
      distance: collection.distance,
      status: 'green',
    };
  }

  async upsert(name: string, points: VectorPoint[]): Promise<void> {
    const collection = this.require(name);
    for (const point of points) {
      if (point.vector.length !== collection.vectorSize) {
        throw new DimensionMismatchError(collection.vectorSize, point.vector.length, `upsert into ${name}`);
      }
    }
    for (const point of points) {
      collection.points.set(point.id, { vector: [...point.vector], payload: structuredClone(point.payload) });
    }
  }

  async search(name: string, vector: number[], options: SearchOptions = {}): Promise<ScoredPoint[]> {
    const collection = this.require(name);
    if (vector.length !== collection.vectorSize) {
      throw new DimensionMismatchError(collection.vectorSize, vector.length, `search in ${name}`);
    }

    const higherIsBetter = isSimilarityMetric(collection.distance);
    const scored: ScoredPoint[] = [];
    for (const [id, point] of collection.points) {
      if (!matchesFilter(point.payload, options.filter)) continue;
      const score = computeScore(collection.distance, vector, point.vector);
      if (options.scoreThreshold !== undefined) {
        if (higherIsBetter ? score < options.scoreThreshold : score > options.scoreThreshold) continue;
      }
      scored.push({ id, payload: structuredClone(point.payload), score });
    }

    scored.sort((a, b) => (higherIsBetter ? b.score - a.score : a.score - b.score) || a.id.localeCompare(b.id));
    return scored.slice(0, options.limit ?? DEFAULT_SEARCH_LIMIT);
  }

  async scroll(name: string, options: ScrollOptions = {}): Promise<ScrollResult> {
    const collection = this.require(name);
    const limit = options.limit ?? DEFAULT_SCROLL_LIMIT;

    const ids = [...collection.points.keys()].sort();
    const matching = ids.filter((id) => {
      if (options.offset && id < options.offset) return false;
      const point = collection.points.get(id);
      return point !== undefined && matchesFilter(point.payload, options.filter);
    });

    const page = matching.slice(0, limit);
    const points = page.map((id) => ({
      id,
      payload: structuredClone(collection.points.get(id)?.payload ?? {}),
    }));
    return { points, nextOffset: matching[limit] ?? null };
  }

  async delete(name: string, selector: DeleteSelector): Promise<void> {
    const collection = this.require(name);
    if ('ids' in selector) {
      for (const id of selector.ids) collection.points.delete(id);
      return;
    }
    for (const [id, point] of collection.points) {
      if (matchesFilter(point.payload, selector.filter)) collection.points.delete(id);
    }
  }

  async count(name: string, filter?: Filter): Promise<number> {
    const collection = this.require(name);
    if (!filter) return collection.points.size;
    let total = 0;
    for (const point of collection.points.values()) {
      if (matchesFilter(point.payload, filter)) total++;
    }
    return total;
  }

  private require(name: string): MemoryCollection {
    const collection = this.collections.get(name);
    if (!collection) throw new CollectionNotFoundError(name);
    return collection;
  }
}

function computeScore(distance: DistanceMetric, a: number[], b: number[]): number {
  switch (distance) {
    case 'cosine':
      return cosineSimilarity(a, b);
    case 'dot':
      return a.reduce((sum, x, i) => sum + x * b[i], 0);
    case 'euclid':
      return Math.sqrt(a.reduce((sum, x, i) => sum + (x - b[i]) ** 2, 0));
    case 'manhattan':
      return a.reduce((sum, x, i) => sum + Math.abs(x - b[i]), 0);
  }
}
