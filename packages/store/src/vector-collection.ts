import {
  CollectionNotFoundError,
  SynapticError,
  createLogger,
  throwIfAborted,
  type DistanceMetric,
} from '@synaptic/shared';
import type { KeyedMutex } from './keyed-mutex.js';
import type {
  Filter,
  RetrievedPoint,
  ScoredPoint,
  ScrollResult,
  SearchOptions,
  VectorBackendClient,
  VectorPoint,
} from './backends/types.js';

const log = createLogger('store');

const SCROLL_PAGE_SIZE = 256;

export interface VectorCollectionOptions {
  vectorSize: number;
  distance: DistanceMetric;
  /** Points per upsert request. */
  batchSize: number;
}

/**
 * One backend collection as the repositories see it: created on first write,
 * read leniently (a missing collection reads as empty).
 */
export class VectorCollection {
  constructor(
    private backend: VectorBackendClient,
    readonly name: string,
    private options: VectorCollectionOptions,
    private locks: KeyedMutex,
  ) {}

  get vectorSize(): number {
    return this.options.vectorSize;
  }

  async ensure(signal?: AbortSignal): Promise<void> {
    await this.locks.runExclusive(`collection:${this.name}`, async () => {
      throwIfAborted(signal, `ensure ${this.name}`);
      if (await this.backend.collectionExists(this.name)) return;
      throwIfAborted(signal, `create ${this.name}`);
      await this.backend.createCollection(this.name, {
        vectorSize: this.options.vectorSize,
        distance: this.options.distance,
      });
      log.info(`Created collection ${this.name} (${this.options.vectorSize}d, ${this.options.distance})`);
    });
  }

  /** Upserts in sequential chunks of `batchSize`. */
  async upsert(points: VectorPoint[], signal?: AbortSignal): Promise<void> {
    if (points.length === 0) return;
    await this.ensure(signal);
    for (let i = 0; i < points.length; i += this.options.batchSize) {
      throwIfAborted(signal, `upsert into ${this.name}`);
      await this.backend.upsert(this.name, points.slice(i, i + this.options.batchSize));
    }
  }

  /** Every point matching `filter`, across all pages. */
  async scrollAll(filter: Filter | undefined, signal?: AbortSignal): Promise<RetrievedPoint[]> {
    const points: RetrievedPoint[] = [];
    let offset: string | null = null;
    try {
      do {
        throwIfAborted(signal, `scroll ${this.name}`);
        const page: ScrollResult = await this.backend.scroll(this.name, { filter, offset, limit: SCROLL_PAGE_SIZE });
        points.push(...page.points);
        if (page.nextOffset !== null && page.nextOffset === offset) {
          throw new SynapticError(`Scroll cursor of ${this.name} did not advance`);
        }
        offset = page.nextOffset;
      } while (offset !== null);
    } catch (err) {
      if (err instanceof CollectionNotFoundError) return [];
      throw err;
    }
    return points;
  }

  async search(vector: number[], options: SearchOptions, signal?: AbortSignal): Promise<ScoredPoint[]> {
    throwIfAborted(signal, `search ${this.name}`);
    try {
      return await this.backend.search(this.name, vector, options);
    } catch (err) {
      if (err instanceof CollectionNotFoundError) return [];
      throw err;
    }
  }

  async deleteWhere(filter: Filter, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal, `delete from ${this.name}`);
    try {
      await this.backend.delete(this.name, { filter });
    } catch (err) {
      if (err instanceof CollectionNotFoundError) return;
      throw err;
    }
  }
}
