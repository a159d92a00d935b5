import * as lancedb from '@lancedb/lancedb';
import { z } from 'zod';
import {
  BackendUnavailableError,
  CollectionNotFoundError,
  DimensionMismatchError,
  SynapticError,
  createLogger,
  getErrorMessage,
  isDistanceMetric,
  type DistanceMetric,
} from '@synaptic/shared';
import {
  isSimilarityMetric,
  matchesFilter,
  type BackendCollectionInfo,
  type CreateCollectionOptions,
  type DeleteSelector,
  type Filter,
  type FilterCondition,
  type MatchValue,
  type Payload,
  type ScoredPoint,
  type ScrollOptions,
  type ScrollResult,
  type SearchOptions,
  type VectorBackendClient,
  type VectorPoint,
} from './types.js';

const log = createLogger('lancedb');

const META_TABLE = '_synaptic_collections';
const SEED_ID = '__seed__';
const DEFAULT_SCROLL_LIMIT = 100;
const DEFAULT_SEARCH_LIMIT = 10;
const COLUMN_NAME = /^[a-z_][a-z0-9_]*$/;

const metaRowSchema = z.object({
  name: z.string(),
  vector_size: z.number(),
  distance: z.string(),
});

const pointRowSchema = z.object({
  id: z.string(),
  payload: z.string(),
  _distance: z.number().optional(),
});

export interface LanceDbBackendOptions {
  /** Directory (or URI) of the LanceDB database. */
  uri: string;
  /** Payload keys copied into string columns so filters run inside LanceDB. */
  indexedFields: string[];
}

/**
 * One LanceDB table per collection: `id`, `vector`, `payload` (JSON) and one
 * string column per indexed payload key. Vector size and distance of each
 * collection live in a metadata table.
 */
export class LanceDbVectorBackend implements VectorBackendClient {
  private db: lancedb.Connection | null = null;
  private readonly uri: string;
  private readonly indexedFields: string[];

  constructor(options: LanceDbBackendOptions) {
    for (const field of options.indexedFields) {
      if (!COLUMN_NAME.test(field) || field === 'id' || field === 'vector' || field === 'payload') {
        throw new SynapticError(`Invalid indexed field name: ${field}`);
      }
    }
    this.uri = options.uri;
    this.indexedFields = [...options.indexedFields];
  }

  async listCollections(): Promise<string[]> {
    const names = await this.guard('listCollections', async (db) => db.tableNames());
    return names.filter((name) => name !== META_TABLE).sort();
  }

  async collectionExists(name: string): Promise<boolean> {
    const names = await this.guard('collectionExists', async (db) => db.tableNames());
    return name !== META_TABLE && names.includes(name);
  }

  async createCollection(name: string, options: CreateCollectionOptions): Promise<void> {
    if (options.distance === 'manhattan') {
      throw new SynapticError('The LanceDB backend does not support the manhattan distance');
    }
    if (await this.collectionExists(name)) {
      throw new SynapticError(`Collection already exists: ${name}`);
    }

    await this.guard('createCollection', async (db) => {
      // Schema is inferred from a seed row that is removed straight away.
      const seed = this.toRow({ id: SEED_ID, vector: new Array<number>(options.vectorSize).fill(0), payload: {} });
      const table = await db.createTable(name, [seed]);
      await table.delete(`id = '${SEED_ID}'`);

      const metaRow = { name, vector_size: options.vectorSize, distance: options.distance };
      const tables = await db.tableNames();
      if (tables.includes(META_TABLE)) {
        const meta = await db.openTable(META_TABLE);
        await meta.delete(`name = ${quote(name)}`);
        await meta.add([metaRow]);
      } else {
        await db.createTable(META_TABLE, [metaRow]);
      }
    });
    log.debug(`Created table ${name} (${options.vectorSize}d, ${options.distance})`);
  }

  async deleteCollection(name: string): Promise<boolean> {
    if (!(await this.collectionExists(name))) return false;
    await this.guard('deleteCollection', async (db) => {
      await db.dropTable(name);
      if ((await db.tableNames()).includes(META_TABLE)) {
        const meta = await db.openTable(META_TABLE);
        await meta.delete(`name = ${quote(name)}`);
      }
    });
    return true;
  }

  async getCollectionInfo(name: string): Promise<BackendCollectionInfo | null> {
    if (!(await this.collectionExists(name))) return null;
    const meta = await this.readMeta(name);
    const pointsCount = await this.guard('getCollectionInfo', async (db) => {
      const table = await db.openTable(name);
      return table.countRows();
    });
    return {
      // 0 marks a table created outside this backend: its size is unknown.
      vectorSize: meta?.vectorSize ?? 0,
      pointsCount,
      distance: meta?.distance ?? 'cosine',
      status: 'green',
    };
  }

  async upsert(name: string, points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;
    const meta = await this.requireMeta(name);
    for (const point of points) {
      if (meta.vectorSize > 0 && point.vector.length !== meta.vectorSize) {
        throw new DimensionMismatchError(meta.vectorSize, point.vector.length, `upsert into ${name}`);
      }
    }

    await this.guard('upsert', async (db) => {
      const table = await db.openTable(name);
      await table
        .mergeInsert('id')
        .whenMatchedUpdateAll()
        .whenNotMatchedInsertAll()
        .execute(points.map((p) => this.toRow(p)));
    });
  }

  async search(name: string, vector: number[], options: SearchOptions = {}): Promise<ScoredPoint[]> {
    const meta = await this.requireMeta(name);
    if (meta.vectorSize > 0 && vector.length !== meta.vectorSize) {
      throw new DimensionMismatchError(meta.vectorSize, vector.length, `search in ${name}`);
    }

    const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
    const { where, residual } = this.splitFilter(options.filter);

    const rows = await this.guard('search', async (db) => {
      const table = await db.openTable(name);
      let query = table.vectorSearch(vector).distanceType(toLanceDistance(meta.distance));
      if (where) query = query.where(where);
      // Conditions on non-indexed keys are applied here, after the limit.
      return query.limit(limit).toArray();
    });

    const higherIsBetter = isSimilarityMetric(meta.distance);
    const results: ScoredPoint[] = [];
    for (const raw of rows) {
      const row = this.parseRow(name, raw);
      if (!row || !matchesFilter(row.payload, residual)) continue;
      const distance = row.distance ?? 0;
      // l2 comes back squared.
      const score = higherIsBetter ? 1 - distance : meta.distance === 'euclid' ? Math.sqrt(distance) : distance;
      if (options.scoreThreshold !== undefined) {
        if (higherIsBetter ? score < options.scoreThreshold : score > options.scoreThreshold) continue;
      }
      results.push({ id: row.id, payload: row.payload, score });
    }
    return results;
  }

  /** The cursor is the row offset of the next page. */
  async scroll(name: string, options: ScrollOptions = {}): Promise<ScrollResult> {
    await this.requireMeta(name);
    const limit = options.limit ?? DEFAULT_SCROLL_LIMIT;
    const start = options.offset ? Number.parseInt(options.offset, 10) : 0;
    if (!Number.isInteger(start) || start < 0) {
      throw new SynapticError(`Invalid scroll offset: ${options.offset}`);
    }
    const { where, residual } = this.splitFilter(options.filter);

    const rows = await this.guard('scroll', async (db) => {
      const table = await db.openTable(name);
      let query = table.query();
      if (where) query = query.where(where);
      return query.offset(start).limit(limit).toArray();
    });

    const points = [];
    for (const raw of rows) {
      const row = this.parseRow(name, raw);
      if (row && matchesFilter(row.payload, residual)) {
        points.push({ id: row.id, payload: row.payload });
      }
    }
    return { points, nextOffset: rows.length === limit ? String(start + limit) : null };
  }

  async delete(name: string, selector: DeleteSelector): Promise<void> {
    await this.requireMeta(name);

    let predicate: string | null;
    if ('ids' in selector) {
      if (selector.ids.length === 0) return;
      predicate = `id IN (${selector.ids.map(quote).join(', ')})`;
    } else {
      const { where, residual } = this.splitFilter(selector.filter);
      predicate = residual ? await this.idsMatching(name, selector.filter) : where;
      if (predicate === '') return;
    }

    await this.guard('delete', async (db) => {
      const table = await db.openTable(name);
      await table.delete(predicate ?? 'true');
    });
  }

  async count(name: string, filter?: Filter): Promise<number> {
    await this.requireMeta(name);
    const { where, residual } = this.splitFilter(filter);
    if (residual) {
      let total = 0;
      let offset: string | null = null;
      do {
        const page: ScrollResult = await this.scroll(name, { filter, offset, limit: DEFAULT_SCROLL_LIMIT });
        total += page.points.length;
        offset = page.nextOffset;
      } while (offset);
      return total;
    }
    return this.guard('count', async (db) => {
      const table = await db.openTable(name);
      return where ? table.countRows(where) : table.countRows();
    });
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  // ── Internals ──────────────────────────────────────────────────

  private async connection(): Promise<lancedb.Connection> {
    if (!this.db) {
      this.db = await lancedb.connect(this.uri);
    }
    return this.db;
  }

  private async guard<T>(operation: string, fn: (db: lancedb.Connection) => Promise<T>): Promise<T> {
    try {
      return await fn(await this.connection());
    } catch (err) {
      if (err instanceof SynapticError) throw err;
      throw new BackendUnavailableError(operation, err);
    }
  }

  private async readMeta(name: string): Promise<{ vectorSize: number; distance: DistanceMetric } | null> {
    const rows = await this.guard('readMeta', async (db) => {
      if (!(await db.tableNames()).includes(META_TABLE)) return [];
      const meta = await db.openTable(META_TABLE);
      return meta.query().where(`name = ${quote(name)}`).limit(1).toArray();
    });
    const parsed = metaRowSchema.safeParse(rows[0]);
    if (!parsed.success) return null;
    return {
      vectorSize: parsed.data.vector_size,
      distance: isDistanceMetric(parsed.data.distance) ? parsed.data.distance : 'cosine',
    };
  }

  private async requireMeta(name: string): Promise<{ vectorSize: number; distance: DistanceMetric }> {
    if (!(await this.collectionExists(name))) throw new CollectionNotFoundError(name);
    return (await this.readMeta(name)) ?? { vectorSize: 0, distance: 'cosine' };
  }

  private toRow(point: VectorPoint): Record<string, unknown> {
    const row: Record<string, unknown> = {
      id: point.id,
      vector: point.vector,
      payload: JSON.stringify(point.payload),
    };
    for (const field of this.indexedFields) {
      const value = point.payload[field];
      row[field] = isMatchValue(value) ? String(value) : '';
    }
    return row;
  }

  private parseRow(collection: string, raw: unknown): { id: string; payload: Payload; distance?: number } | null {
    const parsed = pointRowSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`Skipping malformed row in ${collection}: ${parsed.error.message}`);
      return null;
    }
    let payload: unknown;
    try {
      payload = JSON.parse(parsed.data.payload);
    } catch (err) {
      log.warn(`Skipping row ${parsed.data.id} in ${collection}: ${getErrorMessage(err)}`);
      return null;
    }
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      log.warn(`Skipping row ${parsed.data.id} in ${collection}: payload is not an object`);
      return null;
    }
    return {
      id: parsed.data.id,
      payload: Object.fromEntries(Object.entries(payload)),
      distance: parsed.data._distance,
    };
  }

  /**
   * Conditions on indexed keys become a SQL predicate; the rest are returned
   * as a residual filter evaluated on the decoded payload.
   */
  private splitFilter(filter: Filter | undefined): { where: string | null; residual: Filter | undefined } {
    if (!filter) return { where: null, residual: undefined };
    const indexed = (c: FilterCondition) => this.indexedFields.includes(c.key);
    const must = filter.must ?? [];
    const should = filter.should ?? [];

    const shouldIndexed = should.every(indexed);
    const clauses = must.filter(indexed).map(toSql);
    if (should.length > 0 && shouldIndexed) {
      clauses.push(`(${should.map(toSql).join(' OR ')})`);
    }

    const residualMust = must.filter((c) => !indexed(c));
    const residualShould = shouldIndexed ? [] : should;
    const residual =
      residualMust.length > 0 || residualShould.length > 0
        ? { must: residualMust, should: residualShould }
        : undefined;

    return { where: clauses.length > 0 ? clauses.join(' AND ') : null, residual };
  }

  private async idsMatching(name: string, filter: Filter): Promise<string> {
    const ids: string[] = [];
    let offset: string | null = null;
    do {
      const page: ScrollResult = await this.scroll(name, { filter, offset, limit: DEFAULT_SCROLL_LIMIT });
      ids.push(...page.points.map((p) => p.id));
      offset = page.nextOffset;
    } while (offset);
    return ids.length > 0 ? `id IN (${ids.map(quote).join(', ')})` : '';
  }
}

function isMatchValue(value: unknown): value is MatchValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function toSql(condition: FilterCondition): string {
  return `${condition.key} = ${quote(String(condition.match))}`;
}

function toLanceDistance(distance: DistanceMetric): 'cosine' | 'l2' | 'dot' {
  switch (distance) {
    case 'cosine':
      return 'cosine';
    case 'dot':
      return 'dot';
    case 'euclid':
    case 'manhattan':
      return 'l2';
  }
}
