import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as lancedb from '@lancedb/lancedb';
import { mkdtemp, rm } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { CollectionNotFoundError, DimensionMismatchError, SynapticError } from '@synaptic/shared';
import { LanceDbVectorBackend } from '../src/backends/lancedb.js';
import { ThoughtStore } from '../src/thought-store.js';
import { makeThought, uuid } from './helpers.js';

const INDEXED = ['session_id', 'type', 'thought_id', 'source_thought_id', 'target_thought_id', 'relation_type'];

let dir: string;
let backend: LanceDbVectorBackend;

/** A row written behind the backend's back, with a payload that is not JSON. */
async function addCorruptRow(table: string, id: string, sessionId: string): Promise<void> {
  const db = await lancedb.connect(dir);
  const handle = await db.openTable(table);
  const row: Record<string, unknown> = { id, vector: [0, 1], payload: '{not json' };
  for (const field of INDEXED) row[field] = field === 'session_id' ? sessionId : '';
  await handle.add([row]);
  db.close();
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'synaptic-lancedb-'));
  backend = new LanceDbVectorBackend({ uri: dir, indexedFields: INDEXED });
  await backend.createCollection('items', { vectorSize: 2, distance: 'cosine' });
  await backend.upsert('items', [
    { id: uuid(1), vector: [1, 0], payload: { session_id: 's1', type: 'Observation', note: 'a' } },
    { id: uuid(2), vector: [0, 1], payload: { session_id: 's1', type: 'Decision', note: 'b' } },
    { id: uuid(3), vector: [1, 1], payload: { session_id: 's2', type: 'Observation', note: 'a' } },
  ]);
});

afterEach(async () => {
  await backend.close();
  await rm(dir, { recursive: true, force: true });
});

describe('LanceDbVectorBackend', () => {
  it('creates a table with its metadata row and hides the metadata table', async () => {
    expect(await backend.listCollections()).toEqual(['items']);
    expect(await backend.collectionExists('_synaptic_collections')).toBe(false);

    await backend.createCollection('empty', { vectorSize: 3, distance: 'euclid' });
    expect(await backend.getCollectionInfo('empty')).toEqual({
      vectorSize: 3,
      pointsCount: 0,
      distance: 'euclid',
      status: 'green',
    });
    expect(await backend.getCollectionInfo('missing')).toBeNull();
  });

  it('rejects a duplicate collection and the manhattan distance', async () => {
    await expect(backend.createCollection('items', { vectorSize: 2, distance: 'cosine' })).rejects.toBeInstanceOf(
      SynapticError,
    );
    await expect(backend.createCollection('grid', { vectorSize: 2, distance: 'manhattan' })).rejects.toBeInstanceOf(
      SynapticError,
    );
    expect(await backend.collectionExists('grid')).toBe(false);
  });

  it('rejects requests against a missing collection', async () => {
    await expect(backend.scroll('missing')).rejects.toBeInstanceOf(CollectionNotFoundError);
  });

  it('rejects vectors of the wrong length', async () => {
    await expect(
      backend.upsert('items', [{ id: uuid(9), vector: [1, 2, 3], payload: {} }]),
    ).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it('upserts by id', async () => {
    await backend.upsert('items', [
      { id: uuid(1), vector: [1, 0], payload: { session_id: 's1', type: 'Decision', note: 'changed' } },
    ]);

    expect(await backend.count('items')).toBe(3);
    const decisions = await backend.scroll('items', { filter: { must: [{ key: 'type', match: 'Decision' }] } });
    expect(decisions.points.map((p) => p.id).sort()).toEqual([uuid(1), uuid(2)]);
  });

  it('pages through scroll results with an offset cursor', async () => {
    const first = await backend.scroll('items', { limit: 2 });
    expect(first.points).toHaveLength(2);
    expect(first.nextOffset).toBe('2');

    const second = await backend.scroll('items', { limit: 2, offset: first.nextOffset });
    expect(second.points).toHaveLength(1);
    expect(second.nextOffset).toBeNull();

    const ids = [...first.points, ...second.points].map((p) => p.id).sort();
    expect(ids).toEqual([uuid(1), uuid(2), uuid(3)]);
  });

  it('applies indexed and payload-only conditions together', async () => {
    const page = await backend.scroll('items', {
      filter: { must: [{ key: 'session_id', match: 's1' }, { key: 'note', match: 'a' }] },
    });
    expect(page.points.map((p) => p.id)).toEqual([uuid(1)]);
    expect(await backend.count('items', { must: [{ key: 'note', match: 'a' }] })).toBe(2);
    expect(await backend.count('items', { must: [{ key: 'session_id', match: 's1' }] })).toBe(2);
  });

  it('matches either end of a relation with a should filter', async () => {
    await backend.createCollection('links', { vectorSize: 2, distance: 'cosine' });
    await backend.upsert('links', [
      { id: uuid(10), vector: [1, 0], payload: { source_thought_id: uuid(1), target_thought_id: uuid(2) } },
      { id: uuid(11), vector: [1, 0], payload: { source_thought_id: uuid(2), target_thought_id: uuid(3) } },
      { id: uuid(12), vector: [1, 0], payload: { source_thought_id: uuid(3), target_thought_id: uuid(4) } },
    ]);

    const page = await backend.scroll('links', {
      filter: {
        should: [
          { key: 'source_thought_id', match: uuid(2) },
          { key: 'target_thought_id', match: uuid(2) },
        ],
      },
    });
    expect(page.points.map((p) => p.id).sort()).toEqual([uuid(10), uuid(11)]);
  });

  it('deletes by ids and by filter', async () => {
    await backend.delete('items', { ids: [uuid(3)] });
    expect(await backend.count('items')).toBe(2);

    await backend.delete('items', { filter: { must: [{ key: 'note', match: 'b' }] } });
    const rest = await backend.scroll('items');
    expect(rest.points.map((p) => p.id)).toEqual([uuid(1)]);
  });

  it('scores cosine search as a similarity', async () => {
    const hits = await backend.search('items', [1, 0], {
      limit: 1,
      filter: { must: [{ key: 'session_id', match: 's1' }] },
    });
    expect(hits.map((h) => h.id)).toEqual([uuid(1)]);
    expect(hits[0].score).toBeCloseTo(1, 5);
  });

  it('scores euclid search as the plain distance', async () => {
    await backend.createCollection('plane', { vectorSize: 2, distance: 'euclid' });
    await backend.upsert('plane', [{ id: uuid(20), vector: [3, 4], payload: {} }]);

    const [hit] = await backend.search('plane', [0, 0], { limit: 1 });
    expect(hit.score).toBeCloseTo(5, 4);
    expect(await backend.search('plane', [0, 0], { scoreThreshold: 4 })).toEqual([]);
  });

  it('skips a row whose payload is not JSON', async () => {
    await addCorruptRow('items', uuid(9), 's1');

    const page = await backend.scroll('items', { filter: { must: [{ key: 'session_id', match: 's1' }] } });
    expect(page.points.map((p) => p.id).sort()).toEqual([uuid(1), uuid(2)]);
  });

  it('keeps reading a session when one stored thought is corrupt', async () => {
    const store = new ThoughtStore({ backend, vectorSize: 2 });
    await store.saveThought('s1', makeThought(1));
    await addCorruptRow('synaptic_thoughts', uuid(9), 's1');

    expect((await store.getThoughts('s1')).map((t) => t.id)).toEqual([uuid(1)]);
  });
});
