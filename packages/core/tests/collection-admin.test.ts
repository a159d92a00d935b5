import { describe, it, expect, beforeEach } from 'vitest';
import {
  ConfirmationRequiredError,
  DEFAULT_COLLECTION_LINKS,
  ValidationError,
  type CollectionLink,
} from '@synaptic/shared';
import { InMemoryVectorBackend, initializeAdminStore, type AdminStore } from '@synaptic/store';
import { CollectionAdmin, computeStatistics, toHealthReport } from '../src/collection-admin.js';
import { uuid } from './helpers.js';

let backend: InMemoryVectorBackend;
let adminStore: AdminStore;

function makeAdmin(defaultLinks: CollectionLink[] = []): CollectionAdmin {
  return new CollectionAdmin({
    backend,
    links: adminStore.links,
    audit: adminStore.audit,
    defaultVectorSize: 4,
    defaultLinks,
  });
}

beforeEach(() => {
  backend = new InMemoryVectorBackend();
  adminStore = initializeAdminStore();
});

describe('CollectionAdmin: collections', () => {
  it('creates a collection once', async () => {
    const admin = makeAdmin();
    expect(await admin.createCollection('notes')).toBe(true);
    expect(await admin.createCollection('notes')).toBe(false);
    expect(await admin.getCollectionInfo('notes')).toMatchObject({
      name: 'notes',
      vectorSize: 4,
      pointsCount: 0,
      distanceMetric: 'cosine',
      status: 'green',
    });
  });

  it('rejects invalid collection names', async () => {
    const admin = makeAdmin();
    await expect(admin.createCollection('bad name')).rejects.toBeInstanceOf(ValidationError);
  });

  it('attaches the known purpose of a collection', async () => {
    const admin = makeAdmin();
    await admin.createCollection('synaptic_skills');
    expect((await admin.getCollectionInfo('synaptic_skills'))?.purpose).toBe('Learned skills and their descriptions');
  });

  it('returns null for a missing collection', async () => {
    expect(await makeAdmin().getCollectionInfo('missing')).toBeNull();
  });

  it('drops links touching a deleted collection', async () => {
    const admin = makeAdmin();
    await admin.createCollection('a');
    await admin.addCollectionLink({ source: 'a', target: 'b', relationType: 'indexes', strength: 1 });
    await admin.addCollectionLink({ source: 'b', target: 'c', relationType: 'extends', strength: 1 });

    expect(await admin.deleteCollection('a')).toBe(true);
    expect(await admin.deleteCollection('a')).toBe(false);
    expect(admin.getLinkedCollections('a')).toEqual([]);
    expect(adminStore.links.list().map((l) => l.source)).toEqual(['b']);
    expect(adminStore.audit.recent(1)[0]).toMatchObject({ operation: 'delete_collection', target: 'a', success: true });
  });
});

describe('CollectionAdmin: health', () => {
  beforeEach(async () => {
    await backend.createCollection('synaptic_thoughts', { vectorSize: 4, distance: 'cosine' });
    await backend.createCollection('synaptic_skills', { vectorSize: 6, distance: 'dot' });
    await backend.upsert('synaptic_skills', [{ id: uuid(1), vector: [1, 0, 0, 0, 0, 0], payload: {} }]);
  });

  it('flags collections whose dimension differs from the expected one', async () => {
    const reports = await makeAdmin().healthCheck(4);

    expect(reports).toEqual([
      {
        collectionName: 'synaptic_skills',
        isHealthy: false,
        expectedDimension: 4,
        actualDimension: 6,
        dimensionMismatch: true,
        issue: 'Dimension mismatch: expected 4, got 6',
        recommendation: 'Delete and recreate the collection, or migrate its vectors to 4 dimensions',
      },
      {
        collectionName: 'synaptic_thoughts',
        isHealthy: true,
        expectedDimension: 4,
        actualDimension: 4,
        dimensionMismatch: false,
      },
    ]);
  });

  it('never flags an unknown (zero) dimension', () => {
    const report = toHealthReport(
      { name: 'x', vectorSize: 0, pointsCount: 0, distanceMetric: 'cosine', status: 'green', linkedCollections: [] },
      768,
    );
    expect(report.dimensionMismatch).toBe(false);
    expect(report.isHealthy).toBe(true);
  });

  it('refuses to heal without confirmation', async () => {
    await expect(makeAdmin().autoHeal(4)).rejects.toBeInstanceOf(ConfirmationRequiredError);
    expect(await backend.getCollectionInfo('synaptic_skills')).toMatchObject({ vectorSize: 6, pointsCount: 1 });
  });

  it('recreates mismatched collections empty at the target dimension', async () => {
    const admin = makeAdmin();
    const result = await admin.autoHeal(4, { confirm: true });

    expect(result).toEqual({ healed: ['synaptic_skills'], failed: [] });
    expect(await backend.getCollectionInfo('synaptic_skills')).toEqual({
      vectorSize: 4,
      pointsCount: 0,
      distance: 'dot',
      status: 'green',
    });
    expect(adminStore.audit.recent(1)[0]).toMatchObject({
      operation: 'auto_heal',
      target: 'synaptic_skills',
      details: { from: 6, to: 4, distance: 'dot' },
      success: true,
    });
    expect((await admin.healthCheck(4)).every((r) => r.isHealthy)).toBe(true);
  });

  it('summarizes collections', async () => {
    expect(await makeAdmin().getMemoryStatistics()).toEqual({
      totalCollections: 2,
      totalVectors: 1,
      healthyCollections: 2,
      unhealthyCollections: 0,
      collectionLinks: 0,
      dimensionDistribution: { 4: 1, 6: 1 },
    });
  });
});

describe('CollectionAdmin: links', () => {
  it('seeds the default links on initialize', async () => {
    const admin = new CollectionAdmin({ backend });
    await admin.initialize();
    await admin.initialize();
    expect(admin.collectionLinks).toHaveLength(DEFAULT_COLLECTION_LINKS.length);
  });

  it('ignores duplicate links and persists new ones', async () => {
    const admin = makeAdmin();
    const link: CollectionLink = { source: 'a', target: 'b', relationType: 'mirrors', strength: 0.5 };
    expect(await admin.addCollectionLink(link)).toBe(true);
    expect(await admin.addCollectionLink(link)).toBe(false);

    const reloaded = makeAdmin();
    await reloaded.initialize();
    expect(reloaded.collectionLinks).toEqual([link]);
  });

  it('rejects a link with an out-of-range strength', async () => {
    await expect(
      makeAdmin().addCollectionLink({ source: 'a', target: 'b', relationType: 'mirrors', strength: 2 }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('finds collections by relation from either end', async () => {
    const admin = makeAdmin();
    await admin.addCollectionLink({ source: 'a', target: 'b', relationType: 'indexes', strength: 1 });
    await admin.addCollectionLink({ source: 'c', target: 'a', relationType: 'indexes', strength: 1 });
    await admin.addCollectionLink({ source: 'a', target: 'd', relationType: 'extends', strength: 1 });

    expect(admin.getCollectionsByRelation('a', 'indexes')).toEqual(['b', 'c']);
    expect(await admin.removeCollectionLink('a', 'b', 'indexes')).toBe(true);
    expect(await admin.removeCollectionLink('a', 'b', 'indexes')).toBe(false);
    expect(admin.getCollectionsByRelation('a', 'indexes')).toEqual(['c']);
  });
});

describe('CollectionAdmin: memory map', () => {
  it('groups collections by role and lists links', async () => {
    await backend.createCollection('synaptic_thoughts', { vectorSize: 4, distance: 'cosine' });
    await backend.createCollection('synaptic_skills', { vectorSize: 4, distance: 'cosine' });
    await backend.createCollection('core', { vectorSize: 4, distance: 'cosine' });
    await backend.createCollection('misc', { vectorSize: 2, distance: 'cosine' });
    await backend.upsert('synaptic_thoughts', [
      { id: uuid(1), vector: [1, 0, 0, 0], payload: {} },
      { id: uuid(2), vector: [0, 1, 0, 0], payload: {} },
    ]);
    const admin = makeAdmin([{ source: 'core', target: 'misc', relationType: 'part_of', strength: 1 }]);
    await admin.initialize();

    expect((await admin.generateMemoryMap()).split('\n')).toEqual([
      'SYNAPTIC MEMORY MAP',
      '===================',
      '',
      'Thought system',
      '  ✓ synaptic_thoughts [4d] 2 pts',
      '',
      'Skills & tools',
      '  ✓ synaptic_skills [4d] 0 pts',
      '',
      'Knowledge base',
      '  ✓ core [4d] 0 pts',
      '',
      'Other',
      '  ✓ misc [2d] 0 pts',
      '',
      'Collection links',
      '  core --part_of--> misc',
    ]);
  });

  it('lists at most ten links', async () => {
    const links: CollectionLink[] = Array.from({ length: 12 }, (_, i) => ({
      source: `s${i}`,
      target: 't',
      relationType: 'related_to',
      strength: 1,
    }));
    const admin = makeAdmin(links);
    await admin.initialize();

    const lines = (await admin.generateMemoryMap()).split('\n');
    expect(lines.filter((l) => l.includes('--related_to-->'))).toHaveLength(10);
    expect(lines[lines.length - 1]).toBe('  ... and 2 more links');
  });
});

describe('computeStatistics', () => {
  it('counts non-green collections as unhealthy', () => {
    const stats = computeStatistics(
      [
        { name: 'a', vectorSize: 4, pointsCount: 3, distanceMetric: 'cosine', status: 'green', linkedCollections: [] },
        { name: 'b', vectorSize: 4, pointsCount: 1, distanceMetric: 'cosine', status: 'yellow', linkedCollections: [] },
      ],
      5,
    );
    expect(stats).toEqual({
      totalCollections: 2,
      totalVectors: 4,
      healthyCollections: 1,
      unhealthyCollections: 1,
      collectionLinks: 5,
      dimensionDistribution: { 4: 2 },
    });
  });
});
