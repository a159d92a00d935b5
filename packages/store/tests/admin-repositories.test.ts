import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { CollectionLinkRepository } from '../src/repositories/collection-link.repository.js';
import { AdminAuditRepository } from '../src/repositories/admin-audit.repository.js';
import { freshDb } from './helpers.js';

let db: Database.Database;

beforeEach(() => {
  db = freshDb();
});

describe('CollectionLinkRepository', () => {
  it('saves and lists links in insertion order', () => {
    const repo = new CollectionLinkRepository(db);
    repo.save({ source: 'a', target: 'b', relationType: 'mirrors', strength: 0.5, description: 'copy' });
    repo.save({ source: 'b', target: 'c', relationType: 'indexes', strength: 1 });

    expect(repo.list()).toEqual([
      { source: 'a', target: 'b', relationType: 'mirrors', strength: 0.5, description: 'copy' },
      { source: 'b', target: 'c', relationType: 'indexes', strength: 1 },
    ]);
  });

  it('updates strength on a repeated source/target/type', () => {
    const repo = new CollectionLinkRepository(db);
    repo.save({ source: 'a', target: 'b', relationType: 'mirrors', strength: 0.5 });
    repo.save({ source: 'a', target: 'b', relationType: 'mirrors', strength: 0.9 });

    const links = repo.list();
    expect(links).toHaveLength(1);
    expect(links[0].strength).toBe(0.9);
  });

  it('removes a single link', () => {
    const repo = new CollectionLinkRepository(db);
    repo.save({ source: 'a', target: 'b', relationType: 'mirrors', strength: 1 });
    expect(repo.remove('a', 'b', 'mirrors')).toBe(true);
    expect(repo.remove('a', 'b', 'mirrors')).toBe(false);
    expect(repo.list()).toEqual([]);
  });

  it('removes every link touching a collection', () => {
    const repo = new CollectionLinkRepository(db);
    repo.save({ source: 'a', target: 'b', relationType: 'mirrors', strength: 1 });
    repo.save({ source: 'c', target: 'a', relationType: 'part_of', strength: 1 });
    repo.save({ source: 'c', target: 'd', relationType: 'part_of', strength: 1 });

    expect(repo.removeTouching('a')).toBe(2);
    expect(repo.list().map((l) => l.target)).toEqual(['d']);
  });

  it('skips rows with an unknown relation type', () => {
    const repo = new CollectionLinkRepository(db);
    db.prepare(
      "INSERT INTO collection_links (source, target, relation_type, strength) VALUES ('x', 'y', 'obsolete', 1)",
    ).run();
    expect(repo.list()).toEqual([]);
  });
});

describe('AdminAuditRepository', () => {
  it('records entries and returns the newest first', () => {
    const repo = new AdminAuditRepository(db);
    repo.record({ operation: 'auto_heal', target: 'synaptic_thoughts', details: { targetDimension: 768 }, success: true });
    repo.record({ operation: 'clear_layer', target: 'working', success: false });

    const entries = repo.recent();
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ operation: 'clear_layer', target: 'working', success: false });
    expect(entries[0].details).toBeUndefined();
    expect(entries[1]).toMatchObject({
      operation: 'auto_heal',
      target: 'synaptic_thoughts',
      details: { targetDimension: 768 },
      success: true,
    });
  });

  it('limits the number of entries returned', () => {
    const repo = new AdminAuditRepository(db);
    for (let i = 0; i < 5; i++) {
      repo.record({ operation: 'delete_collection', target: `c${i}`, success: true });
    }
    expect(repo.recent(2).map((e) => e.target)).toEqual(['c4', 'c3']);
  });
});
