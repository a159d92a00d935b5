import { describe, it, expect } from 'vitest';
import { createTestDatabase } from '../src/database.js';
import { runMigrations, getCurrentVersion } from '../src/migrations.js';
import { allMigrations } from '../src/migrations/index.js';

describe('runMigrations', () => {
  it('reports version 0 before anything ran', () => {
    const db = createTestDatabase();
    expect(getCurrentVersion(db)).toBe(0);
    db.close();
  });

  it('creates the admin tables', () => {
    const db = createTestDatabase();
    runMigrations(db, allMigrations);

    const tables = db.prepare("SELECT name FROM sqlite_master WHERE type='table'").all() as Array<{ name: string }>;
    const names = tables.map((t) => t.name);
    expect(names).toContain('_migrations');
    expect(names).toContain('collection_links');
    expect(names).toContain('admin_audit');
    expect(getCurrentVersion(db)).toBe(1);
    db.close();
  });

  it('is idempotent', () => {
    const db = createTestDatabase();
    runMigrations(db, allMigrations);
    runMigrations(db, allMigrations);

    const rows = db.prepare('SELECT COUNT(*) AS n FROM _migrations').get() as { n: number };
    expect(rows.n).toBe(1);
    db.close();
  });

  it('applies later migrations in version order', () => {
    const db = createTestDatabase();
    const applied: number[] = [];
    runMigrations(db, [
      { version: 2, name: 'second', up: () => applied.push(2) },
      { version: 1, name: 'first', up: () => applied.push(1) },
    ]);
    expect(applied).toEqual([1, 2]);
    expect(getCurrentVersion(db)).toBe(2);
    db.close();
  });
});
