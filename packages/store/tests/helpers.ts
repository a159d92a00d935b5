import type Database from 'better-sqlite3';
import type { EmbeddingFunction, ThoughtInput } from '@synaptic/shared';
import { createTestDatabase } from '../src/database.js';
import { runMigrations } from '../src/migrations.js';
import { allMigrations } from '../src/migrations/index.js';

/** Create a fresh in-memory database with all migrations applied. */
export function freshDb(): Database.Database {
  const db = createTestDatabase();
  runMigrations(db, allMigrations);
  return db;
}

/** Deterministic UUID for test data: uuid(1) → 00000000-0000-4000-8000-000000000001 */
export function uuid(n: number): string {
  return `00000000-0000-4000-8000-${n.toString().padStart(12, '0')}`;
}

export function at(minute: number): string {
  return new Date(Date.UTC(2024, 0, 1, 0, minute)).toISOString();
}

export function makeThought(n: number, overrides: Partial<ThoughtInput> = {}): ThoughtInput {
  return {
    id: uuid(n),
    type: 'Observation',
    origin: 'Reactive',
    content: `thought ${n}`,
    confidence: 0.8,
    relevance: 0.5,
    timestamp: at(n),
    ...overrides,
  };
}

/**
 * Embeds text by keyword: each listed keyword owns one axis. Text without a
 * known keyword maps onto the last axis.
 */
export function keywordEmbedder(keywords: string[]): EmbeddingFunction {
  return async (text) => {
    const lower = text.toLowerCase();
    const vector = keywords.map((k) => (lower.includes(k) ? 1 : 0));
    const hit = vector.some((v) => v > 0);
    return [...vector, hit ? 0 : 1];
  };
}
