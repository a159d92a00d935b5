import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

const VERSION_SQL = 'SELECT COALESCE(MAX(version), 0) AS v FROM _migrations';

/**
 * Applies pending migrations in version order, each in its own transaction.
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const currentVersion = getCurrentVersion(db);
  const record = db.prepare('INSERT INTO _migrations (version, name) VALUES (?, ?)');
  const pending = [...migrations]
    .filter((m) => m.version > currentVersion)
    .sort((a, b) => a.version - b.version);

  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name);
    })();
  }
}

/** Highest applied version; 0 before the first migration. */
export function getCurrentVersion(db: Database.Database): number {
  const table = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = '_migrations'")
    .get();
  if (!table) return 0;
  return (db.prepare(VERSION_SQL).get() as { v: number }).v;
}
