import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';

const DEFAULT_DB_PATH = '.synaptic/admin.db';

export interface DatabaseOptions {
  /** Path to the SQLite file, or `:memory:`. Defaults to .synaptic/admin.db */
  dbPath?: string;
  readonly?: boolean;
}

/** Opens the admin metadata database and applies its pragmas. */
export function openDatabase(options?: DatabaseOptions): Database.Database {
  const dbPath = options?.dbPath ?? path.join(process.cwd(), DEFAULT_DB_PATH);

  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath, {
    readonly: options?.readonly ?? false,
  });
  applyPragmas(db);
  return db;
}

/** Fresh, isolated in-memory database. */
export function createTestDatabase(): Database.Database {
  return openDatabase({ dbPath: ':memory:' });
}

function applyPragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');       // 5 s
}
