import type { Migration } from '../migrations.js';

export const migration001: Migration = {
  version: 1,
  name: 'admin-schema',
  up(db) {
    // ── Collection links ─────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS collection_links (
        source        TEXT NOT NULL,
        target        TEXT NOT NULL,
        relation_type TEXT NOT NULL,
        strength      REAL NOT NULL DEFAULT 1.0,
        description   TEXT,
        created_at    TEXT NOT NULL DEFAULT (datetime('now')),
        PRIMARY KEY (source, target, relation_type)
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_collection_links_target ON collection_links(target)');

    // ── Audit log of destructive operations ──────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS admin_audit (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        operation   TEXT NOT NULL,
        target      TEXT NOT NULL,
        details     TEXT,
        success     INTEGER NOT NULL,
        created_at  TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_admin_audit_created ON admin_audit(created_at)');
  },
};
