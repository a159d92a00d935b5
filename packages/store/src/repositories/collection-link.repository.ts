import type Database from 'better-sqlite3';
import { isCollectionLinkType, type CollectionLink } from '@synaptic/shared';

export interface CollectionLinkRow {
  source: string;
  target: string;
  relation_type: string;
  strength: number;
  description: string | null;
  created_at: string;
}

/**
 * Runtime collection links, persisted so that links added through the admin
 * survive a restart.
 */
export class CollectionLinkRepository {
  private upsertStmt: Database.Statement;
  private deleteStmt: Database.Statement;
  private deleteTouchingStmt: Database.Statement;
  private listStmt: Database.Statement;

  constructor(private db: Database.Database) {
    this.upsertStmt = db.prepare(`
      INSERT INTO collection_links (source, target, relation_type, strength, description)
      VALUES (@source, @target, @relationType, @strength, @description)
      ON CONFLICT(source, target, relation_type)
      DO UPDATE SET strength = excluded.strength, description = excluded.description
    `);
    this.deleteStmt = db.prepare(
      'DELETE FROM collection_links WHERE source = ? AND target = ? AND relation_type = ?',
    );
    this.deleteTouchingStmt = db.prepare(
      'DELETE FROM collection_links WHERE source = ? OR target = ?',
    );
    this.listStmt = db.prepare('SELECT * FROM collection_links ORDER BY created_at, rowid');
  }

  save(link: CollectionLink): void {
    this.upsertStmt.run({
      source: link.source,
      target: link.target,
      relationType: link.relationType,
      strength: link.strength,
      description: link.description ?? null,
    });
  }

  remove(source: string, target: string, relationType: string): boolean {
    return this.deleteStmt.run(source, target, relationType).changes > 0;
  }

  /** Drops every link with `collection` at either end; returns how many went. */
  removeTouching(collection: string): number {
    return this.deleteTouchingStmt.run(collection, collection).changes;
  }

  /** Rows whose relation type is no longer known are left out. */
  list(): CollectionLink[] {
    const rows = this.listStmt.all() as CollectionLinkRow[];
    const links: CollectionLink[] = [];
    for (const row of rows) {
      const link = rowToLink(row);
      if (link) links.push(link);
    }
    return links;
  }
}

function rowToLink(row: CollectionLinkRow): CollectionLink | null {
  if (!isCollectionLinkType(row.relation_type)) return null;
  return {
    source: row.source,
    target: row.target,
    relationType: row.relation_type,
    strength: row.strength,
    ...(row.description !== null ? { description: row.description } : {}),
  };
}
