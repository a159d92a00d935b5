import type Database from 'better-sqlite3';
import { isoNow } from '@synaptic/shared';

export type AdminOperation = 'auto_heal' | 'clear_layer' | 'delete_collection' | 'create_collection';

export interface AdminAuditRow {
  id: number;
  operation: string;
  target: string;
  details: string | null;
  success: number;
  created_at: string;
}

export interface AdminAuditEntry {
  id: number;
  operation: string;
  target: string;
  details?: Record<string, unknown>;
  success: boolean;
  createdAt: string;
}

export interface AdminAuditInput {
  operation: AdminOperation;
  target: string;
  details?: Record<string, unknown>;
  success: boolean;
}

export class AdminAuditRepository {
  private insertStmt: Database.Statement;
  private recentStmt: Database.Statement;

  constructor(private db: Database.Database) {
    this.insertStmt = db.prepare(`
      INSERT INTO admin_audit (operation, target, details, success, created_at)
      VALUES (?, ?, ?, ?, ?)
    `);
    this.recentStmt = db.prepare('SELECT * FROM admin_audit ORDER BY id DESC LIMIT ?');
  }

  record(entry: AdminAuditInput): number {
    const result = this.insertStmt.run(
      entry.operation,
      entry.target,
      entry.details ? JSON.stringify(entry.details) : null,
      entry.success ? 1 : 0,
      isoNow(),
    );
    return Number(result.lastInsertRowid);
  }

  /** Newest first. */
  recent(limit = 50): AdminAuditEntry[] {
    const rows = this.recentStmt.all(limit) as AdminAuditRow[];
    return rows.map(rowToEntry);
  }
}

function rowToEntry(row: AdminAuditRow): AdminAuditEntry {
  return {
    id: row.id,
    operation: row.operation,
    target: row.target,
    ...(row.details ? { details: parseDetails(row.details) } : {}),
    success: row.success === 1,
    createdAt: row.created_at,
  };
}

function parseDetails(raw: string): Record<string, unknown> {
  const value: unknown = JSON.parse(raw);
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : { value };
}
