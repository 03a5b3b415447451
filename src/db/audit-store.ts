// This module owns SQLite initialization and persistence of tool execution audit records.

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { AuditEntry, AuditOutcome, DispatchMode, StoredAuditEntry } from '../types/domain.js';

interface AuditRow {
  id: number;
  timestamp: string;
  tool_name: string;
  mode: string;
  outcome: string;
  duration_ms: number;
  message: string | null;
}

// This sink is what dispatch writes to; the SQLite store is its only durable implementation.
export interface AuditSink {
  record(entry: AuditEntry): void;
  listRecent(limit: number): StoredAuditEntry[];
}

function toMode(value: string): DispatchMode {
  return value === 'notification' ? 'notification' : 'request';
}

function toOutcome(value: string): AuditOutcome {
  if (value === 'failure' || value === 'rejected') {
    return value;
  }
  return 'success';
}

// This store is intentionally synchronous because SQLite calls are local and bounded.
export class SqliteAuditStore implements AuditSink {
  private readonly db: Database.Database;

  public constructor(dbPath: string) {
    if (dbPath !== ':memory:' && !existsSync(dirname(dbPath))) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initializeSchema();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tool_audit_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        tool_name TEXT NOT NULL,
        mode TEXT NOT NULL CHECK (mode IN ('request', 'notification')),
        outcome TEXT NOT NULL CHECK (outcome IN ('success', 'failure', 'rejected')),
        duration_ms INTEGER NOT NULL,
        message TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_tool_audit_log_timestamp ON tool_audit_log (timestamp);
    `);
  }

  public record(entry: AuditEntry): void {
    this.db
      .prepare(
        `
      INSERT INTO tool_audit_log (timestamp, tool_name, mode, outcome, duration_ms, message)
      VALUES (?, ?, ?, ?, ?, ?)
    `
      )
      .run(
        new Date().toISOString(),
        entry.toolName,
        entry.mode,
        entry.outcome,
        Math.round(entry.durationMs),
        entry.message ?? null
      );
  }

  // Newest first.
  public listRecent(limit: number): StoredAuditEntry[] {
    const rows = this.db
      .prepare<[number], AuditRow>(
        `
      SELECT id, timestamp, tool_name, mode, outcome, duration_ms, message
      FROM tool_audit_log
      ORDER BY id DESC
      LIMIT ?
    `
      )
      .all(limit);

    return rows.map((row) => ({
      id: row.id,
      timestamp: row.timestamp,
      toolName: row.tool_name,
      mode: toMode(row.mode),
      outcome: toOutcome(row.outcome),
      durationMs: row.duration_ms,
      message: row.message ?? undefined
    }));
  }

  // This method allows a clean shutdown of SQLite resources.
  public close(): void {
    this.db.close();
  }
}
