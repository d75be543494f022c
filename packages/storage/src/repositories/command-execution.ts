// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  OptionValuesSchema,
  StorageError,
  errorMessage,
  now,
  type AuditEntry,
  type AuditLogStore,
  type AuditSink,
  type OptionValues,
} from '@opsdeck/shared';
import type { DatabaseConnection } from '../database.js';

// ============================================================================
// Command Execution Repository
// ============================================================================

interface CommandExecutionRow {
  id: number;
  command: string;
  options: string | null;
  user_id: string | null;
  user_name: string | null;
  user_email: string | null;
  exit_code: number | null;
  output: string | null;
  execution_time: number | null;
  environment: string;
  ip_address: string | null;
  user_agent: string | null;
  started_at: number;
  completed_at: number | null;
  created_at: number;
  updated_at: number;
}

export interface CommandExecution {
  id: number;
  command: string;
  options: OptionValues;
  userId: string | null;
  userName: string | null;
  userEmail: string | null;
  exitCode: number | null;
  output: string | null;
  /** Seconds, rounded to two decimals */
  executionTime: number | null;
  environment: string;
  ipAddress: string | null;
  userAgent: string | null;
  startedAt: number;
  completedAt: number | null;
  createdAt: number;
}

export interface ExecutionLogFilter {
  command?: string;
  userId?: string;
  environment?: string;
  limit?: number;
  offset?: number;
}

const DEFAULT_PAGE_SIZE = 50;

/**
 * Execution log on SQLite. Doubles as the runner's audit sink and as the
 * retention store used by audit:prune.
 */
export class CommandExecutionRepository implements AuditSink, AuditLogStore {
  private db: DatabaseConnection;

  constructor(db: DatabaseConnection) {
    this.db = db;
  }

  /**
   * Store one execution attempt.
   */
  record(entry: AuditEntry): void {
    this.insert(entry);
  }

  /**
   * Store one execution attempt and return it with its id.
   */
  insert(entry: AuditEntry): CommandExecution {
    const stmt = this.db.instance.prepare(`
      INSERT INTO command_executions (
        command, options, user_id, user_name, user_email, exit_code, output,
        execution_time, environment, ip_address, user_agent,
        started_at, completed_at, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    try {
      const result = stmt.run(
        entry.command,
        JSON.stringify(entry.options),
        entry.user.id ?? null,
        entry.user.name,
        entry.user.email ?? null,
        entry.exitCode,
        entry.output,
        Math.round(entry.elapsedSeconds * 100) / 100,
        entry.environment,
        entry.user.ipAddress ?? null,
        entry.user.userAgent ?? null,
        entry.startedAt,
        entry.completedAt,
        entry.completedAt,
        now(),
      );

      const stored = this.get(Number(result.lastInsertRowid));
      if (!stored) {
        throw StorageError.saveFailed('command execution');
      }
      return stored;
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw StorageError.saveFailed('command execution', errorMessage(error));
    }
  }

  get(id: number): CommandExecution | null {
    const row = this.db.instance
      .prepare<[number], CommandExecutionRow>('SELECT * FROM command_executions WHERE id = ?')
      .get(id);
    return row ? this.rowToExecution(row) : null;
  }

  /**
   * Most recent executions first.
   */
  list(filter: ExecutionLogFilter = {}): CommandExecution[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filter.command !== undefined) {
      clauses.push('command = ?');
      params.push(filter.command);
    }
    if (filter.userId !== undefined) {
      clauses.push('user_id = ?');
      params.push(filter.userId);
    }
    if (filter.environment !== undefined) {
      clauses.push('environment = ?');
      params.push(filter.environment);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(filter.limit ?? DEFAULT_PAGE_SIZE, filter.offset ?? 0);

    const rows = this.db.instance
      .prepare<Array<string | number>, CommandExecutionRow>(
        `SELECT * FROM command_executions ${where} ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`,
      )
      .all(...params);

    return rows.map((row) => this.rowToExecution(row));
  }

  count(): number {
    const row = this.db.instance.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM command_executions').get();
    return row?.total ?? 0;
  }

  countOlderThan(cutoff: number): number {
    const row = this.db.instance
      .prepare<[number], { total: number }>('SELECT COUNT(*) AS total FROM command_executions WHERE created_at < ?')
      .get(cutoff);
    return row?.total ?? 0;
  }

  deleteOlderThan(cutoff: number): number {
    const result = this.db.instance.prepare('DELETE FROM command_executions WHERE created_at < ?').run(cutoff);
    return result.changes;
  }

  private rowToExecution(row: CommandExecutionRow): CommandExecution {
    return {
      id: row.id,
      command: row.command,
      options: parseOptions(row.options),
      userId: row.user_id,
      userName: row.user_name,
      userEmail: row.user_email,
      exitCode: row.exit_code,
      output: row.output,
      executionTime: row.execution_time,
      environment: row.environment,
      ipAddress: row.ip_address,
      userAgent: row.user_agent,
      startedAt: row.started_at,
      completedAt: row.completed_at,
      createdAt: row.created_at,
    };
  }
}

function parseOptions(raw: string | null): OptionValues {
  if (!raw) {
    return {};
  }
  try {
    const parsed = OptionValuesSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    // Rows written by other tools may hold arbitrary text
    return {};
  }
}
