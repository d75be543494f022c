// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import Database from 'better-sqlite3';
import { dirname, join } from 'path';
import { homedir } from 'os';
import { mkdirSync, existsSync } from 'fs';
import { StorageError } from '@opsdeck/shared';

// ============================================================================
// Database Configuration
// ============================================================================

const APP_DIR = '.opsdeck';
const DB_FILE = 'executions.db';

export interface DatabaseOptions {
  path?: string;
  inMemory?: boolean;
}

/**
 * Get the default database path.
 */
export function getDefaultDatabasePath(): string {
  return join(homedir(), APP_DIR, DB_FILE);
}

/**
 * Database schema version for migrations.
 */
const SCHEMA_VERSION = 1;

/**
 * SQL statements for creating the database schema.
 */
const SCHEMA_SQL = `
-- One row per command execution attempt
CREATE TABLE IF NOT EXISTS command_executions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  command TEXT NOT NULL,
  options TEXT,
  user_id TEXT,
  user_name TEXT,
  user_email TEXT,
  exit_code INTEGER,
  output TEXT,
  execution_time REAL,
  environment TEXT NOT NULL,
  ip_address TEXT,
  user_agent TEXT,
  started_at INTEGER NOT NULL,
  completed_at INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_command_executions_command ON command_executions(command, created_at);
CREATE INDEX IF NOT EXISTS idx_command_executions_user ON command_executions(user_id, created_at);
CREATE INDEX IF NOT EXISTS idx_command_executions_environment ON command_executions(environment);

-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY
);
`;

// ============================================================================
// Database Connection
// ============================================================================

export class DatabaseConnection {
  private db: Database.Database;
  private isOpen: boolean = true;

  constructor(options: DatabaseOptions = {}) {
    const dbPath = options.inMemory ? ':memory:' : (options.path || getDefaultDatabasePath());
    if (!options.inMemory) {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath, {
      verbose: process.env.DEBUG_SQL ? (...args: unknown[]) => console.warn('[Database]', ...args) : undefined,
    });

    this.db.pragma('foreign_keys = ON');
    if (!options.inMemory) {
      this.db.pragma('journal_mode = WAL');
    }

    this.initializeSchema();
  }

  /**
   * Initialize the database schema.
   */
  private initializeSchema(): void {
    const versionTable = this.db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'")
      .get();

    if (!versionTable) {
      // First time setup - create all tables
      this.db.exec(SCHEMA_SQL);
      this.db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
      return;
    }

    const currentVersion = this.db.prepare<[], { version: number }>('SELECT version FROM schema_version').get();

    if (!currentVersion || currentVersion.version < SCHEMA_VERSION) {
      this.runMigrations(currentVersion?.version ?? 0);
    }
  }

  /**
   * Bring an older schema up to date. Version 1 is the first release, so an
   * unversioned database only needs the tables created.
   */
  private runMigrations(fromVersion: number): void {
    if (fromVersion < 1) {
      this.db.exec(SCHEMA_SQL);
    }

    this.db.prepare('DELETE FROM schema_version').run();
    this.db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  }

  /**
   * Get the underlying database instance.
   */
  get instance(): Database.Database {
    if (!this.isOpen) {
      throw StorageError.connectionClosed();
    }
    return this.db;
  }

  /**
   * Close the database connection.
   */
  close(): void {
    if (this.isOpen) {
      this.db.close();
      this.isOpen = false;
    }
  }
}
