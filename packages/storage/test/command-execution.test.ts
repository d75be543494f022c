// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AuditEntry } from '@opsdeck/shared';
import { DatabaseConnection } from '../src/database.js';
import { CommandExecutionRepository } from '../src/repositories/command-execution.js';

function createEntry(overrides: Partial<AuditEntry> = {}): AuditEntry {
  return {
    command: 'data:query',
    options: { entity: 'members', query: 'count()' },
    user: { id: '7', name: 'Test Operator', email: 'operator@example.test', ipAddress: '127.0.0.1' },
    exitCode: 0,
    output: '3',
    elapsedSeconds: 0.125,
    environment: 'staging',
    startedAt: 1_000,
    completedAt: 1_125,
    ...overrides,
  };
}

describe('CommandExecutionRepository', () => {
  let db: DatabaseConnection;
  let repo: CommandExecutionRepository;

  beforeEach(() => {
    db = new DatabaseConnection({ inMemory: true });
    repo = new CommandExecutionRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('creates the schema and records its version', () => {
    const row = db.instance.prepare<[], { version: number }>('SELECT version FROM schema_version').get();
    expect(row).toEqual({ version: 1 });
  });

  it('stores an execution attempt', () => {
    const stored = repo.insert(createEntry());

    expect(stored).toEqual({
      id: 1,
      command: 'data:query',
      options: { entity: 'members', query: 'count()' },
      userId: '7',
      userName: 'Test Operator',
      userEmail: 'operator@example.test',
      exitCode: 0,
      output: '3',
      executionTime: 0.13,
      environment: 'staging',
      ipAddress: '127.0.0.1',
      userAgent: null,
      startedAt: 1_000,
      completedAt: 1_125,
      createdAt: 1_125,
    });
  });

  it('lists the newest executions first and filters them', () => {
    repo.record(createEntry({ completedAt: 1_000 }));
    repo.record(createEntry({ command: 'audit:prune', completedAt: 2_000, environment: 'production' }));
    repo.record(createEntry({ completedAt: 3_000, user: { name: 'CLI' } }));

    expect(repo.list().map((execution) => execution.createdAt)).toEqual([3_000, 2_000, 1_000]);
    expect(repo.list({ command: 'audit:prune' }).map((execution) => execution.id)).toEqual([2]);
    expect(repo.list({ environment: 'staging', limit: 1 }).map((execution) => execution.id)).toEqual([3]);
    expect(repo.list({ userId: '7' }).map((execution) => execution.id)).toEqual([2, 1]);
  });

  it('counts and prunes entries older than a cutoff', () => {
    repo.record(createEntry({ completedAt: 1_000 }));
    repo.record(createEntry({ completedAt: 2_000 }));
    repo.record(createEntry({ completedAt: 3_000 }));

    expect(repo.countOlderThan(2_500)).toBe(2);
    expect(repo.deleteOlderThan(2_500)).toBe(2);
    expect(repo.count()).toBe(1);
    expect(repo.countOlderThan(2_500)).toBe(0);
  });

  it('refuses to work on a closed connection', () => {
    db.close();
    expect(() => repo.count()).toThrowError('Database connection is closed');
  });
});
