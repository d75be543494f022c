// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi } from 'vitest';
import type { EntityTypeResolver, QueryRecord } from '@opsdeck/sandbox';
import { silentLogger, type RunnableCommand } from '@opsdeck/shared';
import { CommandExecutionRepository, DatabaseConnection } from '@opsdeck/storage';
import { createOpsdeck, registerConfiguredCommands } from './bootstrap.js';
import { loadConfig, type RunnerConfigInput } from './config.js';
import { LIGHT_RULE } from './formatter.js';
import { CommandRegistry } from './registry.js';

const FIXTURES = fileURLToPath(new URL('../test/fixtures/commands', import.meta.url));

const MEMBERS: QueryRecord[] = [
  { id: 1, name: 'alpha' },
  { id: 2, name: 'beta' },
  { id: 3, name: 'gamma' },
];

const entities: EntityTypeResolver = {
  list: () => [{ name: 'members', label: 'Members', fields: ['id', 'name'] }],
  resolve: (name) =>
    name === 'members'
      ? {
          name: 'members',
          primaryKey: 'id',
          fields: () => ['id', 'name'],
          select: () => MEMBERS,
          iterate: () => MEMBERS,
          aggregate: () => MEMBERS.length,
        }
      : undefined,
};

function plainCommand(name: string): RunnableCommand {
  return {
    descriptor: { name, displayName: name, description: '', category: 'Host', riskLevel: 'low' },
    validate: () => undefined,
    execute: async () => ({ output: `${name} ran\n`, exitCode: 0 }),
  };
}

function config(overrides: RunnerConfigInput = {}) {
  return loadConfig({ environment: 'local', databaseLogging: { enabled: false }, ...overrides }, {});
}

function names(registry: CommandRegistry): string[] {
  return registry.all().map((command) => command.descriptor.name);
}

describe('createOpsdeck', () => {
  it('registers the built-in commands', async () => {
    const store = { countOlderThan: () => 0, deleteOlderThan: () => 0 };

    const { registry } = await createOpsdeck(config(), { entities, auditLog: store, logger: silentLogger });

    expect(names(registry)).toEqual(['data:query', 'audit:prune']);
  });

  it('leaves out audit:prune without an audit log store', async () => {
    const { registry } = await createOpsdeck(config(), { entities, logger: silentLogger });
    expect(names(registry)).toEqual(['data:query']);
  });

  it('honours the enable map', async () => {
    const store = { countOlderThan: () => 0, deleteOlderThan: () => 0 };

    const { registry } = await createOpsdeck(config({ commands: { 'audit:prune': false, 'host:two': false } }), {
      entities,
      auditLog: store,
      commands: [plainCommand('host:one'), plainCommand('host:two')],
      logger: silentLogger,
    });

    expect(names(registry)).toEqual(['data:query', 'host:one']);
  });

  it('logs and skips host commands that fail to register', async () => {
    const logger = { ...silentLogger, error: vi.fn() };

    const { registry } = await createOpsdeck(config(), {
      entities,
      commands: [plainCommand('bad name'), plainCommand('host:one')],
      logger,
    });

    expect(names(registry)).toEqual(['data:query', 'host:one']);
    expect(logger.error).toHaveBeenCalledWith('Failed to register command', {
      name: 'bad name',
      error: 'Command "bad name" is not a valid command: name: Command names cannot contain whitespace',
    });
  });

  it('registers discovered commands only when enabled', async () => {
    const { registry } = await createOpsdeck(
      config({ autoDiscovery: { enabled: true, directory: FIXTURES }, commands: { 'fixture:greet': true } }),
      { entities, logger: silentLogger },
    );

    expect(names(registry)).toEqual(['data:query', 'fixture:greet']);
  });

  it('registers every discovered command when enabled by default', async () => {
    const { registry } = await createOpsdeck(
      config({ autoDiscovery: { enabled: true, directory: FIXTURES, defaultEnabled: true } }),
      { entities, logger: silentLogger },
    );

    expect(names(registry)).toEqual(['data:query', 'fixture:greet', 'fixture:object']);
  });

  it('runs a data query end to end and records it', async () => {
    const auditSink = { record: vi.fn() };
    const { runner, database } = await createOpsdeck(config({ databaseLogging: { enabled: true } }), {
      entities,
      auditSink,
      logger: silentLogger,
    });

    const response = await runner.run({ commandName: 'data:query', options: { entity: 'members', query: 'count()' } });

    expect(database).toBeUndefined();
    expect(response.exitCode).toBe(0);
    expect(response.output).toContain(`Results:\n${LIGHT_RULE}\n3\n`);
    expect(auditSink.record).toHaveBeenCalledWith(
      expect.objectContaining({ command: 'data:query', exitCode: 0, environment: 'local' }),
    );
  });

  it('does not record executions when database logging is off', async () => {
    const auditSink = { record: vi.fn() };
    const { runner } = await createOpsdeck(config({ databaseLogging: { enabled: false } }), {
      entities,
      auditSink,
      logger: silentLogger,
    });

    await runner.run({ commandName: 'data:query', options: { entity: 'members', query: 'count()' } });

    expect(auditSink.record).not.toHaveBeenCalled();
  });

  it('asks for confirmation in production by default', async () => {
    const { runner } = await createOpsdeck(config({ environment: 'production' }), { entities, logger: silentLogger });

    const response = await runner.run({ commandName: 'data:query', options: { entity: 'members', query: 'count()' } });

    expect(response.exitCode).toBe(1);
    expect(response.output).toContain('requires confirmation before it can run.');
  });
});

describe('createOpsdeck with the execution log database', () => {
  it('opens the database at the configured path and applies the retention window', async () => {
    const directory = mkdtempSync(join(tmpdir(), 'opsdeck-bootstrap-'));
    const path = join(directory, 'logs', 'executions.db');

    try {
      const { registry, runner, database } = await createOpsdeck(
        config({ databaseLogging: { enabled: true, path, keepLogsForDays: 30 } }),
        { entities, logger: silentLogger },
      );
      await runner.run({ commandName: 'data:query', options: { entity: 'members', query: 'count()' } });
      database?.close();

      expect(existsSync(path)).toBe(true);
      expect(names(registry)).toEqual(['data:query', 'audit:prune']);
      expect(registry.get('audit:prune')?.descriptor.options[0].default).toBe('30');

      const reopened = new DatabaseConnection({ path });
      const [entry] = new CommandExecutionRepository(reopened).list();
      reopened.close();
      expect(entry.command).toBe('data:query');
      expect(entry.exitCode).toBe(0);
    } finally {
      rmSync(directory, { recursive: true, force: true });
    }
  });
});

describe('registerConfiguredCommands', () => {
  it('skips commands missing from the map when disabled by default', () => {
    const registry = new CommandRegistry({ logger: silentLogger });

    const registered = registerConfiguredCommands(
      registry,
      [plainCommand('host:one'), plainCommand('host:two')],
      { 'host:two': true },
      { enabledByDefault: false, logger: silentLogger },
    );

    expect(registered.map((command) => command.descriptor.name)).toEqual(['host:two']);
  });
});
