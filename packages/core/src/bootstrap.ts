// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { EntityTypeResolver } from '@opsdeck/sandbox';
import { CommandExecutionRepository, DatabaseConnection } from '@opsdeck/storage';
import {
  createLogger,
  errorMessage,
  type AuditLogStore,
  type AuditSink,
  type Logger,
  type RegisteredCommand,
  type RunnableCommand,
} from '@opsdeck/shared';
import { AuditPruneCommand } from './commands/audit-prune.js';
import { DataQueryCommand } from './commands/data-query.js';
import type { RunnerConfig } from './config.js';
import { discoverCommands } from './discovery.js';
import { EnvironmentGate } from './policy.js';
import { CommandRegistry } from './registry.js';
import { CommandRunner } from './runner.js';

export interface OpsdeckDependencies {
  /** Queryable entity types for data:query */
  entities: EntityTypeResolver;
  /**
   * Where executions are recorded. When neither this nor auditLog is given
   * and database logging is on, the execution log database is opened.
   */
  auditSink?: AuditSink;
  /** Enables audit:prune when present */
  auditLog?: AuditLogStore;
  /** Host commands registered after the built-ins */
  commands?: RunnableCommand[];
  logger?: Logger;
  now?: () => number;
}

export interface Opsdeck {
  registry: CommandRegistry;
  gate: EnvironmentGate;
  runner: CommandRunner;
  /** Set when the execution log database was opened here; the caller closes it */
  database?: DatabaseConnection;
}

export function createDefaultCommands(deps: OpsdeckDependencies, retentionDays?: number): RunnableCommand[] {
  const commands: RunnableCommand[] = [new DataQueryCommand(deps.entities, { logger: deps.logger })];
  if (deps.auditLog) {
    commands.push(new AuditPruneCommand(deps.auditLog, { retentionDays, now: deps.now }));
  }
  return commands;
}

/**
 * Register commands that the enable map does not switch off. A command
 * missing from the map registers when `enabledByDefault` is true. Failures
 * are logged and the remaining commands still register.
 */
export function registerConfiguredCommands(
  registry: CommandRegistry,
  commands: Iterable<RunnableCommand>,
  enabled: Readonly<Record<string, boolean>> = {},
  options: { enabledByDefault?: boolean; logger?: Logger } = {},
): RegisteredCommand[] {
  const logger = options.logger ?? createLogger('CommandRegistry');
  const enabledByDefault = options.enabledByDefault ?? true;
  const registered: RegisteredCommand[] = [];

  for (const command of commands) {
    const name: unknown = command.descriptor?.name;
    if (typeof name === 'string' && !(enabled[name] ?? enabledByDefault)) {
      logger.debug('Command disabled by configuration', { name });
      continue;
    }

    try {
      registered.push(registry.register(command));
    } catch (error) {
      logger.error('Failed to register command', { name, error: errorMessage(error) });
    }
  }

  return registered;
}

export function registerDefaultCommands(
  registry: CommandRegistry,
  config: Pick<RunnerConfig, 'commands' | 'databaseLogging'>,
  deps: OpsdeckDependencies,
): RegisteredCommand[] {
  const commands = createDefaultCommands(deps, config.databaseLogging.keepLogsForDays);
  return registerConfiguredCommands(registry, commands, config.commands, { logger: deps.logger });
}

function withExecutionLog(
  config: Pick<RunnerConfig, 'databaseLogging'>,
  host: OpsdeckDependencies,
): { deps: OpsdeckDependencies; database?: DatabaseConnection } {
  if (!config.databaseLogging.enabled || host.auditSink || host.auditLog) {
    return { deps: host };
  }
  const database = new DatabaseConnection({ path: config.databaseLogging.path });
  const executions = new CommandExecutionRepository(database);
  return { deps: { ...host, auditSink: executions, auditLog: executions }, database };
}

/**
 * Wire registry, gate and runner from a loaded configuration.
 */
export async function createOpsdeck(config: RunnerConfig, host: OpsdeckDependencies): Promise<Opsdeck> {
  const { deps, database } = withExecutionLog(config, host);

  const registry = new CommandRegistry({ logger: deps.logger });
  const gate = new EnvironmentGate(config.environmentRestrictions);

  registerDefaultCommands(registry, config, deps);
  registerConfiguredCommands(registry, deps.commands ?? [], config.commands, { logger: deps.logger });

  const { autoDiscovery } = config;
  if (autoDiscovery.enabled && autoDiscovery.directory) {
    const discovered = await discoverCommands(autoDiscovery.directory, { logger: deps.logger });
    registerConfiguredCommands(registry, discovered, config.commands, {
      enabledByDefault: autoDiscovery.defaultEnabled,
      logger: deps.logger,
    });
  }

  const runner = new CommandRunner({
    registry,
    gate,
    environment: config.environment,
    enabled: config.enabled,
    logExecutions: config.logExecutions,
    auditSink: config.databaseLogging.enabled ? deps.auditSink : undefined,
    maxExecutionTimeSeconds: config.maxExecutionTimeSeconds,
    logger: deps.logger,
    now: deps.now,
  });

  return { registry, gate, runner, database };
}
