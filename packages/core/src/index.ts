// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// Options
export { isEmptyValue, satisfiesRule, resolveChoices, validateOptions, applyDefaults, parseRules } from './options.js';

// Commands
export { BaseCommand } from './command.js';
export type { DataQueryCommandOptions } from './commands/data-query.js';
export type { AuditPruneCommandOptions } from './commands/audit-prune.js';
export { DataQueryCommand, DATA_QUERY_PLACEHOLDER } from './commands/data-query.js';
export { AuditPruneCommand } from './commands/audit-prune.js';

// Registry
export type { CommandRegistryOptions } from './registry.js';
export { CommandRegistry, toCatalogEntry } from './registry.js';

// Policy
export type { EnvironmentRestrictionsInput, GateDecision } from './policy.js';
export { EnvironmentGate, requiresConfirmation } from './policy.js';

// Formatting
export type { ExecutionHeaderInput, ExecutionFooterInput } from './formatter.js';
export {
  RULE_WIDTH,
  LIGHT_RULE,
  formatResult,
  formatExecutionHeader,
  formatExecutionFooter,
  createSectionHeader,
  createTable,
  stripFormatting,
} from './formatter.js';

// Runner
export type { CommandRunnerOptions } from './runner.js';
export { CommandRunner } from './runner.js';

// Configuration
export type { RunnerConfig, RunnerConfigInput } from './config.js';
export { RunnerConfigSchema, DEFAULT_ENVIRONMENT_RESTRICTIONS, loadConfig, loadConfigFile } from './config.js';

// Discovery & bootstrap
export type { DiscoveryOptions } from './discovery.js';
export { discoverCommands } from './discovery.js';
export type { OpsdeckDependencies, Opsdeck } from './bootstrap.js';
export {
  createDefaultCommands,
  registerConfiguredCommands,
  registerDefaultCommands,
  createOpsdeck,
} from './bootstrap.js';
