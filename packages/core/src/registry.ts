// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  CommandDescriptorSchema,
  CommandError,
  createLogger,
  deepFreeze,
  isRunnableCommand,
  type CatalogOption,
  type CommandCatalogEntry,
  type CommandContext,
  type Logger,
  type NormalizedOptionDefinition,
  type OptionValues,
  type RegisteredCommand,
  type RegisteredDescriptor,
  type RiskLevel,
  type RunnableCommand,
} from '@opsdeck/shared';
import type { ZodIssue } from 'zod';
import { resolveChoices } from './options.js';
import { requiresConfirmation } from './policy.js';

export interface CommandRegistryOptions {
  logger?: Logger;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

function describedName(candidate: unknown): string {
  if (typeof candidate !== 'object' || candidate === null || !('descriptor' in candidate)) return '';
  const descriptor: unknown = candidate.descriptor;
  if (typeof descriptor !== 'object' || descriptor === null || !('name' in descriptor)) return '';
  return typeof descriptor.name === 'string' ? descriptor.name : '';
}

// ============================================================================
// Catalog Entries
// ============================================================================

function toCatalogOption(option: NormalizedOptionDefinition): CatalogOption {
  const entry: CatalogOption = {
    key: option.key,
    label: option.label,
    kind: option.kind,
    required: option.required,
    numeric: option.numeric,
  };
  if (option.default !== undefined) entry.default = option.default;
  if (option.kind === 'choice') entry.choices = resolveChoices(option);
  if (option.help !== undefined) entry.help = option.help;
  if (option.placeholder !== undefined) entry.placeholder = option.placeholder;
  return entry;
}

/**
 * Plain, serializable view of a descriptor. Dynamic choices are resolved at
 * the time of the call.
 */
export function toCatalogEntry(descriptor: RegisteredDescriptor, confirmation: boolean): CommandCatalogEntry {
  return {
    name: descriptor.name,
    displayName: descriptor.displayName,
    description: descriptor.description,
    category: descriptor.category,
    riskLevel: descriptor.riskLevel,
    requiresConfirmation: confirmation,
    options: descriptor.options.map(toCatalogOption),
  };
}

// ============================================================================
// Command Registry
// ============================================================================

/**
 * Holds the commands an operator can pick from, keyed by name and kept in
 * registration order.
 */
export class CommandRegistry {
  private readonly commands = new Map<string, RegisteredCommand>();
  private readonly logger: Logger;

  constructor(options: CommandRegistryOptions = {}) {
    this.logger = options.logger ?? createLogger('CommandRegistry');
  }

  /**
   * Register a command, replacing any command of the same name. The
   * descriptor is validated and a frozen copy is kept; catalog listings and
   * option validation both use that copy, so later changes to the command's
   * own descriptor have no effect.
   *
   * @throws CommandError when the candidate is not a command or its
   * descriptor is invalid; the registry is left unchanged
   */
  register(candidate: unknown): RegisteredCommand {
    if (!isRunnableCommand(candidate)) {
      throw CommandError.invalidCommand(describedName(candidate), [
        'a command needs a descriptor object and validate and execute methods',
      ]);
    }
    const command = candidate;
    const parsed = CommandDescriptorSchema.safeParse(command.descriptor);
    if (!parsed.success) {
      throw CommandError.invalidCommand(describedName(command), parsed.error.issues.map(formatIssue));
    }

    const descriptor: RegisteredDescriptor = deepFreeze(parsed.data);
    const entry: RegisteredCommand = Object.freeze({
      descriptor,
      validate: (options: OptionValues) => command.validate(options, descriptor.options),
      execute: (options: OptionValues, context: CommandContext) => command.execute(options, context),
    });

    if (this.commands.has(descriptor.name)) {
      this.logger.warn('Replacing registered command', { name: descriptor.name });
    }
    this.commands.set(descriptor.name, entry);
    this.logger.debug('Registered command', { name: descriptor.name, riskLevel: descriptor.riskLevel });

    return entry;
  }

  /**
   * Register commands in order. Each registration stands on its own: a
   * failure stops the loop but keeps the commands registered before it.
   */
  registerMany(commands: Iterable<RunnableCommand>): RegisteredCommand[] {
    const registered: RegisteredCommand[] = [];
    for (const command of commands) {
      registered.push(this.register(command));
    }
    return registered;
  }

  get(name: string): RegisteredCommand | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  all(): RegisteredCommand[] {
    return Array.from(this.commands.values());
  }

  get size(): number {
    return this.commands.size;
  }

  groupByCategory(): Map<string, RegisteredCommand[]> {
    const grouped = new Map<string, RegisteredCommand[]>();
    for (const command of this.commands.values()) {
      const category = command.descriptor.category;
      const bucket = grouped.get(category);
      if (bucket) {
        bucket.push(command);
      } else {
        grouped.set(category, [command]);
      }
    }
    return grouped;
  }

  filterByRisk(riskLevel: RiskLevel): RegisteredCommand[] {
    return this.all().filter((command) => command.descriptor.riskLevel === riskLevel);
  }

  requiringConfirmation(): RegisteredCommand[] {
    return this.all().filter(({ descriptor }) =>
      requiresConfirmation(descriptor.riskLevel, descriptor.explicitConfirmation),
    );
  }

  toConfig(): CommandCatalogEntry[] {
    return this.all().map(({ descriptor }) =>
      toCatalogEntry(descriptor, requiresConfirmation(descriptor.riskLevel, descriptor.explicitConfirmation)),
    );
  }

  /**
   * Drop every command. Meant for tests.
   */
  reset(): void {
    this.commands.clear();
  }
}
