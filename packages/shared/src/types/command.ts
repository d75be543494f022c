// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import { OptionDefinitionSchema, type OptionDefinition, type OptionValues } from './option.js';
import { RiskLevelSchema } from './risk.js';
import type { UserIdentity } from './audit.js';

// ============================================================================
// Command Descriptor
// ============================================================================

export const CommandDescriptorSchema = z
  .object({
    /** Unique key, e.g. "data:query" */
    name: z
      .string()
      .min(1)
      .max(128)
      .regex(/^\S+$/, 'Command names cannot contain whitespace'),
    /** Display name for UI */
    displayName: z.string().min(1).max(128),
    description: z.string(),
    /** Grouping used by catalogs, e.g. "Data Exploration" */
    category: z.string().min(1),
    riskLevel: RiskLevelSchema,
    /** Author-declared confirmation, on top of what the risk level implies */
    explicitConfirmation: z.boolean().default(false),
    /** Option schema in render order */
    options: z.array(OptionDefinitionSchema).default([]),
  })
  .superRefine((descriptor, ctx) => {
    const seen = new Set<string>();
    descriptor.options.forEach((option, index) => {
      if (seen.has(option.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['options', index, 'key'],
          message: `Duplicate option key "${option.key}"`,
        });
      }
      seen.add(option.key);
    });
  });

/** Descriptor as written by command authors. */
export type CommandDescriptor = z.input<typeof CommandDescriptorSchema>;

/** Descriptor after registration: defaults applied, frozen. */
export type RegisteredDescriptor = Readonly<z.output<typeof CommandDescriptorSchema>>;

// ============================================================================
// Command Execution Contract
// ============================================================================

/**
 * Context passed to a command's execute method.
 */
export interface CommandContext {
  /** Environment the command runs in, e.g. "production" */
  environment: string;

  /** Who triggered the execution */
  user: UserIdentity;

  /** Wall-clock time the execution started (ms since epoch) */
  startedAt: number;
}

/**
 * Command execution result.
 */
export interface CommandResult {
  /** Plain-text body of the output */
  output: string;

  /** 0 on success */
  exitCode: number;

  /** Error message when the command failed */
  error?: string;
}

/**
 * Capability set every executable command implements.
 */
export interface RunnableCommand {
  readonly descriptor: CommandDescriptor;

  /**
   * Throw a ValidationError (or QueryRejectedError) when the options are
   * not acceptable. Runs before execute on every attempt. A registry passes
   * the option schema it holds for the command.
   */
  validate(options: OptionValues, schema?: readonly OptionDefinition[]): void;

  execute(options: OptionValues, context: CommandContext): Promise<CommandResult>;
}

/**
 * A command as held by a registry: the descriptor is the frozen copy taken
 * at registration time.
 */
export interface RegisteredCommand extends RunnableCommand {
  readonly descriptor: RegisteredDescriptor;
}

export function isRunnableCommand(value: unknown): value is RunnableCommand {
  return (
    typeof value === 'object' &&
    value !== null &&
    'descriptor' in value &&
    typeof value.descriptor === 'object' &&
    value.descriptor !== null &&
    'validate' in value &&
    typeof value.validate === 'function' &&
    'execute' in value &&
    typeof value.execute === 'function'
  );
}
