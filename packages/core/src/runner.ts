// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  CommandError,
  SYSTEM_IDENTITY,
  createLogger,
  elapsedSeconds,
  errorMessage,
  now as systemNow,
  type AuditEntry,
  type AuditSink,
  type CommandCatalogEntry,
  type ExecutionRequest,
  type ExecutionResponse,
  type Logger,
  type OptionValues,
  type UserIdentity,
} from '@opsdeck/shared';
import { formatExecutionFooter, formatExecutionHeader, stripFormatting } from './formatter.js';
import { applyDefaults } from './options.js';
import type { EnvironmentGate } from './policy.js';
import { toCatalogEntry, type CommandRegistry } from './registry.js';

export interface CommandRunnerOptions {
  registry: CommandRegistry;
  gate: EnvironmentGate;
  environment: string;
  /** When false every request is refused */
  enabled?: boolean;
  /** Send an audit entry per attempt to the audit sink */
  logExecutions?: boolean;
  auditSink?: AuditSink;
  /** Executions running longer than this are logged as slow */
  maxExecutionTimeSeconds?: number;
  logger?: Logger;
  now?: () => number;
}

interface Attempt {
  commandName: string;
  options: OptionValues;
  user: UserIdentity;
  startedAt: number;
}

/**
 * Runs commands on behalf of an operator: gates them by environment and
 * confirmation, validates their options, executes them and records the
 * attempt. Request-level failures come back as a non-zero exit code with an
 * error footer; run() itself does not throw for them.
 */
export class CommandRunner {
  private readonly registry: CommandRegistry;
  private readonly gate: EnvironmentGate;
  private readonly environment: string;
  private readonly enabled: boolean;
  private readonly logExecutions: boolean;
  private readonly auditSink?: AuditSink;
  private readonly maxExecutionTimeSeconds?: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: CommandRunnerOptions) {
    this.registry = options.registry;
    this.gate = options.gate;
    this.environment = options.environment;
    this.enabled = options.enabled ?? true;
    this.logExecutions = options.logExecutions ?? true;
    this.auditSink = options.auditSink;
    this.maxExecutionTimeSeconds = options.maxExecutionTimeSeconds;
    this.logger = options.logger ?? createLogger('CommandRunner');
    this.now = options.now ?? systemNow;
  }

  async run(request: ExecutionRequest, user: UserIdentity = SYSTEM_IDENTITY): Promise<ExecutionResponse> {
    const startedAt = this.now();

    if (!this.enabled) {
      return this.refuse(CommandError.disabled(request.commandName), startedAt);
    }

    const command = this.registry.get(request.commandName);
    if (!command) {
      return this.refuse(CommandError.notFound(request.commandName), startedAt);
    }

    const { descriptor } = command;
    const attempt: Attempt = { commandName: descriptor.name, options: request.options, user, startedAt };

    const decision = this.gate.evaluate(descriptor, this.environment);
    if (!decision.eligible) {
      this.logger.warn('Command not eligible', { name: descriptor.name, reasons: decision.reasons });
      return this.finish(attempt, '', 1, CommandError.notEligible(descriptor.name, this.environment).message);
    }
    if (decision.requiresConfirmation && request.confirmed !== true) {
      return this.finish(attempt, '', 1, CommandError.confirmationRequired(descriptor.name).message);
    }

    attempt.options = applyDefaults(request.options, descriptor.options);
    const header = formatExecutionHeader({
      commandName: descriptor.name,
      user,
      environment: this.environment,
      startedAt,
      options: attempt.options,
    });

    try {
      command.validate(attempt.options);
      const result = await command.execute(attempt.options, {
        environment: this.environment,
        user,
        startedAt,
      });
      return this.finish(attempt, header + result.output, result.exitCode, result.error);
    } catch (error) {
      this.logger.debug('Command failed', { name: descriptor.name, error: errorMessage(error) });
      return this.finish(attempt, header, 1, errorMessage(error));
    }
  }

  /**
   * Eligible commands for the runner's environment, with the confirmation
   * requirement that applies there.
   */
  catalog(): CommandCatalogEntry[] {
    return this.gate.eligibleCommands(this.registry, this.environment).map(({ descriptor }) =>
      toCatalogEntry(descriptor, this.gate.evaluate(descriptor, this.environment).requiresConfirmation),
    );
  }

  groupedCatalog(): Record<string, CommandCatalogEntry[]> {
    const grouped: Record<string, CommandCatalogEntry[]> = {};
    for (const entry of this.catalog()) {
      (grouped[entry.category] ??= []).push(entry);
    }
    return grouped;
  }

  private refuse(error: CommandError, startedAt: number): ExecutionResponse {
    const completedAt = this.now();
    const elapsed = elapsedSeconds(startedAt, completedAt);
    this.logger.warn('Command refused', { name: error.commandName, reason: error.reason });
    return {
      output: formatExecutionFooter({ completedAt, elapsedSeconds: elapsed, exitCode: 1, error: error.message }),
      exitCode: 1,
      elapsedSeconds: elapsed,
    };
  }

  private async finish(attempt: Attempt, body: string, exitCode: number, error?: string): Promise<ExecutionResponse> {
    const completedAt = this.now();
    const elapsed = elapsedSeconds(attempt.startedAt, completedAt);
    const output = body + formatExecutionFooter({ completedAt, elapsedSeconds: elapsed, exitCode, error });

    if (this.maxExecutionTimeSeconds !== undefined && elapsed > this.maxExecutionTimeSeconds) {
      this.logger.warn('Command exceeded the maximum execution time', {
        name: attempt.commandName,
        elapsedSeconds: elapsed,
        maxExecutionTimeSeconds: this.maxExecutionTimeSeconds,
      });
    }

    const effectiveExitCode = error !== undefined && exitCode === 0 ? 1 : exitCode;

    await this.audit({
      command: attempt.commandName,
      options: attempt.options,
      user: attempt.user,
      exitCode: effectiveExitCode,
      output: stripFormatting(output),
      elapsedSeconds: elapsed,
      environment: this.environment,
      startedAt: attempt.startedAt,
      completedAt,
    });

    return { output, exitCode: effectiveExitCode, elapsedSeconds: elapsed };
  }

  private async audit(entry: AuditEntry): Promise<void> {
    if (!this.logExecutions || !this.auditSink) {
      return;
    }
    try {
      await this.auditSink.record(entry);
    } catch (error) {
      this.logger.error('Failed to record execution', { name: entry.command, error: errorMessage(error) });
    }
  }
}
