// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { OptionRule } from '../types/option.js';

// ============================================================================
// Base Error Class
// ============================================================================

export abstract class OpsdeckError extends Error {
  abstract readonly code: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = Date.now();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export type ValidationFailure = 'missing_required' | 'rule_violation' | 'invalid_value';

export class ValidationError extends OpsdeckError {
  readonly code = 'VALIDATION_ERROR';
  readonly reason: ValidationFailure;
  readonly field?: string;
  readonly rule?: OptionRule;

  constructor(
    message: string,
    reason: ValidationFailure,
    field?: string,
    rule?: OptionRule,
    context?: Record<string, unknown>,
  ) {
    super(message, context);
    this.reason = reason;
    this.field = field;
    this.rule = rule;
  }

  static missingRequired(field: string, label = field): ValidationError {
    return new ValidationError(`Option '${label}' is required`, 'missing_required', field);
  }

  static ruleViolation(field: string, rule: OptionRule): ValidationError {
    return new ValidationError(describeRuleViolation(field, rule), 'rule_violation', field, rule, {
      rule: rule.name,
      arg: rule.arg,
    });
  }

  static invalid(field: string, reason?: string): ValidationError {
    return new ValidationError(`Invalid ${field}${reason ? `: ${reason}` : ''}`, 'invalid_value', field);
  }
}

function describeRuleViolation(field: string, rule: OptionRule): string {
  switch (rule.name) {
    case 'integer':
      return `Option '${field}' must be an integer`;
    case 'numeric':
      return `Option '${field}' must be numeric`;
    case 'min':
      return `Option '${field}' must be at least ${rule.arg}`;
    case 'max':
      return `Option '${field}' must not exceed ${rule.arg}`;
  }
}

// ============================================================================
// Command Errors
// ============================================================================

export type CommandFailure =
  | 'invalid_command'
  | 'not_found'
  | 'not_eligible'
  | 'confirmation_required'
  | 'disabled';

export class CommandError extends OpsdeckError {
  readonly code = 'COMMAND_ERROR';
  readonly reason: CommandFailure;
  readonly commandName: string;

  constructor(commandName: string, reason: CommandFailure, message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.commandName = commandName;
    this.reason = reason;
  }

  static invalidCommand(commandName: string, issues: string[]): CommandError {
    const label = commandName || '<unnamed>';
    return new CommandError(
      commandName,
      'invalid_command',
      `Command "${label}" is not a valid command: ${issues.join('; ')}`,
      { issues },
    );
  }

  static notFound(commandName: string): CommandError {
    return new CommandError(commandName, 'not_found', `Command "${commandName}" is not registered.`);
  }

  static notEligible(commandName: string, environment: string): CommandError {
    return new CommandError(
      commandName,
      'not_eligible',
      `Command "${commandName}" is not available in the ${environment} environment.`,
      { environment },
    );
  }

  static confirmationRequired(commandName: string): CommandError {
    return new CommandError(
      commandName,
      'confirmation_required',
      `Command "${commandName}" requires confirmation before it can run.`,
    );
  }

  static disabled(commandName: string): CommandError {
    return new CommandError(commandName, 'disabled', 'The command runner is disabled.');
  }
}

// ============================================================================
// Query Errors
// ============================================================================

export type QueryRejection = 'disallowed_verb' | 'disallowed_pattern' | 'malformed';

export class QueryRejectedError extends OpsdeckError {
  readonly code = 'QUERY_REJECTED';
  readonly reason: QueryRejection;
  readonly verb?: string;
  readonly pattern?: string;
  /** Parser message without the user-facing prefix */
  readonly detail?: string;

  constructor(
    message: string,
    reason: QueryRejection,
    details: { verb?: string; pattern?: string; detail?: string } = {},
  ) {
    super(message, details);
    this.reason = reason;
    this.verb = details.verb;
    this.pattern = details.pattern;
    this.detail = details.detail;
  }

  static disallowedVerb(verb: string): QueryRejectedError {
    return new QueryRejectedError(
      `Method '${verb}' is not allowed. Only read-only query methods are permitted.`,
      'disallowed_verb',
      { verb },
    );
  }

  static disallowedPattern(pattern: string): QueryRejectedError {
    return new QueryRejectedError(
      'Query contains disallowed operations. Only read-only queries are allowed.',
      'disallowed_pattern',
      { pattern },
    );
  }

  static malformed(detail: string): QueryRejectedError {
    return new QueryRejectedError(`Query could not be parsed: ${detail}`, 'malformed', { detail });
  }
}

export type QueryExecutionFailure = 'unknown_entity_type' | 'evaluation_failed';

export class QueryExecutionError extends OpsdeckError {
  readonly code = 'QUERY_EXECUTION_ERROR';
  readonly reason: QueryExecutionFailure;

  constructor(message: string, reason: QueryExecutionFailure = 'evaluation_failed', context?: Record<string, unknown>) {
    super(message, context);
    this.reason = reason;
  }

  static unknownEntityType(entityType: string): QueryExecutionError {
    return new QueryExecutionError(`Entity type '${entityType}' does not exist.`, 'unknown_entity_type', {
      entityType,
    });
  }

  static failed(reason: string): QueryExecutionError {
    return new QueryExecutionError(`Query execution failed: ${reason}`);
  }
}

// ============================================================================
// Storage Errors
// ============================================================================

export class StorageError extends OpsdeckError {
  readonly code = 'STORAGE_ERROR';

  static saveFailed(entity: string, reason?: string): StorageError {
    return new StorageError(`Failed to save ${entity}${reason ? `: ${reason}` : ''}`, { entity });
  }

  static connectionClosed(): StorageError {
    return new StorageError('Database connection is closed');
  }
}

// ============================================================================
// Error Type Guards
// ============================================================================

export function isOpsdeckError(error: unknown): error is OpsdeckError {
  return error instanceof OpsdeckError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isCommandError(error: unknown): error is CommandError {
  return error instanceof CommandError;
}

export function isQueryRejectedError(error: unknown): error is QueryRejectedError {
  return error instanceof QueryRejectedError;
}

export function isQueryExecutionError(error: unknown): error is QueryExecutionError {
  return error instanceof QueryExecutionError;
}

// ============================================================================
// Error Wrapping
// ============================================================================

class UnknownError extends OpsdeckError {
  readonly code = 'UNKNOWN_ERROR';
}

export function wrapError(error: unknown, fallbackMessage = 'An unexpected error occurred'): OpsdeckError {
  if (isOpsdeckError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new UnknownError(error.message || fallbackMessage, { originalError: error.name });
  }

  return new UnknownError(String(error) || fallbackMessage);
}

/**
 * Message of any thrown value, for user-facing output.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
