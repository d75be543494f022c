// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  QueryExecutionError,
  createLogger,
  elapsedSeconds,
  errorMessage,
  isQueryExecutionError,
  now as systemNow,
  type Logger,
} from '@opsdeck/shared';
import { interpret } from './interpreter.js';
import type { EntityTypeResolver, ExecutionFailureCode, ExecutionOutcome } from './types.js';
import { QueryValidator } from './validator.js';

export interface QueryExecutorOptions {
  validator?: QueryValidator;
  /** Source of now() and today() inside queries */
  clock?: () => Date;
  /** Millisecond timer used for elapsed time */
  now?: () => number;
  logger?: Logger;
}

// ============================================================================
// Query Executor
// ============================================================================

export class QueryExecutor {
  private readonly validator: QueryValidator;
  private readonly clock?: () => Date;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly resolver: EntityTypeResolver,
    options: QueryExecutorOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('QueryExecutor');
    this.validator = options.validator ?? new QueryValidator({ logger: this.logger });
    this.clock = options.clock;
    this.now = options.now ?? systemNow;
  }

  /**
   * Validate and run a query against one entity type.
   *
   * The expression is validated again on every call, whatever the caller
   * checked before. A rejected expression throws QueryRejectedError without
   * touching the entity source; every other failure is returned as a failed
   * outcome.
   */
  run(entityType: string, expression: string): ExecutionOutcome {
    const chain = this.validator.assertSafe(expression);
    const startedAt = this.now();

    try {
      const source = this.resolver.resolve(entityType);
      if (!source) {
        throw QueryExecutionError.unknownEntityType(entityType);
      }

      const value = interpret(chain, source, { clock: this.clock });
      const elapsed = elapsedSeconds(startedAt, this.now());
      this.logger.debug('Query executed', { entityType, elapsedSeconds: elapsed });
      return { ok: true, value, elapsedSeconds: elapsed, exitCode: 0 };
    } catch (error) {
      const elapsed = elapsedSeconds(startedAt, this.now());
      const failure = toFailure(error);
      this.logger.warn('Query failed', { entityType, code: failure.code, error: failure.message });
      return {
        ok: false,
        errorMessage: failure.message,
        code: failure.code,
        elapsedSeconds: elapsed,
        exitCode: 1,
      };
    }
  }
}

function toFailure(error: unknown): { message: string; code: ExecutionFailureCode } {
  if (isQueryExecutionError(error)) {
    return {
      message: error.message,
      code: error.reason === 'unknown_entity_type' ? 'UNKNOWN_ENTITY_TYPE' : 'EXECUTION_ERROR',
    };
  }
  return { message: QueryExecutionError.failed(errorMessage(error)).message, code: 'EXECUTION_ERROR' };
}
