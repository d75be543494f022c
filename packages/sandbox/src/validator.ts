// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { QueryRejectedError, createLogger, isQueryRejectedError, type Logger } from '@opsdeck/shared';
import { invokedNames, parseChain, tokenize } from './parser.js';
import type { QueryChain, QueryValidationResult, Token } from './types.js';
import { ALLOWED_QUERY_VERBS } from './verbs.js';

// ============================================================================
// Denied Patterns
// ============================================================================

/**
 * Checked against the raw expression. Catches write verbs, raw statements and
 * system access that would not necessarily look like a "verb(" call.
 */
export const DENIED_QUERY_PATTERNS = [
  // Writes
  /save\s*\(/i,
  /create\s*\(/i,
  /update\s*\(/i,
  /upsert\s*\(/i,
  /delete\s*\(/i,
  /destroy\s*\(/i,
  /forceDelete\s*\(/i,
  /insert\s*\(/i,
  /truncate\s*\(/i,
  /increment\s*\(/i,
  /decrement\s*\(/i,
  /touch\s*\(/i,
  /push\s*\(/i,

  // Schema changes
  /drop\s*\(/i,
  /dropIfExists\s*\(/i,
  /alter\s*\(/i,

  // Raw statements and connection access
  /raw\s*\(/i,
  /statement\s*\(/i,
  /unprepared\s*\(/i,
  /exec\s*\(/i,
  /query\s*\(/i,
  /connection\s*\(/i,
  /attach\s*\(/i,
  /\bpragma\b/i,
  /schema\s*::/i,
  /db\s*::/i,

  // Interpolation
  /\$/,
  /`/,

  // Process execution and meta-programming
  /eval\s*\(/i,
  /assert\s*\(/i,
  /system\s*\(/i,
  /passthru\s*\(/i,
  /shell_exec\s*\(/i,
  /proc_open\s*\(/i,
  /popen\s*\(/i,
  /require\s*\(/i,
  /import\s*\(/i,
  /process\s*\./i,
  /child_process/i,
  /constructor/i,
  /__proto__/i,
  /prototype/i,
  /function\s*\(/i,
] as const;

// Fallback verb scan for expressions the lexer cannot read
const LOOSE_INVOCATION = /([A-Za-z_][A-Za-z0-9_]*)\s*\(/g;

export interface QueryValidatorOptions {
  /** Patterns checked in addition to DENIED_QUERY_PATTERNS */
  deniedPatterns?: readonly RegExp[];
  logger?: Logger;
}

interface Inspection {
  result: QueryValidationResult;
  chain?: QueryChain;
}

// ============================================================================
// Query Validator
// ============================================================================

/**
 * Decides whether a query expression may be interpreted. Three passes, all of
 * which must pass:
 *
 * 1. every invoked name is on the read-only allowlist
 * 2. no denied pattern occurs anywhere in the raw string
 * 3. the expression parses as a method chain
 *
 * Results are never cached.
 */
export class QueryValidator {
  private readonly patterns: readonly RegExp[];
  private readonly logger: Logger;

  constructor(options: QueryValidatorOptions = {}) {
    const extra = (options.deniedPatterns ?? []).map(
      // Global and sticky regexes keep state between test() calls
      (pattern) => new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')),
    );
    this.patterns = [...DENIED_QUERY_PATTERNS, ...extra];
    this.logger = options.logger ?? createLogger('QueryValidator');
  }

  check(expression: string): QueryValidationResult {
    return this.inspect(expression).result;
  }

  /**
   * Validate and return the parsed chain, or throw QueryRejectedError.
   */
  assertSafe(expression: string): QueryChain {
    const { result, chain } = this.inspect(expression);

    if (result.rejectedVerb !== undefined) {
      throw QueryRejectedError.disallowedVerb(result.rejectedVerb);
    }
    if (result.rejectedPattern !== undefined) {
      throw QueryRejectedError.disallowedPattern(result.rejectedPattern);
    }
    if (!chain) {
      throw QueryRejectedError.malformed(result.parseError ?? 'unknown error');
    }
    return chain;
  }

  private inspect(expression: string): Inspection {
    let tokens: Token[] | null = null;
    let lexError: string | null = null;

    try {
      tokens = tokenize(expression);
    } catch (error) {
      if (!isQueryRejectedError(error)) throw error;
      lexError = error.detail ?? error.message;
    }

    const rejectedVerb = this.findDisallowedVerb(tokens ? invokedNames(tokens) : looseInvocations(expression));
    if (rejectedVerb) {
      this.logger.warn('Rejected query verb', { verb: rejectedVerb });
      return { result: { accepted: false, rejectedVerb } };
    }

    const rejectedPattern = this.findDeniedPattern(expression);
    if (rejectedPattern) {
      this.logger.warn('Rejected query pattern', { pattern: rejectedPattern });
      return { result: { accepted: false, rejectedPattern } };
    }

    if (!tokens) {
      return { result: { accepted: false, parseError: lexError ?? 'unreadable expression' } };
    }

    try {
      return { result: { accepted: true }, chain: parseChain(tokens) };
    } catch (error) {
      if (!isQueryRejectedError(error)) throw error;
      return { result: { accepted: false, parseError: error.detail ?? error.message } };
    }
  }

  private findDisallowedVerb(names: string[]): string | undefined {
    for (const name of names) {
      const normalized = name.toLowerCase();
      if (!ALLOWED_QUERY_VERBS.has(normalized)) {
        return normalized;
      }
    }
    return undefined;
  }

  private findDeniedPattern(expression: string): string | undefined {
    for (const pattern of this.patterns) {
      if (pattern.test(expression)) {
        return pattern.source;
      }
    }
    return undefined;
  }
}

function looseInvocations(expression: string): string[] {
  return Array.from(expression.matchAll(LOOSE_INVOCATION), (match) => match[1]);
}

/**
 * Validate an expression with the default validator.
 */
export function validateQuery(expression: string, options?: QueryValidatorOptions): QueryValidationResult {
  return new QueryValidator(options).check(expression);
}

/**
 * Quick check if an expression is safe to interpret.
 */
export function isSafeQuery(expression: string, options?: QueryValidatorOptions): boolean {
  return validateQuery(expression, options).accepted;
}
