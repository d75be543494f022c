// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// ============================================================================
// Query Values
// ============================================================================

export type QueryScalar = string | number | boolean | null;

export type QueryValue = QueryScalar | QueryValue[] | { [key: string]: QueryValue };

/** One row of an entity. */
export type QueryRecord = Record<string, QueryScalar>;

// ============================================================================
// Parsed Expressions
// ============================================================================

export type TokenType = 'identifier' | 'string' | 'number' | 'arrow' | 'punct';

export interface Token {
  type: TokenType;
  value: string;
  /** Offset of the first character in the expression */
  position: number;
}

export type ValueHelperName = 'now' | 'today';

/** Zero-argument helper call used as an argument, e.g. today(). */
export interface HelperCall {
  helper: ValueHelperName;
}

export type QueryArgument = QueryScalar | HelperCall | QueryArgument[];

export interface VerbCall {
  /** Verb as written */
  verb: string;
  args: QueryArgument[];
  position: number;
}

export interface QueryChain {
  calls: VerbCall[];
}

// ============================================================================
// Validation
// ============================================================================

export interface QueryValidationResult {
  accepted: boolean;
  /** Lower-cased verb that is not on the allowlist */
  rejectedVerb?: string;
  /** Source of the denylist pattern that matched */
  rejectedPattern?: string;
  /** Why the expression could not be parsed */
  parseError?: string;
}

// ============================================================================
// Query Plans
// ============================================================================

export type ComparisonOperator = '=' | '!=' | '<>' | '<' | '>' | '<=' | '>=' | 'like' | 'not like';

export type Conjunction = 'and' | 'or';

export type DatePart = 'date' | 'month' | 'year' | 'time';

export type Condition =
  | { type: 'basic'; column: string; operator: ComparisonOperator; value: QueryScalar; boolean: Conjunction }
  | { type: 'in'; column: string; values: QueryScalar[]; not: boolean; boolean: Conjunction }
  | { type: 'between'; column: string; range: [QueryScalar, QueryScalar]; not: boolean; boolean: Conjunction }
  | { type: 'null'; column: string; not: boolean; boolean: Conjunction }
  | {
      type: 'datePart';
      part: DatePart;
      column: string;
      operator: ComparisonOperator;
      value: QueryScalar;
      boolean: Conjunction;
    }
  | { type: 'column'; first: string; operator: ComparisonOperator; second: string; boolean: Conjunction };

export interface Ordering {
  column: string;
  direction: 'asc' | 'desc';
}

export interface HavingClause {
  column: string;
  operator: ComparisonOperator;
  value: QueryScalar;
}

/**
 * Read-only description of a query, built by the interpreter from builder
 * verbs and handed to an entity source.
 */
export interface QueryPlan {
  /** Empty means every field */
  columns: string[];
  distinct: boolean;
  conditions: Condition[];
  groups: string[];
  havings: HavingClause[];
  orders: Ordering[];
  limit: number | null;
  offset: number | null;
}

export type AggregateFunction = 'count' | 'min' | 'max' | 'avg' | 'sum';

// ============================================================================
// Entity Sources
// ============================================================================

/**
 * Query capability of one entity type.
 */
export interface EntityQuerySource {
  readonly name: string;
  readonly primaryKey: string;
  fields(): string[];
  select(plan: QueryPlan): QueryRecord[];
  iterate(plan: QueryPlan): Iterable<QueryRecord>;
  /** Aggregate over the rows the plan returns; column null means "*" */
  aggregate(plan: QueryPlan, fn: AggregateFunction, column: string | null): number | null;
}

export interface EntityTypeInfo {
  name: string;
  label: string;
  fields: string[];
}

/**
 * Supplied by the host application: the queryable entity types.
 */
export interface EntityTypeResolver {
  list(): EntityTypeInfo[];
  resolve(name: string): EntityQuerySource | undefined;
}

// ============================================================================
// Execution Outcome
// ============================================================================

export type ExecutionFailureCode = 'UNKNOWN_ENTITY_TYPE' | 'EXECUTION_ERROR';

export type ExecutionOutcome =
  | { ok: true; value: QueryValue; elapsedSeconds: number; exitCode: 0 }
  | { ok: false; errorMessage: string; code: ExecutionFailureCode; elapsedSeconds: number; exitCode: 1 };

export function createEmptyPlan(): QueryPlan {
  return {
    columns: [],
    distinct: false,
    conditions: [],
    groups: [],
    havings: [],
    orders: [],
    limit: null,
    offset: null,
  };
}
