// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { ValueHelperName } from './types.js';

// ============================================================================
// Read-Only Query Verbs
// ============================================================================

/** Verbs that narrow, order or shape the query before it runs. */
export const BUILDER_VERBS = [
  'where',
  'orWhere',
  'whereIn',
  'whereNotIn',
  'whereBetween',
  'whereNotBetween',
  'whereNull',
  'whereNotNull',
  'whereDate',
  'whereMonth',
  'whereYear',
  'whereTime',
  'whereColumn',
  'orderBy',
  'orderByDesc',
  'latest',
  'oldest',
  'limit',
  'take',
  'offset',
  'skip',
  'select',
  'addSelect',
  'distinct',
  'groupBy',
  'having',
] as const;

/** Verbs that run the query. */
export const TERMINAL_VERBS = [
  'get',
  'first',
  'find',
  'findOrFail',
  'sole',
  'pluck',
  'value',
  'count',
  'min',
  'max',
  'avg',
  'sum',
  'exists',
  'doesntExist',
  'paginate',
  'simplePaginate',
  'lazy',
] as const;

/** Verbs applied to an already materialized result. */
export const RESULT_VERBS = [
  'pluck',
  'first',
  'count',
  'take',
  'skip',
  'sum',
  'avg',
  'min',
  'max',
  'toArray',
  'toJson',
] as const;

export const VALUE_HELPERS: readonly ValueHelperName[] = ['now', 'today'];

export type BuilderVerb = (typeof BUILDER_VERBS)[number];
export type TerminalVerb = (typeof TERMINAL_VERBS)[number];
export type ResultVerb = (typeof RESULT_VERBS)[number];
export type QueryVerb = BuilderVerb | TerminalVerb | ResultVerb;

const CANONICAL_VERBS = new Map<string, QueryVerb>();
for (const verb of [...BUILDER_VERBS, ...TERMINAL_VERBS, ...RESULT_VERBS]) {
  CANONICAL_VERBS.set(verb.toLowerCase(), verb);
}

/**
 * Every name that may appear directly before "(" in a query, lower-cased.
 */
export const ALLOWED_QUERY_VERBS: ReadonlySet<string> = new Set([
  ...CANONICAL_VERBS.keys(),
  ...VALUE_HELPERS,
]);

/**
 * Map a verb as written to its canonical spelling; verbs are
 * case-insensitive.
 */
export function canonicalVerb(verb: string): QueryVerb | undefined {
  return CANONICAL_VERBS.get(verb.toLowerCase());
}

export function toValueHelper(name: string): ValueHelperName | undefined {
  const lowered = name.toLowerCase();
  return VALUE_HELPERS.find((helper) => helper === lowered);
}

const BUILDER_SET: ReadonlySet<string> = new Set(BUILDER_VERBS);
const TERMINAL_SET: ReadonlySet<string> = new Set(TERMINAL_VERBS);
const RESULT_SET: ReadonlySet<string> = new Set(RESULT_VERBS);

export function isBuilderVerb(verb: QueryVerb): verb is BuilderVerb {
  return BUILDER_SET.has(verb);
}

export function isTerminalVerb(verb: QueryVerb): verb is TerminalVerb {
  return TERMINAL_SET.has(verb);
}

export function isResultVerb(verb: QueryVerb): verb is ResultVerb {
  return RESULT_SET.has(verb);
}
