// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { QueryExecutionError, isNumeric, toNumber } from '@opsdeck/shared';
import type {
  ComparisonOperator,
  Condition,
  Conjunction,
  DatePart,
  EntityQuerySource,
  QueryArgument,
  QueryChain,
  QueryPlan,
  QueryRecord,
  QueryScalar,
  QueryValue,
} from './types.js';
import { createEmptyPlan } from './types.js';
import {
  canonicalVerb,
  isBuilderVerb,
  isResultVerb,
  isTerminalVerb,
  type BuilderVerb,
  type ResultVerb,
  type TerminalVerb,
} from './verbs.js';

/** Argument after helper calls have been replaced by their values. */
type Argument = QueryScalar | Argument[];

export interface InterpreterOptions {
  /** Source of now() and today(); defaults to the system clock */
  clock?: () => Date;
}

const COLUMN_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const OPERATORS: ReadonlySet<string> = new Set<ComparisonOperator>([
  '=',
  '!=',
  '<>',
  '<',
  '>',
  '<=',
  '>=',
  'like',
  'not like',
]);

const DEFAULT_PER_PAGE = 15;
const DEFAULT_TIMESTAMP_COLUMN = 'created_at';

function fail(reason: string): QueryExecutionError {
  return QueryExecutionError.failed(reason);
}

function isOperator(value: string): value is ComparisonOperator {
  return OPERATORS.has(value);
}

// ============================================================================
// Interpreter
// ============================================================================

/**
 * Walks a parsed chain. Builder verbs shape a QueryPlan, the first terminal
 * verb runs it against the source, and any verbs after that transform the
 * materialized result.
 */
class ChainInterpreter {
  private readonly plan: QueryPlan = createEmptyPlan();
  private result: QueryValue = null;
  private executed = false;

  constructor(
    private readonly source: EntityQuerySource,
    private readonly clock: () => Date,
  ) {}

  run(chain: QueryChain): QueryValue {
    for (const call of chain.calls) {
      const verb = canonicalVerb(call.verb);
      if (!verb) {
        throw fail(`unknown method '${call.verb}'`);
      }
      const args = call.args.map((arg) => this.resolve(arg));

      if (!this.executed) {
        if (isBuilderVerb(verb)) {
          this.applyBuilder(verb, args);
        } else if (isTerminalVerb(verb)) {
          this.result = this.executeTerminal(verb, args);
          this.executed = true;
        } else {
          throw fail(`${verb}() can only be called on a query result`);
        }
        continue;
      }

      if (!isResultVerb(verb)) {
        throw fail(`${verb}() cannot be called on a query result`);
      }
      this.result = this.applyResult(verb, args, this.result);
    }

    if (!this.executed) {
      throw fail('the query never runs; end it with a method such as get(), first() or count()');
    }
    return this.result;
  }

  private resolve(arg: QueryArgument): Argument {
    if (Array.isArray(arg)) {
      return arg.map((item) => this.resolve(item));
    }
    if (arg !== null && typeof arg === 'object') {
      const iso = this.clock().toISOString();
      return arg.helper === 'today' ? iso.slice(0, 10) : iso.slice(0, 19).replace('T', ' ');
    }
    return arg;
  }

  // ==========================================================================
  // Builder verbs
  // ==========================================================================

  private applyBuilder(verb: BuilderVerb, args: Argument[]): void {
    const plan = this.plan;

    switch (verb) {
      case 'where':
      case 'orWhere':
        plan.conditions.push(this.comparison(verb, args, verb === 'orWhere' ? 'or' : 'and'));
        return;

      case 'whereIn':
      case 'whereNotIn':
        arity(verb, args, 2);
        plan.conditions.push({
          type: 'in',
          column: column(verb, args[0]),
          values: scalarList(verb, args[1]),
          not: verb === 'whereNotIn',
          boolean: 'and',
        });
        return;

      case 'whereBetween':
      case 'whereNotBetween': {
        arity(verb, args, 2);
        const range = scalarList(verb, args[1]);
        if (range.length !== 2) {
          throw fail(`${verb}() expects a range of exactly two values`);
        }
        plan.conditions.push({
          type: 'between',
          column: column(verb, args[0]),
          range: [range[0], range[1]],
          not: verb === 'whereNotBetween',
          boolean: 'and',
        });
        return;
      }

      case 'whereNull':
      case 'whereNotNull':
        arity(verb, args, 1);
        plan.conditions.push({
          type: 'null',
          column: column(verb, args[0]),
          not: verb === 'whereNotNull',
          boolean: 'and',
        });
        return;

      case 'whereDate':
      case 'whereMonth':
      case 'whereYear':
      case 'whereTime': {
        const [col, operator, value] = operands(verb, args);
        plan.conditions.push({
          type: 'datePart',
          part: DATE_PARTS[verb],
          column: col,
          operator,
          value,
          boolean: 'and',
        });
        return;
      }

      case 'whereColumn': {
        const [first, operator, second] = operands(verb, args);
        plan.conditions.push({
          type: 'column',
          first,
          operator,
          second: column(verb, second),
          boolean: 'and',
        });
        return;
      }

      case 'orderBy': {
        arity(verb, args, 1, 2);
        const direction = args.length === 2 ? scalar(verb, args[1]) : 'asc';
        if (typeof direction !== 'string' || !['asc', 'desc'].includes(direction.toLowerCase())) {
          throw fail(`${verb}() direction must be 'asc' or 'desc'`);
        }
        plan.orders.push({ column: column(verb, args[0]), direction: direction.toLowerCase() === 'desc' ? 'desc' : 'asc' });
        return;
      }

      case 'orderByDesc':
        arity(verb, args, 1);
        plan.orders.push({ column: column(verb, args[0]), direction: 'desc' });
        return;

      case 'latest':
      case 'oldest':
        arity(verb, args, 0, 1);
        plan.orders.push({
          column: args.length === 1 ? column(verb, args[0]) : DEFAULT_TIMESTAMP_COLUMN,
          direction: verb === 'latest' ? 'desc' : 'asc',
        });
        return;

      case 'limit':
      case 'take':
        arity(verb, args, 1);
        plan.limit = count(verb, args[0]);
        return;

      case 'offset':
      case 'skip':
        arity(verb, args, 1);
        plan.offset = count(verb, args[0]);
        return;

      case 'select':
        plan.columns = columnList(verb, args);
        return;

      case 'addSelect':
        plan.columns.push(...columnList(verb, args));
        return;

      case 'distinct':
        arity(verb, args, 0);
        plan.distinct = true;
        return;

      case 'groupBy':
        plan.groups.push(...columnList(verb, args));
        return;

      case 'having': {
        const [col, operator, value] = operands(verb, args);
        plan.havings.push({ column: col, operator, value });
        return;
      }
    }
  }

  private comparison(verb: string, args: Argument[], boolean: Conjunction): Condition {
    const [col, operator, value] = operands(verb, args);

    if (value === null) {
      if (operator === '=') {
        return { type: 'null', column: col, not: false, boolean };
      }
      if (operator === '!=' || operator === '<>') {
        return { type: 'null', column: col, not: true, boolean };
      }
      throw fail(`${verb}() cannot compare against null with '${operator}'`);
    }

    return { type: 'basic', column: col, operator, value, boolean };
  }

  // ==========================================================================
  // Terminal verbs
  // ==========================================================================

  private executeTerminal(verb: TerminalVerb, args: Argument[]): QueryValue {
    const source = this.source;
    const plan = this.plan;

    switch (verb) {
      case 'get':
        return source.select(args.length > 0 ? { ...plan, columns: columnList(verb, args) } : plan);

      case 'first':
        return this.firstRow(args.length > 0 ? { ...plan, columns: columnList(verb, args) } : plan);

      case 'find':
      case 'findOrFail': {
        arity(verb, args, 1);
        const id = scalar(verb, args[0]);
        const row = this.firstRow({
          ...plan,
          conditions: [
            ...plan.conditions,
            { type: 'basic', column: source.primaryKey, operator: '=', value: id, boolean: 'and' },
          ],
        });
        if (row === null && verb === 'findOrFail') {
          throw fail(`no ${source.name} record found with ${source.primaryKey} ${String(id)}`);
        }
        return row;
      }

      case 'sole': {
        arity(verb, args, 0);
        const rows = source.select({ ...plan, limit: 2 });
        if (rows.length === 0) {
          throw fail('no records found');
        }
        if (rows.length > 1) {
          throw fail('more than one record found');
        }
        return rows[0];
      }

      case 'pluck': {
        arity(verb, args, 1, 2);
        const valueColumn = column(verb, args[0]);
        const keyColumn = args.length === 2 ? column(verb, args[1]) : null;
        const rows = source.select({ ...plan, columns: keyColumn ? [valueColumn, keyColumn] : [valueColumn] });
        if (!keyColumn) {
          return rows.map((row) => row[valueColumn] ?? null);
        }
        const keyed: Record<string, QueryValue> = {};
        for (const row of rows) {
          keyed[String(row[keyColumn])] = row[valueColumn] ?? null;
        }
        return keyed;
      }

      case 'value': {
        arity(verb, args, 1);
        const col = column(verb, args[0]);
        const row = this.firstRow({ ...plan, columns: [col] });
        return row ? (row[col] ?? null) : null;
      }

      case 'count': {
        arity(verb, args, 0, 1);
        const target = args.length === 1 && args[0] !== '*' ? column(verb, args[0]) : null;
        return source.aggregate(plan, 'count', target) ?? 0;
      }

      case 'min':
      case 'max':
      case 'avg':
        arity(verb, args, 1);
        return source.aggregate(plan, verb, column(verb, args[0]));

      case 'sum':
        arity(verb, args, 1);
        return source.aggregate(plan, verb, column(verb, args[0])) ?? 0;

      case 'exists':
      case 'doesntExist': {
        arity(verb, args, 0);
        const found = (source.aggregate(plan, 'count', null) ?? 0) > 0;
        return verb === 'exists' ? found : !found;
      }

      case 'paginate': {
        arity(verb, args, 0, 2);
        const perPage = args.length > 0 ? positive(verb, args[0]) : DEFAULT_PER_PAGE;
        const page = args.length > 1 ? positive(verb, args[1]) : 1;
        const total = source.aggregate({ ...plan, orders: [], limit: null, offset: null }, 'count', null) ?? 0;
        const data = source.select({ ...plan, limit: perPage, offset: (page - 1) * perPage });
        return {
          data,
          total,
          perPage,
          currentPage: page,
          lastPage: Math.max(1, Math.ceil(total / perPage)),
        };
      }

      case 'simplePaginate': {
        arity(verb, args, 0, 2);
        const perPage = args.length > 0 ? positive(verb, args[0]) : DEFAULT_PER_PAGE;
        const page = args.length > 1 ? positive(verb, args[1]) : 1;
        const rows = source.select({ ...plan, limit: perPage + 1, offset: (page - 1) * perPage });
        return {
          data: rows.slice(0, perPage),
          perPage,
          currentPage: page,
          hasMorePages: rows.length > perPage,
        };
      }

      case 'lazy':
        arity(verb, args, 0);
        return Array.from(source.iterate(plan));
    }
  }

  private firstRow(plan: QueryPlan): QueryRecord | null {
    return this.source.select({ ...plan, limit: 1 })[0] ?? null;
  }

  // ==========================================================================
  // Result verbs
  // ==========================================================================

  private applyResult(verb: ResultVerb, args: Argument[], value: QueryValue): QueryValue {
    switch (verb) {
      case 'toArray':
        arity(verb, args, 0);
        return value;

      case 'toJson':
        arity(verb, args, 0);
        return JSON.stringify(value);

      case 'count':
        arity(verb, args, 0);
        if (Array.isArray(value)) return value.length;
        if (isRecord(value)) return Object.keys(value).length;
        throw fail('count() needs a list of records');

      case 'first':
        arity(verb, args, 0);
        return items(verb, value)[0] ?? null;

      case 'take':
        arity(verb, args, 1);
        return items(verb, value).slice(0, count(verb, args[0]));

      case 'skip':
        arity(verb, args, 1);
        return items(verb, value).slice(count(verb, args[0]));

      case 'pluck': {
        arity(verb, args, 1);
        const col = column(verb, args[0]);
        return items(verb, value).map((item) => field(item, col));
      }

      case 'sum':
      case 'avg':
      case 'min':
      case 'max': {
        arity(verb, args, 0, 1);
        const col = args.length === 1 ? column(verb, args[0]) : null;
        const numbers = items(verb, value)
          .map((item) => (col === null ? item : field(item, col)))
          .filter((item): item is number | string => isNumeric(item))
          .map(toNumber);
        return reduceNumbers(verb, numbers);
      }
    }
  }
}

function isRecord(value: QueryValue): value is { [key: string]: QueryValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function items(verb: string, value: QueryValue): QueryValue[] {
  if (!Array.isArray(value)) {
    throw fail(`${verb}() needs a list of records`);
  }
  return value;
}

function field(item: QueryValue, col: string): QueryValue {
  return isRecord(item) ? (item[col] ?? null) : null;
}

const DATE_PARTS: Record<'whereDate' | 'whereMonth' | 'whereYear' | 'whereTime', DatePart> = {
  whereDate: 'date',
  whereMonth: 'month',
  whereYear: 'year',
  whereTime: 'time',
};

// ============================================================================
// Argument checks
// ============================================================================

function arity(verb: string, args: Argument[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw fail(`${verb}() takes ${expected} argument${max === 1 ? '' : 's'}, ${args.length} given`);
  }
}

function scalar(verb: string, arg: Argument | undefined): QueryScalar {
  if (arg === undefined || Array.isArray(arg)) {
    throw fail(`${verb}() expects a single value, not a list`);
  }
  return arg;
}

function column(verb: string, arg: Argument | undefined): string {
  if (typeof arg !== 'string' || !COLUMN_NAME.test(arg)) {
    throw fail(`${verb}() expects a column name`);
  }
  return arg;
}

function columnList(verb: string, args: Argument[]): string[] {
  const flat = args.length === 1 && Array.isArray(args[0]) ? args[0] : args;
  if (flat.length === 0) {
    throw fail(`${verb}() expects at least one column`);
  }
  return flat.map((arg) => column(verb, arg));
}

function scalarList(verb: string, arg: Argument | undefined): QueryScalar[] {
  if (!Array.isArray(arg)) {
    throw fail(`${verb}() expects a list of values`);
  }
  return arg.map((item) => scalar(verb, item));
}

function count(verb: string, arg: Argument | undefined): number {
  const value = scalar(verb, arg);
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw fail(`${verb}() expects a non-negative whole number`);
  }
  return value;
}

function positive(verb: string, arg: Argument | undefined): number {
  const value = count(verb, arg);
  if (value === 0) {
    throw fail(`${verb}() expects a number greater than zero`);
  }
  return value;
}

/**
 * (column, value) or (column, operator, value).
 */
function operands(verb: string, args: Argument[]): [string, ComparisonOperator, QueryScalar] {
  arity(verb, args, 2, 3);
  const col = column(verb, args[0]);
  if (args.length === 2) {
    return [col, '=', scalar(verb, args[1])];
  }

  const operator = scalar(verb, args[1]);
  const normalized = typeof operator === 'string' ? operator.trim().toLowerCase().replace(/\s+/g, ' ') : '';
  if (!isOperator(normalized)) {
    throw fail(`${verb}() does not support the operator ${JSON.stringify(operator)}`);
  }
  return [col, normalized, scalar(verb, args[2])];
}

function reduceNumbers(verb: 'sum' | 'avg' | 'min' | 'max', numbers: number[]): number | null {
  if (verb === 'sum') {
    return numbers.reduce((total, n) => total + n, 0);
  }
  if (numbers.length === 0) {
    return null;
  }
  switch (verb) {
    case 'avg':
      return numbers.reduce((total, n) => total + n, 0) / numbers.length;
    case 'min':
      return Math.min(...numbers);
    case 'max':
      return Math.max(...numbers);
  }
}

/**
 * Run a validated chain against an entity source. Throws QueryExecutionError
 * for anything the chain asks that the interpreter cannot do.
 */
export function interpret(chain: QueryChain, source: EntityQuerySource, options: InterpreterOptions = {}): QueryValue {
  return new ChainInterpreter(source, options.clock ?? (() => new Date())).run(chain);
}
