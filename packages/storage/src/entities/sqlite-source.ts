// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type Database from 'better-sqlite3';
import { QueryExecutionError, isNumeric, toNumber } from '@opsdeck/shared';
import type {
  AggregateFunction,
  ComparisonOperator,
  Condition,
  EntityQuerySource,
  QueryPlan,
  QueryRecord,
  QueryScalar,
} from '@opsdeck/sandbox';

type BindValue = string | number | null;

interface CompiledQuery {
  sql: string;
  params: BindValue[];
}

const SQL_OPERATORS: Record<ComparisonOperator, string> = {
  '=': '=',
  '!=': '!=',
  '<>': '<>',
  '<': '<',
  '>': '>',
  '<=': '<=',
  '>=': '>=',
  like: 'LIKE',
  'not like': 'NOT LIKE',
};

const DATE_PART_SQL = {
  date: (column: string) => `date(${column})`,
  month: (column: string) => `CAST(strftime('%m', ${column}) AS INTEGER)`,
  year: (column: string) => `CAST(strftime('%Y', ${column}) AS INTEGER)`,
  time: (column: string) => `time(${column})`,
} as const;

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Read-only query source over one SQLite table. Plans compile to a single
 * parameterized SELECT; every identifier must be one of the table's columns.
 */
export class SqliteQuerySource implements EntityQuerySource {
  private readonly columns: ReadonlySet<string>;

  constructor(
    private readonly db: Database.Database,
    readonly name: string,
    private readonly columnNames: string[],
    readonly primaryKey: string,
  ) {
    this.columns = new Set([...columnNames, primaryKey]);
  }

  fields(): string[] {
    return [...this.columnNames];
  }

  select(plan: QueryPlan): QueryRecord[] {
    const { sql, params } = this.compile(plan);
    return this.db
      .prepare<BindValue[], Record<string, unknown>>(sql)
      .all(...params)
      .map(normalizeRow);
  }

  *iterate(plan: QueryPlan): Iterable<QueryRecord> {
    const { sql, params } = this.compile(plan);
    for (const row of this.db.prepare<BindValue[], Record<string, unknown>>(sql).iterate(...params)) {
      yield normalizeRow(row);
    }
  }

  aggregate(plan: QueryPlan, fn: AggregateFunction, column: string | null): number | null {
    // Only grouped or distinct plans need their own column list in the subquery
    const keepColumns = plan.distinct || plan.groups.length > 0;
    const inner = this.compile({ ...plan, columns: keepColumns ? plan.columns : [] });
    const target = column === null ? '*' : `q.${this.identifier(column)}`;
    if (fn !== 'count' && column === null) {
      throw QueryExecutionError.failed(`${fn}() needs a column`);
    }

    const row = this.db
      .prepare<BindValue[], { aggregate: unknown }>(
        `SELECT ${fn.toUpperCase()}(${target}) AS aggregate FROM (${inner.sql}) AS q`,
      )
      .get(...inner.params);

    return toAggregate(row?.aggregate);
  }

  /**
   * Build the SELECT for a plan.
   */
  compile(plan: QueryPlan): CompiledQuery {
    const params: BindValue[] = [];
    const columns = plan.columns.length > 0 ? plan.columns.map((c) => this.identifier(c)).join(', ') : '*';
    let sql = `SELECT ${plan.distinct ? 'DISTINCT ' : ''}${columns} FROM ${quoteIdentifier(this.name)}`;

    if (plan.conditions.length > 0) {
      const parts = plan.conditions.map((condition, index) => {
        const clause = this.compileCondition(condition, params);
        return index === 0 ? clause : `${condition.boolean.toUpperCase()} ${clause}`;
      });
      sql += ` WHERE ${parts.join(' ')}`;
    }

    if (plan.groups.length > 0) {
      sql += ` GROUP BY ${plan.groups.map((c) => this.identifier(c)).join(', ')}`;
    }

    if (plan.havings.length > 0) {
      const parts = plan.havings.map((having) => {
        params.push(bindValue(having.value));
        return `${this.identifier(having.column)} ${SQL_OPERATORS[having.operator]} ?`;
      });
      sql += ` HAVING ${parts.join(' AND ')}`;
    }

    if (plan.orders.length > 0) {
      sql += ` ORDER BY ${plan.orders
        .map((order) => `${this.identifier(order.column)} ${order.direction.toUpperCase()}`)
        .join(', ')}`;
    }

    if (plan.limit !== null || plan.offset !== null) {
      // SQLite needs a LIMIT before OFFSET; -1 means no limit
      sql += ' LIMIT ?';
      params.push(plan.limit ?? -1);
      if (plan.offset !== null) {
        sql += ' OFFSET ?';
        params.push(plan.offset);
      }
    }

    return { sql, params };
  }

  private compileCondition(condition: Condition, params: BindValue[]): string {
    switch (condition.type) {
      case 'basic':
        params.push(bindValue(condition.value));
        return `${this.identifier(condition.column)} ${SQL_OPERATORS[condition.operator]} ?`;

      case 'in': {
        if (condition.values.length === 0) {
          return condition.not ? '1 = 1' : '0 = 1';
        }
        params.push(...condition.values.map(bindValue));
        const placeholders = condition.values.map(() => '?').join(', ');
        return `${this.identifier(condition.column)} ${condition.not ? 'NOT IN' : 'IN'} (${placeholders})`;
      }

      case 'between':
        params.push(bindValue(condition.range[0]), bindValue(condition.range[1]));
        return `${this.identifier(condition.column)} ${condition.not ? 'NOT BETWEEN' : 'BETWEEN'} ? AND ?`;

      case 'null':
        return `${this.identifier(condition.column)} IS ${condition.not ? 'NOT NULL' : 'NULL'}`;

      case 'datePart': {
        const numericPart = condition.part === 'month' || condition.part === 'year';
        const value = numericPart && isNumeric(condition.value) ? toNumber(condition.value) : condition.value;
        params.push(bindValue(value));
        return `${DATE_PART_SQL[condition.part](this.identifier(condition.column))} ${SQL_OPERATORS[condition.operator]} ?`;
      }

      case 'column':
        return `${this.identifier(condition.first)} ${SQL_OPERATORS[condition.operator]} ${this.identifier(condition.second)}`;
    }
  }

  private identifier(column: string): string {
    if (!this.columns.has(column)) {
      throw QueryExecutionError.failed(`unknown column '${column}' on ${this.name}`);
    }
    return quoteIdentifier(column);
  }
}

// SQLite has no boolean type
function bindValue(value: QueryScalar): BindValue {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

function normalizeValue(value: unknown): QueryScalar {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return String(value);
}

function normalizeRow(row: Record<string, unknown>): QueryRecord {
  const record: QueryRecord = {};
  for (const [key, value] of Object.entries(row)) {
    record[key] = normalizeValue(value);
  }
  return record;
}

function toAggregate(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (isNumeric(value)) return toNumber(value);
  return null;
}
