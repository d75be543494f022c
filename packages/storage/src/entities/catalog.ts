// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type Database from 'better-sqlite3';
import type { EntityTypeInfo, EntityTypeResolver } from '@opsdeck/sandbox';
import { SqliteQuerySource } from './sqlite-source.js';

export interface EntityCatalogOptions {
  /** Only these tables are queryable; default is every user table */
  include?: string[];
  /** Tables never offered, on top of SQLite's internal ones */
  exclude?: string[];
  /** Display labels by table name */
  labels?: Record<string, string>;
}

interface ColumnInfo {
  name: string;
  pk: number;
}

const INTERNAL_TABLES = ['schema_version'];

/**
 * "command_executions" -> "Command Executions"
 */
export function humanizeTableName(name: string): string {
  return name
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

// ============================================================================
// SQLite Entity Catalog
// ============================================================================

/**
 * Offers the tables of a SQLite database as queryable entity types. The
 * table list is read on every call, so tables created later show up.
 */
export class SqliteEntityCatalog implements EntityTypeResolver {
  private readonly include?: ReadonlySet<string>;
  private readonly exclude: ReadonlySet<string>;
  private readonly labels: Record<string, string>;

  constructor(
    private readonly db: Database.Database,
    options: EntityCatalogOptions = {},
  ) {
    this.include = options.include ? new Set(options.include) : undefined;
    this.exclude = new Set([...INTERNAL_TABLES, ...(options.exclude ?? [])]);
    this.labels = options.labels ?? {};
  }

  list(): EntityTypeInfo[] {
    return this.tableNames().map((name) => ({
      name,
      label: this.labels[name] ?? humanizeTableName(name),
      fields: this.columns(name).map((column) => column.name),
    }));
  }

  resolve(name: string): SqliteQuerySource | undefined {
    if (!this.tableNames().includes(name)) {
      return undefined;
    }

    const columns = this.columns(name);
    const primary = columns.filter((column) => column.pk > 0);
    // Tables without a single-column key fall back to SQLite's rowid
    const primaryKey = primary.length === 1 ? primary[0].name : 'rowid';

    return new SqliteQuerySource(
      this.db,
      name,
      columns.map((column) => column.name),
      primaryKey,
    );
  }

  private tableNames(): string[] {
    return this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all()
      .map((row) => row.name)
      .filter((name) => !this.exclude.has(name) && (!this.include || this.include.has(name)));
  }

  private columns(table: string): ColumnInfo[] {
    return this.db
      .prepare<[string], ColumnInfo>('SELECT name, pk FROM pragma_table_info(?) ORDER BY cid')
      .all(table);
  }
}
