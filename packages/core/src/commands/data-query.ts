// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { QueryExecutor, QueryValidator, type EntityTypeResolver, type QueryExecutorOptions } from '@opsdeck/sandbox';
import {
  QueryExecutionError,
  createLogger,
  type CommandDescriptor,
  type CommandResult,
  type Logger,
  type OptionDefinition,
  type OptionValues,
} from '@opsdeck/shared';
import { BaseCommand } from '../command.js';
import { LIGHT_RULE, formatResult } from '../formatter.js';

export const DATA_QUERY_PLACEHOLDER = "whereDate('created_at', today())->get()->pluck('name', 'id')";

export interface DataQueryCommandOptions {
  validator?: QueryValidator;
  /** Passed to the executor, e.g. a fixed clock for today() */
  executor?: Omit<QueryExecutorOptions, 'validator' | 'logger'>;
  logger?: Logger;
}

/**
 * Runs a read-only method chain against one entity type, e.g.
 * `where('status', 'active')->orderBy('name')->get()`.
 */
export class DataQueryCommand extends BaseCommand {
  readonly descriptor: CommandDescriptor;
  private readonly validator: QueryValidator;
  private readonly executor: QueryExecutor;

  constructor(
    private readonly entities: EntityTypeResolver,
    options: DataQueryCommandOptions = {},
  ) {
    super();
    const logger = options.logger ?? createLogger('DataQuery');
    this.validator = options.validator ?? new QueryValidator({ logger });
    this.executor = new QueryExecutor(entities, { ...options.executor, validator: this.validator, logger });

    this.descriptor = {
      name: 'data:query',
      displayName: 'Data Query Runner',
      description: 'Run read-only queries for data exploration and analysis. Only read-only query methods are allowed.',
      category: 'Data Exploration',
      riskLevel: 'low',
      options: [
        {
          key: 'entity',
          label: 'Entity Type',
          kind: 'choice',
          required: true,
          resolveChoices: () => this.entities.list().map((entity) => ({ value: entity.name, label: entity.label })),
          help: 'Entity type to query',
        },
        {
          key: 'query',
          label: 'Query',
          kind: 'long_text',
          required: true,
          placeholder: DATA_QUERY_PLACEHOLDER,
          help: "Method chain without the entity prefix, e.g. where('status', 'active')->count()",
        },
      ],
    };
  }

  override validate(options: OptionValues, schema?: readonly OptionDefinition[]): void {
    super.validate(options, schema);

    const entity = String(options.entity);
    if (!this.entities.resolve(entity)) {
      throw QueryExecutionError.unknownEntityType(entity);
    }
    this.validator.assertSafe(String(options.query));
  }

  async execute(options: OptionValues): Promise<CommandResult> {
    const entity = String(options.entity);
    const query = String(options.query);

    const lines = [`📋 Entity: ${entity}`, `📋 Query: ${query}`, '', `Executing: ${entity}::${query}`, LIGHT_RULE];

    const outcome = this.executor.run(entity, query);
    if (!outcome.ok) {
      return { output: `${lines.join('\n')}\n`, exitCode: outcome.exitCode, error: outcome.errorMessage };
    }

    lines.push('✅ Query executed successfully', '', 'Results:', LIGHT_RULE, formatResult(outcome.value));
    return { output: `${lines.join('\n')}\n`, exitCode: 0 };
  }
}
