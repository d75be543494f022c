// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// Database
export { DatabaseConnection, getDefaultDatabasePath, type DatabaseOptions } from './database.js';

// Repositories
export {
  CommandExecutionRepository,
  type CommandExecution,
  type ExecutionLogFilter,
} from './repositories/command-execution.js';

// Entities
export { SqliteEntityCatalog, humanizeTableName, type EntityCatalogOptions } from './entities/catalog.js';
export { SqliteQuerySource, quoteIdentifier } from './entities/sqlite-source.js';

import { DatabaseConnection, type DatabaseOptions } from './database.js';
import { CommandExecutionRepository } from './repositories/command-execution.js';
import { SqliteEntityCatalog, type EntityCatalogOptions } from './entities/catalog.js';

export interface Repositories {
  executions: CommandExecutionRepository;
  entities: SqliteEntityCatalog;
  db: DatabaseConnection;
}

/**
 * Create the repositories over one database connection. The entity catalog
 * sees the same database, so the execution log itself is queryable.
 */
export function createRepositories(options?: DatabaseOptions, catalog?: EntityCatalogOptions): Repositories {
  const db = new DatabaseConnection(options);

  return {
    executions: new CommandExecutionRepository(db),
    entities: new SqliteEntityCatalog(db.instance, catalog),
    db,
  };
}
