// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { createLogger, errorMessage, isPlainObject, isRunnableCommand, type Logger, type RunnableCommand } from '@opsdeck/shared';

const MODULE_EXTENSIONS = new Set(['.js', '.mjs', '.ts']);

export interface DiscoveryOptions {
  logger?: Logger;
}

function isCommandModule(fileName: string): boolean {
  return MODULE_EXTENSIONS.has(extname(fileName)) && !fileName.endsWith('.d.ts');
}

/**
 * Pull a command out of a module namespace: the default export or a named
 * `command` export, either a command object or a class that constructs one
 * without arguments.
 */
function extractCommand(namespace: unknown): RunnableCommand | undefined {
  if (!isPlainObject(namespace)) {
    return undefined;
  }

  for (const candidate of [namespace.default, namespace.command]) {
    if (isRunnableCommand(candidate)) {
      return candidate;
    }
    if (typeof candidate === 'function' && candidate.length === 0) {
      const instance: unknown = Reflect.construct(candidate, []);
      if (isRunnableCommand(instance)) {
        return instance;
      }
    }
  }
  return undefined;
}

/**
 * Load command modules from a directory, in file name order. Modules that
 * fail to import or export no command are logged and skipped.
 */
export async function discoverCommands(directory: string, options: DiscoveryOptions = {}): Promise<RunnableCommand[]> {
  const logger = options.logger ?? createLogger('CommandDiscovery');

  if (!existsSync(directory)) {
    logger.warn('Command directory does not exist', { directory });
    return [];
  }

  const entries = await readdir(directory, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && isCommandModule(entry.name))
    .map((entry) => entry.name)
    .sort();

  const commands: RunnableCommand[] = [];
  for (const file of files) {
    const path = join(directory, file);
    try {
      const namespace: unknown = await import(pathToFileURL(path).href);
      const command = extractCommand(namespace);
      if (!command) {
        logger.warn('Module exports no command', { file: path });
        continue;
      }
      commands.push(command);
      logger.debug('Discovered command module', { file: path });
    } catch (error) {
      logger.error('Failed to load command module', { file: path, error: errorMessage(error) });
    }
  }

  return commands;
}
