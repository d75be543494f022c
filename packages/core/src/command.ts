// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type {
  CommandContext,
  CommandDescriptor,
  CommandResult,
  OptionDefinition,
  OptionValues,
  RunnableCommand,
} from '@opsdeck/shared';
import { validateOptions } from './options.js';

/**
 * Base class for commands. validate() runs the option schema; subclasses
 * that add checks override it and call super.validate() first.
 */
export abstract class BaseCommand implements RunnableCommand {
  abstract readonly descriptor: CommandDescriptor;

  validate(options: OptionValues, schema: readonly OptionDefinition[] = this.descriptor.options ?? []): void {
    validateOptions(options, schema);
  }

  abstract execute(options: OptionValues, context: CommandContext): Promise<CommandResult>;
}
