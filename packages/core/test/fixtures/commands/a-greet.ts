import type { CommandDescriptor, CommandResult, OptionValues } from '@opsdeck/shared';
import { BaseCommand } from '../../../src/command.js';

export default class GreetCommand extends BaseCommand {
  readonly descriptor: CommandDescriptor = {
    name: 'fixture:greet',
    displayName: 'Greet',
    description: 'Says hello',
    category: 'Fixtures',
    riskLevel: 'low',
    options: [{ key: 'name', label: 'Name', kind: 'text', default: 'world' }],
  };

  async execute(options: OptionValues): Promise<CommandResult> {
    return { output: `Hello, ${String(options.name)}\n`, exitCode: 0 };
  }
}
