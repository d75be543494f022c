// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  DAY_MS,
  formatDisplayTimestamp,
  isNumeric,
  now as systemNow,
  toNumber,
  type AuditLogStore,
  type CommandDescriptor,
  type CommandResult,
  type OptionValue,
  type OptionValues,
} from '@opsdeck/shared';
import { BaseCommand } from '../command.js';
import { parseRules } from '../options.js';

const DEFAULT_RETENTION_DAYS = 90;

function isChecked(value: OptionValue | undefined): boolean {
  if (typeof value === 'string') {
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
  }
  return value === true || value === 1;
}

export interface AuditPruneCommandOptions {
  /** Default for the days option, usually databaseLogging.keepLogsForDays */
  retentionDays?: number;
  now?: () => number;
}

/**
 * Removes execution log entries older than a number of days. Runs as a dry
 * run unless told otherwise.
 */
export class AuditPruneCommand extends BaseCommand {
  readonly descriptor: CommandDescriptor;
  private readonly retentionDays: number;
  private readonly now: () => number;

  constructor(
    private readonly store: AuditLogStore,
    options: AuditPruneCommandOptions = {},
  ) {
    super();
    this.retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS;
    this.now = options.now ?? systemNow;

    this.descriptor = {
      name: 'audit:prune',
      displayName: 'Prune Execution Log',
      description: 'Delete execution log entries older than the given number of days',
      category: 'Maintenance',
      riskLevel: 'medium',
      explicitConfirmation: true,
      options: [
        {
          key: 'days',
          label: 'Keep Entries Newer Than (Days)',
          kind: 'text',
          numeric: true,
          default: String(this.retentionDays),
          rules: parseRules('integer|min:1|max:3650'),
          help: 'Entries older than this many days are removed',
        },
        {
          key: 'dry_run',
          label: 'Dry Run (Preview Only)',
          kind: 'boolean',
          default: true,
          help: 'Count the entries without deleting them',
        },
      ],
    };
  }

  async execute(options: OptionValues): Promise<CommandResult> {
    const days = isNumeric(options.days) ? toNumber(options.days) : this.retentionDays;
    const dryRun = isChecked(options.dry_run);
    const cutoff = this.now() - days * DAY_MS;

    const lines = ['📊 Execution log cleanup'];
    if (dryRun) {
      lines.push('🔍 DRY RUN - no entries will be deleted');
    }
    lines.push(`Entries older than ${days} days (before ${formatDisplayTimestamp(cutoff)})`);

    if (dryRun) {
      lines.push(`Would delete: ${this.store.countOlderThan(cutoff)} entries`);
    } else {
      lines.push(`✅ Deleted: ${this.store.deleteOlderThan(cutoff)} entries`);
    }

    return { output: `${lines.join('\n')}\n`, exitCode: 0 };
  }
}
