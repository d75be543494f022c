// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { describe, it, expect, vi } from 'vitest';
import { DAY_MS, silentLogger } from '@opsdeck/shared';
import { applyDefaults } from '../options.js';
import { CommandRegistry } from '../registry.js';
import { AuditPruneCommand } from './audit-prune.js';

const NOW = Date.UTC(2026, 2, 31, 12, 0, 0);

function setup(retentionDays?: number) {
  const store = { countOlderThan: vi.fn(() => 4), deleteOlderThan: vi.fn(() => 3) };
  const command = new AuditPruneCommand(store, { retentionDays, now: () => NOW });
  return { store, command };
}

describe('AuditPruneCommand', () => {
  it('is a confirmed maintenance command', () => {
    const registry = new CommandRegistry({ logger: silentLogger });
    const { command } = setup();

    const registered = registry.register(command);

    expect(registered.descriptor.riskLevel).toBe('medium');
    expect(registered.descriptor.explicitConfirmation).toBe(true);
    expect(applyDefaults({}, registered.descriptor.options)).toEqual({ days: '90', dry_run: true });
  });

  it('takes its default window from the configured retention', async () => {
    const registry = new CommandRegistry({ logger: silentLogger });
    const { command, store } = setup(14);

    const registered = registry.register(command);
    const result = await command.execute(applyDefaults({}, registered.descriptor.options));

    expect(registered.descriptor.options[0].default).toBe('14');
    expect(result.output).toContain('Entries older than 14 days (before 2026-03-17 12:00:00 UTC)');
    expect(store.countOlderThan).toHaveBeenCalledWith(NOW - 14 * DAY_MS);
  });

  it('validates the retention window', () => {
    const { command } = setup();

    expect(() => command.validate({ days: '0' })).toThrowError("Option 'days' must be at least 1");
    expect(() => command.validate({ days: '5000' })).toThrowError("Option 'days' must not exceed 3650");
    expect(() => command.validate({ days: '1.5' })).toThrowError("Option 'days' must be an integer");
    expect(() => command.validate({ days: '30', dry_run: false })).not.toThrow();
  });

  it('only counts on a dry run', async () => {
    const { command, store } = setup();

    const result = await command.execute({ days: '30', dry_run: true });

    expect(result).toEqual({
      output: [
        '📊 Execution log cleanup',
        '🔍 DRY RUN - no entries will be deleted',
        'Entries older than 30 days (before 2026-03-01 12:00:00 UTC)',
        'Would delete: 4 entries',
        '',
      ].join('\n'),
      exitCode: 0,
    });
    expect(store.countOlderThan).toHaveBeenCalledWith(NOW - 30 * DAY_MS);
    expect(store.deleteOlderThan).not.toHaveBeenCalled();
  });

  it('deletes when the dry run is switched off', async () => {
    const { command, store } = setup();

    const result = await command.execute({ days: 30, dry_run: 'false' });

    expect(result.output).toBe(
      [
        '📊 Execution log cleanup',
        'Entries older than 30 days (before 2026-03-01 12:00:00 UTC)',
        '✅ Deleted: 3 entries',
        '',
      ].join('\n'),
    );
    expect(store.deleteOlderThan).toHaveBeenCalledWith(NOW - 30 * DAY_MS);
  });
});
