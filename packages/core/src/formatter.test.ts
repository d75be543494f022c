// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { describe, it, expect } from 'vitest';
import {
  createSectionHeader,
  createTable,
  formatExecutionFooter,
  formatExecutionHeader,
  formatResult,
  stripFormatting,
} from './formatter.js';

const STARTED_AT = Date.UTC(2026, 2, 1, 14, 5, 9);
const HEAVY = '═'.repeat(60);

describe('formatResult', () => {
  it('renders scalars', () => {
    expect(formatResult(null)).toBe('NULL');
    expect(formatResult(undefined)).toBe('NULL');
    expect(formatResult(true)).toBe('true');
    expect(formatResult(false)).toBe('false');
    expect(formatResult(42)).toBe('42');
    expect(formatResult('alpha')).toBe('alpha');
  });

  it('pretty-prints collections with four spaces', () => {
    expect(formatResult([1, 2])).toBe('[\n    1,\n    2\n]');
    expect(formatResult({ id: 1, name: 'alpha' })).toBe('{\n    "id": 1,\n    "name": "alpha"\n}');
  });
});

describe('formatExecutionHeader', () => {
  it('lists the command, user, start time and supplied options', () => {
    const header = formatExecutionHeader({
      commandName: 'data:query',
      user: { name: 'Tester' },
      environment: 'staging',
      startedAt: STARTED_AT,
      options: { entity: 'members', limit: undefined, dry_run: false },
    });

    expect(header.split('\n')).toEqual([
      `╭${'─'.repeat(53)}╮`,
      `│${' '.repeat(18)}COMMAND EXECUTION${' '.repeat(18)}│`,
      `╰${'─'.repeat(53)}╯`,
      '',
      'Command: data:query',
      'User: Tester',
      'Started: 2026-03-01 14:05:09 UTC',
      'Environment: staging',
      'Options:',
      '  - entity: members',
      '  - dry_run: false',
      HEAVY,
      '',
      '',
    ]);
  });

  it('omits the options block when nothing was supplied', () => {
    const header = formatExecutionHeader({
      commandName: 'cache:clear',
      user: { name: 'Tester' },
      environment: 'local',
      startedAt: STARTED_AT,
    });
    expect(header).not.toContain('Options:');
  });
});

describe('formatExecutionFooter', () => {
  it('reports completion details on success', () => {
    expect(
      formatExecutionFooter({ completedAt: STARTED_AT + 1500, elapsedSeconds: 1.5, exitCode: 0 }),
    ).toBe(
      `\n${HEAVY}\nCompleted: 2026-03-01 14:05:10 UTC\nDuration: 1.5s\nExit Code: 0\nStatus: ✅ SUCCESS\n`,
    );
  });

  it('marks a non-zero exit code as failed', () => {
    expect(formatExecutionFooter({ completedAt: STARTED_AT, elapsedSeconds: 0, exitCode: 2 })).toContain(
      'Status: ❌ FAILED',
    );
  });

  it('shows the error instead of completion details', () => {
    expect(
      formatExecutionFooter({ completedAt: STARTED_AT, elapsedSeconds: 0, exitCode: 1, error: 'boom' }),
    ).toBe(`\n${HEAVY}\n❌ EXECUTION ERROR\nError: boom\n`);
  });
});

describe('createSectionHeader', () => {
  it('centres the title in a box as wide as the rules', () => {
    expect(createSectionHeader('Results')).toBe(
      `\n╭${'─'.repeat(58)}╮\n│${' '.repeat(25)}Results${' '.repeat(26)}│\n╰${'─'.repeat(58)}╯\n`,
    );
  });
});

describe('createTable', () => {
  it('sizes columns to their widest cell', () => {
    expect(
      createTable(
        ['id', 'name'],
        [
          [1, 'alpha'],
          [22, null],
        ],
      ).split('\n'),
    ).toEqual([
      '┌────┬───────┐',
      '│ id │ name  │',
      '├────┼───────┤',
      '│ 1  │ alpha │',
      '│ 22 │       │',
      '└────┴───────┘',
    ]);
  });
});

describe('stripFormatting', () => {
  it('removes ANSI codes and emoji markers', () => {
    expect(stripFormatting('\u001b[32m✅ Done\u001b[0m\n')).toBe('Done');
    expect(stripFormatting('⚠️ careful')).toBe('careful');
  });

  it('removes the markers commands print before their lines', () => {
    expect(stripFormatting('📊 Execution log cleanup\n🔍 DRY RUN\n📋 Entity: members\n')).toBe(
      'Execution log cleanup\nDRY RUN\nEntity: members',
    );
  });

  it('keeps the rest of the text as it is', () => {
    expect(stripFormatting('Status: ❌ FAILED')).toBe('Status: FAILED');
    expect(stripFormatting('Price © 2026 → 10')).toBe('Price © 2026 → 10');
  });
});
