// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { formatDisplayTimestamp, type OptionValues, type UserIdentity } from '@opsdeck/shared';

export const RULE_WIDTH = 60;

const HEAVY_RULE = '═'.repeat(RULE_WIDTH);
export const LIGHT_RULE = '─'.repeat(RULE_WIDTH);

// ============================================================================
// Result Values
// ============================================================================

/**
 * Render a query result for plain-text output.
 */
export function formatResult(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'number' || typeof value === 'string') {
    return String(value);
  }
  return JSON.stringify(value, null, 4) ?? String(value);
}

// ============================================================================
// Execution Header & Footer
// ============================================================================

export interface ExecutionHeaderInput {
  commandName: string;
  user: UserIdentity;
  environment: string;
  startedAt: number;
  options?: OptionValues;
}

export interface ExecutionFooterInput {
  completedAt: number;
  elapsedSeconds: number;
  exitCode: number;
  /** Set when the execution failed with an error */
  error?: string;
}

function boxed(title: string, innerWidth: number): string {
  const space = Math.max(0, innerWidth - title.length);
  const left = Math.floor(space / 2);
  const right = space - left;
  return [
    `╭${'─'.repeat(innerWidth)}╮`,
    `│${' '.repeat(left)}${title}${' '.repeat(right)}│`,
    `╰${'─'.repeat(innerWidth)}╯`,
  ].join('\n');
}

export function formatExecutionHeader(input: ExecutionHeaderInput): string {
  const lines = [
    boxed('COMMAND EXECUTION', 53),
    '',
    `Command: ${input.commandName}`,
    `User: ${input.user.name}`,
    `Started: ${formatDisplayTimestamp(input.startedAt)}`,
    `Environment: ${input.environment}`,
  ];

  const supplied = Object.entries(input.options ?? {}).filter(([, value]) => value !== undefined);
  if (supplied.length > 0) {
    lines.push('Options:');
    for (const [key, value] of supplied) {
      lines.push(`  - ${key}: ${formatResult(value)}`);
    }
  }

  lines.push(HEAVY_RULE, '');
  return `${lines.join('\n')}\n`;
}

export function formatExecutionFooter(input: ExecutionFooterInput): string {
  const lines = ['', HEAVY_RULE];

  if (input.error !== undefined) {
    lines.push('❌ EXECUTION ERROR', `Error: ${input.error}`);
  } else {
    lines.push(
      `Completed: ${formatDisplayTimestamp(input.completedAt)}`,
      `Duration: ${input.elapsedSeconds}s`,
      `Exit Code: ${input.exitCode}`,
      `Status: ${input.exitCode === 0 ? '✅ SUCCESS' : '❌ FAILED'}`,
    );
  }

  return `${lines.join('\n')}\n`;
}

// ============================================================================
// Sections & Tables
// ============================================================================

export function createSectionHeader(title: string): string {
  return `\n${boxed(title, RULE_WIDTH - 2)}\n`;
}

export function createTable(headers: readonly string[], rows: ReadonlyArray<readonly unknown[]>): string {
  const cells = rows.map((row) => headers.map((_, index) => formatCell(row[index])));
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...cells.map((row) => row[index].length)),
  );

  const border = (left: string, middle: string, right: string) =>
    `${left}${widths.map((width) => '─'.repeat(width + 2)).join(middle)}${right}`;
  const line = (values: readonly string[]) =>
    `│${values.map((value, index) => ` ${value.padEnd(widths[index])} `).join('│')}│`;

  return [
    border('┌', '┬', '┐'),
    line(headers),
    border('├', '┼', '┤'),
    ...cells.map(line),
    border('└', '┴', '┘'),
  ].join('\n');
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

// ============================================================================
// Plain Text
// ============================================================================

const ANSI_SEQUENCE = /\u001b\[[0-9;]*m/g;
// Status markers and the section markers commands print, with a following space
const OUTPUT_MARKERS = /[\u2705\u274C\u26A0\u2139\u{1F4CA}\u{1F4CB}\u{1F50D}]\uFE0F? ?/gu;

/**
 * Remove ANSI styling and emoji markers so output can be stored as plain text.
 */
export function stripFormatting(output: string): string {
  return output.replace(ANSI_SEQUENCE, '').replace(OUTPUT_MARKERS, '').trim();
}
