// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// ============================================================================
// Time Utilities
// ============================================================================

export function now(): number {
  return Date.now();
}

/**
 * "2026-03-01 14:05:09 UTC"
 */
export function formatDisplayTimestamp(timestamp: number): string {
  return `${new Date(timestamp).toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function elapsedSeconds(startedAt: number, finishedAt: number = now()): number {
  return Math.round(Math.max(0, finishedAt - startedAt)) / 1000;
}

export const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Number Utilities
// ============================================================================

const NUMERIC_STRING = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Finite numbers and strings written as a decimal number (surrounding
 * whitespace allowed).
 */
export function isNumeric(value: unknown): value is number | string {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (typeof value !== 'string') {
    return false;
  }
  const trimmed = value.trim();
  return NUMERIC_STRING.test(trimmed) && Number.isFinite(Number(trimmed));
}

export function toNumber(value: number | string): number {
  return typeof value === 'number' ? value : Number(value.trim());
}

// ============================================================================
// Object Utilities
// ============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Freeze an object graph of plain objects and arrays. Functions are kept by
 * reference and left unfrozen.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
  return Object.freeze(value);
}
