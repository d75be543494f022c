import { describe, expect, it } from 'vitest';
import { deepFreeze, elapsedSeconds, formatDisplayTimestamp, isNumeric, toNumber } from './index.js';

describe('isNumeric', () => {
  it('accepts finite numbers and decimal strings', () => {
    expect(isNumeric(12)).toBe(true);
    expect(isNumeric('12')).toBe(true);
    expect(isNumeric(' 3.5 ')).toBe(true);
    expect(isNumeric('-.5')).toBe(true);
    expect(isNumeric('1e3')).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isNumeric('abc')).toBe(false);
    expect(isNumeric('')).toBe(false);
    expect(isNumeric('12px')).toBe(false);
    expect(isNumeric(Number.NaN)).toBe(false);
    expect(isNumeric(Number.POSITIVE_INFINITY)).toBe(false);
    expect(isNumeric(true)).toBe(false);
    expect(isNumeric(null)).toBe(false);
  });

  it('converts trimmed strings', () => {
    expect(toNumber(' 42 ')).toBe(42);
    expect(toNumber(7)).toBe(7);
  });
});

describe('time helpers', () => {
  it('formats display timestamps in UTC', () => {
    expect(formatDisplayTimestamp(Date.UTC(2026, 2, 1, 14, 5, 9, 750))).toBe('2026-03-01 14:05:09 UTC');
  });

  it('reports elapsed seconds, never negative', () => {
    expect(elapsedSeconds(1000, 1250)).toBe(0.25);
    expect(elapsedSeconds(2000, 1000)).toBe(0);
  });
});

describe('deepFreeze', () => {
  it('freezes nested objects and arrays but not functions', () => {
    const resolve = () => [];
    const value = deepFreeze({ options: [{ key: 'days', rules: [{ name: 'min' }] }], resolve });

    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.options)).toBe(true);
    expect(Object.isFrozen(value.options[0].rules[0])).toBe(true);
    expect(Object.isFrozen(resolve)).toBe(false);
  });
});
