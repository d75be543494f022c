// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import {
  OptionRuleSchema,
  ValidationError,
  isNumeric,
  toNumber,
  type ChoiceOption,
  type OptionDefinition,
  type OptionRule,
  type OptionValue,
  type OptionValues,
} from '@opsdeck/shared';

// ============================================================================
// Option Validation
// ============================================================================

/**
 * Absent, null, blank text and an unchecked box all count as "not supplied".
 */
export function isEmptyValue(value: OptionValue | undefined): boolean {
  if (value === undefined || value === null || value === false) {
    return true;
  }
  return typeof value === 'string' && value.trim() === '';
}

export function satisfiesRule(value: OptionValue, rule: OptionRule): boolean {
  switch (rule.name) {
    case 'integer':
      return isNumeric(value) && Number.isInteger(toNumber(value));
    case 'numeric':
      return isNumeric(value);
    case 'min':
      return rule.arg === undefined || !isNumeric(value) || toNumber(value) >= rule.arg;
    case 'max':
      return rule.arg === undefined || !isNumeric(value) || toNumber(value) <= rule.arg;
  }
}

/**
 * Static choices, or the resolver's current list.
 */
export function resolveChoices(option: OptionDefinition): ChoiceOption[] {
  return option.resolveChoices ? option.resolveChoices() : (option.choices ?? []);
}

/**
 * Check supplied values against an option schema. Options are checked in
 * schema order and rules in declared order; the first failure is thrown.
 *
 * @throws ValidationError
 */
export function validateOptions(values: OptionValues, schema: readonly OptionDefinition[]): void {
  for (const option of schema) {
    const value = values[option.key];

    if (value === undefined || isEmptyValue(value)) {
      if (option.required) {
        throw ValidationError.missingRequired(option.key, option.label);
      }
      continue;
    }

    for (const rule of option.rules ?? []) {
      if (!satisfiesRule(value, rule)) {
        throw ValidationError.ruleViolation(option.key, rule);
      }
    }

    // Resolved choices are left to the command that supplies the resolver
    if (option.kind === 'choice' && option.choices && !option.resolveChoices) {
      const supplied = String(value);
      if (!option.choices.some((choice) => choice.value === supplied)) {
        throw ValidationError.invalid(option.key, `'${supplied}' is not one of the available choices`);
      }
    }
  }
}

/**
 * Fill schema defaults for absent keys and drop keys the schema does not
 * declare.
 */
export function applyDefaults(values: OptionValues, schema: readonly OptionDefinition[]): OptionValues {
  const result: OptionValues = {};
  for (const option of schema) {
    const value = values[option.key];
    if (value !== undefined) {
      result[option.key] = value;
    } else if (option.default !== undefined) {
      result[option.key] = option.default;
    }
  }
  return result;
}

// ============================================================================
// Rule Notation
// ============================================================================

/**
 * Parse compact rule notation such as "integer|min:1|max:365".
 *
 * @throws ValidationError for unknown rules or bad arguments
 */
export function parseRules(notation: string): OptionRule[] {
  return notation
    .split('|')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const [name, arg] = part.split(':', 2);
      const parsed = OptionRuleSchema.safeParse({
        name: name.trim(),
        arg: arg === undefined ? undefined : Number(arg.trim()),
      });
      if (!parsed.success) {
        throw ValidationError.invalid('rules', `"${part}" is not a supported rule`);
      }
      return parsed.data;
    });
}
