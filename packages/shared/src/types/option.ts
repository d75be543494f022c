// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';

// ============================================================================
// Option Values
// ============================================================================

export const OptionValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type OptionValue = z.infer<typeof OptionValueSchema>;

/** Values supplied for a command, keyed by option key. */
export type OptionValues = Record<string, OptionValue | undefined>;

export const OptionValuesSchema = z.record(OptionValueSchema.optional());

// ============================================================================
// Option Kinds
// ============================================================================

export const OptionKindSchema = z.enum(['text', 'long_text', 'choice', 'boolean']);
export type OptionKind = z.infer<typeof OptionKindSchema>;

// ============================================================================
// Validation Rules
// ============================================================================

export const OptionRuleNameSchema = z.enum(['integer', 'numeric', 'min', 'max']);
export type OptionRuleName = z.infer<typeof OptionRuleNameSchema>;

export const OptionRuleSchema = z
  .object({
    name: OptionRuleNameSchema,
    arg: z.number().int().optional(),
  })
  .refine((rule) => (rule.name === 'min' || rule.name === 'max' ? rule.arg !== undefined : true), {
    message: 'min and max rules need an integer argument',
  });

export type OptionRule = z.infer<typeof OptionRuleSchema>;

// ============================================================================
// Choices
// ============================================================================

export const ChoiceOptionSchema = z.object({
  value: z.string(),
  label: z.string(),
});

export type ChoiceOption = z.infer<typeof ChoiceOptionSchema>;

/**
 * Supplies choices computed by the host application (for example the
 * queryable entity types). Called whenever the choices are needed.
 */
export type ChoiceResolver = () => ChoiceOption[];

// ============================================================================
// Option Definitions
// ============================================================================

export const OptionDefinitionSchema = z
  .object({
    /** Key under which the value is supplied */
    key: z.string().min(1).max(64),
    /** Form label */
    label: z.string().min(1),
    kind: OptionKindSchema,
    required: z.boolean().default(false),
    default: OptionValueSchema.optional(),
    /** Render as a numeric input */
    numeric: z.boolean().default(false),
    /** Static choices, in display order */
    choices: z.array(ChoiceOptionSchema).optional(),
    resolveChoices: z.custom<ChoiceResolver>((value) => typeof value === 'function').optional(),
    rules: z.array(OptionRuleSchema).default([]),
    help: z.string().optional(),
    placeholder: z.string().optional(),
  })
  .refine(
    (option) =>
      option.kind !== 'choice' ||
      (option.choices !== undefined && option.choices.length > 0) ||
      option.resolveChoices !== undefined,
    { message: 'choice options need static choices or a choice resolver' },
  );

export type OptionDefinition = z.input<typeof OptionDefinitionSchema>;
export type NormalizedOptionDefinition = z.output<typeof OptionDefinitionSchema>;
