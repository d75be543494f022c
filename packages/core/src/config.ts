// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { readFile } from 'node:fs/promises';
import { EnvironmentRestrictionsSchema, ValidationError, errorMessage, isNumeric, toNumber } from '@opsdeck/shared';
import { z } from 'zod';

// ============================================================================
// Runner Configuration
// ============================================================================

export const DEFAULT_ENVIRONMENT_RESTRICTIONS = {
  production: { allowedRiskLevels: ['low'], disableUnlessConfirmed: true },
  staging: { allowedRiskLevels: ['low', 'medium'], disableUnlessConfirmed: false },
} satisfies z.input<typeof EnvironmentRestrictionsSchema>;

export const RunnerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  environment: z.string().min(1).default('production'),
  maxExecutionTimeSeconds: z.number().positive().default(300),
  logExecutions: z.boolean().default(true),
  /** Enable map by command name; false keeps a command out of the registry */
  commands: z.record(z.string(), z.boolean()).default({}),
  autoDiscovery: z
    .object({
      enabled: z.boolean().default(false),
      directory: z.string().min(1).optional(),
      /** Whether discovered commands missing from the enable map register */
      defaultEnabled: z.boolean().default(false),
    })
    .default({}),
  environmentRestrictions: EnvironmentRestrictionsSchema.default(DEFAULT_ENVIRONMENT_RESTRICTIONS),
  databaseLogging: z
    .object({
      enabled: z.boolean().default(true),
      path: z.string().min(1).optional(),
      keepLogsForDays: z.number().int().positive().default(90),
    })
    .default({}),
});

export type RunnerConfig = z.output<typeof RunnerConfigSchema>;
export type RunnerConfigInput = z.input<typeof RunnerConfigSchema>;

const PartialConfigSchema = RunnerConfigSchema.partial();

// ============================================================================
// Environment Variables
// ============================================================================

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off', '']);

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw ValidationError.invalid(name, `'${raw}' is not a boolean`);
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  if (!isNumeric(raw)) {
    throw ValidationError.invalid(name, `'${raw}' is not a number`);
  }
  return toNumber(raw);
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/** Shallow merge where undefined never replaces a value. */
function mergeDefined(...layers: Array<object | undefined>): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

function configFromEnv(env: NodeJS.ProcessEnv): RunnerConfigInput {
  return {
    enabled: readBoolean(env, 'OPSDECK_ENABLED'),
    environment: readString(env, 'OPSDECK_ENV') ?? readString(env, 'NODE_ENV'),
    maxExecutionTimeSeconds: readNumber(env, 'OPSDECK_MAX_EXECUTION_TIME'),
    logExecutions: readBoolean(env, 'OPSDECK_LOG_EXECUTIONS'),
    databaseLogging: {
      enabled: readBoolean(env, 'OPSDECK_DB_LOGGING'),
      path: readString(env, 'OPSDECK_DB_PATH'),
    },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

function resolveConfig(env: NodeJS.ProcessEnv, base: RunnerConfigInput, overrides: RunnerConfigInput): RunnerConfig {
  const fromEnv = configFromEnv(env);
  const parsed = RunnerConfigSchema.safeParse({
    ...mergeDefined(base, fromEnv, overrides),
    databaseLogging: mergeDefined(base.databaseLogging, fromEnv.databaseLogging, overrides.databaseLogging),
  });
  if (!parsed.success) {
    throw ValidationError.invalid('config', formatIssues(parsed.error));
  }
  return parsed.data;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Build the runner configuration. Explicit overrides win over environment
 * variables, which win over the defaults.
 *
 * @throws ValidationError when a value is out of range or malformed
 */
export function loadConfig(overrides: RunnerConfigInput = {}, env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  return resolveConfig(env, {}, overrides);
}

/**
 * Load the configuration from a JSON file. Environment variables win over
 * the file and overrides win over both.
 */
export async function loadConfigFile(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
  overrides: RunnerConfigInput = {},
): Promise<RunnerConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw ValidationError.invalid('config', `could not read ${path}: ${errorMessage(error)}`);
  }

  const parsed = PartialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw ValidationError.invalid('config', formatIssues(parsed.error));
  }
  return resolveConfig(env, parsed.data, overrides);
}
