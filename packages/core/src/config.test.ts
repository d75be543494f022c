// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '@opsdeck/shared';
import { loadConfig, loadConfigFile } from './config.js';

describe('loadConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadConfig({}, {})).toEqual({
      enabled: true,
      environment: 'production',
      maxExecutionTimeSeconds: 300,
      logExecutions: true,
      commands: {},
      autoDiscovery: { enabled: false, defaultEnabled: false },
      environmentRestrictions: {
        production: { allowedRiskLevels: ['low'], disableUnlessConfirmed: true },
        staging: { allowedRiskLevels: ['low', 'medium'], disableUnlessConfirmed: false },
      },
      databaseLogging: { enabled: true, keepLogsForDays: 90 },
    });
  });

  it('reads environment variables', () => {
    const config = loadConfig(
      {},
      {
        OPSDECK_ENV: 'staging',
        OPSDECK_ENABLED: 'false',
        OPSDECK_MAX_EXECUTION_TIME: '60',
        OPSDECK_LOG_EXECUTIONS: '0',
        OPSDECK_DB_LOGGING: 'off',
        OPSDECK_DB_PATH: '/tmp/opsdeck-test.db',
      },
    );

    expect(config.environment).toBe('staging');
    expect(config.enabled).toBe(false);
    expect(config.maxExecutionTimeSeconds).toBe(60);
    expect(config.logExecutions).toBe(false);
    expect(config.databaseLogging).toEqual({ enabled: false, path: '/tmp/opsdeck-test.db', keepLogsForDays: 90 });
  });

  it('uses NODE_ENV when OPSDECK_ENV is not set', () => {
    expect(loadConfig({}, { NODE_ENV: 'development' }).environment).toBe('development');
    expect(loadConfig({}, { NODE_ENV: 'development', OPSDECK_ENV: 'staging' }).environment).toBe('staging');
  });

  it('lets explicit overrides win over environment variables', () => {
    const config = loadConfig(
      { environment: 'local', databaseLogging: { keepLogsForDays: 30 } },
      { OPSDECK_ENV: 'staging', OPSDECK_DB_PATH: '/tmp/opsdeck-test.db' },
    );

    expect(config.environment).toBe('local');
    expect(config.databaseLogging).toEqual({ enabled: true, path: '/tmp/opsdeck-test.db', keepLogsForDays: 30 });
  });

  it('ignores overrides left undefined', () => {
    expect(loadConfig({ environment: undefined }, { OPSDECK_ENV: 'staging' }).environment).toBe('staging');
  });

  it('rejects malformed environment variables', () => {
    expect(() => loadConfig({}, { OPSDECK_ENABLED: 'maybe' })).toThrowError(
      "Invalid OPSDECK_ENABLED: 'maybe' is not a boolean",
    );
    expect(() => loadConfig({}, { OPSDECK_MAX_EXECUTION_TIME: 'soon' })).toThrowError(
      "Invalid OPSDECK_MAX_EXECUTION_TIME: 'soon' is not a number",
    );
  });

  it('rejects out of range values', () => {
    expect(() => loadConfig({ maxExecutionTimeSeconds: -5 }, {})).toThrowError(ValidationError);
    expect(() => loadConfig({ maxExecutionTimeSeconds: -5 }, {})).toThrowError(
      'Invalid config: maxExecutionTimeSeconds: Number must be greater than 0',
    );
  });
});

describe('loadConfigFile', () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'opsdeck-config-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const path = join(directory, 'opsdeck.json');
    writeFileSync(path, content);
    return path;
  }

  it('reads a JSON file and fills the rest with defaults', async () => {
    const path = writeConfig(
      JSON.stringify({
        environment: 'staging',
        commands: { 'audit:prune': false },
        databaseLogging: { keepLogsForDays: 14 },
      }),
    );

    const config = await loadConfigFile(path, { OPSDECK_DB_PATH: '/tmp/opsdeck-test.db' });

    expect(config.environment).toBe('staging');
    expect(config.commands).toEqual({ 'audit:prune': false });
    expect(config.maxExecutionTimeSeconds).toBe(300);
    expect(config.databaseLogging).toEqual({ enabled: true, path: '/tmp/opsdeck-test.db', keepLogsForDays: 14 });
  });

  it('lets environment variables win over the file', async () => {
    const path = writeConfig(JSON.stringify({ environment: 'staging' }));

    expect((await loadConfigFile(path, { OPSDECK_ENV: 'production' })).environment).toBe('production');
    expect((await loadConfigFile(path, { OPSDECK_ENV: 'production' }, { environment: 'local' })).environment).toBe(
      'local',
    );
  });

  it('rejects invalid JSON', async () => {
    const path = writeConfig('{ not json');
    await expect(loadConfigFile(path, {})).rejects.toThrowError(/^Invalid config: could not read /);
  });

  it('rejects invalid values in the file', async () => {
    const path = writeConfig(JSON.stringify({ enabled: 'yes' }));
    await expect(loadConfigFile(path, {})).rejects.toThrowError('Invalid config: enabled: Expected boolean, received string');
  });
});
