/**
 * Tests for configuration creation, merging, environment loading and validation
 */

import { describe, it, expect } from 'vitest';
import { AdapterRegistry, ConfigurationError } from '@tuplet/core';
import { MemoryGateway } from '@tuplet/memory';
import { createConfig, getConfigFromEnv, mergeConfigs } from '../config.js';
import { DEFAULT_ADAPTER, DEFAULT_CONFIG, DEFAULT_GATEWAY } from '../defaults.js';
import type { TupletConfig } from '../types.js';
import { validateConfig } from '../validation.js';

describe('DEFAULT_CONFIG', () => {
  it('has one memory gateway and info JSON logging', () => {
    expect(DEFAULT_CONFIG).toEqual({
      gateways: { default: { adapter: 'memory', args: [] } },
      logging: { level: 'info', format: 'json', enabled: true },
    });
    expect(DEFAULT_ADAPTER).toBe('memory');
    expect(DEFAULT_GATEWAY).toBe('default');
  });

  it('is deeply frozen', () => {
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG.gateways)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG.gateways.default)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG.gateways.default.args)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG.logging)).toBe(true);
  });
});

describe('createConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(createConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('adds gateways, defaulting their adapter and args', () => {
    const config = createConfig({ gateways: { archive: {} } });
    expect(config.gateways.archive).toEqual({ adapter: 'memory', args: [] });
    expect(Object.keys(config.gateways)).toEqual(['default', 'archive']);
  });

  it('merges overrides into an existing gateway', () => {
    const seed = { datasets: { users: [] } };
    const config = createConfig({ gateways: { default: { args: [seed] } } });
    expect(config.gateways.default).toEqual({ adapter: 'memory', args: [seed] });
  });

  it('merges logging field by field, skipping undefined', () => {
    const config = createConfig({ logging: { level: 'debug', format: undefined } });
    expect(config.logging).toEqual({ level: 'debug', format: 'json', enabled: true });
  });

  it('builds on a given base', () => {
    const base = createConfig({ logging: { format: 'pretty' } });
    const config = createConfig({ logging: { level: 'warn' } }, base);
    expect(config.logging).toEqual({ level: 'warn', format: 'pretty', enabled: true });
  });

  it('never shares args arrays with its input', () => {
    const args: unknown[] = ['a'];
    const config = createConfig({ gateways: { archive: { args } } });
    args.push('b');
    expect(config.gateways.archive.args).toEqual(['a']);
    expect(Object.isFrozen(config.gateways.archive.args)).toBe(true);
  });
});

describe('mergeConfigs', () => {
  it('lets later configurations win and skips empty ones', () => {
    const merged = mergeConfigs(
      { logging: { level: 'warn' }, gateways: { default: { adapter: 'memory' } } },
      null,
      { logging: { format: 'pretty', level: undefined } },
      undefined,
      { gateways: { default: { args: ['x'] }, archive: { adapter: 'memory' } } }
    );

    expect(merged).toEqual({
      logging: { level: 'warn', format: 'pretty' },
      gateways: {
        default: { adapter: 'memory', args: ['x'] },
        archive: { adapter: 'memory' },
      },
    });
  });

  it('returns an empty override set for nothing', () => {
    expect(mergeConfigs()).toEqual({});
  });
});

describe('getConfigFromEnv', () => {
  it('returns the defaults for an empty environment', () => {
    expect(getConfigFromEnv({ env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('reads logging and the default adapter', () => {
    const config = getConfigFromEnv({
      env: {
        TUPLET_LOGGING_LEVEL: 'warn',
        TUPLET_LOGGING_FORMAT: 'pretty',
        TUPLET_LOGGING_ENABLED: 'FALSE',
        TUPLET_DEFAULT_ADAPTER: 'sql',
      },
    });

    expect(config.logging).toEqual({ level: 'warn', format: 'pretty', enabled: false });
    expect(config.gateways.default).toEqual({ adapter: 'sql', args: [] });
  });

  it.each([
    ['true', true],
    ['True', true],
    ['1', true],
    ['0', false],
    ['no', false],
  ])('parses LOGGING_ENABLED=%s as %s', (value, expected) => {
    expect(getConfigFromEnv({ env: { TUPLET_LOGGING_ENABLED: value } }).logging.enabled).toBe(expected);
  });

  it('honours a custom prefix', () => {
    const config = getConfigFromEnv({
      prefix: 'myapp',
      env: { MYAPP_LOGGING_LEVEL: 'error', TUPLET_LOGGING_LEVEL: 'debug' },
    });
    expect(config.logging.level).toBe('error');
  });

  it('rejects unknown levels and formats', () => {
    try {
      getConfigFromEnv({ env: { TUPLET_LOGGING_LEVEL: 'loud' } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe('Invalid value "loud" for TUPLET_LOGGING_LEVEL');
        expect(error.suggestion).toBe('Use one of: debug, info, warn, error');
      }
    }

    expect(() => getConfigFromEnv({ env: { TUPLET_LOGGING_FORMAT: 'xml' } })).toThrow(
      'Invalid value "xml" for TUPLET_LOGGING_FORMAT'
    );
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('warns about debug logging and missing gateways', () => {
    const config = createConfig({ logging: { level: 'debug' } }, { ...DEFAULT_CONFIG, gateways: {} });
    const result = validateConfig(config);

    expect(result.valid).toBe(true);
    expect(result.warnings.map(warning => warning.path)).toEqual(['gateways', 'logging.level']);
  });

  it('does not warn about debug level when logging is off', () => {
    const config = createConfig({ logging: { level: 'debug', enabled: false } });
    expect(validateConfig(config).warnings).toEqual([]);
  });

  it('rejects connection strings as adapters', () => {
    const config = createConfig({ gateways: { default: { adapter: 'postgres://localhost/app' } } });
    const result = validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      expect.objectContaining({
        path: 'gateways.default.adapter',
        message: 'Adapter must be a bare identifier such as "memory"',
        value: 'postgres://localhost/app',
      }),
    ]);
  });

  it('checks adapters against a registry when given one', () => {
    const registry = new AdapterRegistry().register('memory', { Gateway: MemoryGateway });
    const config = createConfig({ gateways: { archive: { adapter: 'sql' } } });

    expect(validateConfig(config).valid).toBe(true);
    const result = validateConfig(config, { registry });
    expect(result.errors.map(error => error.message)).toEqual(['Adapter "sql" is not registered']);
  });

  it('checks every field of a configuration read from JSON', () => {
    const config: TupletConfig = JSON.parse(
      '{"gateways":{"default":{"adapter":"memory","args":"x"}},' +
        '"logging":{"level":"loud","format":"xml","enabled":"yes"}}'
    );
    const result = validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.errors.map(error => error.path)).toEqual([
      'gateways.default.args',
      'logging.level',
      'logging.format',
      'logging.enabled',
    ]);
    expect(result.warnings).toEqual([]);
  });
});
