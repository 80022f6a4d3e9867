import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import { DEFAULT_DISCOVERY_THRESHOLD, loadHarnessSettings } from '../src/lib/config';
import { EnvConfigError, booleanVar, enumVar, integerVar, loadEnvConfig } from '../src/lib/envConfig';
import { createConsoleLogger } from '../src/lib/logger';
import { computeSeed, createRng, pickIndex } from '../src/lib/rng';
import { sanitizeIdentifier, toTitleWords } from '../src/lib/utils';

describe('loadEnvConfig', () => {
  const schema = z.object({
    RETRIES: integerVar({ defaultValue: 3, min: 0, max: 10 }),
    VERBOSE: booleanVar({ defaultValue: false }),
    MODE: enumVar({ values: ['fast', 'slow'], defaultValue: 'fast' })
  });

  test('applies defaults and parses values', () => {
    expect(loadEnvConfig(schema, { env: {} })).toEqual({ RETRIES: 3, VERBOSE: false, MODE: 'fast' });
    expect(loadEnvConfig(schema, { env: { RETRIES: '7', VERBOSE: 'yes', MODE: 'SLOW' } })).toEqual({
      RETRIES: 7,
      VERBOSE: true,
      MODE: 'slow'
    });
  });

  test('reports every invalid value', () => {
    expect(() => loadEnvConfig(schema, { env: { RETRIES: '42', VERBOSE: 'perhaps' }, context: 'test' })).toThrow(
      EnvConfigError
    );
    expect(() => loadEnvConfig(schema, { env: { RETRIES: '42' }, context: 'test' })).toThrow(
      '[test] Invalid environment configuration\n  - RETRIES: RETRIES must be <= 10'
    );
    expect(() => loadEnvConfig(schema, { env: { RETRIES: 'many' } })).toThrow(
      '  - RETRIES: Expected RETRIES to be an integer'
    );
    expect(() => loadEnvConfig(schema, { env: { VERBOSE: 'perhaps' } })).toThrow(
      "  - VERBOSE: Invalid VERBOSE. Accepted boolean values: '1', 'true', 'yes', 'on', '0', 'false', 'no', 'off'"
    );
  });
});

describe('loadHarnessSettings', () => {
  test('falls back to defaults', () => {
    expect(loadHarnessSettings({})).toEqual({
      sampleCount: 6,
      rounds: 3,
      seed: null,
      discoveryThreshold: DEFAULT_DISCOVERY_THRESHOLD,
      logLevel: 'warn',
      logJson: false
    });
  });

  test('reads KEEP_SIM_* variables', () => {
    expect(
      loadHarnessSettings({
        KEEP_SIM_SAMPLE_COUNT: '10',
        KEEP_SIM_ROUNDS: '0',
        KEEP_SIM_SEED: '99',
        KEEP_SIM_DISCOVERY_THRESHOLD: '3',
        KEEP_SIM_LOG_LEVEL: 'debug',
        KEEP_SIM_LOG_JSON: 'true'
      })
    ).toEqual({ sampleCount: 10, rounds: 0, seed: 99, discoveryThreshold: 3, logLevel: 'debug', logJson: true });
  });

  test('rejects an unknown log level', () => {
    expect(() => loadHarnessSettings({ KEEP_SIM_LOG_LEVEL: 'loud' })).toThrow(
      'KEEP_SIM_LOG_LEVEL: Invalid KEEP_SIM_LOG_LEVEL. Expected one of: debug, info, warn, error'
    );
  });
});

describe('rng', () => {
  test('Park-Miller sequence is deterministic', () => {
    const random = createRng(1);

    expect(random()).toBeCloseTo(16807 / 2147483647, 12);
    expect(random()).toBeCloseTo(282475249 / 2147483647, 12);
  });

  test('seeds from numbers and strings', () => {
    expect(computeSeed(42)).toBe(42);
    expect(computeSeed('arena')).toBe(computeSeed('arena'));
    expect(computeSeed('arena')).not.toBe(computeSeed('meadow'));
    expect(computeSeed(0)).toBeGreaterThan(0);
  });

  test('pickIndex stays inside the range', () => {
    expect(pickIndex(3, () => 0)).toBe(0);
    expect(pickIndex(3, () => 0.999)).toBe(2);
    expect(pickIndex(3, () => 1)).toBe(2);
  });
});

describe('utils', () => {
  test('sanitizeIdentifier keeps module-safe characters', () => {
    expect(sanitizeIdentifier('space-marine tactics')).toBe('space_marine_tactics');
    expect(sanitizeIdentifier('--odd--')).toBe('odd');
  });

  test('toTitleWords splits snake and camel case', () => {
    expect(toTitleWords('include_cursed')).toBe('Include Cursed');
    expect(toTitleWords('includeCursed')).toBe('Include Cursed');
  });
});

describe('createConsoleLogger', () => {
  test('filters by level and prints metadata', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger({ level: 'warn', write: (line) => lines.push(line) });

    logger.info('hidden');
    logger.warn('Could not load a.js', { code: 'read_failed' });
    logger.error(new Error('boom'));

    expect(lines[0]).toBe('Warning: Could not load a.js {"code":"read_failed"}');
    expect(lines[1]?.startsWith('Error: boom {"stack":')).toBe(true);
    expect(lines).toHaveLength(2);
  });
});
