import { z } from 'zod';
import { booleanVar, enumVar, integerVar, loadEnvConfig, type EnvSource } from './envConfig';
import type { LogLevel } from './logger';

export const DEFAULT_SAMPLE_COUNT = 6;
export const DEFAULT_ROUNDS = 3;
export const DEFAULT_ROUND_SAMPLE_COUNT = 3;
export const DEFAULT_DISCOVERY_THRESHOLD = 2;

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

const settingsSchema = z
  .object({
    KEEP_SIM_SAMPLE_COUNT: integerVar({ defaultValue: DEFAULT_SAMPLE_COUNT, min: 1, max: 1000 }),
    KEEP_SIM_ROUNDS: integerVar({ defaultValue: DEFAULT_ROUNDS, min: 0, max: 100 }),
    KEEP_SIM_SEED: integerVar({ min: 1 }),
    KEEP_SIM_DISCOVERY_THRESHOLD: integerVar({ defaultValue: DEFAULT_DISCOVERY_THRESHOLD, min: 1, max: 5 }),
    KEEP_SIM_LOG_LEVEL: enumVar<LogLevel>({ values: LOG_LEVELS, defaultValue: 'warn' }),
    KEEP_SIM_LOG_JSON: booleanVar({ defaultValue: false })
  })
  .passthrough();

export type HarnessSettings = {
  sampleCount: number;
  rounds: number;
  seed: number | null;
  discoveryThreshold: number;
  logLevel: LogLevel;
  logJson: boolean;
};

export function loadHarnessSettings(env?: EnvSource): HarnessSettings {
  const parsed = loadEnvConfig(settingsSchema, { env, context: 'keep-sim' });
  return {
    sampleCount: parsed.KEEP_SIM_SAMPLE_COUNT ?? DEFAULT_SAMPLE_COUNT,
    rounds: parsed.KEEP_SIM_ROUNDS ?? DEFAULT_ROUNDS,
    seed: parsed.KEEP_SIM_SEED ?? null,
    discoveryThreshold: parsed.KEEP_SIM_DISCOVERY_THRESHOLD ?? DEFAULT_DISCOVERY_THRESHOLD,
    logLevel: parsed.KEEP_SIM_LOG_LEVEL ?? 'warn',
    logJson: parsed.KEEP_SIM_LOG_JSON ?? false
  } satisfies HarnessSettings;
}
