import path from 'node:path';
import { tmpdir } from 'node:os';
import { copyFile, mkdtemp } from 'node:fs/promises';
import type { HarnessLogger } from '../src/lib/logger';

export const FIXTURE_DIR = path.resolve(__dirname, 'fixtures', 'plugins');

export function fixturePath(file: string): string {
  return path.join(FIXTURE_DIR, file);
}

export async function createTempDir(prefix = 'keep-sim-test-'): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), prefix));
  return dir;
}

export async function copyFixtures(dir: string, files: readonly string[]): Promise<void> {
  for (const file of files) {
    await copyFile(fixturePath(file), path.join(dir, file));
  }
}

export type RecordedLog = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta?: Record<string, unknown>;
};

export function createRecordingLogger(): HarnessLogger & { entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  return {
    entries,
    debug(message, meta) {
      entries.push({ level: 'debug', message, meta });
    },
    info(message, meta) {
      entries.push({ level: 'info', message, meta });
    },
    warn(message, meta) {
      entries.push({ level: 'warn', message, meta });
    },
    error(message, meta) {
      entries.push({ level: 'error', message: message instanceof Error ? message.message : message, meta });
    }
  };
}

/** Deterministic source cycling through `values`. */
export function sequenceRandom(values: readonly number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index += 1;
    return value;
  };
}
