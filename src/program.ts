import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { runMenu, runSingleTarget, type RunOptions } from './commands/test';
import { loadHarnessSettings } from './lib/config';
import { isDirectory } from './lib/fs';
import type { EnvSource } from './lib/envConfig';
import { createConsoleLogger, createPinoLogger } from './lib/logger';
import { createMenuPrompt, type MenuPrompt } from './lib/prompt';
import { computeSeed, createRng } from './lib/rng';

export type ProgramIO = {
  write?: (line: string) => void;
  createPrompt?: () => MenuPrompt;
  env?: EnvSource;
  cwd?: string;
  setExitCode?: (code: number) => void;
};

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseNonNegativeInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function createProgram(io: ProgramIO = {}): Command {
  const program = new Command();
  const write = io.write ?? ((line: string) => console.log(line));
  const setExitCode =
    io.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  program
    .name('keep-sim')
    .description("Load, analyze and sample Keymaster's Keep game implementations")
    .version('0.1.0')
    .argument('[target]', 'Implementation file or partial file name; omit for the interactive menu')
    .option('--count <n>', 'Objectives to sample per implementation', parsePositiveInteger)
    .option('--rounds <n>', 'Extra sampling rounds to show', parseNonNegativeInteger)
    .option('--seed <n>', 'Seed for reproducible sampling', parsePositiveInteger)
    .option('--no-difficult', 'Leave out templates marked difficult')
    .option('--no-time-consuming', 'Leave out templates marked time consuming')
    .option('--catalog', 'Print the objective catalog of each implementation')
    .option('--dir <path>', 'Directory to discover implementations in')
    .action(async (target: string | undefined, options: Record<string, unknown>) => {
      const settings = loadHarnessSettings(io.env);
      const logger = settings.logJson
        ? createPinoLogger(settings.logLevel)
        : createConsoleLogger({ level: settings.logLevel, write });

      const seed = typeof options.seed === 'number' ? options.seed : settings.seed;
      const cwd = io.cwd ?? process.cwd();
      const runOptions: RunOptions = {
        directory: path.resolve(cwd, typeof options.dir === 'string' ? options.dir : '.'),
        threshold: settings.discoveryThreshold,
        sampleCount: typeof options.count === 'number' ? options.count : settings.sampleCount,
        rounds: typeof options.rounds === 'number' ? options.rounds : settings.rounds,
        random: seed === null ? undefined : createRng(computeSeed(seed)),
        includeDifficult: options.difficult !== false,
        includeTimeConsuming: options.timeConsuming !== false,
        showCatalog: Boolean(options.catalog),
        logger,
        write
      };

      write("KEYMASTER'S KEEP - IMPLEMENTATION TESTER");
      write('='.repeat(60));

      if (!(await isDirectory(runOptions.directory))) {
        write(`[ERROR] Not a directory: ${runOptions.directory}`);
        setExitCode(1);
        return;
      }

      if (target) {
        const passed = await runSingleTarget(target, runOptions);
        if (!passed) {
          setExitCode(1);
        }
        return;
      }

      await runMenu(runOptions, io.createPrompt ?? (() => createMenuPrompt()));
    });

  return program;
}
