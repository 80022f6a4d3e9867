import path from 'node:path';
import { analyzeImplementation } from '../analyzer';
import type { MockEnvironment } from '../environment/mockEnvironment';
import { InstantiationError } from '../errors';
import type { LoadingSession } from '../loader/session';
import { synthesizeOptions } from '../options/synthesizer';
import { callTemplateMethod, describeObjectives, normalizeTemplates, sampleObjectives, type SampleOptions } from '../sampler';
import type { AnalysisReport, LoadedImplementation, SampledObjective } from '../types';
import { DEFAULT_ROUND_SAMPLE_COUNT, DEFAULT_ROUNDS, DEFAULT_SAMPLE_COUNT } from './config';
import { noopLogger, type HarnessLogger } from './logger';
import {
  formatAnalysis,
  formatCatalog,
  formatConstraints,
  formatHeader,
  formatMetrics,
  formatRound,
  formatSamples
} from './report';
import type { RandomSource } from './rng';
import { errorMessage } from './utils';

export const CONSTRAINT_METHOD = 'optionalGameConstraintTemplates';

export type HarnessOptions = {
  sampleCount?: number;
  rounds?: number;
  roundSampleCount?: number;
  random?: RandomSource;
  includeDifficult?: boolean;
  includeTimeConsuming?: boolean;
  showCatalog?: boolean;
  logger?: HarnessLogger;
  write?: (line: string) => void;
};

export type TestOutcome =
  | { status: 'succeeded'; analysis: AnalysisReport; samples: SampledObjective[] }
  | { status: 'failed'; error: Error };

export function instantiateImplementation(implementation: LoadedImplementation, options: object | null): object {
  try {
    const game: object = Reflect.construct(implementation.gameClass, [options]);
    return game;
  } catch (err) {
    throw new InstantiationError({
      filePath: implementation.filePath,
      className: implementation.className,
      cause: err
    });
  }
}

function constraintLines(game: object, logger: HarnessLogger): string[] {
  if (typeof Reflect.get(game, CONSTRAINT_METHOD) !== 'function') {
    return [];
  }
  try {
    return formatConstraints(normalizeTemplates(callTemplateMethod(game, CONSTRAINT_METHOD, logger)));
  } catch (err) {
    return ['', `WARNING: Constraint system error: ${errorMessage(err)}`];
  }
}

/**
 * Runs the full check for one loaded implementation and prints the report.
 * Failures stay inside the returned outcome so a batch run can move on.
 */
export function testImplementation(
  implementation: LoadedImplementation,
  environment: MockEnvironment,
  options: HarnessOptions = {}
): TestOutcome {
  const write = options.write ?? ((line: string) => console.log(line));
  const logger = options.logger ?? noopLogger;
  const writeLines = (lines: readonly string[]) => {
    for (const line of lines) {
      write(line);
    }
  };
  const sampleOptions: SampleOptions = {
    random: options.random,
    includeDifficult: options.includeDifficult,
    includeTimeConsuming: options.includeTimeConsuming,
    logger
  };

  writeLines(formatHeader(implementation));

  try {
    const configuration = synthesizeOptions(implementation, environment, logger);
    if (configuration === null) {
      write('WARNING: No options class found, using null');
    }

    const game = instantiateImplementation(implementation, configuration);
    const analysis = analyzeImplementation(game, logger);
    writeLines(formatAnalysis(analysis));

    if (options.showCatalog) {
      writeLines(formatCatalog(describeObjectives(game, logger)));
    }

    const samples = sampleObjectives(game, options.sampleCount ?? DEFAULT_SAMPLE_COUNT, sampleOptions);
    if (samples.length > 0) {
      writeLines(formatSamples(samples));
      const rounds = options.rounds ?? DEFAULT_ROUNDS;
      if (rounds > 0) {
        writeLines(['', `DEMONSTRATING DYNAMIC SELECTION (${rounds} more rounds):`]);
        for (let round = 1; round <= rounds; round += 1) {
          const roundSamples = sampleObjectives(
            game,
            options.roundSampleCount ?? DEFAULT_ROUND_SAMPLE_COUNT,
            sampleOptions
          );
          if (roundSamples.length > 0) {
            write(formatRound(round, roundSamples));
          }
        }
      }
    } else {
      writeLines(['', 'WARNING: No objectives could be generated dynamically']);
    }

    writeLines(constraintLines(game, logger));
    writeLines(formatMetrics(analysis));
    writeLines(['', '[SUCCESS] Testing completed successfully!']);
    return { status: 'succeeded', analysis, samples };
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    writeLines(['', `[ERROR] Error testing implementation: ${error.message}`]);
    logger.debug(`Test of ${implementation.className} failed`, { stack: error.stack });
    return { status: 'failed', error };
  }
}

/** Loads `filePath` through the session and tests it; `null` when nothing loaded. */
export function loadAndTest(
  session: LoadingSession,
  filePath: string,
  options: HarnessOptions = {}
): TestOutcome | null {
  const implementation = session.load(filePath);
  if (!implementation) {
    const write = options.write ?? ((line: string) => console.log(line));
    write(`[ERROR] Could not load ${path.basename(filePath)}`);
    return null;
  }
  return testImplementation(implementation, session.environment, options);
}
