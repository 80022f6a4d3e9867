import { TemplateRetrievalError } from '../errors';
import { TEMPLATE_METHOD } from '../loader/session';
import { noopLogger, type HarnessLogger } from '../lib/logger';
import { pickIndex, type RandomSource } from '../lib/rng';
import { escapeRegExp } from '../lib/utils';
import type { ObjectiveTemplateRecord, SampledObjective } from '../types';
import { evaluateDataSource } from './dataSources';
import { buildWeightedPool, normalizeTemplates } from './pool';

export const ATTEMPTS_PER_SAMPLE = 10;

export type SampleOptions = {
  random?: RandomSource;
  includeDifficult?: boolean;
  includeTimeConsuming?: boolean;
  logger?: HarnessLogger;
};

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'object') {
    const ctor: unknown = Reflect.get(value, 'constructor');
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}

/**
 * Calls a template-producing method on the game. A missing method or one
 * that throws is a per-implementation failure; a result that is not an
 * array only earns a warning and counts as no templates.
 */
export function callTemplateMethod(game: object, method: string, logger: HarnessLogger = noopLogger): unknown[] {
  const fn: unknown = Reflect.get(game, method);
  if (typeof fn !== 'function') {
    throw new TemplateRetrievalError({ method, cause: new Error(`${method} is not a function`) });
  }
  let result: unknown;
  try {
    result = Reflect.apply(fn, game, []);
  } catch (err) {
    throw new TemplateRetrievalError({ method, cause: err });
  }
  if (!Array.isArray(result)) {
    logger.warn(`${method}() returned ${describeType(result)}, expected an array`);
    return [];
  }
  return result;
}

export function retrieveTemplates(game: object, logger: HarnessLogger = noopLogger): ObjectiveTemplateRecord[] {
  return normalizeTemplates(callTemplateMethod(game, TEMPLATE_METHOD, logger));
}

/**
 * Replaces every data key in `label` in one pass, longest key first, so a
 * value that happens to contain another key is left alone.
 */
export function substitutePlaceholders(label: string, values: ReadonlyMap<string, string>): string {
  const keys = [...values.keys()].filter((key) => key.length > 0);
  if (keys.length === 0) {
    return label;
  }
  keys.sort((a, b) => b.length - a.length);
  const pattern = new RegExp(keys.map(escapeRegExp).join('|'), 'g');
  return label.replace(pattern, (match) => values.get(match) ?? match);
}

function populate(
  template: ObjectiveTemplateRecord,
  game: object,
  random: RandomSource,
  logger: HarnessLogger
): string | null {
  const chosen = new Map<string, string>();
  for (const [placeholder, descriptor] of Object.entries(template.data)) {
    let candidates: unknown[];
    try {
      candidates = evaluateDataSource(descriptor, game);
    } catch (err) {
      logger.debug(`Data source for ${placeholder} failed`, {
        label: template.label,
        error: err instanceof Error ? err.message : String(err)
      });
      return null;
    }
    if (candidates.length === 0) {
      return null;
    }
    chosen.set(placeholder, String(candidates[pickIndex(candidates.length, random)]));
  }
  return substitutePlaceholders(template.label, chosen);
}

/**
 * Weighted draw of up to `count` populated objectives from `templates`.
 * Mirrors the host: a recently drawn template is skipped while fresher ones
 * remain, and the recent set is cleared once it is large enough. Fewer
 * than `count` results is a normal outcome once `10 × count` draws are
 * spent.
 */
export function sampleFromTemplates(
  templates: readonly ObjectiveTemplateRecord[],
  game: object,
  count: number,
  options: SampleOptions = {}
): SampledObjective[] {
  const random = options.random ?? Math.random;
  const logger = options.logger ?? noopLogger;
  const eligible = templates.filter(
    (template) =>
      (options.includeDifficult !== false || !template.isDifficult) &&
      (options.includeTimeConsuming !== false || !template.isTimeConsuming)
  );
  const pool = buildWeightedPool(eligible);
  if (pool.length === 0 || count <= 0) {
    return [];
  }

  const distinctTemplates = new Set(eligible.map((template) => template.source)).size;
  const resetThreshold = Math.min(distinctTemplates, Math.floor(count / 2));
  const recentlyUsed = new Set<object>();
  const sampled: SampledObjective[] = [];
  const maxAttempts = count * ATTEMPTS_PER_SAMPLE;

  for (let attempts = 0; sampled.length < count && attempts < maxAttempts; attempts += 1) {
    const template = pool[pickIndex(pool.length, random)];
    if (recentlyUsed.has(template.source) && recentlyUsed.size < distinctTemplates) {
      continue;
    }

    const label = populate(template, game, random, logger);
    if (label === null) {
      continue;
    }

    sampled.push({
      label,
      originalLabel: template.label,
      weight: template.weight,
      isDifficult: template.isDifficult,
      isTimeConsuming: template.isTimeConsuming,
      dataComplexity: Object.keys(template.data).length
    });

    recentlyUsed.add(template.source);
    if (recentlyUsed.size >= resetThreshold) {
      recentlyUsed.clear();
    }
  }

  return sampled;
}

/** Retrieves the game's templates and samples from them. */
export function sampleObjectives(game: object, count: number, options: SampleOptions = {}): SampledObjective[] {
  const templates = retrieveTemplates(game, options.logger);
  return sampleFromTemplates(templates, game, count, options);
}
