import { noopLogger, type HarnessLogger } from './lib/logger';
import { errorMessage, toTitleWords } from './lib/utils';
import { dataSourceIdentifier } from './sampler/dataSources';
import { weightHistogram } from './sampler/pool';
import { retrieveTemplates } from './sampler/sampler';
import type { AnalysisReport } from './types';

// Checked in order against each lower-cased attribute name; first hit wins.
const FEATURE_TAGS: ReadonlyArray<readonly [string, string]> = [
  ['relationship', 'Relationship System'],
  ['preferred', 'Dynamic Preferences'],
  ['difficulty', 'Difficulty Scaling'],
  ['cursed', 'Cursed/Challenge Mode']
];

const MAX_CATEGORY_LENGTH = 10;

/** Own and inherited property names, minus `_`-prefixed ones and `constructor`. */
export function publicAttributeNames(target: object): string[] {
  const names = new Set<string>();
  let current: object | null = target;
  while (current !== null && current !== Object.prototype) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (!name.startsWith('_') && name !== 'constructor') {
        names.add(name);
      }
    }
    current = Object.getPrototypeOf(current);
  }
  return [...names].sort();
}

export function featureTagFor(attributeName: string): string | null {
  const lowered = attributeName.toLowerCase();
  for (const [needle, tag] of FEATURE_TAGS) {
    if (lowered.includes(needle)) {
      return tag;
    }
  }
  return null;
}

export function formatCategory(attributeName: string): string {
  const category = toTitleWords(attributeName);
  return category.length > MAX_CATEGORY_LENGTH ? `${category.slice(0, MAX_CATEGORY_LENGTH)}...` : category;
}

export function computeComplexityScore(
  report: Pick<AnalysisReport, 'totalObjectives' | 'dataSources' | 'features' | 'categories'>
): number {
  return (
    report.totalObjectives + 2 * report.dataSources.size + 3 * report.features.length + report.categories.length
  );
}

function readAttributeNames(target: object, logger: HarnessLogger): string[] {
  try {
    return publicAttributeNames(target);
  } catch (err) {
    logger.debug(`Skipping attribute enumeration: ${errorMessage(err)}`);
    return [];
  }
}

function optionCategories(options: unknown, logger: HarnessLogger): string[] {
  if (typeof options !== 'object' || options === null) {
    return [];
  }
  const categories = new Set<string>();
  for (const name of readAttributeNames(options, logger)) {
    try {
      const value: unknown = Reflect.get(options, name);
      if (typeof value === 'object' && value !== null && 'value' in value) {
        categories.add(formatCategory(name));
      }
    } catch (err) {
      logger.debug(`Skipping option attribute ${name}: ${errorMessage(err)}`);
    }
  }
  return [...categories];
}

/**
 * Summarizes a game instance. Only template retrieval can fail the whole
 * analysis; a failing attribute or template is skipped.
 */
export function analyzeImplementation(game: object, logger: HarnessLogger = noopLogger): AnalysisReport {
  const templates = retrieveTemplates(game, logger);

  const dataSources = new Set<string>();
  for (const template of templates) {
    for (const [placeholder, descriptor] of Object.entries(template.data)) {
      try {
        dataSources.add(dataSourceIdentifier(descriptor));
      } catch (err) {
        logger.debug(`Skipping data source ${placeholder}: ${errorMessage(err)}`);
      }
    }
  }

  const features = new Set<string>();
  const specialMethods: string[] = [];
  for (const name of readAttributeNames(game, logger)) {
    const tag = featureTagFor(name);
    if (tag) {
      features.add(tag);
      continue;
    }
    try {
      if (name.toLowerCase().endsWith('templates') && typeof Reflect.get(game, name) === 'function') {
        specialMethods.push(name);
      }
    } catch (err) {
      logger.debug(`Skipping attribute ${name}: ${errorMessage(err)}`);
    }
  }

  let categories: string[] = [];
  try {
    categories = optionCategories(Reflect.get(game, 'archipelagoOptions'), logger);
  } catch (err) {
    logger.debug(`Skipping option categories: ${errorMessage(err)}`);
  }

  const report = {
    totalObjectives: templates.length,
    weightDistribution: weightHistogram(templates),
    features: [...features],
    categories,
    specialMethods,
    dataSources,
    complexityScore: 0
  } satisfies AnalysisReport;
  report.complexityScore = computeComplexityScore(report);
  return report;
}
