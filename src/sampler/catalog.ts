import { noopLogger, type HarnessLogger } from '../lib/logger';
import type { ObjectiveCatalogEntry } from '../types';
import { dataSourceIdentifier } from './dataSources';
import { retrieveTemplates } from './sampler';

/** Renderer-facing listing of every template the game declares. */
export function describeObjectives(game: object, logger: HarnessLogger = noopLogger): ObjectiveCatalogEntry[] {
  return retrieveTemplates(game, logger).map((template) => {
    const data: Record<string, string> = {};
    for (const [placeholder, descriptor] of Object.entries(template.data)) {
      data[placeholder] = dataSourceIdentifier(descriptor);
    }
    return {
      label: template.label,
      weight: template.weight,
      isDifficult: template.isDifficult,
      isTimeConsuming: template.isTimeConsuming,
      data
    } satisfies ObjectiveCatalogEntry;
  });
}
