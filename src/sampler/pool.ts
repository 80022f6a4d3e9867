import { isRecord } from '../lib/utils';
import type { ObjectiveTemplateRecord } from '../types';

export const UNKNOWN_OBJECTIVE_LABEL = 'Unknown Objective';

export function normalizeWeight(weight: unknown): number {
  return typeof weight === 'number' && Number.isInteger(weight) && weight >= 1 ? weight : 1;
}

/**
 * Reads plugin template objects (host `GameObjectiveTemplate` instances or
 * plain objects of the same shape) into records. Entries that are not
 * objects are dropped.
 */
export function normalizeTemplates(templates: readonly unknown[]): ObjectiveTemplateRecord[] {
  const records: ObjectiveTemplateRecord[] = [];
  for (const template of templates) {
    if (typeof template !== 'object' || template === null) {
      continue;
    }
    const label: unknown = Reflect.get(template, 'label');
    const data: unknown = Reflect.get(template, 'data');
    records.push({
      label: typeof label === 'string' ? label : UNKNOWN_OBJECTIVE_LABEL,
      data: isRecord(data) ? { ...data } : {},
      weight: normalizeWeight(Reflect.get(template, 'weight')),
      isDifficult: Boolean(Reflect.get(template, 'isDifficult')),
      isTimeConsuming: Boolean(Reflect.get(template, 'isTimeConsuming')),
      source: template
    });
  }
  return records;
}

/** Each template repeated `weight` times; the pool length is the weight sum. */
export function buildWeightedPool<T extends { weight: number }>(templates: readonly T[]): T[] {
  const pool: T[] = [];
  for (const template of templates) {
    const copies = normalizeWeight(template.weight);
    for (let copy = 0; copy < copies; copy += 1) {
      pool.push(template);
    }
  }
  return pool;
}

export function weightHistogram(templates: readonly { weight: number }[]): Map<number, number> {
  const histogram = new Map<number, number>();
  for (const { weight } of templates) {
    histogram.set(weight, (histogram.get(weight) ?? 0) + 1);
  }
  return histogram;
}
