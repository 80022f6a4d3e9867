import type { MockEnvironment } from '../environment/mockEnvironment';
import type { OptionBases } from '../environment/options';
import { readOptionsClass } from '../loader/session';
import { defaultForTypeName } from '../loader/synthesizedTypes';
import { noopLogger, type HarnessLogger } from '../lib/logger';
import { errorMessage } from '../lib/utils';
import type { ClassLike, LoadedImplementation } from '../types';
import {
  classifyOptionType,
  planCustomWithDefault,
  planNamedKind,
  readStaticDefault,
  type OptionPlan
} from './optionKinds';
import { collectOptionSchema, resolveOptionSchema, type ResolvedOptionField } from './schema';

export function planOptionField(type: ClassLike, typeName: string, bases: OptionBases): OptionPlan | null {
  const kind = classifyOptionType(type, typeName);
  if (kind) {
    return planNamedKind(kind, type);
  }
  const declared = readStaticDefault(type);
  if (declared.present) {
    return planCustomWithDefault(type, typeName, declared.value, bases);
  }
  return null;
}

function construct(ctor: ClassLike, value: unknown): object {
  const instance: object = Reflect.construct(ctor, [value]);
  Reflect.set(instance, 'value', value);
  return instance;
}

function fallbackToggle(bases: OptionBases): object {
  return new bases.Toggle(true);
}

export function synthesizeField(field: ResolvedOptionField, bases: OptionBases, logger: HarnessLogger): object {
  if (field.type === null) {
    logger.warn(`Could not resolve ${field.typeName} for option '${field.field}', using Toggle: ${field.reason}`);
    return fallbackToggle(bases);
  }

  try {
    const plan = planOptionField(field.type, field.typeName, bases);
    if (!plan) {
      return construct(field.type, defaultForTypeName(field.typeName));
    }
    const ctor = plan.preferOwnType ? field.type : bases[plan.base];
    return construct(ctor, plan.value);
  } catch (err) {
    logger.warn(`Could not create ${field.typeName} for option '${field.field}', using Toggle: ${errorMessage(err)}`);
    return fallbackToggle(bases);
  }
}

/**
 * Builds a populated configuration object for the implementation's
 * `optionsCls`, or `null` when it declares no schema. Never throws; every
 * field it cannot build becomes `Toggle(true)` with a warning.
 */
export function synthesizeOptions(
  implementation: LoadedImplementation,
  environment: MockEnvironment,
  logger: HarnessLogger = noopLogger
): object | null {
  const optionsCls = readOptionsClass(implementation.gameClass);
  if (!optionsCls) {
    return null;
  }
  const schema = collectOptionSchema(optionsCls);
  if (!schema) {
    return null;
  }

  const values: Record<string, object> = {};
  for (const field of resolveOptionSchema(schema, implementation.symbols)) {
    values[field.field] = synthesizeField(field, environment.bases, logger);
  }

  try {
    const options: object = Reflect.construct(optionsCls, [values]);
    for (const [field, value] of Object.entries(values)) {
      Reflect.set(options, field, value);
    }
    return options;
  } catch (err) {
    logger.warn(`Could not create options for ${implementation.className}: ${errorMessage(err)}`);
    return null;
  }
}
