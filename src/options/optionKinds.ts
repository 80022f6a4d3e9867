import { defaultRangeValue, readRangeBounds, toValueSet, type OptionBases } from '../environment/options';
import { isIterable } from '../lib/utils';
import type { ClassLike } from '../types';

export type OptionKind = 'toggle' | 'choice' | 'range' | 'set' | 'list' | 'dict' | 'customWithDefault';

export type NamedKind = Exclude<OptionKind, 'customWithDefault'>;

// Priority order: the first substring found in a type name decides its kind.
const KIND_TABLE: ReadonlyArray<readonly [string, NamedKind]> = [
  ['Toggle', 'toggle'],
  ['Choice', 'choice'],
  ['Range', 'range'],
  ['OptionSet', 'set'],
  ['OptionList', 'list'],
  ['OptionDict', 'dict']
];

/**
 * What to build for one field: the environment base standing in for the
 * kind, the value to store, and whether the plugin's own type is
 * constructed instead of the base.
 */
export type OptionPlan = {
  kind: OptionKind;
  base: keyof OptionBases;
  value: unknown;
  preferOwnType: boolean;
};

function nameChain(type: ClassLike, typeName: string): string[] {
  const names = [typeName];
  let current: unknown = Object.getPrototypeOf(type);
  while (typeof current === 'function' && current !== Function.prototype) {
    const descriptor = Object.getOwnPropertyDescriptor(current, 'name');
    if (descriptor && typeof descriptor.value === 'string' && descriptor.value) {
      names.push(descriptor.value);
    }
    current = Object.getPrototypeOf(current);
  }
  return names;
}

/**
 * Matches the type's own name first, then the names of the classes it
 * extends, so `class Difficulty extends Choice` is still a choice.
 */
export function classifyOptionType(type: ClassLike, typeName: string): NamedKind | null {
  for (const name of nameChain(type, typeName)) {
    for (const [needle, kind] of KIND_TABLE) {
      if (name.includes(needle)) {
        return kind;
      }
    }
  }
  return null;
}

export function readStaticDefault(type: ClassLike): { present: boolean; value: unknown } {
  if (!Reflect.has(type, 'default')) {
    return { present: false, value: undefined };
  }
  return { present: true, value: Reflect.get(type, 'default') };
}

function staticKeys(type: ClassLike): string[] {
  const keys: string[] = [];
  let current: unknown = type;
  while (typeof current === 'function' && current !== Function.prototype) {
    for (const key of Object.getOwnPropertyNames(current)) {
      if (!keys.includes(key)) {
        keys.push(key);
      }
    }
    current = Object.getPrototypeOf(current);
  }
  return keys;
}

export function choiceDefault(type: ClassLike): unknown {
  const declared = readStaticDefault(type);
  if (declared.present) {
    return declared.value;
  }
  const optionKey = staticKeys(type).find((key) => key.startsWith('option'));
  return optionKey === undefined ? 'default' : Reflect.get(type, optionKey);
}

function plan(kind: OptionKind, base: keyof OptionBases, value: unknown, preferOwnType = true): OptionPlan {
  return { kind, base, value, preferOwnType } satisfies OptionPlan;
}

const NAMED_KIND_PLANS: { [K in NamedKind]: (type: ClassLike) => OptionPlan } = {
  toggle: () => plan('toggle', 'Toggle', true),
  choice: (type) => plan('choice', 'Choice', choiceDefault(type)),
  range: (type) => plan('range', 'Range', defaultRangeValue(type)),
  set: () => plan('set', 'OptionSet', new Set<unknown>()),
  list: () => plan('list', 'OptionList', []),
  dict: () => plan('dict', 'OptionDict', {})
};

export function planNamedKind(kind: NamedKind, type: ClassLike): OptionPlan {
  return NAMED_KIND_PLANS[kind](type);
}

function extendsBase(type: ClassLike, base: ClassLike): boolean {
  return type === base || type.prototype instanceof base;
}

/**
 * A type no kind matched but which declares a static `default`. The shape
 * of the default picks the stand-in.
 */
export function planCustomWithDefault(
  type: ClassLike,
  typeName: string,
  defaultValue: unknown,
  bases: OptionBases
): OptionPlan {
  if (typeof defaultValue === 'number') {
    if (readRangeBounds(type).declared) {
      return plan('customWithDefault', 'Range', defaultValue);
    }
    const lowered = typeName.toLowerCase();
    if (lowered.includes('percentage')) {
      return plan('customWithDefault', 'PercentageRange', defaultValue, false);
    }
    if (lowered.includes('namedrange')) {
      return plan('customWithDefault', 'NamedRange', defaultValue, false);
    }
    return plan('customWithDefault', 'Range', defaultValue, false);
  }
  if (defaultValue instanceof Set || Array.isArray(defaultValue)) {
    if (extendsBase(type, bases.OptionList)) {
      return plan('customWithDefault', 'OptionList', [...defaultValue]);
    }
    return plan('customWithDefault', 'OptionSet', toValueSet(defaultValue));
  }
  if (typeof defaultValue === 'boolean') {
    return plan('customWithDefault', 'Toggle', defaultValue, false);
  }
  if (isIterable(defaultValue)) {
    return plan('customWithDefault', 'OptionSet', toValueSet(defaultValue));
  }
  return plan('customWithDefault', 'Range', defaultValue, false);
}
