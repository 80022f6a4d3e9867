import type { ClassLike } from '../types';

type SynthesizedDefaultRule = {
  match: string;
  create: () => unknown;
};

// Checked in order against the lower-cased type name; first hit wins.
const DEFAULT_RULES: SynthesizedDefaultRule[] = [
  { match: 'selection', create: () => new Set(['default_selection']) },
  { match: 'actions', create: () => new Set(['default_action']) },
  { match: 'range', create: () => 50 },
  { match: 'toggle', create: () => true }
];

export function defaultForTypeName(name: string): unknown {
  const lowered = name.toLowerCase();
  for (const rule of DEFAULT_RULES) {
    if (lowered.includes(rule.match)) {
      return rule.create();
    }
  }
  return new Set(['default']);
}

function cloneDefault(value: unknown): unknown {
  if (value instanceof Set) {
    return new Set(value);
  }
  if (Array.isArray(value)) {
    return [...value];
  }
  return value;
}

const synthesizedTypes = new WeakSet<ClassLike>();

export function isSynthesizedOptionType(value: unknown): boolean {
  return typeof value === 'function' && synthesizedTypes.has(value);
}

/**
 * Builds a placeholder option type for a name the plugin references but
 * never defines. The type is named after the reference and exposes its
 * name-driven default both as a static `default` and as the constructor
 * fallback.
 */
export function createSynthesizedOptionType(name: string) {
  const declaredDefault = defaultForTypeName(name);
  const holder = {
    [name]: class {
      static readonly default: unknown = declaredDefault;
      value: unknown;

      constructor(value?: unknown) {
        this.value = value === undefined ? cloneDefault(declaredDefault) : value;
      }
    }
  };
  const type = holder[name];
  synthesizedTypes.add(type);
  return type;
}
