import { isIterable } from '../lib/utils';

/**
 * Stand-ins for the host's option kinds. A plugin subclasses these and
 * tunes them through statics (`default`, `rangeStart`, `rangeEnd`,
 * `option…` members); every instance carries a single mutable `value`.
 */

export const FALLBACK_RANGE_START = 1;
export const FALLBACK_RANGE_END = 10;

function readNumericStatic(type: unknown, key: string): number | null {
  if (typeof type !== 'function') {
    return null;
  }
  const value: unknown = Reflect.get(type, key);
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export type RangeBounds = {
  start: number;
  end: number;
  declared: boolean;
};

export function readRangeBounds(type: unknown): RangeBounds {
  const start = readNumericStatic(type, 'rangeStart');
  const end = readNumericStatic(type, 'rangeEnd');
  if (start === null || end === null) {
    return { start: FALLBACK_RANGE_START, end: FALLBACK_RANGE_END, declared: false };
  }
  return { start, end, declared: true };
}

export function defaultRangeValue(type: unknown): number {
  const declared = readNumericStatic(type, 'default');
  if (declared !== null) {
    return declared;
  }
  const { start, end } = readRangeBounds(type);
  return Math.floor((start + end) / 2);
}

export function toValueSet(value: unknown): Set<unknown> {
  if (value === undefined || value === null) {
    return new Set();
  }
  if (value instanceof Set) {
    return new Set(value);
  }
  if (isIterable(value)) {
    return new Set(value);
  }
  return new Set([value]);
}

export class Toggle {
  value: boolean;

  constructor(value = true) {
    this.value = value;
  }
}

export class DefaultOnToggle extends Toggle {
  static readonly default = true;
}

export class Choice {
  value: unknown;

  constructor(value: unknown = 'default') {
    this.value = value;
  }
}

export class Range {
  value: number;

  constructor(value?: number) {
    this.value = value ?? defaultRangeValue(new.target);
  }
}

export class PercentageRange extends Range {
  static readonly rangeStart = 0;
  static readonly rangeEnd = 100;
  static readonly default = 50;
}

export class NamedRange extends Range {
  static readonly default = 1;
}

export class OptionSet {
  value: Set<unknown>;

  constructor(value?: unknown) {
    this.value = toValueSet(value);
  }
}

export class OptionList {
  value: unknown[];

  constructor(value?: unknown) {
    this.value = Array.isArray(value) ? [...value] : value === undefined || value === null ? [] : [value];
  }
}

export class OptionDict {
  value: Record<string, unknown>;

  constructor(value?: Record<string, unknown>) {
    this.value = { ...(value ?? {}) };
  }

  get(key: string): unknown {
    return this.value[key];
  }

  set(key: string, entry: unknown): void {
    this.value[key] = entry;
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.value, key);
  }

  keys(): string[] {
    return Object.keys(this.value);
  }

  entries(): Array<[string, unknown]> {
    return Object.entries(this.value);
  }
}

export const OPTION_BASES = {
  Toggle,
  DefaultOnToggle,
  Choice,
  Range,
  PercentageRange,
  NamedRange,
  OptionSet,
  OptionList,
  OptionDict
} as const;

export type OptionBases = typeof OPTION_BASES;
