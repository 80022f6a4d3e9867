import { isIterable, isRecord } from '../lib/utils';

/** `{ start, stop, step? }` with `stop` exclusive, like a host range. */
export type RangeDescriptor = {
  start: number;
  stop: number;
  step?: number;
};

const MAX_RANGE_LENGTH = 100_000;

export function isRangeDescriptor(value: unknown): value is RangeDescriptor {
  if (!isRecord(value)) {
    return false;
  }
  const { start, stop, step } = value;
  return (
    typeof start === 'number' &&
    typeof stop === 'number' &&
    (step === undefined || typeof step === 'number')
  );
}

/**
 * Host descriptors are `[source, count]` pairs; a bare source is accepted
 * too. Any two-item array ending in a number is read as a pair, so
 * `['Bronze', 1]` yields `'Bronze'` and `[1, 2]` yields `1`.
 */
export function unwrapDescriptor(descriptor: unknown): unknown {
  if (Array.isArray(descriptor) && descriptor.length === 2 && typeof descriptor[1] === 'number') {
    const [source]: unknown[] = descriptor;
    return source;
  }
  return descriptor;
}

export function materializeRange({ start, stop, step = 1 }: RangeDescriptor): number[] {
  if (step === 0 || !Number.isFinite(start) || !Number.isFinite(stop) || !Number.isFinite(step)) {
    return [];
  }
  const values: number[] = [];
  for (
    let current = start;
    (step > 0 ? current < stop : current > stop) && values.length < MAX_RANGE_LENGTH;
    current += step
  ) {
    values.push(current);
  }
  return values;
}

// Nullish values, empty strings and empty collections give no candidates;
// any other scalar is a single literal candidate.
function toCandidates(value: unknown): unknown[] {
  if (value === null || value === undefined) {
    return [];
  }
  if (typeof value === 'string') {
    return value.length > 0 ? [value] : [];
  }
  if (isRangeDescriptor(value)) {
    return materializeRange(value);
  }
  if (isIterable(value)) {
    return [...value];
  }
  return [value];
}

/**
 * Evaluates one data-source descriptor into the values a placeholder can
 * take. Functions are invoked with the game instance as `this`; an empty
 * result means the template cannot be populated on this draw.
 */
export function evaluateDataSource(descriptor: unknown, game: object): unknown[] {
  const source = unwrapDescriptor(descriptor);
  if (typeof source === 'function') {
    const result: unknown = Reflect.apply(source, game, []);
    return toCandidates(result);
  }
  return toCandidates(source);
}

/**
 * Stable identifier for a data source: a function's name, otherwise the
 * runtime type of the value.
 */
export function dataSourceIdentifier(descriptor: unknown): string {
  const source = unwrapDescriptor(descriptor);
  if (typeof source === 'function') {
    const name = source.name.replace(/^(bound )+/, '');
    return name || 'anonymous';
  }
  if (source === null) {
    return 'null';
  }
  if (typeof source !== 'object') {
    return typeof source;
  }
  if (isRangeDescriptor(source)) {
    return 'range';
  }
  const ctor: unknown = Reflect.get(source, 'constructor');
  if (typeof ctor === 'function' && ctor.name) {
    return ctor.name;
  }
  return 'Object';
}
