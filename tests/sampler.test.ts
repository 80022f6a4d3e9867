import { describe, expect, test } from 'vitest';
import { TemplateRetrievalError } from '../src/errors';
import { instantiateImplementation } from '../src/lib/harness';
import { createRng } from '../src/lib/rng';
import { LoadingSession } from '../src/loader/session';
import { synthesizeOptions } from '../src/options/synthesizer';
import {
  buildWeightedPool,
  dataSourceIdentifier,
  describeObjectives,
  evaluateDataSource,
  normalizeTemplates,
  retrieveTemplates,
  sampleFromTemplates,
  sampleObjectives,
  substitutePlaceholders
} from '../src/sampler';
import { createRecordingLogger, fixturePath, sequenceRandom } from './helpers';

function gameWith(templates: unknown): object {
  return { gameObjectiveTemplates: () => templates };
}

function loadArenaGame(): object {
  const session = new LoadingSession();
  const implementation = session.load(fixturePath('arena_clash.js'));
  if (!implementation) {
    throw new Error('fixture failed to load');
  }
  return instantiateImplementation(implementation, synthesizeOptions(implementation, session.environment));
}

describe('buildWeightedPool', () => {
  test('repeats each template weight times', () => {
    const records = normalizeTemplates([
      { label: 'Win X matches', data: { X: [() => [1, 2, 3], 1] }, weight: 5 }
    ]);

    const pool = buildWeightedPool(records);

    expect(pool).toHaveLength(5);
    expect(pool.every((entry) => entry === records[0])).toBe(true);
  });

  test('invalid or missing weights count once', () => {
    const records = normalizeTemplates([
      { label: 'a', weight: 1 },
      { label: 'b', weight: 3 },
      { label: 'c', weight: 0 },
      { label: 'd', weight: 2.5 },
      { label: 'e' },
      'not a template'
    ]);

    expect(records.map((record) => record.weight)).toEqual([1, 3, 1, 1, 1]);
    expect(buildWeightedPool(records)).toHaveLength(7);
  });
});

describe('evaluateDataSource', () => {
  test('invokes functions with the game as this', () => {
    const game = { pool: ['Vex', 'Orin'] };
    function heroes(this: { pool: string[] }): string[] {
      return this.pool;
    }

    expect(evaluateDataSource([heroes, 1], game)).toEqual(['Vex', 'Orin']);
  });

  test('materializes ranges with an exclusive stop', () => {
    expect(evaluateDataSource({ start: 1, stop: 4 }, {})).toEqual([1, 2, 3]);
    expect(evaluateDataSource([{ start: 0, stop: 5, step: 2 }, 1], {})).toEqual([0, 2, 4]);
    expect(evaluateDataSource({ start: 3, stop: 0, step: -1 }, {})).toEqual([3, 2, 1]);
    expect(evaluateDataSource({ start: 0, stop: 3, step: 0 }, {})).toEqual([]);
  });

  test('handles collections and literals', () => {
    function* laps(): Generator<number> {
      yield 3;
      yield 5;
    }

    expect(evaluateDataSource(new Set(['a', 'b']), {})).toEqual(['a', 'b']);
    expect(evaluateDataSource([laps, 1], {})).toEqual([3, 5]);
    expect(evaluateDataSource([1, 2], {})).toEqual([1]);
    expect(evaluateDataSource([1, 2, 3], {})).toEqual([1, 2, 3]);
    expect(evaluateDataSource([[1, 2], 1], {})).toEqual([1, 2]);
    expect(evaluateDataSource('Bronze', {})).toEqual(['Bronze']);
    expect(evaluateDataSource(['Bronze', 1], {})).toEqual(['Bronze']);
    expect(evaluateDataSource([7, 1], {})).toEqual([7]);
    expect(evaluateDataSource([false, 1], {})).toEqual([false]);
  });

  test('falsy scalars are literal candidates', () => {
    expect(evaluateDataSource(0, {})).toEqual([0]);
    expect(evaluateDataSource(false, {})).toEqual([false]);
    expect(evaluateDataSource([() => 0, 1], {})).toEqual([0]);
  });

  test('nullish and empty results yield no candidates', () => {
    expect(evaluateDataSource('', {})).toEqual([]);
    expect(evaluateDataSource(['', 1], {})).toEqual([]);
    expect(evaluateDataSource(undefined, {})).toEqual([]);
    expect(evaluateDataSource(null, {})).toEqual([]);
    expect(evaluateDataSource([() => null, 1], {})).toEqual([]);
    expect(evaluateDataSource([() => [], 1], {})).toEqual([]);
  });
});

describe('dataSourceIdentifier', () => {
  test('names functions and runtime types', () => {
    function ranks(): string[] {
      return [];
    }

    expect(dataSourceIdentifier([ranks, 1])).toBe('ranks');
    expect(dataSourceIdentifier([ranks.bind(null), 1])).toBe('ranks');
    expect(dataSourceIdentifier([() => [1], 1])).toBe('anonymous');
    expect(dataSourceIdentifier([['a'], 1])).toBe('Array');
    expect(dataSourceIdentifier(new Set([1]))).toBe('Set');
    expect(dataSourceIdentifier({ start: 0, stop: 3 })).toBe('range');
    expect(dataSourceIdentifier('Bronze')).toBe('string');
    expect(dataSourceIdentifier(3)).toBe('number');
    expect(dataSourceIdentifier(null)).toBe('null');
    expect(dataSourceIdentifier(Object.create(null))).toBe('Object');
  });
});

describe('substitutePlaceholders', () => {
  test('replaces longer keys first in a single pass', () => {
    expect(
      substitutePlaceholders(
        'X and XX',
        new Map([
          ['X', '5'],
          ['XX', 'ten']
        ])
      )
    ).toBe('5 and ten');
    expect(
      substitutePlaceholders(
        'A B',
        new Map([
          ['A', 'B'],
          ['B', 'C']
        ])
      )
    ).toBe('B C');
  });
});

describe('retrieveTemplates', () => {
  test('treats a non-array result as empty with a warning', () => {
    const logger = createRecordingLogger();

    expect(retrieveTemplates(gameWith('nope'), logger)).toEqual([]);
    expect(logger.entries).toEqual([
      { level: 'warn', message: 'gameObjectiveTemplates() returned string, expected an array', meta: undefined }
    ]);
  });

  test('wraps failures in TemplateRetrievalError', () => {
    const failing = {
      gameObjectiveTemplates: () => {
        throw new Error('kaboom');
      }
    };

    expect(() => retrieveTemplates(failing)).toThrow(TemplateRetrievalError);
    expect(() => retrieveTemplates(failing)).toThrow('gameObjectiveTemplates() failed: kaboom');
    expect(() => retrieveTemplates({})).toThrow(TemplateRetrievalError);
  });
});

describe('sampleObjectives', () => {
  test('a weighted template only yields fully populated labels', () => {
    const game = gameWith([{ label: 'Win X matches', data: { X: [() => [1, 2, 3], 1] }, weight: 5 }]);

    const samples = sampleObjectives(game, 6, { random: createRng(7) });

    expect(samples).toHaveLength(6);
    for (const sample of samples) {
      expect(['Win 1 matches', 'Win 2 matches', 'Win 3 matches']).toContain(sample.label);
      expect(sample).toMatchObject({
        originalLabel: 'Win X matches',
        weight: 5,
        isDifficult: false,
        isTimeConsuming: false,
        dataComplexity: 1
      });
    }
  });

  test('never emits a label with an unresolved placeholder', () => {
    const game = gameWith([
      { label: 'Beat STAGE as CHAR', data: { STAGE: [() => ['Dojo'], 1], CHAR: [() => ['Ryu', 'Ken'], 1] } },
      { label: 'Collect ITEM', data: { ITEM: [() => [], 1] }, weight: 4 },
      { label: 'Find RELIC', data: { RELIC: [() => null, 1] } }
    ]);

    const samples = sampleObjectives(game, 10, { random: createRng(11) });

    expect(samples.length).toBeGreaterThan(0);
    for (const sample of samples) {
      expect(['Beat Dojo as Ryu', 'Beat Dojo as Ken']).toContain(sample.label);
      expect(sample.dataComplexity).toBe(2);
    }
  });

  test('prefers templates that were not drawn recently', () => {
    const game = gameWith([{ label: 'First' }, { label: 'Second' }]);

    const alternating = sampleObjectives(game, 4, { random: sequenceRandom([0, 0.9]) });
    const stuck = sampleObjectives(game, 4, { random: () => 0 });

    expect(alternating.map((sample) => sample.label)).toEqual(['First', 'Second', 'First', 'Second']);
    expect(stuck.map((sample) => sample.label)).toEqual(['First']);
  });

  test('filters difficult and time-consuming templates on request', () => {
    const game = gameWith([
      { label: 'Easy run' },
      { label: 'Hard run', isDifficult: true, weight: 10 },
      { label: 'Long run', isTimeConsuming: true, weight: 10 }
    ]);

    const samples = sampleObjectives(game, 5, {
      random: createRng(3),
      includeDifficult: false,
      includeTimeConsuming: false
    });

    expect(samples.map((sample) => sample.label)).toEqual(['Easy run', 'Easy run', 'Easy run', 'Easy run', 'Easy run']);
  });

  test('a literal paired with a count is used as the value', () => {
    const game = gameWith([{ label: 'Reach RANK', data: { RANK: ['Bronze', 1] } }]);

    const samples = sampleObjectives(game, 2, { random: sequenceRandom([0.1, 0.9]) });

    expect(samples.map((sample) => sample.label)).toEqual(['Reach Bronze', 'Reach Bronze']);
  });

  test('zero values still populate their templates', () => {
    const game = gameWith([
      { label: 'Score N points', data: { N: 0 } },
      { label: 'Finish with S lives', data: { S: [() => 0, 1] } }
    ]);

    const samples = sampleObjectives(game, 2, { random: sequenceRandom([0, 0, 0.9, 0]) });

    expect(samples.map((sample) => sample.label)).toEqual(['Score 0 points', 'Finish with 0 lives']);
  });

  test('returns nothing when no template can be populated', () => {
    const game = gameWith([{ label: 'Find RELIC', data: { RELIC: [() => null, 1] } }]);

    expect(sampleObjectives(game, 3, { random: createRng(5) })).toEqual([]);
    expect(sampleObjectives(gameWith([]), 3)).toEqual([]);
  });

  test('is reproducible for a given seed', () => {
    const game = loadArenaGame();

    const first = sampleObjectives(game, 6, { random: createRng(42) });
    const second = sampleObjectives(game, 6, { random: createRng(42) });

    expect(second).toEqual(first);
    const allowed = new Set([
      'Win 1 matches',
      'Win 2 matches',
      'Win 3 matches',
      'Reach Bronze with Vex',
      'Reach Bronze with Orin',
      'Reach Silver with Vex',
      'Reach Silver with Orin',
      'Play a full season on Harbor'
    ]);
    for (const sample of first) {
      expect(allowed.has(sample.label)).toBe(true);
    }
  });

  test('sampleFromTemplates ignores a non-positive count', () => {
    const records = normalizeTemplates([{ label: 'Only' }]);

    expect(sampleFromTemplates(records, {}, 0)).toEqual([]);
  });
});

describe('describeObjectives', () => {
  test('lists every template with its data sources', () => {
    expect(describeObjectives(loadArenaGame())).toEqual([
      { label: 'Win X matches', weight: 5, isDifficult: false, isTimeConsuming: false, data: { X: 'matchCounts' } },
      {
        label: 'Reach RANK with HERO',
        weight: 2,
        isDifficult: true,
        isTimeConsuming: false,
        data: { RANK: 'ranks', HERO: 'heroes' }
      },
      {
        label: 'Play a full season on MAP',
        weight: 1,
        isDifficult: false,
        isTimeConsuming: true,
        data: { MAP: 'maps' }
      }
    ]);
  });
});
