import path from 'node:path';
import { rm, writeFile } from 'node:fs/promises';
import { afterEach, describe, expect, test } from 'vitest';
import { discoverImplementations, displayNameForFile, scoreSource } from '../src/loader/discovery';
import { copyFixtures, createTempDir } from './helpers';

const ALL_FIXTURES = [
  'arena_clash.js',
  'broken_import.js',
  'notes.js',
  'quiet_meadow.js',
  'star_courier.ts',
  'twin_games.js'
];

describe('scoreSource', () => {
  test('counts matching implementation patterns', () => {
    expect(scoreSource('export const notes = [];')).toBe(0);
    expect(scoreSource("class RallyGame extends Game {\n  static name = 'Rally';\n}")).toBe(2);
    expect(
      scoreSource(
        [
          'export class RallyGame extends Game {',
          "  static gameName = 'Rally';",
          '  static platform = KeymastersKeepGamePlatforms.PC;',
          '  gameObjectiveTemplates() { return this.archipelagoOptions ? [] : []; }',
          '}'
        ].join('\n')
      )
    ).toBe(5);
  });
});

describe('displayNameForFile', () => {
  test('title-cases the file stem', () => {
    expect(displayNameForFile('space_marine-tactics.ts')).toBe('Space Marine Tactics');
    expect(displayNameForFile('quiet_meadow.js')).toBe('Quiet Meadow');
  });
});

describe('discoverImplementations', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  test('keeps files at or above the threshold, most confident first', async () => {
    dir = await createTempDir();
    await copyFixtures(dir, ALL_FIXTURES);

    const found = await discoverImplementations(dir);

    expect(found.map(({ file, confidence, name }) => ({ file, confidence, name }))).toEqual([
      { file: 'arena_clash.js', confidence: 5, name: 'Arena Clash' },
      { file: 'broken_import.js', confidence: 3, name: 'Broken Import' },
      { file: 'quiet_meadow.js', confidence: 3, name: 'Quiet Meadow' },
      { file: 'star_courier.ts', confidence: 3, name: 'Star Courier' },
      { file: 'twin_games.js', confidence: 3, name: 'Twin Games' }
    ]);
    expect(found[0].filePath).toBe(path.join(dir, 'arena_clash.js'));
  });

  test('honours a custom threshold', async () => {
    dir = await createTempDir();
    await copyFixtures(dir, ALL_FIXTURES);

    const found = await discoverImplementations(dir, { threshold: 4 });

    expect(found.map((entry) => entry.file)).toEqual(['arena_clash.js']);
  });

  test('skips declaration and test files', async () => {
    dir = await createTempDir();
    const gameLike = "export class RallyGame extends Game {\n  static name = 'Rally';\n}\n";
    await writeFile(path.join(dir, 'rally.d.ts'), gameLike, 'utf8');
    await writeFile(path.join(dir, 'rally.test.ts'), gameLike, 'utf8');
    await writeFile(path.join(dir, 'rally.md'), gameLike, 'utf8');
    await writeFile(path.join(dir, 'rally.mts'), gameLike, 'utf8');

    const found = await discoverImplementations(dir);

    expect(found.map((entry) => entry.file)).toEqual(['rally.mts']);
  });

  test('returns nothing for an empty directory', async () => {
    dir = await createTempDir();

    await expect(discoverImplementations(dir)).resolves.toEqual([]);
  });
});
