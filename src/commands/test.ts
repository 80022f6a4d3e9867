import path from 'node:path';
import { isFile } from '../lib/fs';
import { loadAndTest, testImplementation, type HarnessOptions } from '../lib/harness';
import { PromptClosedError, PromptInterruptedError, type MenuPrompt } from '../lib/prompt';
import { discoverImplementations, listPluginFiles, type DiscoveredImplementation } from '../loader/discovery';
import { PLUGIN_EXTENSIONS, isPluginFile } from '../loader/sandbox';
import { LoadingSession } from '../loader/session';

export type RunOptions = HarnessOptions & {
  directory: string;
  threshold?: number;
  write: (line: string) => void;
};

export type TargetResolution =
  | { status: 'found'; filePath: string }
  | { status: 'missing' }
  | { status: 'ambiguous'; matches: string[] };

const MAX_CONFIDENCE_STARS = 5;

/**
 * Finds the file a command-line target names: an exact path, the path with
 * a plugin extension appended (`.ts` first), or a unique case-insensitive
 * substring of a plugin file name in `directory`.
 */
export async function resolveTarget(target: string, directory: string): Promise<TargetResolution> {
  const candidate = path.resolve(directory, target);
  if (isPluginFile(candidate) && (await isFile(candidate))) {
    return { status: 'found', filePath: candidate };
  }
  for (const extension of PLUGIN_EXTENSIONS) {
    if (await isFile(`${candidate}${extension}`)) {
      return { status: 'found', filePath: `${candidate}${extension}` };
    }
  }

  const needle = target.toLowerCase();
  const matches = (await listPluginFiles(directory)).filter((file) => file.toLowerCase().includes(needle));
  if (matches.length === 1) {
    return { status: 'found', filePath: path.resolve(directory, matches[0]) };
  }
  return matches.length === 0 ? { status: 'missing' } : { status: 'ambiguous', matches };
}

/** Tests one target; resolves to whether the implementation passed. */
export async function runSingleTarget(target: string, options: RunOptions): Promise<boolean> {
  const { write } = options;
  const resolution = await resolveTarget(target, options.directory);
  if (resolution.status === 'missing') {
    write(`[ERROR] File not found: ${target}`);
    write('Usage: keep-sim <game_file.ts>');
    return false;
  }
  if (resolution.status === 'ambiguous') {
    write(`[ERROR] '${target}' matches several files: ${resolution.matches.join(', ')}`);
    return false;
  }

  write(`Testing specific file: ${path.relative(options.directory, resolution.filePath)}`);
  const session = new LoadingSession({ logger: options.logger });
  try {
    const implementation = session.load(resolution.filePath);
    if (!implementation) {
      write(`[ERROR] Could not load ${target} as a game implementation`);
      return false;
    }
    return testImplementation(implementation, session.environment, options).status === 'succeeded';
  } finally {
    session.dispose();
  }
}

export function formatCandidates(implementations: readonly DiscoveredImplementation[]): string[] {
  return implementations.map((implementation, index) => {
    const stars = '*'.repeat(Math.min(implementation.confidence, MAX_CONFIDENCE_STARS));
    return `   ${index + 1}. ${implementation.name} (${implementation.file}) ${stars}`;
  });
}

export function formatMenu(implementations: readonly DiscoveredImplementation[]): string[] {
  const lines = ['', '='.repeat(40), 'TESTING MENU:', '   0. Exit'];
  implementations.forEach((implementation, index) => {
    lines.push(`   ${index + 1}. Test ${implementation.name}`);
  });
  lines.push(`   ${implementations.length + 1}. Test All Implementations`);
  lines.push(`   ${implementations.length + 2}. Rescan for New Files`);
  return lines;
}

function testFiles(files: readonly DiscoveredImplementation[], options: RunOptions): void {
  const session = new LoadingSession({ logger: options.logger });
  try {
    for (const implementation of files) {
      loadAndTest(session, implementation.filePath, options);
    }
  } finally {
    session.dispose();
  }
}

async function discover(options: RunOptions): Promise<DiscoveredImplementation[]> {
  return discoverImplementations(options.directory, { threshold: options.threshold, logger: options.logger });
}

/**
 * Interactive mode. Resolves once the user exits or interrupts. Returns
 * `false` without ever opening the prompt when nothing was discovered.
 */
export async function runMenu(options: RunOptions, createPrompt: () => MenuPrompt): Promise<boolean> {
  const { write } = options;
  write('Scanning for game implementations...');
  let implementations = await discover(options);

  if (implementations.length === 0) {
    write('[ERROR] No game implementation files found!');
    write('   This tool looks for .ts and .js files with game-like patterns');
    return false;
  }

  write(`Found ${implementations.length} potential implementation(s):`);
  for (const line of formatCandidates(implementations)) {
    write(line);
  }

  const prompt = createPrompt();
  try {
    for (;;) {
      for (const line of formatMenu(implementations)) {
        write(line);
      }
      const lastOption = implementations.length + 2;
      const answer = (await prompt.ask(`\nSelect option (0-${lastOption}): `)).trim();
      const selected = /^\d+$/.test(answer) ? Number.parseInt(answer, 10) : Number.NaN;

      if (selected === 0) {
        write('Goodbye!');
        break;
      }
      if (selected === implementations.length + 1) {
        write('');
        write('Testing all implementations...');
        testFiles(implementations, options);
      } else if (selected === lastOption) {
        write('Rescanning...');
        implementations = await discover(options);
        write(`Found ${implementations.length} implementation(s)`);
      } else if (selected >= 1 && selected <= implementations.length) {
        testFiles([implementations[selected - 1]], options);
      } else {
        write('[ERROR] Invalid choice. Please try again.');
      }
    }
  } catch (err) {
    if (err instanceof PromptInterruptedError) {
      write('');
      write('Interrupted by user. Goodbye!');
    } else if (err instanceof PromptClosedError) {
      write('Goodbye!');
    } else {
      throw err;
    }
  } finally {
    prompt.close();
  }
  return true;
}
