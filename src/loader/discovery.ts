import { readFile } from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import { DEFAULT_DISCOVERY_THRESHOLD } from '../lib/config';
import { noopLogger, type HarnessLogger } from '../lib/logger';
import { errorMessage, toTitleWords } from '../lib/utils';
import { PLUGIN_EXTENSIONS } from './sandbox';

export type DiscoveredImplementation = {
  /** File name relative to the discovery root. */
  file: string;
  filePath: string;
  confidence: number;
  name: string;
};

export type DiscoverOptions = {
  threshold?: number;
  logger?: HarnessLogger;
};

const IMPLEMENTATION_PATTERNS: readonly RegExp[] = [
  /class\s+\w*Game\b/,
  /\b(?:name|gameName)\s*[=:]\s*(['"`]).*\1/,
  /gameObjectiveTemplates/,
  /KeymastersKeepGamePlatforms/,
  /archipelagoOptions/
];

const IGNORED = ['**/*.d.ts', '**/*.test.*', '**/*.spec.*', '**/node_modules/**'];

export function scoreSource(source: string): number {
  return IMPLEMENTATION_PATTERNS.filter((pattern) => pattern.test(source)).length;
}

/** `space_marine-tactics.ts` → `Space Marine Tactics`. */
export function displayNameForFile(file: string): string {
  const stem = path.basename(file, path.extname(file));
  return toTitleWords(stem.replace(/[-_]+/g, ' '));
}

export async function listPluginFiles(directory: string): Promise<string[]> {
  const extensions = PLUGIN_EXTENSIONS.map((extension) => extension.slice(1)).join(',');
  const matches = await fg(`*.{${extensions}}`, {
    cwd: directory,
    onlyFiles: true,
    dot: false,
    ignore: IGNORED
  });
  return matches.sort((a, b) => a.localeCompare(b));
}

/**
 * Lists files in `directory` that look like game implementations: each
 * file is scored against a handful of source patterns and kept when it
 * reaches `threshold`. Most confident first, then by file name.
 */
export async function discoverImplementations(
  directory: string,
  options: DiscoverOptions = {}
): Promise<DiscoveredImplementation[]> {
  const root = path.resolve(directory);
  const threshold = options.threshold ?? DEFAULT_DISCOVERY_THRESHOLD;
  const logger = options.logger ?? noopLogger;

  const implementations: DiscoveredImplementation[] = [];
  for (const file of await listPluginFiles(root)) {
    const filePath = path.join(root, file);
    let source: string;
    try {
      source = await readFile(filePath, 'utf8');
    } catch (err) {
      logger.debug(`Skipping unreadable file ${file}: ${errorMessage(err)}`);
      continue;
    }
    const confidence = scoreSource(source);
    if (confidence >= threshold) {
      implementations.push({ file, filePath, confidence, name: displayNameForFile(file) });
    }
  }

  return implementations.sort((a, b) => b.confidence - a.confidence || a.file.localeCompare(b.file));
}
