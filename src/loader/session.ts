import { readFileSync } from 'node:fs';
import path from 'node:path';
import { PluginLoadError } from '../errors';
import { createMockEnvironment, type MockEnvironment, type MockModuleName, type ModuleExports } from '../environment/mockEnvironment';
import { noopLogger, type HarnessLogger } from '../lib/logger';
import { errorMessage, escapeRegExp, isRecord, sanitizeIdentifier } from '../lib/utils';
import type { ClassLike, LoadedImplementation } from '../types';
import { executePlugin, transpilePlugin, type SyntheticSlot } from './sandbox';
import { createSynthesizedOptionType } from './synthesizedTypes';

export const DEFAULT_ROOT_PACKAGE = 'keep_root';
export const DEFAULT_PACKAGE_NAME = 'games';

export const TEMPLATE_METHOD = 'gameObjectiveTemplates';
export const NAME_ATTRIBUTES = ['name', 'gameName'] as const;

export type LoadingSessionOptions = {
  environment?: MockEnvironment;
  logger?: HarnessLogger;
  rootPackage?: string;
  packageName?: string;
};

export function isClass(value: unknown): value is ClassLike {
  return typeof value === 'function' && isRecord(value.prototype);
}

/**
 * The plugin-declared display name. The built-in `Function.name` is not
 * enumerable, so only a name the plugin assigned itself qualifies.
 */
export function readGameName(cls: ClassLike): string | null {
  for (const attribute of NAME_ATTRIBUTES) {
    let current: unknown = cls;
    while (typeof current === 'function' && current !== Function.prototype) {
      const descriptor = Object.getOwnPropertyDescriptor(current, attribute);
      if (descriptor?.enumerable && typeof descriptor.value === 'string') {
        return descriptor.value;
      }
      current = Object.getPrototypeOf(current);
    }
  }
  return null;
}

export function hasTemplateCapability(cls: ClassLike): boolean {
  return isRecord(cls.prototype) && typeof Reflect.get(cls.prototype, TEMPLATE_METHOD) === 'function';
}

export function readFieldDeclarations(cls: ClassLike): Record<string, unknown> | null {
  const fields: unknown = Reflect.get(cls, 'fields');
  return isRecord(fields) ? fields : null;
}

export function readOptionsClass(cls: ClassLike): ClassLike | null {
  const optionsCls: unknown = Reflect.get(cls, 'optionsCls');
  return isClass(optionsCls) ? optionsCls : null;
}

export function readClassName(cls: ClassLike, fallback: string): string {
  const descriptor = Object.getOwnPropertyDescriptor(cls, 'name');
  if (descriptor && !descriptor.enumerable && typeof descriptor.value === 'string' && descriptor.value) {
    return descriptor.value;
  }
  return fallback;
}

/**
 * One loading session: a private mock environment plus the synthetic module
 * slots handed out so far. Loads within a session never overwrite each
 * other; a second load of the same file name gets a suffixed slot.
 */
export class LoadingSession {
  readonly environment: MockEnvironment;
  private readonly logger: HarnessLogger;
  private readonly rootPackage: string;
  private readonly packageName: string;
  private readonly slots = new Set<string>();

  constructor(options: LoadingSessionOptions = {}) {
    this.environment = options.environment ?? createMockEnvironment();
    this.logger = options.logger ?? noopLogger;
    this.rootPackage = options.rootPackage ?? DEFAULT_ROOT_PACKAGE;
    this.packageName = options.packageName ?? DEFAULT_PACKAGE_NAME;
  }

  get loadedModules(): string[] {
    return [...this.slots];
  }

  /** Returns `null` (after logging why) instead of throwing. */
  load(filePath: string): LoadedImplementation | null {
    try {
      const implementation = this.loadOrThrow(filePath);
      if (!implementation) {
        this.logger.info(`No game class found in ${filePath}`);
      }
      return implementation;
    } catch (err) {
      const meta = err instanceof PluginLoadError ? { code: err.code } : undefined;
      this.logger.warn(`Could not load ${filePath}: ${errorMessage(err)}`, meta);
      return null;
    }
  }

  loadOrThrow(filePath: string): LoadedImplementation | null {
    const absolutePath = path.resolve(filePath);
    let source: string;
    try {
      source = readFileSync(absolutePath, 'utf8');
    } catch (err) {
      throw new PluginLoadError({
        code: 'read_failed',
        filePath: absolutePath,
        message: `Failed to read ${absolutePath}: ${errorMessage(err)}`,
        cause: err
      });
    }

    const slot = this.allocateSlot(absolutePath);
    const code = transpilePlugin(absolutePath, source);
    const imported = new Set<MockModuleName>();
    const moduleExports = executePlugin({
      filePath: absolutePath,
      code,
      slot,
      environment: this.environment,
      onFabricatedImport: (moduleName) => imported.add(moduleName)
    });

    const exportsRecord = this.normalizeExports(moduleExports, slot);
    const scope = this.collectScope(exportsRecord, imported);
    const synthesized = this.synthesizeMissingTypes(exportsRecord, scope, slot, source);

    const symbols = new Map(scope);
    for (const [name, type] of synthesized) {
      symbols.set(name, type);
    }

    const primary = this.findPrimaryClass(exportsRecord);
    if (!primary) {
      return null;
    }

    this.logger.debug(`Loaded ${primary.className} from ${absolutePath}`, {
      module: slot.fullName,
      synthesized: [...synthesized.keys()]
    });

    return {
      moduleName: slot.fullName,
      className: primary.className,
      gameName: primary.gameName,
      gameClass: primary.cls,
      symbols,
      exports: exportsRecord,
      filePath: absolutePath
    } satisfies LoadedImplementation;
  }

  /** Ends the session; the environment and slots go with it. */
  dispose(): void {
    this.slots.clear();
  }

  private allocateSlot(filePath: string): SyntheticSlot {
    const stem = path.basename(filePath, path.extname(filePath));
    const baseName = sanitizeIdentifier(stem) || 'plugin';
    let moduleName = baseName;
    let suffix = 2;
    while (this.slots.has(this.fullName(moduleName))) {
      moduleName = `${baseName}_${suffix}`;
      suffix += 1;
    }
    const fullName = this.fullName(moduleName);
    if (moduleName !== baseName) {
      this.logger.debug(`Module slot ${this.fullName(baseName)} already in use, loading as ${fullName}`);
    }
    this.slots.add(fullName);
    return {
      rootPackage: this.rootPackage,
      packageName: this.packageName,
      moduleName,
      fullName
    } satisfies SyntheticSlot;
  }

  private fullName(moduleName: string): string {
    return `${this.rootPackage}.${this.packageName}.${moduleName}`;
  }

  private normalizeExports(moduleExports: unknown, slot: SyntheticSlot): ModuleExports {
    if (isRecord(moduleExports)) {
      const record: ModuleExports = {};
      for (const key of Object.keys(moduleExports)) {
        record[key] = moduleExports[key];
      }
      return record;
    }
    if (isClass(moduleExports)) {
      return { [readClassName(moduleExports, slot.moduleName)]: moduleExports };
    }
    return {};
  }

  private collectScope(exportsRecord: ModuleExports, imported: Set<MockModuleName>): Map<string, unknown> {
    const scope = new Map<string, unknown>();
    for (const moduleName of imported) {
      for (const [symbol, value] of this.environment.symbols(moduleName)) {
        scope.set(symbol, value);
      }
    }
    for (const [key, value] of Object.entries(exportsRecord)) {
      scope.set(key, value);
      if (isClass(value)) {
        const className = readClassName(value, key);
        if (!scope.has(className)) {
          scope.set(className, value);
        }
        const optionsCls = readOptionsClass(value);
        if (optionsCls) {
          const optionsName = readClassName(optionsCls, `${key}Options`);
          if (!scope.has(optionsName)) {
            scope.set(optionsName, optionsCls);
          }
        }
      }
    }
    return scope;
  }

  /**
   * Every class with a `fields` record (exported, or reachable as some
   * exported class's `optionsCls`) gets a placeholder type for each
   * forward-reference name the module scope does not define. Only exports
   * are visible, so a class the module declares without exporting is
   * shadowed by the placeholder.
   */
  private synthesizeMissingTypes(
    exportsRecord: ModuleExports,
    scope: Map<string, unknown>,
    slot: SyntheticSlot,
    source: string
  ): Map<string, unknown> {
    const declaring = new Set<ClassLike>();
    for (const value of Object.values(exportsRecord)) {
      if (!isClass(value)) {
        continue;
      }
      declaring.add(value);
      const optionsCls = readOptionsClass(value);
      if (optionsCls) {
        declaring.add(optionsCls);
      }
    }

    const synthesized = new Map<string, unknown>();
    for (const cls of declaring) {
      const fields = readFieldDeclarations(cls);
      if (!fields) {
        continue;
      }
      for (const declared of Object.values(fields)) {
        if (typeof declared !== 'string' || scope.has(declared) || synthesized.has(declared)) {
          continue;
        }
        const type = createSynthesizedOptionType(declared);
        synthesized.set(declared, type);
        this.environment.register('Options', declared, type);
        if (new RegExp(`\\bclass\\s+${escapeRegExp(declared)}\\b`).test(source)) {
          this.logger.warn(
            `Option type ${declared} is declared but not exported from ${slot.fullName}, using a placeholder`,
            { module: slot.fullName, type: declared }
          );
        } else {
          this.logger.debug(`Synthesized option type ${declared}`, { module: slot.fullName });
        }
      }
    }
    return synthesized;
  }

  private findPrimaryClass(
    exportsRecord: ModuleExports
  ): { cls: ClassLike; className: string; gameName: string } | null {
    // First qualifying export wins. Export order follows the plugin's source
    // and is the only tie-break applied.
    for (const [key, value] of Object.entries(exportsRecord)) {
      if (!isClass(value)) {
        continue;
      }
      const gameName = readGameName(value);
      if (gameName === null) {
        continue;
      }
      const className = readClassName(value, key);
      const followsNaming = key.endsWith('Game') || className.endsWith('Game');
      if (followsNaming || hasTemplateCapability(value)) {
        return { cls: value, className, gameName };
      }
    }
    return null;
  }
}
