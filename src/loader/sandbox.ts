import { createRequire } from 'node:module';
import path from 'node:path';
import vm from 'node:vm';
import { transformSync, type Loader } from 'esbuild';
import { PluginLoadError } from '../errors';
import { isMockModuleName, type MockEnvironment, type MockModuleName } from '../environment/mockEnvironment';
import { errorMessage } from '../lib/utils';

export const PLUGIN_EXTENSIONS = ['.ts', '.mts', '.cts', '.js', '.mjs', '.cjs'] as const;

const PLUGIN_EXTENSION_SET = new Set<string>(PLUGIN_EXTENSIONS);

const TS_EXTENSIONS = new Set(['.ts', '.mts', '.cts']);

const ALLOWED_BUILTINS = new Set<string>([
  'path',
  'node:path',
  'util',
  'node:util',
  'crypto',
  'node:crypto',
  'events',
  'node:events',
  'assert',
  'node:assert',
  'url',
  'node:url'
]);

const MODULE_WRAPPER_PARAMS = ['exports', 'require', 'module', '__filename', '__dirname'];

/**
 * Location of one plugin inside the synthetic package tree:
 * `<rootPackage>.<packageName>.<moduleName>`. Relative imports climb from
 * here, so `../game` lands on the root package and `../../Options` above it.
 */
export type SyntheticSlot = {
  rootPackage: string;
  packageName: string;
  moduleName: string;
  fullName: string;
};

export function isPluginFile(filePath: string): boolean {
  return PLUGIN_EXTENSION_SET.has(path.extname(filePath).toLowerCase());
}

function stripExtension(segment: string): string {
  const extension = path.posix.extname(segment);
  if (extension && PLUGIN_EXTENSION_SET.has(extension)) {
    return segment.slice(0, -extension.length);
  }
  return segment;
}

/**
 * Maps an import specifier to one of the fabricated modules, or `null` when
 * it points anywhere else. Relative specifiers may only land on the root
 * package (`../game`) or above it (`../../Options`).
 */
export function resolveFabricatedSpecifier(specifier: string, slot: SyntheticSlot): MockModuleName | null {
  if (!specifier.startsWith('.')) {
    const bare = stripExtension(specifier);
    const scoped = bare.startsWith(`${slot.rootPackage}.`) ? bare.slice(slot.rootPackage.length + 1) : bare;
    return isMockModuleName(scoped) ? scoped : null;
  }

  const packageDir = path.posix.join('/', slot.rootPackage, slot.packageName);
  const resolved = path.posix.resolve(packageDir, specifier);
  const parent = path.posix.dirname(resolved);
  if (parent !== '/' && parent !== `/${slot.rootPackage}`) {
    return null;
  }
  const target = stripExtension(path.posix.basename(resolved));
  return isMockModuleName(target) ? target : null;
}

export function transpilePlugin(filePath: string, source: string): string {
  const extension = path.extname(filePath).toLowerCase();
  const loader: Loader = TS_EXTENSIONS.has(extension) ? 'ts' : 'js';
  try {
    const result = transformSync(source, {
      loader,
      format: 'cjs',
      platform: 'node',
      target: 'node20',
      sourcefile: filePath,
      logLevel: 'silent',
      // Static `name` / `gameName` fields must be defined, not assigned.
      tsconfigRaw: { compilerOptions: { useDefineForClassFields: true } }
    });
    return result.code;
  } catch (err) {
    throw new PluginLoadError({
      code: 'transpile_failed',
      filePath,
      message: `Failed to transpile ${path.basename(filePath)}: ${errorMessage(err)}`,
      cause: err
    });
  }
}

export type ExecutePluginOptions = {
  filePath: string;
  code: string;
  slot: SyntheticSlot;
  environment: MockEnvironment;
  onFabricatedImport?: (moduleName: MockModuleName) => void;
};

/**
 * Runs transpiled plugin code as a CommonJS module whose `require` only
 * hands out the session's fabricated modules and a few side-effect-free
 * built-ins. Returns whatever the module left in `module.exports`.
 */
export function executePlugin(options: ExecutePluginOptions): unknown {
  const { filePath, code, slot, environment } = options;
  const hostRequire = createRequire(filePath);

  const sandboxRequire = (specifier: string): unknown => {
    if (ALLOWED_BUILTINS.has(specifier)) {
      return hostRequire(specifier);
    }
    const target = resolveFabricatedSpecifier(specifier, slot);
    if (!target) {
      throw new PluginLoadError({
        code: 'resolution_failed',
        filePath,
        specifier,
        message: `Cannot resolve '${specifier}' from ${slot.fullName}`
      });
    }
    options.onFabricatedImport?.(target);
    return environment.requireModule(target);
  };

  const moduleRecord: { exports: unknown } = { exports: {} };

  let wrapper: Function;
  try {
    wrapper = vm.compileFunction(code, MODULE_WRAPPER_PARAMS, { filename: filePath });
  } catch (err) {
    throw new PluginLoadError({
      code: 'transpile_failed',
      filePath,
      message: `Failed to compile ${path.basename(filePath)}: ${errorMessage(err)}`,
      cause: err
    });
  }

  try {
    wrapper.call(
      moduleRecord.exports,
      moduleRecord.exports,
      sandboxRequire,
      moduleRecord,
      filePath,
      path.dirname(filePath)
    );
  } catch (err) {
    if (err instanceof PluginLoadError) {
      throw err;
    }
    throw new PluginLoadError({
      code: 'evaluation_failed',
      filePath,
      message: `Executing ${path.basename(filePath)} failed: ${errorMessage(err)}`,
      cause: err
    });
  }

  return moduleRecord.exports;
}
