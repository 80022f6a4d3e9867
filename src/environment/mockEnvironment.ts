import { Game, GameObjectiveTemplate } from './gameTypes';
import { OPTION_BASES, type OptionBases } from './options';
import { createPlatformEnum } from './platforms';

export const MOCK_MODULE_NAMES = ['Options', 'game', 'game_objective_template', 'enums'] as const;

export type MockModuleName = (typeof MOCK_MODULE_NAMES)[number];

export type ModuleExports = Record<string, unknown>;

const MOCK_MODULE_SET = new Set<string>(MOCK_MODULE_NAMES);

export function isMockModuleName(value: string): value is MockModuleName {
  return MOCK_MODULE_SET.has(value);
}

/**
 * The fabricated host modules for one loading session. Each session owns
 * its own instance, so synthesized types registered while loading one set
 * of plugins never leak into another session.
 */
export class MockEnvironment {
  readonly bases: OptionBases = OPTION_BASES;
  private readonly modules = new Map<MockModuleName, ModuleExports>();

  constructor() {
    for (const name of MOCK_MODULE_NAMES) {
      this.modules.set(name, Object.create(null));
    }
    for (const [symbol, value] of Object.entries(OPTION_BASES)) {
      this.register('Options', symbol, value);
    }
    this.register('game', 'Game', Game);
    this.register('game_objective_template', 'GameObjectiveTemplate', GameObjectiveTemplate);
    this.register('enums', 'KeymastersKeepGamePlatforms', createPlatformEnum());
  }

  /**
   * Adds `symbol` to `moduleName`. Registering a symbol that is already
   * present is a no-op; the existing value is returned either way.
   */
  register(moduleName: MockModuleName, symbol: string, value: unknown): unknown {
    const exports = this.requireModule(moduleName);
    if (Object.prototype.hasOwnProperty.call(exports, symbol)) {
      return exports[symbol];
    }
    exports[symbol] = value;
    return value;
  }

  has(moduleName: MockModuleName, symbol: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.requireModule(moduleName), symbol);
  }

  /** Live exports object handed to a plugin's `require`. */
  requireModule(moduleName: MockModuleName): ModuleExports {
    const exports = this.modules.get(moduleName);
    if (!exports) {
      throw new Error(`Mock module '${moduleName}' is not registered`);
    }
    return exports;
  }

  symbols(moduleName: MockModuleName): Array<[string, unknown]> {
    return Object.entries(this.requireModule(moduleName));
  }
}

export function createMockEnvironment(): MockEnvironment {
  return new MockEnvironment();
}
