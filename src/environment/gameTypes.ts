export type ObjectiveData = Record<string, unknown>;

export interface GameObjectiveTemplateInit {
  label: string;
  data?: ObjectiveData;
  isTimeConsuming?: boolean;
  isDifficult?: boolean;
  weight?: number;
}

/**
 * The host's objective record. Frozen once built; the data mapping keeps
 * the plugin's own descriptors so every draw re-evaluates them.
 */
export class GameObjectiveTemplate {
  readonly label: string;
  readonly data: ObjectiveData;
  readonly isTimeConsuming: boolean;
  readonly isDifficult: boolean;
  readonly weight: number;

  constructor(init: GameObjectiveTemplateInit) {
    this.label = init.label;
    this.data = Object.freeze({ ...(init.data ?? {}) });
    this.isTimeConsuming = init.isTimeConsuming ?? false;
    this.isDifficult = init.isDifficult ?? false;
    this.weight = init.weight ?? 1;
    Object.freeze(this);
  }
}

export class Game {
  archipelagoOptions: unknown;

  constructor(archipelagoOptions: unknown = null) {
    this.archipelagoOptions = archipelagoOptions;
  }

  gameObjectiveTemplates(): GameObjectiveTemplate[] {
    return [];
  }
}
