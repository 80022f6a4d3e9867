import { Game } from '../game';
import { GameObjectiveTemplate } from '../game_objective_template';
import { OptionSet, Toggle } from '../../Options';

export class StarCourierRoutes extends OptionSet {
  static default = new Set(['Inner Belt', 'Outer Rim']);
}

export class StarCourierHardcore extends Toggle {}

export class StarCourierOptions {
  static fields: Record<string, unknown> = {
    starCourierRoutes: 'StarCourierRoutes',
    starCourierHardcore: 'StarCourierHardcore'
  };

  constructor(values: Record<string, unknown> = {}) {
    Object.assign(this, values);
  }
}

export class StarCourierGame extends Game {
  static gameName = 'Star Courier';
  static optionsCls = StarCourierOptions;

  gameObjectiveTemplates(): GameObjectiveTemplate[] {
    return [
      new GameObjectiveTemplate({
        label: 'Deliver CARGO along ROUTE',
        data: { CARGO: [this.cargo, 1], ROUTE: [this.routes, 1] },
        weight: 3
      })
    ];
  }

  cargo(): string[] {
    return ['medicine', 'ore'];
  }

  routes(): string[] {
    return ['Inner Belt'];
  }
}
