import type { ModuleExports } from './environment/mockEnvironment';

/** Any constructor discovered at run time inside a plugin module. */
export type ClassLike = Function;

/** Names visible to one plugin load, for forward-reference resolution. */
export type SymbolTable = ReadonlyMap<string, unknown>;

export interface LoadedImplementation {
  moduleName: string;
  className: string;
  gameName: string;
  gameClass: ClassLike;
  symbols: SymbolTable;
  exports: ModuleExports;
  filePath: string;
}

export interface ObjectiveTemplateRecord {
  label: string;
  data: Record<string, unknown>;
  weight: number;
  isDifficult: boolean;
  isTimeConsuming: boolean;
  /** The plugin's original template object; its identity drives the recently-used set. */
  source: object;
}

export interface SampledObjective {
  label: string;
  originalLabel: string;
  weight: number;
  isDifficult: boolean;
  isTimeConsuming: boolean;
  dataComplexity: number;
}

export interface AnalysisReport {
  totalObjectives: number;
  weightDistribution: Map<number, number>;
  features: string[];
  categories: string[];
  specialMethods: string[];
  dataSources: Set<string>;
  complexityScore: number;
}

export interface ObjectiveCatalogEntry {
  label: string;
  weight: number;
  isDifficult: boolean;
  isTimeConsuming: boolean;
  data: Record<string, string>;
}
