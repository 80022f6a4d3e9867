export * from './catalog';
export * from './dataSources';
export * from './pool';
export * from './sampler';
