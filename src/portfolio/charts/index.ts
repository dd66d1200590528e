/**
 * Chart builders
 */

export * from './figure';
export * from './htmlExport';
export * from './options';
export * from './timeline';
export * from './radar';
export * from './heatmap';
export * from './treemap';
export * from './network';
