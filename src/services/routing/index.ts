export * from './router.js';
export * from './fusion.js';
export * from './spec-builders.js';
export type * from './types.js';
