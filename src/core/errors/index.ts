export type * from './cache-error.js';
export * from './factories.js';
export * from './type-guards.js';
export * from './formatter.js';
