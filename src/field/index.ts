export * from './field-spec.js';
export * from './types.js';
export * from './field.js';
export * from './field-registry.js';
export * from './kinds/index.js';
