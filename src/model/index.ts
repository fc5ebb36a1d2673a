export * from './types.js';
export * from './relations.js';
export * from './memory-data-access.js';
export * from './model-form.js';
