export * from './profile.js';
export * from './dependency-groups.js';
export * from './form.js';
