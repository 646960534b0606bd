export * from './expand.js';
export * from './fs-error.js';
export * from './path-guard.js';
export * from './path-lock.js';
