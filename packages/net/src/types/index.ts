export * from './config.js';
export * from './error.js';
