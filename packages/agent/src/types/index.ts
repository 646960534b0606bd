export * from './config.js';
export * from './error.js';
export * from './tool.js';
