export * from './file-system.js';
export * from './search-engines.js';
export * from './web.js';
