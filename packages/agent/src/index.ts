// @toolgate/agent: sandboxed file and web tools behind a single dispatcher

export * from './types/index.js';
export * from './logging/index.js';
export * from './config/index.js';
export * from './sandbox/index.js';
export * from './execution/index.js';
export * from './tools/index.js';
export * from './toolbox.js';
