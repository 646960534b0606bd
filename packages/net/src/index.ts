// @toolgate/net: guarded HTTP, URL policy, HTML and feed extraction

export * from './types/index.js';
export * from './utils/index.js';
