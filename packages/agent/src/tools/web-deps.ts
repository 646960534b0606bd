import type { WebClient } from '../execution/web.js';

export type WebToolDeps = {
  readonly web: WebClient;
};
