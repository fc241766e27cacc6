export * from './critics/index.js';
export * from './scoring/index.js';
export * from './evals/index.js';
export * from './providers/index.js';
export * from './loader/index.js';
export * from './results/index.js';
export { getEnv, parseEnv, type Env } from './config/env.js';
