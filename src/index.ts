export * from './lib/num/index.js';
export { logger } from './utils/logger.js';
export { resolveRuntime } from './config/runtime.js';
export type { Runtime, LogLevel } from './config/runtime.js';
