import pino from 'pino';
import { resolveRuntime } from '../config/runtime.js';

// built at import time, so a bad LOG_LEVEL must not make the import throw
export const logger = pino({
  base: undefined,
  level: resolveRuntime(process.env, { strict: false }).logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.epochTime,
});

const numLog = logger.child({ scope: 'num' });

export type ParseOutcome = 'sentinel' | 'null_argument' | 'format' | 'overflow';

/**
 * Debug trace for a parse that did not yield the literal's own value.
 */
export function traceFallback(fn: string, input: string | null | undefined, outcome: ParseOutcome) {
  if (!numLog.isLevelEnabled('debug')) return;
  numLog.debug({ fn, input: input ?? null, outcome }, `${fn} -> ${outcome}`);
}
