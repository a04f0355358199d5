import { z } from 'zod';
import { isTestEnv } from '../util/env.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Runtime = {
    logLevel: LogLevel;
};

const envSchema = z.object({
    LOG_LEVEL: z
        .string()
        .trim()
        .toLowerCase()
        .pipe(z.enum(LOG_LEVELS))
        .optional(),
});

export type ResolveOptions = {
    /** Throw on an invalid LOG_LEVEL; otherwise fall back to `warn`. Defaults to true. */
    strict?: boolean;
};

export function resolveRuntime(env: NodeJS.ProcessEnv = process.env, opts: ResolveOptions = {}): Runtime {
    /* tests stay quiet regardless of LOG_LEVEL */
    if (isTestEnv(env)) return { logLevel: 'silent' };
    const parsed = envSchema.safeParse({ LOG_LEVEL: env.LOG_LEVEL || undefined });
    if (!parsed.success) {
        if (opts.strict === false) return { logLevel: 'warn' };
        throw new Error(
            `Invalid LOG_LEVEL "${env.LOG_LEVEL}": expected one of ${LOG_LEVELS.join(', ')}`,
            { cause: parsed.error },
        );
    }
    return { logLevel: parsed.data.LOG_LEVEL ?? 'warn' };
}
