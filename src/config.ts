import { z } from 'zod';
import { DEFAULTS } from './types/options.js';
import { createInvalidInputError } from './types/errors.js';

export interface RuntimeConfig {
    baseUrl: string;
    timeoutMs: number;
    concurrency: number;
}

const envSchema = z.object({
    QUICKGO_BASE_URL: z.string().url().optional(),
    GO_ANNOTATE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    GO_ANNOTATE_CONCURRENCY: z.coerce.number().int().positive().optional(),
});

/**
 * Settings taken from the environment, falling back to DEFAULTS.
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw createInvalidInputError(`Invalid environment variable ${issue.path.join('.')}: ${issue.message}`);
    }
    return {
        baseUrl: parsed.data.QUICKGO_BASE_URL ?? DEFAULTS.baseUrl,
        timeoutMs: parsed.data.GO_ANNOTATE_TIMEOUT_MS ?? DEFAULTS.timeoutMs,
        concurrency: parsed.data.GO_ANNOTATE_CONCURRENCY ?? DEFAULTS.concurrency,
    };
}
