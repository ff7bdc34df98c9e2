// src/config.ts

import { z } from 'zod';
import { ConfigError } from './errors';

const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    STORE_DRIVER: z.enum(['supabase', 'memory']).default('supabase'),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_KEY: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
});

export type StoreDriver = 'supabase' | 'memory';

export interface AppConfig {
    port: number;
    logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
    store:
        | { driver: 'supabase'; url: string; key: string }
        | { driver: 'memory' };
}

/**
 * Read configuration from the environment
 *
 * Supabase credentials are only required for the supabase driver.
 * Throws ConfigError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // Empty strings count as unset
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );

    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const { PORT, STORE_DRIVER, SUPABASE_URL, SUPABASE_KEY, LOG_LEVEL } = parsed.data;

    if (STORE_DRIVER === 'memory') {
        return { port: PORT, logLevel: LOG_LEVEL, store: { driver: 'memory' } };
    }

    if (!SUPABASE_URL || !SUPABASE_KEY) {
        throw new ConfigError(['SUPABASE_URL and SUPABASE_KEY are required for the supabase store']);
    }

    return {
        port: PORT,
        logLevel: LOG_LEVEL,
        store: { driver: 'supabase', url: SUPABASE_URL, key: SUPABASE_KEY }
    };
}
