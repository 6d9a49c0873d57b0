/**
 * 🔒 ENVIRONMENT CONFIGURATION
 * Centralized .env loading with zod validation. Invalid values refuse to load.
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';

import { ConfigurationError } from '../utils/errors';

dotenv.config();

const EnvSchema = z.object({
    // 🗄️ Database
    SQLITE_PATH: z.string().default('./data/profiles.db'),

    // 🌐 Rendering fallback (render sessions are disabled when unset)
    CHROME_PATH: z.string().min(1).optional(),

    // ⚙️ Batch settings
    BATCH_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(4),
    BATCH_BUDGET_MS: z.coerce.number().int().min(1000).optional(),
    // A record left "searching" longer than this may be searched again
    STALE_SEARCH_MS: z.coerce.number().int().min(60_000).default(30 * 60_000),

    // 📊 Scoring + policy file
    DISCOVERY_CONFIG_PATH: z.string().optional(),

    // 🏷️ Service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    SERVICE_NAME: z.string().default('profile-discovery'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function loadEnvConfig(source: NodeJS.ProcessEnv = process.env): EnvConfig {
    const result = EnvSchema.safeParse(source);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`);
    }
    return result.data;
}

export const config = loadEnvConfig();
