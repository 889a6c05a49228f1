/**
 * 🔒 ENVIRONMENT CONFIGURATION
 * Centralized .env with Zod validation. Values here override default.yaml.
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).optional(),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    LOG_DIR: z.string().min(1).optional(),
    SERVICE_NAME: z.string().default('product-titles'),
    CONFIG_PATH: z.string().min(1).optional(),
    STATIC_DIR: z.string().min(1).optional(),

    // 🧠 Entity oracle
    ORACLE_BACKEND: z.enum(['endpoint', 'openai']).optional(),
    ORACLE_ENDPOINT_URL: z.string().url().optional(),
    ORACLE_API_TOKEN: z.string().min(1).optional(),
    OPENAI_API_KEY: z.string().min(1).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

let envInstance: Env | null = null;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
    const result = EnvSchema.safeParse(source);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`);
    }
    return result.data;
}

export function getEnv(): Env {
    if (!envInstance) {
        envInstance = parseEnv(process.env);
    }
    return envInstance;
}
