import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { Env, getEnv } from './env';

const ConfigSchema = z.object({
    fetcher: z.object({
        timeout_ms: z.number().int().positive().default(10000),
        user_agent: z.string().min(1),
        accept_language: z.string().default('en-US,en;q=0.9'),
    }),
    extractor: z.object({
        heading_selectors: z.array(z.string().min(1)).min(1).default(['h1']),
        hint_elements: z.array(z.string().min(1)).min(1).default(['p', 'div', 'span']),
        class_hints: z.array(z.string().min(1)).min(1).default(['name', 'title']),
    }),
    scorer: z.object({
        target_label: z.string().min(1).default('PRODUCT'),
        min_length: z.number().int().min(0).default(2),
        max_candidates: z.number().int().positive().optional(),
    }),
    oracle: z.object({
        backend: z.enum(['endpoint', 'openai']).default('endpoint'),
        endpoint_url: z.string().url().optional(),
        api_token: z.string().min(1).optional(),
        openai_api_key: z.string().min(1).optional(),
        timeout_ms: z.number().int().positive().optional(),
        model: z.string().default('gpt-4o-mini'),
    }),
    server: z.object({
        port: z.number().int().min(0).max(65535).default(5000),
        static_dir: z.string().default('static'),
    }),
});

export type Config = z.infer<typeof ConfigSchema>;

let configInstance: Config | null = null;

export const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'config', 'default.yaml');

/**
 * Parses a raw YAML document into a validated Config. Environment values take
 * precedence over the file for secrets, the oracle backend and the server.
 */
export const parseConfig = (raw: unknown, env: Env): Config => {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
    }
    const config = result.data;

    return {
        ...config,
        oracle: {
            ...config.oracle,
            backend: env.ORACLE_BACKEND ?? config.oracle.backend,
            endpoint_url: env.ORACLE_ENDPOINT_URL ?? config.oracle.endpoint_url,
            api_token: env.ORACLE_API_TOKEN ?? config.oracle.api_token,
            openai_api_key: env.OPENAI_API_KEY ?? config.oracle.openai_api_key,
        },
        server: {
            port: env.PORT ?? config.server.port,
            static_dir: env.STATIC_DIR ?? config.server.static_dir,
        },
    };
};

export const loadConfig = (configPath?: string): Config => {
    if (configInstance) return configInstance;

    const env = getEnv();
    const validPath = configPath || env.CONFIG_PATH || DEFAULT_CONFIG_PATH;

    let raw: unknown;
    try {
        raw = yaml.load(fs.readFileSync(validPath, 'utf8'));
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Cannot read config at ${validPath}: ${reason}`);
    }

    configInstance = parseConfig(raw, env);
    return configInstance;
};

export const getConfig = (): Config => {
    if (!configInstance) {
        return loadConfig(); // Auto-load default
    }
    return configInstance;
};
