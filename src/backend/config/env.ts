/**
 * Centralized Environment Configuration
 *
 * Validates process.env with Zod once, at module load.
 * Import this module instead of reading process.env directly.
 */

import 'dotenv/config';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    CORS_ORIGIN: z.string().default('*'),

    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error', 'silent'])
        .default('info')
        .describe('Log level: debug, info, warn, error, silent'),
    LOG_PRETTY: booleanFlag.describe('Pretty-print logs through pino-pretty'),

    OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
    OLLAMA_CHAT_MODEL: z.string().min(1).default('llama3.2'),
    OLLAMA_EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),
    OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

    VECTOR_STORE_PATH: z.string().min(1).default(path.join('data', 'vectorstore.json')),
    RESOURCES_DIR: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment record, throwing ConfigurationError listing
 * every offending variable.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
    const result = envSchema.safeParse(source);
    if (!result.success) {
        const problems = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid environment configuration: ${problems}`);
    }
    return result.data;
}

export const env: Env = parseEnv(process.env);

/**
 * Grouped application settings derived from the environment.
 */
export interface AppConfig {
    port: number;
    corsOrigin: string;
    logLevel: Env['LOG_LEVEL'];
    logPretty: boolean;
    ollama: {
        baseUrl: string;
        chatModel: string;
        embeddingModel: string;
        timeoutMs: number;
    };
    vectorStorePath: string;
    resourcesDir: string;
}

/** Bundled templates and documents, relative to the compiled or source tree. */
export const DEFAULT_RESOURCES_DIR = path.resolve(__dirname, '..', '..', '..', 'resources');

export function loadConfig(source: Env = env): AppConfig {
    return {
        port: source.PORT,
        corsOrigin: source.CORS_ORIGIN,
        logLevel: source.NODE_ENV === 'test' ? 'silent' : source.LOG_LEVEL,
        logPretty: source.LOG_PRETTY,
        ollama: {
            baseUrl: source.OLLAMA_BASE_URL,
            chatModel: source.OLLAMA_CHAT_MODEL,
            embeddingModel: source.OLLAMA_EMBEDDING_MODEL,
            timeoutMs: source.OLLAMA_TIMEOUT_MS,
        },
        vectorStorePath: path.resolve(source.VECTOR_STORE_PATH),
        resourcesDir: source.RESOURCES_DIR
            ? path.resolve(source.RESOURCES_DIR)
            : DEFAULT_RESOURCES_DIR,
    };
}
