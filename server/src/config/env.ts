/**
 * Gateway configuration
 * Environment-sourced (server.ts loads .env first), validated once at startup.
 *
 * Precedence for the provider key: secret file > environment variable > default.
 */

import fs from 'fs';
import { z } from 'zod';
import { parseLogLevel, type LogLevel } from './logging.config.js';
import { logger } from '../lib/logger/structured-logger.js';

export const SERVICE_NAME = 'maps-gateway';
export const SERVICE_VERSION = '1.0.0';

const DEFAULT_CORS_ORIGINS = 'http://localhost:3000,http://127.0.0.1:3000';

const truthy = (value: string) => ['true', '1', 'yes'].includes(value.trim().toLowerCase());

const EnvSchema = z.object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    APP_NAME: z.string().min(1).default('Maps Gateway'),
    DEBUG: z.string().default('false').transform(truthy),
    LOG_LEVEL: z.string().optional(),
    GOOGLE_MAPS_API_KEY: z.string().default(''),
    CORS_ORIGINS: z
        .string()
        .default(DEFAULT_CORS_ORIGINS)
        .transform((s) => s.split(',').map((origin) => origin.trim()).filter((origin) => origin.length > 0)),
    API_TIMEOUT: z.coerce.number().positive().max(120).default(10),
    MAX_RESULTS: z.coerce.number().int().min(1).max(60).default(10),
});

export interface GatewayConfig {
    env: string;
    port: number;
    appName: string;
    debug: boolean;
    logLevel: LogLevel;
    googleMapsApiKey: string;
    /** Where the key came from, for startup logs only */
    apiKeySource: 'secret_file' | 'env' | 'none';
    corsOrigins: string[];
    apiTimeoutMs: number;
    maxResults: number;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Reads the key from a mounted secret file.
 * Unreadable or empty files yield undefined so the env variable can take over.
 */
export function readSecretFile(filePath: string | undefined): string | undefined {
    if (!filePath || !fs.existsSync(filePath)) {
        return undefined;
    }
    try {
        const value = fs.readFileSync(filePath, 'utf8').trim();
        return value.length > 0 ? value : undefined;
    } catch (error) {
        logger.warn({
            filePath,
            error: error instanceof Error ? error.message : String(error),
        }, '[Config] Failed to read API key secret file');
        return undefined;
    }
}

/** Empty strings count as unset, like a blank line in a .env file */
function blankToUndefined(value: string | undefined): string | undefined {
    return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
    const parsed = EnvSchema.safeParse({
        NODE_ENV: blankToUndefined(env.NODE_ENV),
        PORT: blankToUndefined(env.PORT),
        APP_NAME: blankToUndefined(env.APP_NAME),
        DEBUG: blankToUndefined(env.DEBUG),
        LOG_LEVEL: blankToUndefined(env.LOG_LEVEL),
        GOOGLE_MAPS_API_KEY: blankToUndefined(env.GOOGLE_MAPS_API_KEY),
        CORS_ORIGINS: blankToUndefined(env.CORS_ORIGINS),
        API_TIMEOUT: blankToUndefined(env.API_TIMEOUT),
        MAX_RESULTS: blankToUndefined(env.MAX_RESULTS),
    });

    if (!parsed.success) {
        const issues = parsed.error.flatten().fieldErrors;
        throw new ConfigError(`Invalid gateway config: ${JSON.stringify(issues)}`);
    }

    const data = parsed.data;
    const secretKey = readSecretFile(blankToUndefined(env.GOOGLE_MAPS_API_KEY_FILE));
    const envKey = data.GOOGLE_MAPS_API_KEY.trim();

    return {
        env: data.NODE_ENV,
        port: data.PORT,
        appName: data.APP_NAME,
        debug: data.DEBUG,
        logLevel: parseLogLevel(data.LOG_LEVEL),
        googleMapsApiKey: secretKey ?? envKey,
        apiKeySource: secretKey ? 'secret_file' : envKey ? 'env' : 'none',
        corsOrigins: data.CORS_ORIGINS,
        apiTimeoutMs: Math.round(data.API_TIMEOUT * 1000),
        maxResults: data.MAX_RESULTS,
    };
}

let cached: GatewayConfig | undefined;

export function getConfig(): GatewayConfig {
    if (!cached) {
        cached = loadConfig();
    }
    return cached;
}
