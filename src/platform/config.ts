import dotenv from 'dotenv';
import path from 'path';
import type { AzureOpenAIConfig } from '../types/config.js';
import { ChatMode } from '../features/chat/domain/ChatMode.js';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
    server: {
        host: string;
        port: number;
    };
    auth: {
        sharedPassword: string;
        sessionTtlMinutes: number;
        maxConcurrentSessions: number;
        /** Registered-user ceiling; never above MAX_USERS_LIMIT */
        maxUsers: number;
    };
    azure: AzureOpenAIConfig;
    prompts: {
        dir: string;
    };
    logging: {
        level: LogLevel;
        dir: string;
        toFile: boolean;
        silent: boolean;
    };
}

export const MAX_USERS_LIMIT = 3;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const NUMBER_STRING_REGEX = /^-?\d+(?:\.\d+)?$/;

const readNumber = (raw: string | undefined, fallback: number): number => {
    if (raw === undefined || !NUMBER_STRING_REGEX.test(raw.trim())) return fallback;
    const parsed = Number(raw.trim());
    return Number.isFinite(parsed) ? parsed : fallback;
};

const readPositiveInt = (raw: string | undefined, fallback: number): number => {
    const value = Math.floor(readNumber(raw, fallback));
    return value >= 1 ? value : fallback;
};

const readBoolean = (raw: string | undefined, fallback: boolean): boolean => {
    if (raw === undefined) return fallback;
    const normalized = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return fallback;
};

const readLogLevel = (raw: string | undefined): LogLevel => {
    const normalized = raw?.trim().toLowerCase();
    return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
};

/**
 * Builds the typed configuration from an environment map.
 * Never throws: missing required values stay empty and are reported by
 * findMissingConfig so the app can start in a not-ready state.
 */
export function buildConfig(env: NodeJS.ProcessEnv): Config {
    const isTest = env.NODE_ENV === 'test';
    return {
        server: {
            host: env.HOST || '127.0.0.1',
            port: readPositiveInt(env.PORT, 3000),
        },
        auth: {
            sharedPassword: env.APP_PASSWORD || '',
            sessionTtlMinutes: readPositiveInt(env.SESSION_TTL_MINUTES, 60),
            maxConcurrentSessions: readPositiveInt(env.MAX_CONCURRENT_SESSIONS, 2),
            maxUsers: Math.min(readPositiveInt(env.MAX_USERS, MAX_USERS_LIMIT), MAX_USERS_LIMIT),
        },
        azure: {
            apiKey: env.AZURE_OPENAI_API_KEY || '',
            endpoint: (env.AZURE_OPENAI_ENDPOINT || '').replace(/\/+$/, ''),
            apiVersion: env.AZURE_OPENAI_API_VERSION || '2024-02-15-preview',
            deployments: {
                [ChatMode.QA]: env.AZURE_OPENAI_QA_DEPLOYMENT || 'gpt-4o',
                [ChatMode.NORMAL]: env.AZURE_OPENAI_NORMAL_DEPLOYMENT || 'gpt-4o',
            },
            temperature: readNumber(env.AZURE_OPENAI_TEMPERATURE, 0.7),
            timeoutMs: readPositiveInt(env.COMPLETION_TIMEOUT_SECONDS, 30) * 1000,
        },
        prompts: {
            dir: env.PROMPT_DIR || path.resolve(process.cwd(), 'prompts'),
        },
        logging: {
            level: readLogLevel(env.LOG_LEVEL),
            dir: env.LOG_DIR || path.resolve(process.cwd(), 'logs'),
            toFile: readBoolean(env.LOG_TO_FILE, !isTest),
            silent: readBoolean(env.LOG_SILENT, isTest),
        },
    };
}

/**
 * Names of the required environment variables that are not set.
 * Only names are reported, never values.
 */
export function findMissingConfig(cfg: Config): string[] {
    const required: Array<[string, string]> = [
        ['APP_PASSWORD', cfg.auth.sharedPassword],
        ['AZURE_OPENAI_API_KEY', cfg.azure.apiKey],
        ['AZURE_OPENAI_ENDPOINT', cfg.azure.endpoint],
    ];
    return required.filter(([, value]) => !value).map(([name]) => name);
}

const config: Config = buildConfig(process.env);

export default config;
