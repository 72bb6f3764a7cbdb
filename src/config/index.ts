// src/config/index.ts

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { AppConfig, AppSettings, Credentials } from '@/types';
import { ConfigError, getErrorMessage } from '@/utils/errors';
import { validateEnv, validateSettings, type EnvVars } from '@/utils/validators';
import { STORAGE_PATHS } from './storage';

export interface LoadConfigOptions {
    configPath?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Load the env file into process.env. Variables already set win.
 */
export const loadEnvFile = (envFile?: string): void => {
    const envPath = envFile ?? process.env.ENV_FILE ?? STORAGE_PATHS.config.env;
    if (fs.existsSync(envPath)) {
        dotenv.config({ path: envPath });
    }
};

const deepFreeze = (value: unknown): void => {
    if (typeof value === 'object' && value !== null) {
        Object.values(value).forEach(child => deepFreeze(child));
        Object.freeze(value);
    }
};

class ConfigManager {
    private readonly configPath: string;
    private readonly env: NodeJS.ProcessEnv;

    constructor(options: LoadConfigOptions = {}) {
        this.env = options.env ?? process.env;
        this.configPath = path.resolve(options.configPath ?? this.env.CONFIG_PATH ?? STORAGE_PATHS.config.settings);
    }

    /**
     * Read, validate and freeze the configuration snapshot
     */
    public load(): AppConfig {
        const settings = this.loadSettings();
        const env = this.loadEnv();
        const credentials = this.resolveCredentials(settings, env);

        const config: AppConfig = {
            ...settings,
            provider: {
                ...settings.provider,
                baseUrl: env.AI_BASE_URL ?? settings.provider.baseUrl,
                model: env.AI_MODEL ?? settings.provider.model
            },
            storage: {
                contentDir: path.resolve(settings.storage.contentDir),
                historyFile: path.resolve(settings.storage.historyFile)
            },
            notifications: {
                webhookUrl: env.NOTIFY_WEBHOOK_URL ?? settings.notifications.webhookUrl
            },
            credentials,
            app: {
                nodeEnv: env.NODE_ENV,
                logLevel: env.LOG_LEVEL
            }
        };

        deepFreeze(config);
        return config;
    }

    private loadSettings(): AppSettings {
        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
        } catch (error: unknown) {
            throw new ConfigError(`Cannot read settings file ${this.configPath}`, [getErrorMessage(error)]);
        }

        const result = validateSettings(raw);
        if (!result.successful || !result.data) {
            throw new ConfigError('Invalid settings file', result.error ? [result.error] : []);
        }
        return result.data;
    }

    private loadEnv(): EnvVars {
        const result = validateEnv(this.env);
        if (!result.successful || !result.data) {
            throw new ConfigError('Invalid environment', result.error ? [result.error] : []);
        }
        return result.data;
    }

    private resolveCredentials(settings: AppSettings, env: EnvVars): Credentials {
        const requiredEnvVars: (keyof EnvVars)[] = ['AI_API_KEY'];
        if (settings.platforms.includes('linkedin')) {
            requiredEnvVars.push('LINKEDIN_ACCESS_TOKEN', 'LINKEDIN_PERSON_URN');
        }
        if (settings.platforms.includes('medium')) {
            requiredEnvVars.push('MEDIUM_INTEGRATION_TOKEN');
        }

        // Check required environment variables
        const missingVars = requiredEnvVars.filter(envVar => !env[envVar]);
        if (missingVars.length > 0 || !env.AI_API_KEY) {
            throw new ConfigError('Missing required environment variables', missingVars);
        }

        const credentials: Credentials = { aiApiKey: env.AI_API_KEY };
        if (env.LINKEDIN_ACCESS_TOKEN && env.LINKEDIN_PERSON_URN) {
            credentials.linkedin = {
                accessToken: env.LINKEDIN_ACCESS_TOKEN,
                personUrn: env.LINKEDIN_PERSON_URN
            };
        }
        if (env.MEDIUM_INTEGRATION_TOKEN) {
            credentials.medium = { integrationToken: env.MEDIUM_INTEGRATION_TOKEN };
        }
        return credentials;
    }
}

export const loadConfig = (options: LoadConfigOptions = {}): AppConfig => {
    return new ConfigManager(options).load();
};

export { ConfigManager };
export default loadConfig;
