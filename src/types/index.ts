// src/types/index.ts

import type { SocialPlatform, MediumPublishStatus } from './social';

export interface ApiResponse<T = unknown> {
    data?: T;
    error?: string;
    message: string;
    successful: boolean;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface RetrySettings {
    maxAttempts: number;
    baseDelayMs: number;
    backoffMultiplier: number;
}

export interface AppSettings {
    schedule: {
        intervalHours: number;
        cron?: string;
        runOnStart: boolean;
    };
    platforms: SocialPlatform[];
    research: {
        seeds: string[];
        queriesPerCycle: number;
        maxTokens: number;
        temperature: number;
        pauseMs: number;
    };
    topics: {
        historyWindow: number;
        historyWindowDays: number;
        maxAttempts: number;
        maxHistoryEntries: number;
        fallbackTopics: string[];
    };
    content: {
        tone: string;
        avoidPhrases: string[];
        maxLength: Record<SocialPlatform, number>;
        maxTokens: number;
        temperature: number;
        maxRegenerations: number;
        platformPauseMs: number;
    };
    provider: {
        baseUrl: string;
        model: string;
        timeoutMs: number;
    };
    retry: RetrySettings;
    publishing: {
        timeoutMs: number;
        maxAttempts: number;
        medium: {
            publishStatus: MediumPublishStatus;
            tags: string[];
        };
    };
    storage: {
        contentDir: string;
        historyFile: string;
    };
    notifications: {
        webhookUrl?: string;
    };
}

export interface Credentials {
    aiApiKey: string;
    linkedin?: {
        accessToken: string;
        personUrn: string;
    };
    medium?: {
        integrationToken: string;
    };
}

export interface AppConfig extends AppSettings {
    credentials: Credentials;
    app: {
        nodeEnv: string;
        logLevel: LogLevel;
    };
}

export * from './content';
export * from './social';
