// src/utils/validators.ts

import Joi from 'joi';
import cron from 'node-cron';
import type { ApiResponse, AppSettings, ComposedPost, LogLevel, TopicHistoryEntry } from '@/types';
import { SOCIAL_PLATFORMS } from '@/types/social';
import { createApiResponse } from './helpers';

export interface EnvVars {
    AI_API_KEY?: string;
    AI_BASE_URL?: string;
    AI_MODEL?: string;
    LINKEDIN_ACCESS_TOKEN?: string;
    LINKEDIN_PERSON_URN?: string;
    MEDIUM_INTEGRATION_TOKEN?: string;
    NOTIFY_WEBHOOK_URL?: string;
    NODE_ENV: string;
    LOG_LEVEL: LogLevel;
}

const optionalString = () => Joi.string().trim().empty('');

/**
 * Environment variables validation schema. Presence of credentials is
 * checked by the config loader, which knows which platforms are enabled.
 */
const envSchema = Joi.object<EnvVars>({
    AI_API_KEY: optionalString(),
    AI_BASE_URL: optionalString().uri({ scheme: ['http', 'https'] }),
    AI_MODEL: optionalString(),
    LINKEDIN_ACCESS_TOKEN: optionalString(),
    LINKEDIN_PERSON_URN: optionalString(),
    MEDIUM_INTEGRATION_TOKEN: optionalString(),
    NOTIFY_WEBHOOK_URL: optionalString().uri({ scheme: ['http', 'https'] }),
    NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
    LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug').default('info')
});

const positiveInt = () => Joi.number().integer().min(1);

const cronExpression = Joi.string().custom((value: string, helpers) => {
    if (!cron.validate(value)) {
        return helpers.error('any.invalid');
    }
    return value;
}, 'cron expression');

/**
 * Settings file validation schema
 */
const settingsSchema = Joi.object<AppSettings>({
    schedule: Joi.object({
        intervalHours: Joi.number().positive().default(6),
        cron: cronExpression.optional(),
        runOnStart: Joi.boolean().default(true)
    }).default(),
    platforms: Joi.array()
        .items(Joi.string().valid(...SOCIAL_PLATFORMS))
        .unique()
        .min(1)
        .default([...SOCIAL_PLATFORMS]),
    research: Joi.object({
        seeds: Joi.array().items(Joi.string().trim().min(1)).min(1).required(),
        queriesPerCycle: positiveInt().default(3),
        maxTokens: positiveInt().default(1000),
        temperature: Joi.number().min(0).max(2).default(0.7),
        pauseMs: Joi.number().integer().min(0).default(2000)
    }).required(),
    topics: Joi.object({
        historyWindow: positiveInt().default(10),
        historyWindowDays: positiveInt().default(30),
        maxAttempts: positiveInt().default(3),
        maxHistoryEntries: positiveInt().default(50),
        fallbackTopics: Joi.array().items(Joi.string().trim().min(1)).min(1).required()
    }).required(),
    content: Joi.object({
        tone: Joi.string().default('conversational and personal'),
        avoidPhrases: Joi.array().items(Joi.string()).default([]),
        maxLength: Joi.object({
            linkedin: Joi.number().integer().min(200).default(3000),
            medium: Joi.number().integer().min(500).default(5000)
        }).default(),
        maxTokens: positiveInt().default(2000),
        temperature: Joi.number().min(0).max(2).default(0.85),
        maxRegenerations: Joi.number().integer().min(0).default(1),
        platformPauseMs: Joi.number().integer().min(0).default(5000)
    }).default(),
    provider: Joi.object({
        baseUrl: Joi.string().uri({ scheme: ['http', 'https'] }).default('https://api.perplexity.ai'),
        model: Joi.string().default('sonar'),
        timeoutMs: positiveInt().default(60000)
    }).default(),
    retry: Joi.object({
        maxAttempts: positiveInt().default(3),
        baseDelayMs: Joi.number().integer().min(0).default(2000),
        backoffMultiplier: Joi.number().min(1).default(2)
    }).default(),
    publishing: Joi.object({
        timeoutMs: positiveInt().default(30000),
        maxAttempts: positiveInt().default(1),
        medium: Joi.object({
            publishStatus: Joi.string().valid('public', 'draft', 'unlisted').default('public'),
            tags: Joi.array().items(Joi.string()).max(5).default([])
        }).default()
    }).default(),
    storage: Joi.object({
        contentDir: Joi.string().default('content'),
        historyFile: Joi.string().default('content/history.json')
    }).default(),
    notifications: Joi.object({
        webhookUrl: Joi.string().uri({ scheme: ['http', 'https'] }).optional()
    }).default()
});

const historySchema = Joi.array<TopicHistoryEntry[]>().items(
    Joi.object<TopicHistoryEntry>({
        topic: Joi.string().required(),
        usedAt: Joi.string().isoDate().required()
    }).unknown(true)
);

const composedPostSchema = Joi.object({
    platform: Joi.string().valid(...SOCIAL_PLATFORMS).required(),
    title: Joi.string().min(1).required(),
    body: Joi.string().trim().min(1).required()
}).unknown(true);

const describe = (error: Joi.ValidationError): string[] =>
    error.details.map(detail => detail.message);

/**
 * Validate environment variables
 */
export const validateEnv = (env: NodeJS.ProcessEnv): ApiResponse<EnvVars | undefined> => {
    const { error, value } = envSchema.validate(env, {
        allowUnknown: true,
        stripUnknown: true,
        abortEarly: false
    });

    if (error) {
        return createApiResponse(false, 'Environment validation failed', undefined, describe(error).join(', '));
    }

    return createApiResponse(true, 'Environment variables validated', value);
};

/**
 * Validate the settings file contents, applying defaults
 */
export const validateSettings = (raw: unknown): ApiResponse<AppSettings | undefined> => {
    const { error, value } = settingsSchema.validate(raw, { abortEarly: false });

    if (error) {
        return createApiResponse(false, 'Settings validation failed', undefined, describe(error).join(', '));
    }

    return createApiResponse(true, 'Settings validated', value);
};

/**
 * Validate persisted topic history
 */
export const validateHistory = (raw: unknown): ApiResponse<TopicHistoryEntry[] | undefined> => {
    const { error, value } = historySchema.validate(raw, { stripUnknown: true });

    if (error) {
        return createApiResponse(
            false,
            'Topic history validation failed',
            undefined,
            error.details[0]?.message || 'Unknown validation error'
        );
    }

    return createApiResponse(true, 'Topic history validated', value);
};

/**
 * Validate a composed post before it is sent to a platform
 */
export const validateComposedPost = (post: ComposedPost, maxLength: number): ApiResponse<boolean> => {
    const { error } = composedPostSchema.validate(post);

    if (error) {
        return createApiResponse(
            false,
            'Post validation failed',
            false,
            error.details[0]?.message || 'Unknown validation error'
        );
    }

    if (post.body.length > maxLength) {
        return createApiResponse(
            false,
            'Post content too long',
            false,
            `Content exceeds ${post.platform} limit of ${maxLength} characters`
        );
    }

    return createApiResponse(true, 'Post validated', true);
};
