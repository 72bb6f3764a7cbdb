// tests/support/fixtures.ts

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { AppConfig } from '@/types';

export const makeTempDir = (): Promise<string> =>
    fs.mkdtemp(path.join(os.tmpdir(), 'content-cycle-'));

export const noDelay = async (): Promise<void> => undefined;

export const buildConfig = (root: string): AppConfig => ({
    schedule: { intervalHours: 6, runOnStart: true },
    platforms: ['linkedin', 'medium'],
    research: {
        seeds: ['vector databases', 'edge inference'],
        queriesPerCycle: 2,
        maxTokens: 500,
        temperature: 0.7,
        pauseMs: 2000
    },
    topics: {
        historyWindow: 10,
        historyWindowDays: 30,
        maxAttempts: 3,
        maxHistoryEntries: 50,
        fallbackTopics: ['Fallback Topic One', 'Fallback Topic Two']
    },
    content: {
        tone: 'plain and friendly',
        avoidPhrases: ['delve'],
        maxLength: { linkedin: 3000, medium: 5000 },
        maxTokens: 2000,
        temperature: 0.85,
        maxRegenerations: 1,
        platformPauseMs: 5000
    },
    provider: { baseUrl: 'https://llm.test', model: 'test-model', timeoutMs: 1000 },
    retry: { maxAttempts: 3, baseDelayMs: 0, backoffMultiplier: 2 },
    publishing: {
        timeoutMs: 1000,
        maxAttempts: 1,
        medium: { publishStatus: 'draft', tags: ['ai'] }
    },
    storage: {
        contentDir: path.join(root, 'content'),
        historyFile: path.join(root, 'content', 'history.json')
    },
    notifications: {},
    credentials: {
        aiApiKey: 'test-secret',
        linkedin: { accessToken: 'test-linkedin-token', personUrn: 'urn:li:person:test-person' },
        medium: { integrationToken: 'test-medium-token' }
    },
    app: { nodeEnv: 'test', logLevel: 'error' }
});

export const readJson = async (file: string): Promise<unknown> =>
    JSON.parse(await fs.readFile(file, 'utf-8'));
