// tests/config.test.ts

import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '@/config';
import { ConfigError } from '@/utils/errors';
import { makeTempDir } from './support/fixtures';

const fullEnv = (): NodeJS.ProcessEnv => ({
    AI_API_KEY: 'test-secret',
    LINKEDIN_ACCESS_TOKEN: 'test-linkedin-token',
    LINKEDIN_PERSON_URN: 'urn:li:person:test-person',
    MEDIUM_INTEGRATION_TOKEN: 'test-medium-token'
});

const minimalSettings = {
    research: { seeds: ['edge inference'] },
    topics: { fallbackTopics: ['A Fallback Topic'] }
};

describe('loadConfig', () => {
    let dir: string;

    const writeSettings = async (settings: unknown): Promise<string> => {
        const file = path.join(dir, 'config.json');
        await fs.writeFile(file, JSON.stringify(settings));
        return file;
    };

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('loads the bundled settings file', () => {
        const config = loadConfig({
            configPath: path.resolve(__dirname, '../config/config.json'),
            env: fullEnv()
        });

        expect(config.platforms).toEqual(['linkedin', 'medium']);
        expect(config.topics.historyWindow).toBe(10);
        expect(config.content.maxLength).toEqual({ linkedin: 3000, medium: 5000 });
        expect(config.credentials.linkedin).toEqual({
            accessToken: 'test-linkedin-token',
            personUrn: 'urn:li:person:test-person'
        });
        expect(config.credentials.medium).toEqual({ integrationToken: 'test-medium-token' });
    });

    it('returns a deeply frozen snapshot', async () => {
        const config = loadConfig({ configPath: await writeSettings(minimalSettings), env: fullEnv() });

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.topics)).toBe(true);
        expect(Object.isFrozen(config.topics.fallbackTopics)).toBe(true);
        expect(Object.isFrozen(config.credentials)).toBe(true);
    });

    it('applies defaults for omitted sections', async () => {
        const config = loadConfig({ configPath: await writeSettings(minimalSettings), env: fullEnv() });

        expect(config.schedule).toEqual({ intervalHours: 6, runOnStart: true });
        expect(config.research.queriesPerCycle).toBe(3);
        expect(config.research.pauseMs).toBe(2000);
        expect(config.content.platformPauseMs).toBe(5000);
        expect(config.publishing.maxAttempts).toBe(1);
        expect(config.publishing.medium.publishStatus).toBe('public');
        expect(config.content.maxLength.linkedin).toBe(3000);
        expect(config.app).toEqual({ nodeEnv: 'development', logLevel: 'info' });
        expect(path.isAbsolute(config.storage.historyFile)).toBe(true);
    });

    it('lets the environment override the provider and webhook', async () => {
        const config = loadConfig({
            configPath: await writeSettings(minimalSettings),
            env: {
                ...fullEnv(),
                AI_MODEL: 'other-model',
                AI_BASE_URL: 'https://llm.example.test',
                NOTIFY_WEBHOOK_URL: 'https://hooks.example.test/notify',
                LOG_LEVEL: 'debug'
            }
        });

        expect(config.provider.model).toBe('other-model');
        expect(config.provider.baseUrl).toBe('https://llm.example.test');
        expect(config.notifications.webhookUrl).toBe('https://hooks.example.test/notify');
        expect(config.app.logLevel).toBe('debug');
    });

    it('names every missing credential', async () => {
        const configPath = await writeSettings(minimalSettings);
        const env = fullEnv();
        delete env.MEDIUM_INTEGRATION_TOKEN;
        delete env.LINKEDIN_PERSON_URN;

        expect(() => loadConfig({ configPath, env })).toThrow(ConfigError);
        expect(() => loadConfig({ configPath, env })).toThrow(
            'Missing required environment variables: LINKEDIN_PERSON_URN; MEDIUM_INTEGRATION_TOKEN'
        );
    });

    it('requires the provider key', async () => {
        const configPath = await writeSettings(minimalSettings);

        expect(() => loadConfig({ configPath, env: { ...fullEnv(), AI_API_KEY: '' } })).toThrow(
            'Missing required environment variables: AI_API_KEY'
        );
    });

    it('only requires credentials of enabled platforms', async () => {
        const config = loadConfig({
            configPath: await writeSettings({ ...minimalSettings, platforms: ['linkedin'] }),
            env: {
                AI_API_KEY: 'test-secret',
                LINKEDIN_ACCESS_TOKEN: 'test-linkedin-token',
                LINKEDIN_PERSON_URN: 'test-person'
            }
        });

        expect(config.platforms).toEqual(['linkedin']);
        expect(config.credentials.medium).toBeUndefined();
    });

    it('rejects invalid settings', async () => {
        const configPath = await writeSettings({
            ...minimalSettings,
            research: { seeds: ['edge inference'], queriesPerCycle: 0 }
        });

        expect(() => loadConfig({ configPath, env: fullEnv() })).toThrow(/^Invalid settings file: .*queriesPerCycle/);
    });

    it('rejects an invalid cron expression', async () => {
        const configPath = await writeSettings({
            ...minimalSettings,
            schedule: { cron: 'every tuesday' }
        });

        expect(() => loadConfig({ configPath, env: fullEnv() })).toThrow(ConfigError);
    });

    it('rejects unknown platforms', async () => {
        const configPath = await writeSettings({ ...minimalSettings, platforms: ['myspace'] });

        expect(() => loadConfig({ configPath, env: fullEnv() })).toThrow(ConfigError);
    });

    it('reports a missing settings file', () => {
        expect(() => loadConfig({ configPath: path.join(dir, 'absent.json'), env: fullEnv() })).toThrow(
            /^Cannot read settings file/
        );
    });
});
