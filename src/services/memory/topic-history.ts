// src/services/memory/topic-history.ts

import fs from 'fs/promises';
import path from 'path';
import type { TopicHistoryEntry } from '@/types';
import { HISTORY_DEFAULTS } from '@/config/storage';
import { ArchiveError, getErrorMessage } from '@/utils/errors';
import { dateUtils, isRecord, safeJsonParse, stringUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { validateHistory } from '@/utils/validators';

const logger = createServiceLogger('TopicHistory');

/**
 * True when the normalised candidate equals, contains or is contained in a windowed topic.
 * Matching is on whole words, so "ai" never matches inside "email".
 */
export const isSimilarTopic = (candidate: string, used: string): boolean => {
    const a = stringUtils.normalizeTopic(candidate);
    const b = stringUtils.normalizeTopic(used);
    if (!a || !b) return false;
    return ` ${a} `.includes(` ${b} `) || ` ${b} `.includes(` ${a} `);
};

const isMissingFile = (error: unknown): boolean => isRecord(error) && error.code === 'ENOENT';

export class TopicHistory {
    private entries: TopicHistoryEntry[] = [];
    private loaded: boolean = false;

    constructor(
        private readonly historyFile: string,
        private readonly maxEntries: number = HISTORY_DEFAULTS.maxEntries,
        private readonly now: () => Date = () => new Date()
    ) {}

    /**
     * Load history from disk. A missing or invalid file starts an empty history;
     * any other read failure throws ArchiveError.
     */
    public async load(): Promise<TopicHistoryEntry[]> {
        let raw: string | null = null;
        try {
            raw = await fs.readFile(this.historyFile, 'utf-8');
        } catch (error: unknown) {
            if (!isMissingFile(error)) {
                logger.error('Failed to read topic history', error, { file: this.historyFile });
                throw new ArchiveError(`Failed to read topic history: ${getErrorMessage(error)}`, this.historyFile, { cause: error });
            }
        }

        if (raw === null) {
            logger.info('No existing topic history found, starting fresh');
            this.entries = [];
        } else {
            const result = validateHistory(safeJsonParse(raw, []));
            if (result.successful && result.data) {
                this.entries = result.data;
            } else {
                logger.warn('Topic history is invalid, starting fresh', { error: result.error });
                this.entries = [];
            }
        }

        this.loaded = true;
        return this.getEntries();
    }

    public getEntries(): TopicHistoryEntry[] {
        return this.entries.map(entry => ({ ...entry }));
    }

    /**
     * Newest `size` entries used within the last `days` days, oldest first
     */
    public async getWindow(size: number, days: number): Promise<TopicHistoryEntry[]> {
        await this.ensureLoaded();
        const now = this.now();
        return this.entries
            .slice(-size)
            .filter(entry => dateUtils.isWithinDays(entry.usedAt, days, now))
            .map(entry => ({ ...entry }));
    }

    /**
     * Record a topic as used and persist, keeping the newest entries only
     */
    public async append(topic: string): Promise<TopicHistoryEntry> {
        await this.ensureLoaded();

        const entry: TopicHistoryEntry = { topic, usedAt: this.now().toISOString() };
        const next = [...this.entries, entry].slice(-this.maxEntries);

        await this.saveToDisk(next);
        this.entries = next;

        logger.info('Topic history updated', { topic, size: next.length });
        return { ...entry };
    }

    private async ensureLoaded(): Promise<void> {
        if (!this.loaded) {
            await this.load();
        }
    }

    private async saveToDisk(entries: TopicHistoryEntry[]): Promise<void> {
        const tempFile = `${this.historyFile}.tmp`;
        try {
            await fs.mkdir(path.dirname(this.historyFile), { recursive: true });
            await fs.writeFile(tempFile, JSON.stringify(entries, null, 2));
            await fs.rename(tempFile, this.historyFile);
        } catch (error: unknown) {
            throw new ArchiveError(`Failed to save topic history: ${getErrorMessage(error)}`, this.historyFile, { cause: error });
        }
    }
}
