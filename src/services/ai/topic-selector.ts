// src/services/ai/topic-selector.ts

import type { AppSettings, ResearchResult, TopicHistoryEntry } from '@/types';
import { SYSTEM_PROMPTS, TOPIC_PROMPTS } from '@/data/templates/prompts';
import { ProviderError } from '@/utils/errors';
import { stringUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { isSimilarTopic, type TopicHistory } from '@/services/memory/topic-history';
import type { CompletionClient } from './completion-client';

const logger = createServiceLogger('TopicSelector');

const TOPIC_MAX_TOKENS = 100;
const TOPIC_TEMPERATURE = 0.8;

export type TopicSource = 'model' | 'fallback';

export interface TopicSelection {
    topic: string;
    source: TopicSource;
    attempts: number;
}

export class TopicSelector {
    constructor(
        private readonly completions: CompletionClient,
        private readonly history: TopicHistory,
        private readonly settings: AppSettings['topics']
    ) {}

    /**
     * Choose a topic that is not in the recent window, then record it
     */
    public async selectTopic(research: readonly ResearchResult[]): Promise<TopicSelection> {
        const window = await this.history.getWindow(this.settings.historyWindow, this.settings.historyWindowDays);
        const insights = this.combineInsights(research);

        let attempts = 0;
        let selection: TopicSelection | undefined;

        while (attempts < this.settings.maxAttempts) {
            attempts++;

            let answer: string;
            try {
                answer = await this.completions.complete({
                    prompt: TOPIC_PROMPTS.selectTopic({
                        insights,
                        recentTopics: window.map(entry => entry.topic)
                    }),
                    system: SYSTEM_PROMPTS.writer,
                    maxTokens: TOPIC_MAX_TOKENS,
                    temperature: TOPIC_TEMPERATURE
                });
            } catch (error: unknown) {
                if (error instanceof ProviderError) {
                    logger.error('Topic request failed, using fallback', error, { attempt: attempts });
                    break;
                }
                throw error;
            }

            const candidate = this.cleanTopic(answer);
            if (!candidate) {
                logger.warn('Model returned an empty topic', { attempt: attempts });
                continue;
            }

            const match = window.find(entry => isSimilarTopic(candidate, entry.topic));
            if (match) {
                logger.warn('Rejected recently used topic', { candidate, matches: match.topic, attempt: attempts });
                continue;
            }

            selection = { topic: candidate, source: 'model', attempts };
            break;
        }

        if (!selection) {
            selection = { topic: this.pickFallback(window), source: 'fallback', attempts };
        }

        await this.history.append(selection.topic);
        logger.info('Topic selected', { ...selection });
        return selection;
    }

    /**
     * Trim, take the first line and strip quotes or a leading label
     */
    public cleanTopic(answer: string): string {
        const line = stringUtils.firstLine(answer).replace(/^[#*\s]+|[*\s]+$/g, '');
        const unlabeled = stringUtils.stripWrappingQuotes(line).replace(/^(topic|title)\s*:\s*/i, '');
        return stringUtils.stripWrappingQuotes(unlabeled);
    }

    /**
     * First fallback outside the window, else the one used longest ago
     */
    public pickFallback(window: readonly TopicHistoryEntry[]): string {
        const fallbacks = this.settings.fallbackTopics;

        const fresh = fallbacks.find(topic => !window.some(entry => isSimilarTopic(topic, entry.topic)));
        if (fresh !== undefined) {
            return fresh;
        }

        const lastUsed = (topic: string): number => {
            const times = window
                .filter(entry => isSimilarTopic(topic, entry.topic))
                .map(entry => Date.parse(entry.usedAt));
            return times.length > 0 ? Math.max(...times) : 0;
        };

        let oldest = fallbacks[0] ?? '';
        for (const topic of fallbacks) {
            if (lastUsed(topic) < lastUsed(oldest)) {
                oldest = topic;
            }
        }

        logger.warn('All fallback topics used recently, reusing the oldest', { topic: oldest });
        return oldest;
    }

    private combineInsights(research: readonly ResearchResult[]): string {
        return research
            .map(result => `Topic: ${result.query}\nInsights: ${result.insights}`)
            .join('\n\n');
    }
}
