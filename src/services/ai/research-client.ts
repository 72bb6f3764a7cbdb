// src/services/ai/research-client.ts

import type { AppSettings, ResearchResult } from '@/types';
import { RESEARCH_PROMPTS, SYSTEM_PROMPTS } from '@/data/templates/prompts';
import { AbortedError } from '@/utils/errors';
import { arrayUtils, sleep } from '@/utils/helpers';
import { createServiceLogger, logPerformance } from '@/utils/logger';
import type { CompletionClient } from './completion-client';

const logger = createServiceLogger('ResearchClient');

export type PauseFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export class ResearchClient {
    constructor(
        private readonly completions: CompletionClient,
        private readonly settings: AppSettings['research'],
        private readonly random: () => number = Math.random,
        private readonly pause: PauseFn = sleep
    ) {}

    /**
     * Gather insights for a single seed query
     */
    public async research(seed: string): Promise<string> {
        logger.info('Researching seed', { seed });
        return this.completions.complete({
            prompt: RESEARCH_PROMPTS.insights(seed),
            system: SYSTEM_PROMPTS.research,
            maxTokens: this.settings.maxTokens,
            temperature: this.settings.temperature
        });
    }

    /**
     * Research seeds one after another, pausing between requests. The first failure ends the run.
     */
    public async researchSeeds(seeds: readonly string[], signal?: AbortSignal): Promise<ResearchResult[]> {
        const startTime = Date.now();
        const results: ResearchResult[] = [];

        for (const [index, seed] of seeds.entries()) {
            if (index > 0 && this.settings.pauseMs > 0) {
                await this.pause(this.settings.pauseMs, signal);
            }
            if (signal?.aborted) {
                throw new AbortedError('Research aborted');
            }
            const insights = await this.research(seed);
            results.push({ query: seed, insights });
        }

        logPerformance('research', startTime, { seeds: results.length });
        return results;
    }

    /**
     * Pick this cycle's seeds at random from the configured list
     */
    public pickSeeds(): string[] {
        const count = Math.min(this.settings.queriesPerCycle, this.settings.seeds.length);
        return arrayUtils.sample(this.settings.seeds, count, this.random);
    }
}
