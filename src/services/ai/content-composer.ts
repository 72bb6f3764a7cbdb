// src/services/ai/content-composer.ts

import type { AppSettings, ComposedPost, SocialPlatform } from '@/types';
import { CONTENT_PROMPTS, PLATFORM_SPECIFIC_ADJUSTMENTS, SYSTEM_PROMPTS } from '@/data/templates/prompts';
import { CompositionError, ProviderError, getErrorMessage } from '@/utils/errors';
import { generateId, stringUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import type { CompletionClient } from './completion-client';

const logger = createServiceLogger('ContentComposer');

export class ContentComposer {
    constructor(
        private readonly completions: CompletionClient,
        private readonly settings: AppSettings['content'],
        private readonly now: () => Date = () => new Date()
    ) {}

    /**
     * Write a post for one platform, kept within the platform's character limit
     */
    public async compose(topic: string, platform: SocialPlatform, cycleId: string): Promise<ComposedPost> {
        const limit = this.settings.maxLength[platform];
        const targetLength = limit - PLATFORM_SPECIFIC_ADJUSTMENTS[platform].lengthMargin;

        logger.info('Composing post', { platform, topic, targetLength });

        const prompt = CONTENT_PROMPTS[platform]({
            topic,
            tone: this.settings.tone,
            avoidPhrases: this.settings.avoidPhrases,
            targetLength
        });

        let content = await this.generate(prompt, platform);
        for (let regenerations = 0; ; regenerations++) {
            const phrase = stringUtils.findPhrase(content, this.settings.avoidPhrases);
            if (!phrase) break;

            if (regenerations >= this.settings.maxRegenerations) {
                logger.warn('Keeping output that contains an avoided phrase', { platform, phrase });
                break;
            }

            logger.info('Output contains an avoided phrase, regenerating', { platform, phrase });
            content = await this.generate(prompt, platform);
        }

        if (content.length > limit) {
            logger.warn('Content too long, trimming', { platform, length: content.length, limit });
        }
        const body = stringUtils.truncateAtSentence(content, limit);

        const post: ComposedPost = {
            id: generateId(),
            cycleId,
            platform,
            topic,
            title: this.extractTitle(content, topic),
            body,
            characterCount: body.length,
            createdAt: this.now().toISOString(),
            status: 'pending'
        };

        logger.info('Post composed', { platform, postId: post.id, characterCount: post.characterCount, limit });
        return post;
    }

    /**
     * First line without markdown or emoji, or the topic when there is no separate title
     */
    public extractTitle(content: string, topic: string): string {
        const lines = content.trim().split('\n');
        if (lines.length < 2) {
            return topic;
        }

        const title = stringUtils.firstLine(content)
            .replace(/[^\p{L}\p{N}\s:!?-]/gu, '')
            .replace(/\s+/g, ' ')
            .trim();
        return title || topic;
    }

    private async generate(prompt: string, platform: SocialPlatform): Promise<string> {
        try {
            return await this.completions.complete({
                prompt,
                system: SYSTEM_PROMPTS.writer,
                maxTokens: this.settings.maxTokens,
                temperature: this.settings.temperature
            });
        } catch (error: unknown) {
            if (error instanceof ProviderError) {
                throw new CompositionError(`Failed to compose ${platform} post: ${getErrorMessage(error)}`, platform, { cause: error });
            }
            throw error;
        }
    }
}
