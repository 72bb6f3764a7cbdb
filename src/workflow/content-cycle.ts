// src/workflow/content-cycle.ts

import type { ComposedPost, CyclePostSummary, CycleReport, PublishResult, SocialPlatform } from '@/types';
import type { PauseFn, ResearchClient } from '@/services/ai/research-client';
import type { TopicSelector } from '@/services/ai/topic-selector';
import type { ContentComposer } from '@/services/ai/content-composer';
import type { ContentArchive } from '@/services/memory/archive';
import type { BasePublisher } from '@/services/social/base-publisher';
import type { Notifier } from '@/services/notify/webhook';
import { AbortedError, AppError, CompositionError, getErrorMessage } from '@/utils/errors';
import { generateId } from '@/utils/helpers';
import { createServiceLogger, logPerformance } from '@/utils/logger';

const logger = createServiceLogger('ContentCycle');

export interface CycleContext {
    research: ResearchClient;
    selector: TopicSelector;
    composer: ContentComposer;
    archive: ContentArchive;
    publishers: Partial<Record<SocialPlatform, BasePublisher>>;
    platforms: readonly SocialPlatform[];
    notifier: Notifier;
    platformPauseMs: number;
    pause: PauseFn;
    now?: () => Date;
}

const applyPublishResult = (post: ComposedPost, result: PublishResult): ComposedPost => {
    if (result.success) {
        return {
            ...post,
            status: 'published',
            publish: { postId: result.postId, url: result.url, publishedAt: result.publishedAt }
        };
    }
    return {
        ...post,
        status: 'failed',
        publish: {
            error: result.error.message,
            errorKind: result.error.kind,
            statusCode: result.error.statusCode
        }
    };
};

/**
 * research -> topic -> per platform: compose, publish, archive
 */
export const runContentCycle = async (context: CycleContext, signal?: AbortSignal): Promise<CycleReport> => {
    const now = context.now ?? (() => new Date());
    const startTime = Date.now();
    const cycleId = generateId();
    const report: CycleReport = {
        cycleId,
        startedAt: now().toISOString(),
        finishedAt: '',
        outcome: 'completed',
        posts: [],
        errors: []
    };

    const finish = (outcome: CycleReport['outcome']): CycleReport => {
        report.outcome = outcome;
        report.finishedAt = now().toISOString();
        logPerformance('content cycle', startTime, { cycleId, outcome, topic: report.topic });
        return report;
    };

    const checkAborted = () => {
        if (signal?.aborted) {
            throw new AbortedError('Cycle stopped');
        }
    };

    logger.info('Starting content cycle', { cycleId, platforms: [...context.platforms] });

    try {
        const seeds = context.research.pickSeeds();
        const research = await context.research.researchSeeds(seeds, signal);
        checkAborted();

        const selection = await context.selector.selectTopic(research);
        report.topic = selection.topic;

        for (const [index, platform] of context.platforms.entries()) {
            if (index > 0 && context.platformPauseMs > 0) {
                await context.pause(context.platformPauseMs, signal);
            }
            checkAborted();
            const summary = await runPlatform(context, platform, selection.topic, cycleId, report);
            report.posts.push(summary);
        }
    } catch (error: unknown) {
        if (error instanceof AbortedError) {
            logger.warn('Content cycle aborted', { cycleId, topic: report.topic });
            report.errors.push(error.message);
            return finish('aborted');
        }

        const message = getErrorMessage(error);
        logger.error('Content cycle failed', error, {
            cycleId,
            topic: report.topic,
            errorType: error instanceof AppError ? error.name : 'Error'
        });
        report.errors.push(message);
        await context.notifier.notify({ type: 'cycle-failed', cycleId, topic: report.topic, message });
        return finish('failed');
    }

    logger.info('Content cycle finished', {
        cycleId,
        topic: report.topic,
        posts: report.posts.map(post => `${post.platform}:${post.status}`)
    });
    return finish('completed');
};

const runPlatform = async (
    context: CycleContext,
    platform: SocialPlatform,
    topic: string,
    cycleId: string,
    report: CycleReport
): Promise<CyclePostSummary> => {
    const publisher = context.publishers[platform];
    if (!publisher) {
        const error = `No publisher configured for ${platform}`;
        logger.warn(error, { cycleId, platform });
        report.errors.push(error);
        return { platform, status: 'not-composed', error };
    }

    let post: ComposedPost;
    try {
        post = await context.composer.compose(topic, platform, cycleId);
    } catch (error: unknown) {
        if (error instanceof CompositionError) {
            logger.error('Skipping platform, composition failed', error, { cycleId, topic, platform });
            report.errors.push(error.message);
            return { platform, status: 'not-composed', error: error.message };
        }
        throw error;
    }

    const result = await publisher.publishPost(post);
    const resolved = applyPublishResult(post, result);

    if (!result.success) {
        logger.error(`Publishing to ${platform} failed`, result.error, {
            cycleId,
            topic,
            platform,
            kind: result.error.kind,
            statusCode: result.error.statusCode
        });
        report.errors.push(result.error.message);
        await context.notifier.notify({
            type: 'publish-failed',
            cycleId,
            topic,
            platform,
            message: result.error.message,
            statusCode: result.error.statusCode
        });
    }

    // An ArchiveError propagates and ends the cycle
    const archivePath = await context.archive.save(resolved);

    return {
        platform,
        status: resolved.status,
        archivePath,
        postId: result.success ? result.postId : undefined,
        error: result.success ? undefined : result.error.message
    };
};
