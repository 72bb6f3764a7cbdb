// src/app.ts

import type { AxiosAdapter } from 'axios';
import type { AppConfig, ApiResponse, CycleReport, SocialPlatform } from '@/types';
import { CompletionClient } from '@/services/ai/completion-client';
import { ResearchClient } from '@/services/ai/research-client';
import { TopicSelector } from '@/services/ai/topic-selector';
import { ContentComposer } from '@/services/ai/content-composer';
import { TopicHistory } from '@/services/memory/topic-history';
import { ContentArchive } from '@/services/memory/archive';
import type { BasePublisher, PublisherOptions } from '@/services/social/base-publisher';
import { LinkedInPublisher } from '@/services/social/linkedin';
import { MediumPublisher } from '@/services/social/medium';
import { WebhookNotifier, noopNotifier, type Notifier } from '@/services/notify/webhook';
import { Scheduler, type Clock } from '@/scheduler/scheduler';
import { runContentCycle, type CycleContext } from '@/workflow/content-cycle';
import { createApiResponse, sleep } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';

const logger = createServiceLogger('Application');

export interface ApplicationOptions {
    httpAdapter?: AxiosAdapter;
    clock?: Clock;
    delay?: (ms: number) => Promise<void>;
    random?: () => number;
    maxCycles?: number;
}

export class Application {
    private readonly context: CycleContext;
    private readonly history: TopicHistory;
    private scheduler: Scheduler | null = null;

    constructor(private readonly config: AppConfig, private readonly options: ApplicationOptions = {}) {
        const now = () => (options.clock ? options.clock.now() : new Date());
        const pause = options.delay ?? sleep;

        const completions = new CompletionClient({
            baseUrl: config.provider.baseUrl,
            apiKey: config.credentials.aiApiKey,
            model: config.provider.model,
            timeoutMs: config.provider.timeoutMs,
            retry: config.retry,
            httpAdapter: options.httpAdapter,
            delay: options.delay
        });

        this.history = new TopicHistory(config.storage.historyFile, config.topics.maxHistoryEntries, now);

        this.context = {
            research: new ResearchClient(completions, config.research, options.random, pause),
            selector: new TopicSelector(completions, this.history, config.topics),
            composer: new ContentComposer(completions, config.content, now),
            archive: new ContentArchive(config.storage.contentDir),
            publishers: this.buildPublishers(),
            platforms: config.platforms,
            notifier: this.buildNotifier(),
            platformPauseMs: config.content.platformPauseMs,
            pause,
            now
        };
    }

    /**
     * Load persisted state and check platform tokens. Token problems are warnings only.
     */
    public async initialize(): Promise<ApiResponse<boolean>> {
        logger.info('Starting content cycle application', {
            platforms: [...this.config.platforms],
            model: this.config.provider.model,
            intervalHours: this.config.schedule.intervalHours,
            cron: this.config.schedule.cron
        });

        const entries = await this.history.load();
        logger.info('Topic history loaded', { entries: entries.length });

        await this.validateExternalServices();
        return createApiResponse(true, 'Application initialized successfully', true);
    }

    /**
     * Run a single content cycle
     */
    public async runOnce(signal?: AbortSignal): Promise<CycleReport> {
        return runContentCycle(this.context, signal);
    }

    /**
     * Run the scheduler until stop() is called
     */
    public async start(): Promise<void> {
        this.scheduler = new Scheduler({
            intervalHours: this.config.schedule.intervalHours,
            runOnStart: this.config.schedule.runOnStart,
            cron: this.config.schedule.cron,
            clock: this.options.clock,
            maxCycles: this.options.maxCycles
        });

        await this.scheduler.start(signal => this.runOnce(signal));
    }

    public stop(): void {
        this.scheduler?.stop();
    }

    private buildPublishers(): Partial<Record<SocialPlatform, BasePublisher>> {
        const { config, options } = this;
        const publisherOptions = (platform: SocialPlatform): PublisherOptions => ({
            retry: { ...config.retry, maxAttempts: config.publishing.maxAttempts },
            maxLength: config.content.maxLength[platform],
            httpAdapter: options.httpAdapter,
            delay: options.delay
        });

        const publishers: Partial<Record<SocialPlatform, BasePublisher>> = {};
        const { linkedin, medium } = config.credentials;

        if (config.platforms.includes('linkedin') && linkedin) {
            publishers.linkedin = new LinkedInPublisher(
                { accessToken: linkedin.accessToken, personUrn: linkedin.personUrn },
                config.publishing.timeoutMs,
                publisherOptions('linkedin')
            );
        }

        if (config.platforms.includes('medium') && medium) {
            publishers.medium = new MediumPublisher(
                medium.integrationToken,
                config.publishing.medium,
                config.publishing.timeoutMs,
                publisherOptions('medium')
            );
        }

        return publishers;
    }

    private buildNotifier(): Notifier {
        const { webhookUrl } = this.config.notifications;
        return webhookUrl ? new WebhookNotifier(webhookUrl, this.options.httpAdapter) : noopNotifier;
    }

    private async validateExternalServices(): Promise<void> {
        for (const publisher of Object.values(this.context.publishers)) {
            if (!publisher) continue;

            const result = await publisher.validateToken();
            if (result.successful) {
                logger.info(`${publisher.platform} token is valid`);
            } else {
                logger.warn(`${publisher.platform} token check failed, publishing may fail`, { error: result.error });
            }
        }
    }
}
