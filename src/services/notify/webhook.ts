// src/services/notify/webhook.ts

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { SocialPlatform } from '@/types';
import { USER_AGENT } from '@/config/apis';
import { getErrorMessage } from '@/utils/errors';
import { createServiceLogger, logApiRequest } from '@/utils/logger';

const logger = createServiceLogger('WebhookNotifier');

const NOTIFY_TIMEOUT_MS = 10000;

export type NotificationType = 'cycle-failed' | 'publish-failed';

export interface NotificationEvent {
    type: NotificationType;
    cycleId: string;
    message: string;
    topic?: string;
    platform?: SocialPlatform;
    statusCode?: number;
}

export interface Notifier {
    notify(event: NotificationEvent): Promise<void>;
}

/**
 * Posts failure events as JSON to a webhook. Delivery problems are only logged.
 */
export class WebhookNotifier implements Notifier {
    private axiosInstance: AxiosInstance;

    constructor(private readonly webhookUrl: string, httpAdapter?: AxiosAdapter) {
        this.axiosInstance = axios.create({
            timeout: NOTIFY_TIMEOUT_MS,
            adapter: httpAdapter,
            headers: {
                'Content-Type': 'application/json',
                'User-Agent': USER_AGENT
            }
        });
    }

    public async notify(event: NotificationEvent): Promise<void> {
        try {
            const response = await this.axiosInstance.post(this.webhookUrl, {
                ...event,
                timestamp: new Date().toISOString()
            });
            logApiRequest('webhook', 'notify', 'POST', response.status);
        } catch (error: unknown) {
            logger.warn('Failed to deliver notification', {
                type: event.type,
                cycleId: event.cycleId,
                error: getErrorMessage(error)
            });
        }
    }
}

export const noopNotifier: Notifier = {
    notify: async () => undefined
};
