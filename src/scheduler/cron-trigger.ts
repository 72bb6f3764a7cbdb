// src/scheduler/cron-trigger.ts

import cron from 'node-cron';
import { ConfigError } from '@/utils/errors';
import { createServiceLogger } from '@/utils/logger';

const logger = createServiceLogger('CronTrigger');

export interface CronTask {
    stop(): void;
}

export type CronScheduler = (expression: string, onTick: () => void) => CronTask;

/**
 * Schedule a node-cron task that calls `onTick` on every match
 */
export const scheduleCron: CronScheduler = (expression, onTick) => {
    if (!cron.validate(expression)) {
        throw new ConfigError('Invalid cron schedule', [expression]);
    }

    const task = cron.schedule(expression, () => onTick());
    logger.info('Cron trigger scheduled', { expression });
    return task;
};
