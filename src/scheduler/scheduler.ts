// src/scheduler/scheduler.ts

import type { CycleReport } from '@/types';
import { AppError } from '@/utils/errors';
import { dateUtils, sleep } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { scheduleCron, type CronScheduler } from './cron-trigger';

const logger = createServiceLogger('Scheduler');

const HOUR_MS = 60 * 60 * 1000;

export type SchedulerState = 'idle' | 'running-cycle' | 'sleeping' | 'stopped';

export interface Clock {
    now(): Date;
    sleep(ms: number, signal: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
    now: () => new Date(),
    sleep: (ms, signal) => sleep(ms, signal)
};

export type CycleRunner = (signal: AbortSignal) => Promise<CycleReport>;

export interface SchedulerOptions {
    intervalHours: number;
    runOnStart: boolean;
    cron?: string;
    clock?: Clock;
    cronScheduler?: CronScheduler;
    maxCycles?: number;
}

export interface SchedulerStats {
    cyclesRun: number;
    cyclesFailed: number;
    triggersSkipped: number;
    lastReport?: CycleReport;
    nextRunAt?: string;
}

/**
 * Runs one content cycle at a time, on an interval or on a cron expression
 */
export class Scheduler {
    private state: SchedulerState = 'idle';
    private readonly controller = new AbortController();
    private readonly clock: Clock;
    private currentCycle: Promise<void> | null = null;
    private stats: SchedulerStats = { cyclesRun: 0, cyclesFailed: 0, triggersSkipped: 0 };

    constructor(private readonly options: SchedulerOptions) {
        this.clock = options.clock ?? systemClock;
    }

    public getState(): SchedulerState {
        return this.state;
    }

    public getStats(): SchedulerStats {
        return { ...this.stats };
    }

    public get signal(): AbortSignal {
        return this.controller.signal;
    }

    /**
     * Run cycles until stopped. Resolves once the loop has exited.
     */
    public async start(runCycle: CycleRunner): Promise<void> {
        if (this.state !== 'idle') {
            throw new AppError(`Scheduler cannot start from state ${this.state}`);
        }

        logger.info('Scheduler started', {
            mode: this.options.cron ? 'cron' : 'interval',
            intervalHours: this.options.intervalHours,
            cron: this.options.cron,
            runOnStart: this.options.runOnStart
        });

        try {
            if (this.options.cron) {
                await this.runCronMode(this.options.cron, runCycle);
            } else {
                await this.runIntervalMode(runCycle);
            }
        } finally {
            this.state = 'stopped';
            logger.info('Scheduler stopped', { ...this.stats, lastReport: undefined });
        }
    }

    /**
     * Stop after the current step. A sleeping loop wakes immediately.
     */
    public stop(): void {
        if (this.controller.signal.aborted) return;
        logger.info('Stopping scheduler', { state: this.state });
        this.controller.abort();
        if (this.state === 'idle') {
            this.state = 'stopped';
        }
    }

    private async runIntervalMode(runCycle: CycleRunner): Promise<void> {
        const intervalMs = this.options.intervalHours * HOUR_MS;

        if (this.options.runOnStart) {
            await this.runGuarded(runCycle);
        }

        while (!this.signal.aborted && !this.reachedMaxCycles()) {
            this.state = 'sleeping';
            this.stats.nextRunAt = dateUtils.addHours(this.clock.now(), this.options.intervalHours).toISOString();
            logger.info('Sleeping until next cycle', { nextRunAt: this.stats.nextRunAt });

            await this.clock.sleep(intervalMs, this.signal);
            if (this.signal.aborted) break;

            await this.runGuarded(runCycle);
        }
    }

    private async runCronMode(expression: string, runCycle: CycleRunner): Promise<void> {
        if (this.options.runOnStart) {
            await this.runGuarded(runCycle);
        }
        if (this.signal.aborted || this.reachedMaxCycles()) return;

        const schedule = this.options.cronScheduler ?? scheduleCron;
        const task = schedule(expression, () => this.onCronTick(runCycle));
        this.state = 'sleeping';

        try {
            await new Promise<void>(resolve => {
                if (this.signal.aborted) {
                    resolve();
                    return;
                }
                this.signal.addEventListener('abort', () => resolve(), { once: true });
            });
        } finally {
            task.stop();
        }

        if (this.currentCycle) {
            await this.currentCycle;
        }
    }

    private onCronTick(runCycle: CycleRunner): void {
        if (this.signal.aborted) return;

        if (this.currentCycle) {
            this.stats.triggersSkipped++;
            logger.warn('Cron trigger fired while a cycle is running, skipping');
            return;
        }

        this.runGuarded(runCycle)
            .then(() => {
                if (this.reachedMaxCycles()) {
                    this.stop();
                } else if (!this.signal.aborted) {
                    this.state = 'sleeping';
                }
            })
            .catch((error: unknown) => logger.error('Cron cycle crashed', error));
    }

    private runGuarded(runCycle: CycleRunner): Promise<void> {
        const cycle = this.executeCycle(runCycle).finally(() => {
            this.currentCycle = null;
        });
        this.currentCycle = cycle;
        return cycle;
    }

    private async executeCycle(runCycle: CycleRunner): Promise<void> {
        this.state = 'running-cycle';
        const startedAt = this.clock.now();

        try {
            const report = await runCycle(this.signal);
            this.stats.lastReport = report;
            if (report.outcome === 'failed') {
                this.stats.cyclesFailed++;
            }
            logger.info('Cycle finished', {
                cycleId: report.cycleId,
                outcome: report.outcome,
                topic: report.topic,
                errors: report.errors.length
            });
        } catch (error: unknown) {
            this.stats.cyclesFailed++;
            logger.error('Cycle threw an unexpected error', error, { startedAt: startedAt.toISOString() });
        } finally {
            this.stats.cyclesRun++;
        }
    }

    private reachedMaxCycles(): boolean {
        return this.options.maxCycles !== undefined && this.stats.cyclesRun >= this.options.maxCycles;
    }
}
