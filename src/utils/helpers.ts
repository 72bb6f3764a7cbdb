// src/utils/helpers.ts

import moment from 'moment';
import type { ApiResponse, RetrySettings } from '@/types';
import { ARCHIVE_FORMAT } from '@/config/storage';

/** Largest delay a single timer accepts */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Sleep/delay function. Resolves early when the signal aborts.
 * Delays above the timer limit are waited out in pieces.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> => {
    return new Promise(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }

        let remaining = Math.max(0, ms);
        let timer: ReturnType<typeof setTimeout> | undefined;

        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };

        const wait = () => {
            const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
            remaining -= step;
            timer = setTimeout(() => {
                if (remaining > 0) {
                    wait();
                    return;
                }
                signal?.removeEventListener('abort', onAbort);
                resolve();
            }, step);
        };

        signal?.addEventListener('abort', onAbort, { once: true });
        wait();
    });
};

export interface RetryPolicy extends RetrySettings {
    isRetryable?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    delay?: (ms: number) => Promise<void>;
}

/**
 * Retry function with exponential backoff. Non-retryable errors are rethrown immediately.
 */
export const retry = async <T>(fn: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> => {
    const maxAttempts = Math.max(1, policy.maxAttempts);
    const wait = policy.delay ?? sleep;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            const retryable = policy.isRetryable ? policy.isRetryable(error) : true;
            if (!retryable || attempt >= maxAttempts) {
                throw error;
            }

            const delayMs = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
            policy.onRetry?.(error, attempt, delayMs);
            await wait(delayMs);
        }
    }
};

/**
 * Safe JSON parse with default value
 */
export const safeJsonParse = (jsonString: string, defaultValue: unknown): unknown => {
    try {
        return JSON.parse(jsonString);
    } catch {
        return defaultValue;
    }
};

/**
 * Create standardized API response
 */
export const createApiResponse = <T>(
    successful: boolean,
    message: string,
    data?: T,
    error?: string | Error
): ApiResponse<T> => {
    const response: ApiResponse<T> = {
        successful,
        message
    };
    if (error !== undefined) {
        response.error = error instanceof Error ? error.message : error;
    }
    if (data !== undefined) {
        response.data = data;
    }
    return response;
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Date and time utilities
 */
export const dateUtils = {
    isWithinDays: (date: string, days: number, now: Date = new Date()): boolean => {
        return moment(date).isAfter(moment(now).subtract(days, 'days'));
    },

    archiveStamp: (date: Date | string): string => {
        return moment(date).format(ARCHIVE_FORMAT.timestamp);
    },

    readable: (date: Date | string): string => {
        return moment(date).format('YYYY-MM-DD HH:mm:ss');
    },

    addHours: (date: Date, hours: number): Date => {
        return moment(date).add(hours, 'hours').toDate();
    }
};

const SENTENCE_ENDINGS = ['.', '!', '?'];

/**
 * Cut at a UTF-16 offset without leaving half of a surrogate pair behind
 */
const cutAt = (text: string, end: number): string => {
    const cut = text.substring(0, end);
    return /[\uD800-\uDBFF]$/.test(cut) ? cut.slice(0, -1) : cut;
};

/**
 * String utilities
 */
export const stringUtils = {
    truncate: (text: string, maxLength: number, suffix: string = '...'): string => {
        if (text.length <= maxLength) return text;
        return cutAt(text, maxLength - suffix.length) + suffix;
    },

    /**
     * Cuts text to at most `limit` characters, preferring a sentence end
     * inside the first `limit - margin` characters, then a word boundary.
     */
    truncateAtSentence: (text: string, limit: number, margin: number = 100): string => {
        if (text.length <= limit) return text;
        if (limit <= 3) return cutAt(text, limit);

        const windowSize = limit > margin ? limit - margin : limit - 3;
        const head = cutAt(text, windowSize);
        const cutPosition = Math.max(...SENTENCE_ENDINGS.map(mark => head.lastIndexOf(mark)));

        let result: string;
        if (cutPosition > 0) {
            result = head.substring(0, cutPosition + 1);
        } else {
            const lastSpace = head.lastIndexOf(' ');
            result = (lastSpace > 0 ? head.substring(0, lastSpace) : head) + '...';
        }

        return stringUtils.truncate(result, limit);
    },

    normalizeTopic: (text: string): string => {
        return text
            .toLowerCase()
            .replace(/[^\p{L}\p{N}\s]/gu, ' ')
            .replace(/\s+/g, ' ')
            .trim();
    },

    stripWrappingQuotes: (text: string): string => {
        return text.trim().replace(/^["'`“”‘’]+|["'`“”‘’]+$/g, '').trim();
    },

    firstLine: (text: string): string => {
        const line = text.split('\n').find(candidate => candidate.trim().length > 0);
        return line ? line.trim() : '';
    },

    findPhrase: (text: string, phrases: readonly string[]): string | undefined => {
        const lower = text.toLowerCase();
        return phrases.find(phrase => phrase.trim().length > 0 && lower.includes(phrase.toLowerCase()));
    }
};

/**
 * Array utilities
 */
export const arrayUtils = {
    sample: <T>(array: readonly T[], count: number, random: () => number = Math.random): T[] => {
        const pool = [...array];
        const picked: T[] = [];
        while (picked.length < count && pool.length > 0) {
            const [item] = pool.splice(Math.floor(random() * pool.length), 1);
            if (item !== undefined) {
                picked.push(item);
            }
        }
        return picked;
    }
};

/**
 * Generate unique ID
 */
export const generateId = (): string => {
    return Date.now().toString(36) + Math.random().toString(36).slice(2, 10);
};
