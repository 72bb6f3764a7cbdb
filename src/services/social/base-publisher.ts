// src/services/social/base-publisher.ts

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { ApiResponse, ComposedPost, PlatformConfig, PublishResult, RetrySettings, SocialPlatform } from '@/types';
import { USER_AGENT, isRetryableStatus } from '@/config/apis';
import { PublishError, getErrorMessage } from '@/utils/errors';
import { createApiResponse, isRecord, retry } from '@/utils/helpers';
import { createServiceLogger, logApiRequest } from '@/utils/logger';
import { validateComposedPost } from '@/utils/validators';

const logger = createServiceLogger('BasePublisher');

export interface PublisherOptions {
    retry: RetrySettings;
    maxLength: number;
    httpAdapter?: AxiosAdapter;
    delay?: (ms: number) => Promise<void>;
}

export abstract class BasePublisher {
    protected axiosInstance: AxiosInstance;

    constructor(
        public readonly platform: SocialPlatform,
        protected readonly config: PlatformConfig,
        baseURL: string,
        protected readonly options: PublisherOptions
    ) {
        this.axiosInstance = axios.create({
            baseURL,
            timeout: config.timeoutMs,
            adapter: options.httpAdapter,
            headers: {
                'Content-Type': 'application/json',
                'User-Agent': USER_AGENT,
                'Authorization': `Bearer ${config.accessToken}`
            }
        });

        this.setupInterceptors();
    }

    /**
     * Publish a composed post - must be implemented by each platform
     */
    abstract publishPost(post: ComposedPost): Promise<PublishResult>;

    /**
     * Check that the access token is accepted
     */
    abstract validateToken(): Promise<ApiResponse<boolean>>;

    /**
     * Map a failed call to a classified publish failure
     */
    protected handleApiError(error: unknown, action: string): PublishResult {
        const publishError = this.classifyError(error, action);
        logger.error(`${this.platform} ${action} failed`, publishError, {
            platform: this.platform,
            kind: publishError.kind,
            statusCode: publishError.statusCode
        });
        return { success: false, platform: this.platform, error: publishError };
    }

    /**
     * 401/403 and other 4xx are terminal; network errors, timeouts, 429 and 5xx are retryable
     */
    protected classifyError(error: unknown, action: string): PublishError {
        if (error instanceof PublishError) {
            return error;
        }

        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            const body: unknown = error.response?.data;
            const detail = isRecord(body) && typeof body.message === 'string' ? body.message : error.message;

            if (status === undefined) {
                return new PublishError(`${this.platform} ${action} failed: ${detail}`, this.platform, 'retryable', undefined, { cause: error });
            }

            switch (status) {
                case 401:
                    return new PublishError(`${this.platform} authentication failed: access token expired or invalid`, this.platform, 'terminal', status, { cause: error });
                case 403:
                    return new PublishError(`${this.platform} access forbidden: insufficient permissions`, this.platform, 'terminal', status, { cause: error });
                case 429:
                    return new PublishError(`${this.platform} rate limit exceeded`, this.platform, 'retryable', status, { cause: error });
                default:
                    return new PublishError(
                        `${this.platform} API error: HTTP ${status}: ${detail}`,
                        this.platform,
                        isRetryableStatus(status) ? 'retryable' : 'terminal',
                        status,
                        { cause: error }
                    );
            }
        }

        return new PublishError(`${this.platform} ${action} failed: ${getErrorMessage(error)}`, this.platform, 'terminal', undefined, { cause: error });
    }

    /**
     * Retry wrapper for API calls. Only retryable failures are repeated.
     */
    protected async retryApiCall<T>(apiCall: () => Promise<T>, action: string): Promise<T> {
        return retry(apiCall, {
            ...this.options.retry,
            delay: this.options.delay,
            isRetryable: (error) => this.classifyError(error, action).retryable,
            onRetry: (error, attempt, delayMs) =>
                logger.warn(`${this.platform} ${action} failed, retrying`, {
                    attempt,
                    delayMs,
                    error: getErrorMessage(error)
                })
        });
    }

    /**
     * Reject empty or oversized posts before any request is made
     */
    protected validatePostContent(post: ComposedPost): PublishError | undefined {
        const validation = validateComposedPost(post, this.options.maxLength);
        if (validation.successful) {
            return undefined;
        }
        return new PublishError(`${validation.message}: ${validation.error ?? 'invalid post'}`, this.platform, 'terminal');
    }

    /**
     * Create success result
     */
    protected createSuccessResult(postId: string, url?: string): PublishResult {
        const result: PublishResult = {
            success: true,
            platform: this.platform,
            postId,
            url,
            publishedAt: new Date().toISOString()
        };

        logger.info(`${this.platform} post published successfully`, {
            postId,
            url,
            publishedAt: result.publishedAt
        });
        return result;
    }

    protected tokenInvalid(error: unknown): ApiResponse<boolean> {
        const publishError = this.classifyError(error, 'validate token');
        return createApiResponse(false, `${this.platform} token validation failed`, false, publishError.message);
    }

    /**
     * Setup axios interceptors for logging
     */
    private setupInterceptors(): void {
        this.axiosInstance.interceptors.request.use((config) => {
            logger.debug(`${this.platform} API request`, {
                method: config.method?.toUpperCase(),
                url: config.url,
                hasData: !!config.data
            });
            return config;
        });

        this.axiosInstance.interceptors.response.use(
            (response) => {
                logApiRequest(
                    this.platform,
                    response.config.url || '',
                    response.config.method?.toUpperCase() || 'GET',
                    response.status
                );
                return response;
            },
            (error: unknown) => {
                if (axios.isAxiosError(error)) {
                    logApiRequest(
                        this.platform,
                        error.config?.url || '',
                        error.config?.method?.toUpperCase() || 'GET',
                        error.response?.status
                    );
                }
                return Promise.reject(error);
            }
        );
    }
}
