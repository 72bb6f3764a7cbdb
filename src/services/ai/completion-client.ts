// src/services/ai/completion-client.ts

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { RetrySettings } from '@/types';
import { API_ENDPOINTS, DEFAULT_HEADERS, USER_AGENT, isRetryableStatus } from '@/config/apis';
import { ProviderError, getErrorMessage } from '@/utils/errors';
import { isRecord, retry } from '@/utils/helpers';
import { createServiceLogger, logApiRequest } from '@/utils/logger';

const logger = createServiceLogger('CompletionClient');

export interface CompletionClientOptions {
    baseUrl: string;
    apiKey: string;
    model: string;
    timeoutMs: number;
    retry: RetrySettings;
    httpAdapter?: AxiosAdapter;
    delay?: (ms: number) => Promise<void>;
}

export interface CompletionRequest {
    prompt: string;
    system?: string;
    maxTokens: number;
    temperature: number;
}

/**
 * Client for an OpenAI-compatible chat completion endpoint
 */
export class CompletionClient {
    private axiosInstance: AxiosInstance;

    constructor(private readonly options: CompletionClientOptions) {
        this.axiosInstance = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            adapter: options.httpAdapter,
            headers: {
                ...DEFAULT_HEADERS.completions,
                'User-Agent': USER_AGENT,
                'Authorization': `Bearer ${options.apiKey}`
            }
        });

        // Request/Response interceptors
        this.axiosInstance.interceptors.request.use((config) => {
            logger.debug('Completion request', { model: options.model, endpoint: config.url });
            return config;
        });

        this.axiosInstance.interceptors.response.use(
            (response) => {
                logApiRequest('completions', response.config.url || '',
                    response.config.method?.toUpperCase() || 'POST',
                    response.status);
                return response;
            },
            (error: unknown) => {
                if (axios.isAxiosError(error)) {
                    logApiRequest('completions', error.config?.url || '',
                        error.config?.method?.toUpperCase() || 'POST',
                        error.response?.status);
                }
                return Promise.reject(error);
            }
        );
    }

    public get model(): string {
        return this.options.model;
    }

    /**
     * Run one completion, retrying transient failures
     */
    public async complete(request: CompletionRequest): Promise<string> {
        return retry(
            () => this.requestOnce(request),
            {
                ...this.options.retry,
                delay: this.options.delay,
                isRetryable: (error) => error instanceof ProviderError && error.retryable,
                onRetry: (error, attempt, delayMs) =>
                    logger.warn('Completion failed, retrying', {
                        attempt,
                        delayMs,
                        error: getErrorMessage(error)
                    })
            }
        );
    }

    private async requestOnce(request: CompletionRequest): Promise<string> {
        const messages = [
            ...(request.system ? [{ role: 'system', content: request.system }] : []),
            { role: 'user', content: request.prompt }
        ];

        let body: unknown;
        try {
            const response = await this.axiosInstance.post<unknown>(API_ENDPOINTS.completions.chat, {
                model: this.options.model,
                messages,
                max_tokens: request.maxTokens,
                temperature: request.temperature
            });
            body = response.data;
        } catch (error: unknown) {
            throw this.toProviderError(error);
        }

        const content = this.extractContent(body);
        if (!content) {
            throw new ProviderError('Provider returned an empty or malformed completion');
        }
        return content;
    }

    private extractContent(body: unknown): string | undefined {
        if (!isRecord(body) || !Array.isArray(body.choices)) {
            return undefined;
        }

        const [choice]: unknown[] = body.choices;
        if (!isRecord(choice) || !isRecord(choice.message)) {
            return undefined;
        }

        const content = choice.message.content;
        return typeof content === 'string' && content.trim().length > 0 ? content.trim() : undefined;
    }

    private toProviderError(error: unknown): ProviderError {
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            if (status === undefined) {
                const reason = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' ? 'timed out' : 'network error';
                return new ProviderError(`Completion request ${reason}: ${error.message}`, undefined, true, { cause: error });
            }
            if (status === 401 || status === 403) {
                return new ProviderError('Completion provider rejected the API key', status, false, { cause: error });
            }
            return new ProviderError(`Completion provider returned HTTP ${status}`, status, isRetryableStatus(status), { cause: error });
        }

        return new ProviderError(`Completion request failed: ${getErrorMessage(error)}`, undefined, false, { cause: error });
    }
}
