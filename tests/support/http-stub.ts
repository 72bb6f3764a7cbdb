// tests/support/http-stub.ts

import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
    status?: number;
    data?: unknown;
    headers?: Record<string, string>;
    error?: 'timeout' | 'network';
}

export type StubHandler = (request: RecordedRequest) => StubReply | Promise<StubReply>;

export interface RecordedRequest {
    method: string;
    url: string;
    body: unknown;
    headers: Record<string, unknown>;
}

const toRecorded = (config: InternalAxiosRequestConfig): RecordedRequest => ({
    method: (config.method ?? 'get').toUpperCase(),
    url: `${config.baseURL ?? ''}${config.url ?? ''}`,
    body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
    headers: config.headers.toJSON()
});

/**
 * In-process axios adapter that answers from a handler and records every request
 */
export const createStubAdapter = (handler: StubHandler): { adapter: AxiosAdapter; requests: RecordedRequest[] } => {
    const requests: RecordedRequest[] = [];

    const adapter: AxiosAdapter = async (config) => {
        const request = toRecorded(config);
        requests.push(request);

        const reply = await handler(request);
        if (reply.error === 'timeout') {
            throw new AxiosError(`timeout of ${config.timeout ?? 0}ms exceeded`, AxiosError.ECONNABORTED, config, {});
        }
        if (reply.error === 'network') {
            throw new AxiosError('socket hang up', AxiosError.ERR_NETWORK, config, {});
        }

        const status = reply.status ?? 200;
        const response: AxiosResponse = {
            data: reply.data,
            status,
            statusText: String(status),
            headers: reply.headers ?? {},
            config,
            request: {}
        };

        if (status >= 400) {
            throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, {}, response);
        }
        return response;
    };

    return { adapter, requests };
};

export const completionReply = (content: string): StubReply => ({
    status: 200,
    data: { choices: [{ message: { role: 'assistant', content } }] }
});

export const promptOf = (request: RecordedRequest): string => {
    const body = request.body;
    if (typeof body !== 'object' || body === null || !('messages' in body) || !Array.isArray(body.messages)) {
        return '';
    }
    const last: unknown = body.messages[body.messages.length - 1];
    return typeof last === 'object' && last !== null && 'content' in last && typeof last.content === 'string'
        ? last.content
        : '';
};
