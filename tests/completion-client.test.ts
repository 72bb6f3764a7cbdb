// tests/completion-client.test.ts

import { describe, expect, it } from 'vitest';
import { CompletionClient } from '@/services/ai/completion-client';
import { ResearchClient } from '@/services/ai/research-client';
import { ProviderError } from '@/utils/errors';
import { completionReply, createStubAdapter, promptOf, type StubHandler, type StubReply } from './support/http-stub';
import { noDelay } from './support/fixtures';

const buildClient = (handler: StubHandler, maxAttempts: number = 3) => {
    const stub = createStubAdapter(handler);
    const client = new CompletionClient({
        baseUrl: 'https://llm.test',
        apiKey: 'test-secret',
        model: 'test-model',
        timeoutMs: 1000,
        retry: { maxAttempts, baseDelayMs: 0, backoffMultiplier: 2 },
        httpAdapter: stub.adapter,
        delay: noDelay
    });
    return { client, requests: stub.requests };
};

const sequence = (...replies: StubReply[]): StubHandler => {
    let index = 0;
    return () => {
        const reply = replies[Math.min(index, replies.length - 1)] ?? { status: 500 };
        index++;
        return reply;
    };
};

const request = { prompt: 'Say hello', maxTokens: 50, temperature: 0.5 };

describe('CompletionClient', () => {
    it('posts an OpenAI-style chat request with bearer auth', async () => {
        const { client, requests } = buildClient(() => completionReply('  Hello there  '));

        const text = await client.complete({ ...request, system: 'Be brief' });

        expect(text).toBe('Hello there');
        expect(requests).toHaveLength(1);
        expect(requests[0]?.method).toBe('POST');
        expect(requests[0]?.url).toBe('https://llm.test/chat/completions');
        expect(requests[0]?.headers.Authorization).toBe('Bearer test-secret');
        expect(requests[0]?.body).toEqual({
            model: 'test-model',
            messages: [
                { role: 'system', content: 'Be brief' },
                { role: 'user', content: 'Say hello' }
            ],
            max_tokens: 50,
            temperature: 0.5
        });
    });

    it('retries server errors and rate limits', async () => {
        const { client, requests } = buildClient(sequence({ status: 503 }, { status: 429 }, completionReply('ok')));

        await expect(client.complete(request)).resolves.toBe('ok');
        expect(requests).toHaveLength(3);
    });

    it('retries timeouts and network errors', async () => {
        const { client, requests } = buildClient(sequence({ error: 'timeout' }, { error: 'network' }, completionReply('ok')));

        await expect(client.complete(request)).resolves.toBe('ok');
        expect(requests).toHaveLength(3);
    });

    it('does not retry client errors', async () => {
        const { client, requests } = buildClient(() => ({ status: 400, data: { error: 'bad model' } }));

        const error = await client.complete(request).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ProviderError);
        expect(error).toMatchObject({ statusCode: 400, retryable: false });
        expect(requests).toHaveLength(1);
    });

    it('reports a rejected key as non-retryable', async () => {
        const { client, requests } = buildClient(() => ({ status: 401 }));

        await expect(client.complete(request)).rejects.toThrow('Completion provider rejected the API key');
        expect(requests).toHaveLength(1);
    });

    it('gives up after the configured attempts', async () => {
        const { client, requests } = buildClient(() => ({ status: 502 }), 2);

        await expect(client.complete(request)).rejects.toMatchObject({ statusCode: 502, retryable: true });
        expect(requests).toHaveLength(2);
    });

    it('treats empty and malformed bodies as provider errors', async () => {
        const empty = buildClient(() => completionReply('   '));
        await expect(empty.client.complete(request)).rejects.toBeInstanceOf(ProviderError);
        expect(empty.requests).toHaveLength(1);

        const malformed = buildClient(() => ({ status: 200, data: { result: 'text' } }));
        await expect(malformed.client.complete(request)).rejects.toThrow('empty or malformed');
    });
});

describe('ResearchClient', () => {
    const settings = { seeds: ['alpha seed', 'beta seed', 'gamma seed'], queriesPerCycle: 2, maxTokens: 100, temperature: 0.7, pauseMs: 0 };

    it('researches seeds in order', async () => {
        const { client, requests } = buildClient((req) => completionReply(`insights for ${promptOf(req).includes('alpha') ? 'alpha' : 'beta'}`));
        const research = new ResearchClient(client, settings);

        const results = await research.researchSeeds(['alpha seed', 'beta seed']);

        expect(results).toEqual([
            { query: 'alpha seed', insights: 'insights for alpha' },
            { query: 'beta seed', insights: 'insights for beta' }
        ]);
        expect(requests).toHaveLength(2);
    });

    it('pauses between seed requests only', async () => {
        const { client, requests } = buildClient(() => completionReply('insights'));
        const pauses: number[] = [];
        const pause = async (ms: number) => {
            pauses.push(ms);
            expect(requests).toHaveLength(pauses.length);
        };
        const research = new ResearchClient(client, { ...settings, pauseMs: 2000 }, Math.random, pause);

        await research.researchSeeds(['alpha seed', 'beta seed', 'gamma seed']);

        expect(pauses).toEqual([2000, 2000]);
        expect(requests).toHaveLength(3);
    });

    it('stops at the first provider error', async () => {
        const { client, requests } = buildClient(sequence(completionReply('first'), { status: 401 }, completionReply('third')));
        const research = new ResearchClient(client, settings);

        await expect(research.researchSeeds(['alpha seed', 'beta seed', 'gamma seed'])).rejects.toBeInstanceOf(ProviderError);
        expect(requests).toHaveLength(2);
    });

    it('picks a random sample of the configured size', () => {
        const { client } = buildClient(() => completionReply('unused'));
        const research = new ResearchClient(client, settings, () => 0);

        expect(research.pickSeeds()).toEqual(['alpha seed', 'beta seed']);
    });
});
