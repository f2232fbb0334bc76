import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import { ProviderError, TransportError } from '../src/core/errors.js';
import type { CompletionRequest } from '../src/core/llm/types.js';
import { ConversationSession, collectReply } from '../src/core/session/conversation.js';
import { OpenAIProvider } from '../src/providers/llm/openai/index.js';
import { WhitespaceCounter, createSilentLogger } from './helpers/fakes.js';

interface CapturedRequest {
    url: string;
    body: unknown;
}

const encoder = new TextEncoder();

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

function chatCompletion(content: string, finishReason = 'stop') {
    return {
        id: 'chatcmpl-test',
        object: 'chat.completion',
        created: 0,
        model: 'gpt-4',
        choices: [{
            index: 0,
            message: { role: 'assistant', content, refusal: null },
            finish_reason: finishReason,
            logprobs: null,
        }],
    };
}

function sseEvent(content: string | null, finishReason: string | null = null): string {
    const chunk = {
        id: 'chatcmpl-test',
        object: 'chat.completion.chunk',
        created: 0,
        model: 'gpt-4',
        choices: [{
            index: 0,
            delta: content === null ? {} : { content },
            finish_reason: finishReason,
            logprobs: null,
        }],
    };
    return `data: ${JSON.stringify(chunk)}\n\n`;
}

function sseResponse(body: string | ReadableStream<Uint8Array>): Response {
    return new Response(body, {
        status: 200,
        headers: { 'content-type': 'text/event-stream' },
    });
}

/**
 * Real SDK client whose HTTP layer is an in-process function.
 */
function createProvider(respond: () => Response | Promise<Response>) {
    const requests: CapturedRequest[] = [];
    const fetch: typeof globalThis.fetch = async (input, init) => {
        requests.push({
            url: String(input),
            body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
        });
        return respond();
    };
    const client = new OpenAI({
        apiKey: 'test-key',
        baseURL: 'http://localhost:8080/v1',
        fetch,
        maxRetries: 0,
    });
    return { provider: new OpenAIProvider({ client, logger: createSilentLogger() }), requests };
}

const request: CompletionRequest = {
    model: 'gpt-4',
    stream: false,
    temperature: 0.001,
    messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'hello' },
    ],
};

describe('OpenAIProvider', () => {
    it('maps a chat completion onto the session payload', async () => {
        const { provider, requests } = createProvider(() => jsonResponse(chatCompletion('X')));

        const payload = await provider.complete(request);

        expect(payload).toEqual({ choices: [{ finish_reason: 'stop', message: { content: 'X' } }] });
        expect(requests).toHaveLength(1);
        expect(requests[0].url).toBe('http://localhost:8080/v1/chat/completions');
        expect(requests[0].body).toMatchObject({
            model: 'gpt-4',
            temperature: 0.001,
            stream: false,
            messages: [
                { role: 'system', content: 'be brief' },
                { role: 'user', content: 'hello' },
            ],
        });
    });

    it('maps streamed chunks in order', async () => {
        const { provider, requests } = createProvider(() => sseResponse(
            sseEvent('A') + sseEvent('B') + sseEvent(null, 'stop') + 'data: [DONE]\n\n'
        ));

        const chunks = [];
        for await (const chunk of await provider.stream({ ...request, stream: true })) {
            chunks.push(chunk);
        }

        expect(chunks).toEqual([
            { choices: [{ finish_reason: null, delta: { content: 'A' } }] },
            { choices: [{ finish_reason: null, delta: { content: 'B' } }] },
            { choices: [{ finish_reason: 'stop', delta: { content: undefined } }] },
        ]);
        expect(requests[0].body).toMatchObject({ stream: true });
    });

    it('turns API errors into provider errors carrying the status', async () => {
        const { provider } = createProvider(() => jsonResponse({
            error: { message: 'Rate limit reached', type: 'requests', code: 'rate_limit_exceeded' },
        }, 429));

        const failure = await provider.complete(request).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(ProviderError);
        expect(failure).toMatchObject({ status: 429, message: '429 Rate limit reached' });
    });

    it('turns connection failures into transport errors', async () => {
        const { provider } = createProvider(() => {
            throw new TypeError('fetch failed');
        });

        await expect(provider.stream({ ...request, stream: true })).rejects.toBeInstanceOf(TransportError);
    });

    it('turns a body that breaks mid-stream into a transport error', async () => {
        let pulls = 0;
        const body = new ReadableStream<Uint8Array>({
            pull(controller) {
                pulls++;
                if (pulls === 1) {
                    controller.enqueue(encoder.encode(sseEvent('A')));
                } else {
                    controller.error(new Error('socket hang up'));
                }
            },
        });
        const { provider } = createProvider(() => sseResponse(body));

        const stream = await provider.stream({ ...request, stream: true });
        const consume = async () => {
            for await (const chunk of stream) {
                expect(chunk.choices[0].delta.content).toBe('A');
            }
        };

        await expect(consume()).rejects.toBeInstanceOf(TransportError);
    });
});

describe('ConversationSession over OpenAIProvider', () => {
    it('runs a streamed exchange end to end', async () => {
        const { provider } = createProvider(() => sseResponse(
            sseEvent('Hi') + sseEvent(' there') + sseEvent(null, 'stop') + 'data: [DONE]\n\n'
        ));
        const session = new ConversationSession({
            systemPrompt: 'be brief',
            provider,
            stream: true,
            tokenizer: new WhitespaceCounter(),
            logger: createSilentLogger(),
        });

        const text = await collectReply(await session.ask('hello'));

        expect(text).toBe('Hi there');
        expect(session.history).toEqual([
            { role: 'user', content: 'hello' },
            { role: 'assistant', content: 'Hi there' },
        ]);
    });

    it('degrades a rate-limited call and reports it once', async () => {
        const onError = vi.fn();
        const { provider } = createProvider(() => jsonResponse({
            error: { message: 'Rate limit reached', type: 'requests', code: 'rate_limit_exceeded' },
        }, 429));
        const session = new ConversationSession({
            systemPrompt: 'be brief',
            provider,
            onError,
            tokenizer: new WhitespaceCounter(),
            logger: createSilentLogger(),
        });

        const reply = await session.ask('hello');

        expect(reply.kind).toBe('degraded');
        expect(await collectReply(reply)).toBe('Provider error. 429 Rate limit reached');
        expect(onError).toHaveBeenCalledTimes(1);
        expect(onError.mock.calls[0][0]).toBeInstanceOf(ProviderError);
    });
});
