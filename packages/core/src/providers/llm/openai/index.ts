import OpenAI, { APIConnectionError, APIError } from 'openai';
import { ProviderError, TransportError } from '../../../core/errors.js';
import type { ILLMProvider } from '../../../core/llm/interfaces.js';
import type { ChatMessage, CompletionChunk, CompletionPayload, CompletionRequest } from '../../../core/llm/types.js';
import { ConsoleLogger, type ILogger } from '../../../core/logger.js';
import { openaiConfig } from './config.js';

type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatCompletionChunk = OpenAI.Chat.Completions.ChatCompletionChunk;

export interface OpenAIProviderOptions {
    apiKey?: string;
    baseUrl?: string;
    /** Pre-built SDK client, e.g. one with a custom fetch or retry policy */
    client?: OpenAI;
    logger?: ILogger;
}

function mapMessages(messages: readonly ChatMessage[]): ChatCompletionMessageParam[] {
    return messages.map((msg): ChatCompletionMessageParam => {
        switch (msg.role) {
            case 'system':
                return { role: 'system', content: msg.content };
            case 'user':
                return { role: 'user', content: msg.content };
            case 'assistant':
                return { role: 'assistant', content: msg.content };
        }
    });
}

/**
 * Maps SDK failures onto the session's error taxonomy. Connection problems
 * become transport errors; every other API error is a provider error.
 */
function toConversationError(error: unknown): ProviderError | TransportError {
    if (error instanceof APIConnectionError) {
        return new TransportError(error.message, { cause: error });
    }
    if (error instanceof APIError) {
        return new ProviderError(error.message, error.status, { cause: error });
    }
    if (error instanceof ProviderError || error instanceof TransportError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(message, { cause: error });
}

/**
 * Chat-completion provider for OpenAI and OpenAI-compatible endpoints.
 */
export class OpenAIProvider implements ILLMProvider {
    public readonly name = 'openai';
    private readonly client: OpenAI;
    private readonly logger: ILogger;

    constructor(options: OpenAIProviderOptions = {}) {
        this.logger = options.logger ?? new ConsoleLogger('OpenAI');
        this.client = options.client ?? new OpenAI({
            apiKey: options.apiKey ?? openaiConfig.apiKey,
            baseURL: options.baseUrl ?? openaiConfig.baseUrl,
        });
        this.logger.debug(`provider ready, base url: ${this.client.baseURL}`);
    }

    async complete(request: CompletionRequest): Promise<CompletionPayload> {
        this.logger.debug(`calling ${request.model} (stream: false)`);
        try {
            const response = await this.client.chat.completions.create({
                model: request.model,
                messages: mapMessages(request.messages),
                temperature: request.temperature,
                stream: false,
            });
            return {
                choices: response.choices.map(choice => ({
                    finish_reason: choice.finish_reason,
                    message: { content: choice.message.content },
                })),
            };
        } catch (error) {
            throw toConversationError(error);
        }
    }

    async stream(request: CompletionRequest): Promise<AsyncIterable<CompletionChunk>> {
        this.logger.debug(`calling ${request.model} (stream: true)`);
        let upstream: AsyncIterable<ChatCompletionChunk>;
        try {
            upstream = await this.client.chat.completions.create({
                model: request.model,
                messages: mapMessages(request.messages),
                temperature: request.temperature,
                stream: true,
            });
        } catch (error) {
            throw toConversationError(error);
        }
        return mapChunks(upstream);
    }
}

async function* mapChunks(
    upstream: AsyncIterable<ChatCompletionChunk>
): AsyncGenerator<CompletionChunk, void, undefined> {
    try {
        for await (const chunk of upstream) {
            yield {
                choices: chunk.choices.map(choice => ({
                    finish_reason: choice.finish_reason,
                    delta: { content: choice.delta.content },
                })),
            };
        }
    } catch (error) {
        throw toConversationError(error);
    }
}
