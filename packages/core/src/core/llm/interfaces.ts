import type { ChatMessage, CompletionChunk, CompletionPayload, CompletionRequest } from './types.js';

/**
 * Access contract every model provider implements. The session only knows
 * this interface, never a concrete SDK.
 */
export interface ILLMProvider {
    /** Human-readable name for logs */
    readonly name: string;

    /**
     * Non-streaming completion, resolved once the whole answer is known.
     * @param request model, sampling options and the ordered turns
     */
    complete(request: CompletionRequest): Promise<CompletionPayload>;

    /**
     * Streaming completion. Dispatch failures reject the returned promise;
     * failures after the first chunk are thrown while iterating.
     * @param request model, sampling options and the ordered turns
     */
    stream(request: CompletionRequest): Promise<AsyncIterable<CompletionChunk>>;
}

/**
 * Anything the token counter accepts.
 */
export type TokenCountInput = string | ChatMessage | readonly ChatMessage[];

/**
 * Opaque tokenizer service: text or turns in, token count out.
 */
export interface ITokenCounter {
    count(input: TokenCountInput): number;
}
