/**
 * Roles understood by chat-completion models.
 */
export type Role = 'system' | 'user' | 'assistant';

/**
 * One turn of the conversation. Turns are never edited after creation.
 */
export type ChatMessage = Readonly<{
    role: Role;
    content: string;
}>;

/**
 * Options the session may tune between exchanges.
 */
export interface ChatOptions {
    stream: boolean;
    temperature: number;
}

/**
 * What the session sends to the model service on every exchange.
 */
export interface CompletionRequest extends ChatOptions {
    model: string;
    /** System prompt, example turns and trimmed history, in that order. */
    messages: readonly ChatMessage[];
}

/**
 * Finish reasons the session knows how to finalize. Anything else reported
 * by the service is passed through as a plain string and rejected later.
 */
export type TerminalFinishReason = 'stop' | 'length';

export interface CompletionPayload {
    choices: Array<{
        finish_reason: string | null;
        message: { content?: string | null };
    }>;
}

export interface CompletionChunk {
    choices: Array<{
        finish_reason: string | null;
        delta: { content?: string | null };
    }>;
}

/**
 * Raw response union, decided once at the transport boundary.
 */
export type RawResponse =
    | { type: 'completion'; completion: CompletionPayload }
    | { type: 'stream'; chunks: AsyncIterable<CompletionChunk> };

/**
 * Context limits of one model.
 */
export interface ModelConfig {
    /** Absolute context window of the model, prompt and output together. */
    contextWindow: number;
}
