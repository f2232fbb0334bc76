import type { ITokenCounter, ILLMProvider } from '../llm/interfaces.js';
import type { ModelConfig } from '../llm/types.js';
import type { ILogger } from '../logger.js';

/**
 * What a caller gets back from one exchange.
 *
 * `degraded` replies replace the model's answer after a provider or
 * transport failure; they keep the text/stream shape the caller asked for.
 */
export type SessionReply =
    | { kind: 'complete'; text: string }
    | { kind: 'stream'; fragments: AsyncIterable<string> }
    | { kind: 'degraded'; text: string; error: unknown }
    | { kind: 'degraded-stream'; fragments: AsyncIterable<string>; error: unknown };

/**
 * Side-effecting callback run once per failed call, before the session
 * raises or degrades. Its own exceptions propagate to the caller.
 */
export type ErrorHook = (error: unknown) => void;

/**
 * Pure function turning the caller's arguments into the user turn text.
 */
export type Preprocessor<TArgs extends unknown[]> = (...args: TArgs) => string;

/** Example content is either plain text or a structured value sent as JSON. */
export type ExampleContent = string | Readonly<Record<string, unknown>>;

export type ExamplePair = readonly [user: ExampleContent, assistant: ExampleContent];

/**
 * Options a session may change between exchanges.
 */
export interface RuntimeOptions {
    stream: boolean;
    temperature: number;
    /** Tokens reserved for the model's answer */
    maxOutputTokens: number;
}

export interface SessionOptions<TArgs extends unknown[]> extends Partial<RuntimeOptions> {
    systemPrompt: string;
    provider: ILLMProvider;
    examples?: readonly ExamplePair[];
    /** Must be listed in the capacity table. Default: gpt-4 */
    model?: string;
    /** Default: tiktoken encoding of the model */
    tokenizer?: ITokenCounter;
    /** Default: the OpenAI chat model table */
    modelTable?: Readonly<Record<string, ModelConfig>>;
    preprocessor?: Preprocessor<TArgs>;
    onError?: ErrorHook;
    /** Propagate provider and transport failures instead of degrading */
    raiseOnError?: boolean;
    logger?: ILogger;
}
