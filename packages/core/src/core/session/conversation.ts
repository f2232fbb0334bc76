import { openaiModelDict } from '../../providers/llm/openai/config.js';
import { TiktokenCounter } from '../../providers/llm/openai/tokenizer.js';
import type { ILLMProvider, ITokenCounter } from '../llm/interfaces.js';
import type { ChatMessage, CompletionRequest, RawResponse } from '../llm/types.js';
import { ConsoleLogger, type ILogger } from '../logger.js';
import { TokenBudget, type TokenBudgetSnapshot } from './budget.js';
import { ErrorPolicy } from './errorPolicy.js';
import { PendingAnswer, ResponseNormalizer } from './normalizer.js';
import { trimHistory } from './trimmer.js';
import type {
    ExampleContent,
    ExamplePair,
    Preprocessor,
    RuntimeOptions,
    SessionOptions,
    SessionReply,
} from './types.js';

const DEFAULTS = {
    model: 'gpt-4',
    maxOutputTokens: 400,
    stream: false,
    // high temperature makes the output unstable
    temperature: 0.001,
    raiseOnError: false,
};

function exampleText(content: ExampleContent): string {
    return typeof content === 'string' ? content : JSON.stringify(content);
}

function expandExamples(examples: readonly ExamplePair[]): ChatMessage[] {
    return examples.flatMap(([user, assistant]): ChatMessage[] => [
        { role: 'user', content: exampleText(user) },
        { role: 'assistant', content: exampleText(assistant) },
    ]);
}

/**
 * Conversation with a chat model over a bounded rolling history.
 *
 * Every call appends the user turn, trims the history to the model's
 * context window and sends system prompt + examples + history to the
 * provider. A streamed answer is recorded in the history only once the
 * caller has drained the returned fragments.
 *
 * Not safe for concurrent exchanges: start the next `ask` only after the
 * previous reply has been fully consumed, otherwise the pending answers of
 * both streams are interleaved.
 *
 * @typeParam TArgs arguments accepted by `ask`, forwarded to the preprocessor
 */
export class ConversationSession<TArgs extends unknown[] = [string]> {
    public readonly model: string;
    public readonly systemPrompt: string;
    public readonly examples: readonly ChatMessage[];

    private historyLog: ChatMessage[] = [];
    private runtime: Omit<RuntimeOptions, 'maxOutputTokens'>;

    private readonly provider: ILLMProvider;
    private readonly tokenizer: ITokenCounter;
    private readonly budget: TokenBudget;
    private readonly preprocessor: Preprocessor<TArgs>;
    private readonly pending = new PendingAnswer();
    private readonly policy: ErrorPolicy;
    private readonly normalizer: ResponseNormalizer;
    private readonly logger: ILogger;

    constructor(options: SessionOptions<TArgs>) {
        this.model = options.model ?? DEFAULTS.model;
        this.systemPrompt = options.systemPrompt;
        this.examples = expandExamples(options.examples ?? []);
        this.provider = options.provider;
        this.logger = options.logger ?? new ConsoleLogger('ConversationSession');
        this.tokenizer = options.tokenizer ?? new TiktokenCounter(this.model);

        this.budget = new TokenBudget({
            model: this.model,
            maxOutputTokens: options.maxOutputTokens ?? DEFAULTS.maxOutputTokens,
            tokenizer: this.tokenizer,
            modelTable: options.modelTable ?? openaiModelDict,
        });
        this.budget.reserveFixedOverhead(this.systemPrompt, this.examples);

        this.runtime = {
            stream: options.stream ?? DEFAULTS.stream,
            temperature: options.temperature ?? DEFAULTS.temperature,
        };
        this.preprocessor = options.preprocessor ?? ((...args: TArgs) => args.map(String).join(' '));

        this.policy = new ErrorPolicy({
            onError: options.onError ?? (() => undefined),
            raiseOnError: options.raiseOnError ?? DEFAULTS.raiseOnError,
            logger: this.logger,
        });
        this.normalizer = new ResponseNormalizer({
            pending: this.pending,
            policy: this.policy,
            logger: this.logger,
            appendTurn: message => {
                this.historyLog.push(message);
            },
        });

        this.logger.debug(
            `session ready on ${this.provider.name}/${this.model}, ` +
            `${this.budget.historyLimit} tokens available for history`
        );
    }

    /** Current history, oldest turn first. */
    get history(): readonly ChatMessage[] {
        return [...this.historyLog];
    }

    /** Token count of the current history. */
    get historyTokens(): number {
        return this.tokenizer.count(this.historyLog);
    }

    /** Text accumulated so far by the stream being consumed. */
    get answer(): string {
        return this.pending.value;
    }

    get raiseOnError(): boolean {
        return this.policy.raiseOnError;
    }

    get options(): RuntimeOptions {
        return { ...this.runtime, maxOutputTokens: this.budget.reservedOutput };
    }

    get tokenBudget(): TokenBudgetSnapshot {
        return this.budget.snapshot();
    }

    /**
     * Changes streaming, temperature or the output reservation for the
     * following exchanges.
     * @throws ConfigurationError when `maxOutputTokens` does not fit the model
     */
    configure(patch: Partial<RuntimeOptions>): void {
        if (patch.maxOutputTokens !== undefined) {
            this.budget.setReservedOutput(patch.maxOutputTokens);
        }
        this.runtime = {
            stream: patch.stream ?? this.runtime.stream,
            temperature: patch.temperature ?? this.runtime.temperature,
        };
    }

    /** System prompt, examples and history, as sent to the provider. */
    buildMessages(): ChatMessage[] {
        return [
            { role: 'system', content: this.systemPrompt },
            ...this.examples,
            ...this.historyLog,
        ];
    }

    /**
     * Runs one exchange.
     * @param args forwarded to the preprocessor to build the user turn
     */
    public async ask(...args: TArgs): Promise<SessionReply> {
        const content = this.preprocessor(...args);
        // history is replaced only once the new turn has been counted
        this.historyLog = trimHistory(
            [...this.historyLog, { role: 'user', content }],
            this.budget.historyLimit,
            this.tokenizer,
            this.logger,
        );
        return this.dispatch();
    }

    /** Forgets the history and any pending answer; configuration is kept. */
    reset(): void {
        this.historyLog = [];
        this.pending.reset();
    }

    private async dispatch(): Promise<SessionReply> {
        const request: CompletionRequest = {
            model: this.model,
            stream: this.runtime.stream,
            temperature: this.runtime.temperature,
            messages: this.buildMessages(),
        };

        const startedAt = Date.now();
        let raw: RawResponse;
        try {
            raw = request.stream
                ? { type: 'stream', chunks: await this.provider.stream(request) }
                : { type: 'completion', completion: await this.provider.complete(request) };
        } catch (error) {
            return this.policy.handleDispatchFailure(error, request.stream);
        } finally {
            this.logger.debug(`time waiting for api: ${((Date.now() - startedAt) / 1000).toFixed(3)}`);
        }

        switch (raw.type) {
            case 'completion':
                return { kind: 'complete', text: this.normalizer.complete(raw.completion) };
            case 'stream':
                return { kind: 'stream', fragments: this.normalizer.stream(raw.chunks) };
        }
    }
}

/**
 * Drains any reply into a single string.
 */
export async function collectReply(reply: SessionReply): Promise<string> {
    if (reply.kind === 'complete' || reply.kind === 'degraded') {
        return reply.text;
    }
    let text = '';
    for await (const fragment of reply.fragments) {
        text += fragment;
    }
    return text;
}
