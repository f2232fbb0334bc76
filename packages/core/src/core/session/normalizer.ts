import { TransportError, UnrecognizedStateError } from '../errors.js';
import type { ChatMessage, CompletionChunk, CompletionPayload, TerminalFinishReason } from '../llm/types.js';
import type { ILogger } from '../logger.js';
import type { ErrorPolicy } from './errorPolicy.js';

export type PendingAnswerState = 'accumulating' | 'finalized';

/**
 * Accumulator for the answer being streamed. Only the normalizer writes to
 * it; the session exposes the current text read-only.
 *
 * Every stream opens its own exchange. Writes that carry an exchange other
 * than the current one (a stream left running across `reset()` or a newer
 * `begin()`) are ignored.
 */
export class PendingAnswer {
    private current: PendingAnswerState = 'finalized';
    private text = '';
    private exchange = 0;

    get state(): PendingAnswerState {
        return this.current;
    }

    get value(): string {
        return this.text;
    }

    /** Opens a new exchange and returns its token. */
    begin(): number {
        this.exchange++;
        this.current = 'accumulating';
        this.text = '';
        return this.exchange;
    }

    private owns(exchange: number): boolean {
        return exchange === this.exchange && this.current === 'accumulating';
    }

    /** @returns false when `exchange` is no longer the open one */
    append(exchange: number, delta: string): boolean {
        if (!this.owns(exchange)) return false;
        this.text += delta;
        return true;
    }

    /**
     * Hands back the accumulated text and closes the exchange.
     * @returns null when `exchange` is no longer the open one
     */
    finalize(exchange: number): string | null {
        if (!this.owns(exchange)) return null;
        const answer = this.text;
        this.reset();
        return answer;
    }

    /** Closes `exchange` without keeping its text, if it is still open. */
    discard(exchange: number): void {
        if (this.owns(exchange)) this.reset();
    }

    /** Closes whatever exchange is open. */
    reset(): void {
        this.exchange++;
        this.current = 'finalized';
        this.text = '';
    }
}

/**
 * @returns null while the answer is still being produced
 * @throws UnrecognizedStateError for any finish reason other than stop/length
 */
export function readFinishReason(finishReason: string | null): TerminalFinishReason | null {
    if (finishReason === null) return null;
    if (finishReason === 'stop' || finishReason === 'length') return finishReason;
    throw new UnrecognizedStateError(finishReason);
}

export interface NormalizerDeps {
    pending: PendingAnswer;
    policy: ErrorPolicy;
    logger: ILogger;
    /** Appends the finalized assistant turn to the session history */
    appendTurn(message: ChatMessage): void;
}

/**
 * Turns raw model responses into the text the caller sees, and records the
 * assistant turn once an answer is complete.
 */
export class ResponseNormalizer {
    constructor(private readonly deps: NormalizerDeps) { }

    /**
     * Non-streaming response: the whole answer is in the first choice.
     */
    complete(payload: CompletionPayload): string {
        const choice = payload.choices[0];
        if (!choice) {
            throw new UnrecognizedStateError(null);
        }
        this.deps.logger.debug(`response: ${JSON.stringify(choice)}`);

        const reason = readFinishReason(choice.finish_reason);
        if (reason === null) {
            throw new UnrecognizedStateError(null);
        }

        const answer = choice.message.content ?? '';
        this.deps.appendTurn({ role: 'assistant', content: answer });
        this.deps.pending.reset();
        return answer;
    }

    /**
     * Streaming response. The assistant turn is appended only when the
     * terminal chunk is seen, so the caller has to drain the sequence.
     */
    async *stream(chunks: AsyncIterable<CompletionChunk>): AsyncGenerator<string, void, undefined> {
        const { pending, policy, logger } = this.deps;
        const exchange = pending.begin();

        try {
            for await (const chunk of chunks) {
                const choice = chunk.choices[0];
                if (!choice) continue;
                logger.debug(`chunk: ${JSON.stringify(choice)}`);

                const reason = readFinishReason(choice.finish_reason);
                if (reason === null) {
                    const delta = choice.delta.content ?? '';
                    pending.append(exchange, delta);
                    if (delta) yield delta;
                    continue;
                }

                const answer = pending.finalize(exchange);
                if (answer === null) {
                    logger.warn('stream finished after its exchange was reset, answer not recorded');
                } else {
                    this.deps.appendTurn({ role: 'assistant', content: answer });
                }
                return;
            }
            throw new TransportError('Stream ended before a finish reason was received');
        } catch (error) {
            pending.discard(exchange);
            if (error instanceof UnrecognizedStateError) {
                throw error;
            }
            yield* policy.handleStreamFailure(error);
        }
    }
}
