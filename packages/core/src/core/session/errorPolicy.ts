import { isRecoverableError } from '../errors.js';
import type { ILogger } from '../logger.js';
import type { ErrorHook, SessionReply } from './types.js';

/** Shown word by word when a stream breaks after it has started. */
export const STREAM_FAILURE_MESSAGE = 'Provider error. Please try again.';

/**
 * Restartable word-by-word stream over a fixed message: every iteration
 * starts again from the first word. Each word is followed by a space.
 */
export function wordStream(message: string): AsyncIterable<string> {
    const words = message.split(/\s+/).filter(word => word.length > 0);
    return {
        async *[Symbol.asyncIterator]() {
            for (const word of words) {
                yield `${word} `;
            }
        },
    };
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export interface ErrorPolicyOptions {
    onError: ErrorHook;
    raiseOnError: boolean;
    logger: ILogger;
}

/**
 * Decides what a failed call turns into. The hook always runs exactly once
 * per failure, before any re-raise.
 */
export class ErrorPolicy {
    constructor(private readonly options: ErrorPolicyOptions) { }

    get raiseOnError(): boolean {
        return this.options.raiseOnError;
    }

    private report(error: unknown, stage: string): void {
        this.options.logger.error(`(${stage}) ${describeError(error)}`);
        this.options.onError(error);
        if (this.options.raiseOnError) {
            throw error;
        }
    }

    /**
     * Dispatch failed before any response arrived.
     * @param stream whether the caller asked for a streamed reply
     */
    handleDispatchFailure(error: unknown, stream: boolean): SessionReply {
        this.report(error, 'dispatch');
        const text = isRecoverableError(error)
            ? `Provider error. ${describeError(error)}`
            : `Internal error. ${describeError(error)}`;
        return stream
            ? { kind: 'degraded-stream', fragments: wordStream(text), error }
            : { kind: 'degraded', text, error };
    }

    /**
     * A stream broke after the caller started consuming it.
     * @returns the fragments to yield in place of the rest of the answer
     */
    handleStreamFailure(error: unknown): AsyncIterable<string> {
        this.report(error, 'stream');
        return wordStream(STREAM_FAILURE_MESSAGE);
    }
}
