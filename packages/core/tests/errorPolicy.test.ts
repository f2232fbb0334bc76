import { describe, it, expect, vi } from 'vitest';
import { ProviderError, TransportError } from '../src/core/errors.js';
import { ErrorPolicy, STREAM_FAILURE_MESSAGE, wordStream } from '../src/core/session/errorPolicy.js';
import { createSilentLogger, drain } from './helpers/fakes.js';

function createPolicy(raiseOnError = false) {
    const onError = vi.fn();
    const logger = createSilentLogger();
    return { policy: new ErrorPolicy({ onError, raiseOnError, logger }), onError, logger };
}

describe('wordStream', () => {
    it('yields each word followed by a space', async () => {
        expect(await drain(wordStream('  Provider   error. '))).toEqual(['Provider ', 'error. ']);
    });

    it('starts over on every iteration', async () => {
        const stream = wordStream('one two');
        expect(await drain(stream)).toEqual(['one ', 'two ']);
        expect(await drain(stream)).toEqual(['one ', 'two ']);
    });
});

describe('ErrorPolicy', () => {
    it('degrades provider failures into a plain message', () => {
        const { policy, onError, logger } = createPolicy();
        const error = new ProviderError('Rate limit reached', 429);

        expect(policy.handleDispatchFailure(error, false)).toEqual({
            kind: 'degraded',
            text: 'Provider error. Rate limit reached',
            error,
        });
        expect(onError).toHaveBeenCalledTimes(1);
        expect(onError).toHaveBeenCalledWith(error);
        expect(logger.error).toHaveBeenCalledWith('(dispatch) Rate limit reached');
    });

    it('labels unexpected faults as internal errors', () => {
        const { policy } = createPolicy();
        const reply = policy.handleDispatchFailure(new Error('socket closed'), false);
        expect(reply.kind === 'degraded' && reply.text).toBe('Internal error. socket closed');
    });

    it('keeps the streaming shape when the caller asked for a stream', async () => {
        const { policy } = createPolicy();
        const reply = policy.handleDispatchFailure(new TransportError('ECONNRESET'), true);
        expect(reply.kind).toBe('degraded-stream');
        if (reply.kind !== 'degraded-stream') return;
        expect(await drain(reply.fragments)).toEqual(['Provider ', 'error. ', 'ECONNRESET ']);
    });

    it('runs the hook before re-raising the original error', () => {
        const { policy, onError } = createPolicy(true);
        const error = new ProviderError('server fault', 500);
        expect(() => policy.handleDispatchFailure(error, false)).toThrow(error);
        expect(onError).toHaveBeenCalledTimes(1);
    });

    it('re-raises non-Error values as they are', () => {
        const { policy } = createPolicy(true);
        let caught: unknown;
        try {
            policy.handleStreamFailure('plain failure');
        } catch (error) {
            caught = error;
        }
        expect(caught).toBe('plain failure');
    });

    it('replaces a broken stream with the fixed message', async () => {
        const { policy, onError } = createPolicy();
        const fragments = await drain(policy.handleStreamFailure(new TransportError('reset')));
        expect(fragments.join('')).toBe(`${STREAM_FAILURE_MESSAGE} `);
        expect(onError).toHaveBeenCalledTimes(1);
    });
});
