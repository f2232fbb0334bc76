import { UnsupportedInputError } from '../errors.js';
import type { ChatMessage } from './types.js';

export function isChatMessage(value: unknown): value is ChatMessage {
    if (typeof value !== 'object' || value === null) return false;
    return 'role' in value
        && (value.role === 'system' || value.role === 'user' || value.role === 'assistant')
        && 'content' in value
        && typeof value.content === 'string';
}

function isChatMessageList(value: unknown): value is readonly ChatMessage[] {
    return Array.isArray(value) && value.every(isChatMessage);
}

function describe(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array containing non-turn values';
    return typeof value;
}

/**
 * Shared counting policy on top of any text encoder:
 * a list of turns is measured as its contents joined by a single space.
 *
 * @param encode returns the token count of a plain string
 * @throws UnsupportedInputError when `input` is neither text, a turn nor a list of turns
 */
export function countTokensWith(encode: (text: string) => number, input: unknown): number {
    if (typeof input === 'string') {
        return encode(input);
    }
    if (isChatMessageList(input)) {
        return encode(input.map(message => message.content).join(' '));
    }
    if (isChatMessage(input)) {
        return encode(input.content);
    }
    throw new UnsupportedInputError(`Cannot count tokens of ${describe(input)}`);
}
