import type { ITokenCounter } from '../llm/interfaces.js';
import type { ChatMessage } from '../llm/types.js';
import type { ILogger } from '../logger.js';

/**
 * Sliding-window trim: returns the longest suffix of `history` whose token
 * count stays within `limit`, scanning from the newest turn backward.
 *
 * When the oldest user turn of that suffix is not its first element, the
 * suffix is advanced past that user turn so it never opens mid-exchange.
 * The dropped user turn is discarded, not kept.
 *
 * @param limit token room left for history; zero or negative keeps nothing
 */
export function trimHistory(
    history: readonly ChatMessage[],
    limit: number,
    tokenizer: ITokenCounter,
    logger?: ILogger
): ChatMessage[] {
    let trimmed: ChatMessage[] = [];
    let tokens = 0;

    for (let i = history.length - 1; i >= 0; i--) {
        const message = history[i];
        tokens += tokenizer.count(message);
        if (tokens > limit) {
            break;
        }
        trimmed.unshift(message);
    }

    const oldestUserIndex = trimmed.findIndex(message => message.role === 'user');
    if (oldestUserIndex > 0) {
        trimmed = trimmed.slice(oldestUserIndex + 1);
        const newLength = trimmed.reduce((acc, message) => acc + tokenizer.count(message), 0);
        logger?.info(`history trimmed. New length: ${newLength}. Available length: ${limit}`);
    }

    return trimmed;
}
