import { getEncoding, type Tiktoken } from 'js-tiktoken';
import type { ITokenCounter, TokenCountInput } from '../../../core/llm/interfaces.js';
import { countTokensWith } from '../../../core/llm/tokens.js';
import { openaiEncodingDict } from './config.js';

/**
 * Token counter backed by the tiktoken encodings of OpenAI models.
 *
 * Unlike the capacity table, an unknown model is not an error here: it is
 * measured with the default encoding.
 */
export class TiktokenCounter implements ITokenCounter {
    private readonly encoder: Tiktoken;
    public readonly encodingName: string;

    constructor(model: string) {
        const encodingName = openaiEncodingDict[model] ?? openaiEncodingDict['default'];
        this.encodingName = encodingName;
        this.encoder = getEncoding(encodingName);
    }

    /** Special-token markup such as `<|endoftext|>` is counted as plain text. */
    count(input: TokenCountInput): number {
        return countTokensWith(text => this.encoder.encode(text, [], []).length, input);
    }
}
