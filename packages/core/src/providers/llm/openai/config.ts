import '../../../config/env.js';
import type { TiktokenEncoding } from 'js-tiktoken';
import type { ModelConfig } from '../../../core/llm/types.js';

// Context windows of the chat models a session may be created for.
export const openaiModelDict: Record<string, ModelConfig> = {
    'gpt-3.5-turbo': { contextWindow: 4097 },
    'gpt-3.5-turbo-0301': { contextWindow: 4097 },
    'gpt-4': { contextWindow: 8192 },
    'gpt-4-0314': { contextWindow: 8192 },
};

// Tokenizer encodings by model. Unlisted models use 'default'.
export const openaiEncodingDict: Record<string, TiktokenEncoding> = {
    'gpt-3.5-turbo': 'cl100k_base',
    'gpt-3.5-turbo-0301': 'cl100k_base',
    'gpt-4': 'cl100k_base',
    'gpt-4-0314': 'cl100k_base',
    'gpt-4o': 'o200k_base',
    'gpt-4o-mini': 'o200k_base',
    'text-davinci-003': 'p50k_base',
    'default': 'cl100k_base',
};

export const openaiConfig = {
    apiKey: process.env.OPENAI_API_KEY || '',
    baseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
    model: process.env.OPENAI_MODEL || 'gpt-4',
};
