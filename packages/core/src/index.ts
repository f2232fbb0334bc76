export { ConversationSession, collectReply } from './core/session/conversation.js';
export { TokenBudget } from './core/session/budget.js';
export type { TokenBudgetOptions, TokenBudgetSnapshot } from './core/session/budget.js';
export { trimHistory } from './core/session/trimmer.js';
export { PendingAnswer, ResponseNormalizer, readFinishReason } from './core/session/normalizer.js';
export type { PendingAnswerState } from './core/session/normalizer.js';
export { ErrorPolicy, STREAM_FAILURE_MESSAGE, wordStream } from './core/session/errorPolicy.js';
export type {
    ErrorHook,
    ExampleContent,
    ExamplePair,
    Preprocessor,
    RuntimeOptions,
    SessionOptions,
    SessionReply,
} from './core/session/types.js';

export {
    ConversationError,
    ConfigurationError,
    ProviderError,
    TransportError,
    UnrecognizedStateError,
    UnsupportedInputError,
    UnsupportedModelError,
    isRecoverableError,
} from './core/errors.js';
export { ConsoleLogger } from './core/logger.js';
export type { ILogger } from './core/logger.js';
export { countTokensWith, isChatMessage } from './core/llm/tokens.js';
export type { ILLMProvider, ITokenCounter, TokenCountInput } from './core/llm/interfaces.js';
export type {
    ChatMessage,
    ChatOptions,
    CompletionChunk,
    CompletionPayload,
    CompletionRequest,
    ModelConfig,
    RawResponse,
    Role,
    TerminalFinishReason,
} from './core/llm/types.js';

export { OpenAIProvider } from './providers/llm/openai/index.js';
export type { OpenAIProviderOptions } from './providers/llm/openai/index.js';
export { TiktokenCounter } from './providers/llm/openai/tokenizer.js';
export { openaiConfig, openaiEncodingDict, openaiModelDict } from './providers/llm/openai/config.js';
export { sysConfig } from './config/env.js';
export type { LogLevel } from './config/env.js';
