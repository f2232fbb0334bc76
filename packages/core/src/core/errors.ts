/**
 * Base class for every error raised by the conversation layer.
 */
export class ConversationError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The model identifier is not in the capacity table. */
export class UnsupportedModelError extends ConversationError {
    constructor(
        public readonly model: string,
        public readonly supportedModels: readonly string[]
    ) {
        super(`${model} must be one of [${supportedModels.join(', ')}]`);
    }
}

/** Construction or runtime options that break the token budget. */
export class ConfigurationError extends ConversationError { }

/** Token counting was handed something that is neither text nor turns. */
export class UnsupportedInputError extends ConversationError { }

/**
 * The model service answered with a structured failure
 * (rate limit, server fault, rejected request...).
 */
export class ProviderError extends ConversationError {
    constructor(message: string, public readonly status?: number, options?: ErrorOptions) {
        super(message, options);
    }
}

/** The connection to the model service failed, before or during a stream. */
export class TransportError extends ConversationError { }

/** A response carried a finish reason the session does not understand. */
export class UnrecognizedStateError extends ConversationError {
    constructor(public readonly finishReason: string | null) {
        super(`Unrecognized finish reason: ${String(finishReason)}`);
    }
}

/** Provider and transport failures are the ones the error policy may degrade. */
export function isRecoverableError(error: unknown): error is ProviderError | TransportError {
    return error instanceof ProviderError || error instanceof TransportError;
}
