import { ConfigurationError, UnsupportedModelError } from '../errors.js';
import type { ITokenCounter } from '../llm/interfaces.js';
import type { ChatMessage, ModelConfig } from '../llm/types.js';

export interface TokenBudgetOptions {
    model: string;
    /** Tokens kept free for the model's answer on every exchange */
    maxOutputTokens: number;
    tokenizer: ITokenCounter;
    /** Capacity table the model must be listed in */
    modelTable: Readonly<Record<string, ModelConfig>>;
}

export interface TokenBudgetSnapshot {
    totalCapacity: number;
    reservedOutput: number;
    fixedOverhead: number;
    historyLimit: number;
}

/**
 * Context accounting of one session: total window, fixed overhead of the
 * system prompt and examples, and the reservation for the model's answer.
 */
export class TokenBudget {
    public readonly totalCapacity: number;
    private reserved: number;
    private overhead = 0;

    constructor(private readonly options: TokenBudgetOptions) {
        const { model, modelTable } = options;
        const config = Object.prototype.hasOwnProperty.call(modelTable, model) ? modelTable[model] : undefined;
        if (!config) {
            throw new UnsupportedModelError(model, Object.keys(modelTable));
        }
        this.totalCapacity = config.contextWindow;
        this.reserved = this.checkReservation(options.maxOutputTokens);
    }

    private checkReservation(maxOutputTokens: number): number {
        if (!Number.isInteger(maxOutputTokens) || maxOutputTokens < 0) {
            throw new ConfigurationError(
                `maxOutputTokens must be a non-negative integer. Current: ${maxOutputTokens}`
            );
        }
        if (maxOutputTokens >= this.totalCapacity) {
            throw new ConfigurationError(
                `maxOutputTokens must be less than the context window of ${this.options.model}. ` +
                `Current: ${maxOutputTokens} >= ${this.totalCapacity}`
            );
        }
        return maxOutputTokens;
    }

    get reservedOutput(): number {
        return this.reserved;
    }

    get fixedOverhead(): number {
        return this.overhead;
    }

    /**
     * Tokens left for user/assistant history. Negative when the fixed
     * overhead alone does not fit, which the trimmer treats as no room.
     */
    get historyLimit(): number {
        return this.totalCapacity - this.overhead - this.reserved;
    }

    /**
     * Measures the system prompt and example turns once. Calling it again
     * replaces the previous overhead.
     */
    reserveFixedOverhead(systemPrompt: string, examples: readonly ChatMessage[]): number {
        const { tokenizer } = this.options;
        const systemTokens = tokenizer.count(systemPrompt);
        const exampleTokens = tokenizer.count(examples.map(example => example.content).join(' '));
        this.overhead = systemTokens + exampleTokens;
        return this.overhead;
    }

    setReservedOutput(maxOutputTokens: number): void {
        this.reserved = this.checkReservation(maxOutputTokens);
    }

    snapshot(): TokenBudgetSnapshot {
        return {
            totalCapacity: this.totalCapacity,
            reservedOutput: this.reserved,
            fixedOverhead: this.overhead,
            historyLimit: this.historyLimit,
        };
    }
}
