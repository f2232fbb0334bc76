import { sysConfig, type LogLevel } from '../config/env.js';

/**
 * Logging sink handed to a session. Hosts that already have a logger
 * can adapt it to this shape instead of relying on the console.
 */
export interface ILogger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/**
 * Writes `[Tag] message` lines to the console, dropping anything below `level`.
 */
export class ConsoleLogger implements ILogger {
    constructor(
        private readonly tag: string,
        private readonly level: LogLevel = sysConfig.logLevel
    ) { }

    private enabled(level: LogLevel): boolean {
        return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
    }

    debug(message: string, ...meta: unknown[]): void {
        if (this.enabled('debug')) console.debug(`[${this.tag}] ${message}`, ...meta);
    }

    info(message: string, ...meta: unknown[]): void {
        if (this.enabled('info')) console.log(`[${this.tag}] ${message}`, ...meta);
    }

    warn(message: string, ...meta: unknown[]): void {
        if (this.enabled('warn')) console.warn(`[${this.tag}] ${message}`, ...meta);
    }

    error(message: string, ...meta: unknown[]): void {
        if (this.enabled('error')) console.error(`[${this.tag}] ${message}`, ...meta);
    }
}
