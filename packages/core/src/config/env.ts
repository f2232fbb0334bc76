// Loads the per-environment .env file and exposes process-wide settings
// that are not tied to a specific provider.
import * as dotenv from 'dotenv';
import * as path from 'path';

const nodeEnv = process.env.NODE_ENV || 'development';
const envFile = `.env.${nodeEnv}`;

// Resolved against the working directory of the host application.
const envPath = path.resolve(process.cwd(), envFile);

dotenv.config({ path: envPath });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): LogLevel {
    const match = LOG_LEVELS.find(level => level === value);
    return match ?? 'error';
}

export const sysConfig = {
    nodeEnv,
    envFile,
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
};
