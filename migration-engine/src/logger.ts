/**
 * Coin Migration Engine — Logger
 *
 * Context-tagged console logging, e.g.
 *   2026-01-01T00:00:00.000Z [INFO] [Migration:mig-1] Liquidity locked
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const levelRank: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
    child(context: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

export class ConsoleLogger implements Logger {
    private context: string;
    private level: LogLevel;

    constructor(context: string = 'Migration', level: LogLevel = 'info') {
        this.context = context;
        this.level = level;
    }

    private log(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
        if (levelRank[level] < levelRank[this.level]) return;

        const line = `${new Date().toISOString()} [${level.toUpperCase()}] [${this.context}] ${message}`;
        switch (level) {
            case 'error':
                console.error(line, ...args);
                break;
            case 'warn':
                console.warn(line, ...args);
                break;
            default:
                console.log(line, ...args);
        }
    }

    debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, args);
    }

    info(message: string, ...args: unknown[]): void {
        this.log('info', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, args);
    }

    error(message: string, ...args: unknown[]): void {
        this.log('error', message, args);
    }

    child(context: string): Logger {
        return new ConsoleLogger(`${this.context}:${context}`, this.level);
    }
}

export function createLogger(context: string, level: LogLevel = 'info'): Logger {
    return new ConsoleLogger(context, level);
}
