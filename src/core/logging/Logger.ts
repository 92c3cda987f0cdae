// src/core/logging/Logger.ts

/**
 * Structured Logger Service
 *
 * Single-line, timestamped entries on stderr:
 * `[time] [LEVEL] [Component] message {context}`
 */

import { ENV } from '../../config/env';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

export type LogContext = Record<string, unknown>;

const LEVELS_BY_NAME: Record<NonNullable<typeof ENV.LOG_LEVEL>, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
};

function defaultLevel(): LogLevel {
    if (ENV.LOG_LEVEL) {
        return LEVELS_BY_NAME[ENV.LOG_LEVEL];
    }
    if (ENV.NODE_ENV === 'production') return LogLevel.INFO;
    if (ENV.NODE_ENV === 'test') return LogLevel.WARN;
    return LogLevel.DEBUG;
}

export class Logger {
    private static readonly currentLevel: LogLevel = defaultLevel();

    private static stringify(context: LogContext): string {
        try {
            return JSON.stringify(context, (_key, value: unknown) =>
                typeof value === 'bigint' ? value.toString() : value
            );
        } catch {
            return '[unserializable context]';
        }
    }

    private static formatMessage(level: string, component: string, message: string, context?: LogContext): string {
        const timestamp = new Date().toISOString();
        let log = `[${timestamp}] [${level}] [${component}] ${message}`;

        if (context && Object.keys(context).length > 0) {
            log += ` ${this.stringify(context)}`;
        }

        return log;
    }

    public static debug(component: string, message: string, context?: LogContext): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.error(this.formatMessage('DEBUG', component, message, context));
        }
    }

    public static info(component: string, message: string, context?: LogContext): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.error(this.formatMessage('INFO', component, message, context));
        }
    }

    public static warn(component: string, message: string, context?: LogContext): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.error(this.formatMessage('WARN', component, message, context));
        }
    }

    public static error(component: string, message: string, error?: unknown, context?: LogContext): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            let errorDetails = '';
            if (error instanceof Error) {
                errorDetails = ` Stack: ${error.stack ?? error.message}`;
            } else if (error !== undefined) {
                errorDetails = ` Details: ${this.stringify({ error })}`;
            }

            console.error(this.formatMessage('ERROR', component, message, context) + errorDetails);
        }
    }
}
