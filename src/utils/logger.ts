/**
 * 📝 STRUCTURED LOGGER
 * Static facade over winston. Errors are categorized before they are written so
 * a blocked site, a broken selector and a logic fault never look alike in the logs.
 */

import winston from 'winston';

export enum ErrorCategory {
    NETWORK = 'NETWORK',        // Timeout, DNS, connection refused
    BLOCKED = 'BLOCKED',        // 403/429, captcha, challenge pages
    BROWSER = 'BROWSER',        // Render session crash, page not responding
    PARSING = 'PARSING',        // Markup / JSON parsing failures
    VALIDATION = 'VALIDATION',  // Identity or config validation failures
    LOGIC = 'LOGIC',            // Programmer error
}

export interface LogContext {
    therapist_id?: string;
    directory_id?: string;
    site_id?: string;
    url?: string;
    error?: Error;
    error_category?: ErrorCategory;
    duration_ms?: number;
    [key: string]: unknown;
}

const env = process.env.NODE_ENV ?? 'development';

const devFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp(),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
        const brief = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `[${String(timestamp)}] ${level} ${String(message)}${brief}`;
    })
);

const prodFormat = winston.format.combine(winston.format.timestamp(), winston.format.json());

const sink = winston.createLogger({
    level: process.env.LOG_LEVEL ?? 'info',
    silent: env === 'test',
    defaultMeta: { service: process.env.SERVICE_NAME ?? 'profile-discovery' },
    format: env === 'production' ? prodFormat : devFormat,
    transports: [new winston.transports.Console()],
});

export class Logger {
    static debug(msg: string, context?: LogContext): void {
        this.log('debug', msg, context);
    }

    static info(msg: string, context?: LogContext): void {
        this.log('info', msg, context);
    }

    static warn(msg: string, context?: LogContext): void {
        this.log('warn', msg, context);
    }

    static error(msg: string, context?: LogContext): void {
        this.log('error', msg, context);
    }

    /**
     * 💀 FATAL: logic faults that must never be swallowed.
     */
    static fatal(msg: string, context?: LogContext): void {
        this.log('error', `FATAL ${msg}`, { ...context, fatal: true });
    }

    static categorizeError(error: Error): ErrorCategory {
        const msg = error.message.toLowerCase();

        if (msg.includes('403') || msg.includes('429') || msg.includes('captcha') || msg.includes('blocked')) {
            return ErrorCategory.BLOCKED;
        }
        if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('socket')) {
            return ErrorCategory.NETWORK;
        }
        if (msg.includes('browser') || msg.includes('puppeteer') || msg.includes('target closed') || msg.includes('detached')) {
            return ErrorCategory.BROWSER;
        }
        if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('selector')) {
            return ErrorCategory.PARSING;
        }
        if (msg.includes('validation') || msg.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        return ErrorCategory.LOGIC;
    }

    static logError(msg: string, error: Error, extraContext?: Partial<LogContext>): void {
        this.error(msg, {
            ...extraContext,
            error,
            error_category: this.categorizeError(error),
        });
    }

    private static log(level: string, msg: string, context?: LogContext): void {
        if (!context) {
            sink.log(level, msg);
            return;
        }

        const { error, ...rest } = context;
        if (error instanceof Error) {
            sink.log(level, msg, { ...rest, error_message: error.message, error_stack: error.stack });
            return;
        }
        sink.log(level, msg, rest);
    }
}
