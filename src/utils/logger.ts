/**
 * 📝 STRUCTURED LOGGER
 * winston underneath: JSON lines in production, colorized one-liners in development.
 * Set LOG_DIR to also keep daily-rotated files.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { AxiosError } from 'axios';
import { getEnv } from '../config/env';

export enum ErrorCategory {
    NETWORK = 'NETWORK',       // Timeout, DNS, TLS, connection refused
    PARSING = 'PARSING',       // HTML/JSON parsing failures
    VALIDATION = 'VALIDATION', // Bad input, zod failures
    ORACLE = 'ORACLE',         // Entity classifier failures
    LOGIC = 'LOGIC'            // Programmer error (bugs)
}

export interface LogContext {
    url?: string;
    text?: string;
    error?: Error;
    error_category?: ErrorCategory;
    duration_ms?: number;
    [key: string]: unknown;
}

function createWinston(): winston.Logger {
    const env = getEnv();
    const isDev = env.NODE_ENV !== 'production';

    const transports: Array<winston.transports.ConsoleTransportInstance | DailyRotateFile> = [
        new winston.transports.Console({
            silent: env.NODE_ENV === 'test',
            format: isDev
                ? winston.format.combine(winston.format.colorize(), winston.format.simple())
                : winston.format.json(),
        }),
    ];

    if (env.LOG_DIR) {
        transports.push(new DailyRotateFile({
            dirname: env.LOG_DIR,
            filename: `${env.SERVICE_NAME}-%DATE%.log`,
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d',
        }));
    }

    return winston.createLogger({
        level: env.LOG_LEVEL,
        defaultMeta: { service: env.SERVICE_NAME },
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
        ),
        transports,
    });
}

export class Logger {
    private static instance: winston.Logger | null = null;

    private static get winston(): winston.Logger {
        if (!this.instance) {
            this.instance = createWinston();
        }
        return this.instance;
    }

    static debug(msg: string, context?: LogContext) {
        this.log('debug', msg, context);
    }

    static info(msg: string, context?: LogContext) {
        this.log('info', msg, context);
    }

    static warn(msg: string, context?: LogContext) {
        this.log('warn', msg, context);
    }

    static error(msg: string, context?: LogContext) {
        this.log('error', msg, context);
    }

    static categorizeError(error: Error): ErrorCategory {
        if (error.name === 'OracleError') return ErrorCategory.ORACLE;
        if (error.name === 'FetchError') return ErrorCategory.NETWORK;
        if (error.name === 'ValidationError' || error.name === 'ZodError') return ErrorCategory.VALIDATION;
        if (error instanceof AxiosError && error.code) return ErrorCategory.NETWORK;

        const msg = error.message.toLowerCase();
        if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('socket') || msg.includes('certificate')) {
            return ErrorCategory.NETWORK;
        }
        if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('json')) {
            return ErrorCategory.PARSING;
        }
        if (msg.includes('validation') || msg.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        return ErrorCategory.LOGIC;
    }

    static logError(msg: string, error: Error, extraContext?: Partial<LogContext>) {
        this.error(msg, {
            ...extraContext,
            error,
            error_category: this.categorizeError(error),
        });
    }

    private static log(level: string, msg: string, context?: LogContext) {
        if (!context) {
            this.winston.log(level, msg);
            return;
        }
        const { error, ...rest } = context;
        const meta: Record<string, unknown> = { ...rest };
        if (error) {
            meta.error_message = error.message;
            meta.error_stack = error.stack;
        }
        this.winston.log(level, msg, meta);
    }
}
