// src/utils/logger.ts

import winston from 'winston';
import type { LogLevel } from '@/types';
import { STORAGE_PATHS } from '@/config/storage';

type LogMeta = Record<string, unknown>;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const resolveLevel = (): LogLevel => {
    const level = LOG_LEVELS.find(candidate => candidate === process.env.LOG_LEVEL);
    return level ?? 'info';
};

const isTestRun = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

// Custom log format
const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, stack, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
        const serviceStr = service ? `[${String(service)}] ` : '';
        const stackStr = typeof stack === 'string' ? stack : '';
        return `${String(timestamp)} [${level.toUpperCase()}] ${serviceStr}${String(message)} ${stackStr} ${metaStr}`.trimEnd();
    })
);

const buildTransports = (): winston.transport[] => {
    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                logFormat
            )
        })
    ];

    if (!isTestRun) {
        transports.push(
            // File transport for all logs
            new winston.transports.File({
                filename: STORAGE_PATHS.logs.app,
                maxsize: 5242880, // 5MB
                maxFiles: 5
            }),

            // Separate file for errors
            new winston.transports.File({
                filename: STORAGE_PATHS.logs.error,
                level: 'error',
                maxsize: 5242880, // 5MB
                maxFiles: 3
            })
        );
    }

    return transports;
};

// Create logger instance
const logger = winston.createLogger({
    level: resolveLevel(),
    format: logFormat,
    defaultMeta: { service: 'content-cycle' },
    silent: isTestRun,
    transports: buildTransports()
});

export const setLogLevel = (level: LogLevel): void => {
    logger.level = level;
};

export interface ServiceLogger {
    info: (message: string, meta?: LogMeta) => void;
    error: (message: string, error?: unknown, meta?: LogMeta) => void;
    warn: (message: string, meta?: LogMeta) => void;
    debug: (message: string, meta?: LogMeta) => void;
}

// Service-specific loggers
export const createServiceLogger = (serviceName: string): ServiceLogger => {
    return {
        info: (message, meta) =>
            logger.info(message, { service: serviceName, ...meta }),

        error: (message, error, meta) =>
            logger.error(message, {
                service: serviceName,
                error: error instanceof Error ? error.message : error,
                stack: error instanceof Error ? error.stack : undefined,
                ...meta
            }),

        warn: (message, meta) =>
            logger.warn(message, { service: serviceName, ...meta }),

        debug: (message, meta) =>
            logger.debug(message, { service: serviceName, ...meta })
    };
};

// Performance logging
export const logPerformance = (operation: string, startTime: number, meta?: LogMeta) => {
    const duration = Date.now() - startTime;
    logger.info(`Performance: ${operation} completed in ${duration}ms`, {
        service: 'performance',
        operation,
        duration,
        ...meta
    });
};

// API request logging
export const logApiRequest = (
    service: string,
    endpoint: string,
    method: string,
    statusCode?: number
) => {
    const level = statusCode === undefined || statusCode >= 400 ? 'error' : 'info';
    logger.log(level, `API Request: ${method} ${endpoint}`, {
        service,
        endpoint,
        method,
        statusCode
    });
};

export default logger;
