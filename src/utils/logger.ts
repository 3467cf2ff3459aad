import type { LogConfig } from '../types/config.types.js';
import { getCorrelationId } from '../errors/index.js';
import pino from 'pino';

export interface LogMeta {
    correlationId?: string;
    filename?: string;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

type LogLevel = LogConfig['level'];

/**
 * Creates a Pino logger writing to stderr, so stdout stays free for CLI output.
 * Every entry carries the correlation ID of the file being processed.
 */
export function createLogger(config: LogConfig): Logger {
    const options: pino.LoggerOptions = {
        name: 'paper-renamer',
        level: config.level,
    };

    // pino-pretty for interactive use, raw JSON otherwise
    const pinoLogger = config.structured === false
        ? pino({
            ...options,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname,name',
                    destination: 2,
                },
            },
        })
        : pino(options, pino.destination(2));

    const enrichMeta = (meta?: LogMeta): LogMeta => ({
        correlationId: meta?.correlationId ?? getCorrelationId(),
        ...meta,
    });

    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        const enrichedMeta = enrichMeta(meta);

        if (config.customLogger) {
            config.customLogger(level, message, enrichedMeta);
            return;
        }

        pinoLogger[level](enrichedMeta, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
    };
}
