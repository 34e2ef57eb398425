import pino from 'pino';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 * Every call takes structured data first and the message second.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

/**
 * Logger Configuration
 *
 * Structured JSON logger for the order aggregator. Covers API requests,
 * feed ingestion, uploads and calls to the page-analysis service.
 */
export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): pino.Logger {
    return pino({
        level,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                singleLine: false
            }
        },
        serializers: {
            req: pino.stdSerializers.req,
            res: pino.stdSerializers.res,
            err: pino.stdSerializers.err
        }
    });
}
