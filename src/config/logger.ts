import pino from 'pino';

/**
 * Logger Interface
 *
 * The subset of pino every service depends on. Services take it by injection
 * so tests can hand in `vi.fn()` spies.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

const usePrettyTransport =
    process.env.NODE_ENV !== 'production' &&
    process.env.NODE_ENV !== 'test' &&
    process.env.LOG_PRETTY !== 'false';

/**
 * Logger Configuration
 *
 * Structured JSON logger for ingestion, retrieval and consistency checks.
 * Pretty-printed in development, raw JSON everywhere else.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    ...(usePrettyTransport
        ? {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                    singleLine: false
                }
            }
        }
        : {}),
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});
