/**
 * Pino logger setup
 *
 * Logs go to stderr so they never mix with the rendered report on stdout.
 * The level is 'silent' until the CLI or the host raises it.
 */

import pino from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * The subset of a pino logger the reporter components use
 */
export type Logger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

const rootLogger = pino(
    {
        name:        'spec-reporter',
        level:       'silent',
        serializers: {
            err: pino.stdSerializers.err,
        },
    },
    pino.destination(2)
);

/**
 * Child logger for one component
 *
 * @example
 * const logger = createLogger('junit-parser');
 * logger.debug('parsed %d testcases', count);
 */
export function createLogger(component: string): pino.Logger {
    return rootLogger.child({ component });
}

export function setLogLevel(level: LogLevel): void {
    rootLogger.level = level;
}
