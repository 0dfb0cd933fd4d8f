import pino from 'pino';
import { env } from '../config/env.js';

/**
 * Logger utilities for the Handheld backend.
 *
 * Modules take a scoped child of the singleton:
 *
 * ```typescript
 * import { logger } from './lib/logger.js';
 *
 * const moduleLogger = logger.child({ module: 'mobile' });
 * moduleLogger.info({ fallBack: 'html' }, 'Mobile handling enabled');
 * ```
 */

function resolveLevel(): pino.LevelWithSilent {
    if (env.LOG_LEVEL) {
        return env.LOG_LEVEL;
    }
    if (env.NODE_ENV === 'test') {
        return 'silent';
    }
    return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Creates a Pino logger with the standard Handheld configuration.
 *
 * Development and staging write through `pino-pretty` for readable console
 * output. Production writes plain JSON lines to stdout, and tests stay on the
 * main thread without a transport worker.
 */
export function createLogger(): pino.Logger {
    const level = resolveLevel();
    const options: pino.LoggerOptions = {
        level,
        base: {
            service: 'handheld-backend'
        }
    };

    if (env.NODE_ENV === 'production' || env.NODE_ENV === 'test') {
        return pino(options);
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    });

    return pino(options, transport);
}

/**
 * Application logger singleton.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info({ port: 4000 }, 'Server listening');
 */
export const logger = createLogger();
