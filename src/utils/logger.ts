/**
 * Stderr Logger
 *
 * Structured logging for the aggregator. Everything is written to stderr so a
 * stdio-hosted MCP session on stdout is never corrupted.
 *
 * - `logger`: lazy facade that picks the active implementation on every call
 * - `LOG_LEVEL=silent` swaps in a no-op logger (used by the test suite)
 */

import winston from 'winston';
import _ from 'lodash';

export type LogMeta = Record<string, unknown>;

export interface Logger {
    debug(infoObjectOrMessage: LogMeta | string, message?: string): Logger
    info(infoObjectOrMessage: LogMeta | string, message?: string): Logger
    warn(infoObjectOrMessage: LogMeta | string, message?: string): Logger
    error(infoObjectOrMessage: LogMeta | string, message?: string): Logger
}

/**
 * No-op logger used when logging is disabled
 */
class SilentLogger implements Logger {
    debug(): Logger {
        return this;
    }

    info(): Logger {
        return this;
    }

    warn(): Logger {
        return this;
    }

    error(): Logger {
        return this;
    }
}

type WinstonLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Create a winston logger that writes ALL levels to stderr
 */
function createStderrLogger(level: string): Logger {
    const winstonLogger = winston.createLogger({
        level,
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
        ),
        transports: [
            new winston.transports.Console({
                stderrLevels: ['error', 'warn', 'info', 'debug'],
            }),
        ],
    });

    const write = (winstonLevel: WinstonLevel, infoObjectOrMessage: LogMeta | string, message?: string): void => {
        if(_.isString(infoObjectOrMessage)) {
            winstonLogger.log(winstonLevel, infoObjectOrMessage);
        } else {
            winstonLogger.log(winstonLevel, message ?? '', infoObjectOrMessage);
        }
    };

    return {
        debug(infoObjectOrMessage, message) {
            write('debug', infoObjectOrMessage, message);
            return this;
        },
        info(infoObjectOrMessage, message) {
            write('info', infoObjectOrMessage, message);
            return this;
        },
        warn(infoObjectOrMessage, message) {
            write('warn', infoObjectOrMessage, message);
            return this;
        },
        error(infoObjectOrMessage, message) {
            write('error', infoObjectOrMessage, message);
            return this;
        },
    };
}

const silentLogger: Logger = new SilentLogger();
const stderrLoggers = new Map<string, Logger>();

/**
 * Resolve the logger for the current LOG_LEVEL.
 *
 * Called on every log invocation so that changes to the environment after
 * module load (CLI flags, test setup) are honoured.
 */
function getLogger(): Logger {
    const level = process.env.LOG_LEVEL ?? 'info';
    if(level === 'silent') {
        return silentLogger;
    }

    let stderrLogger = stderrLoggers.get(level);
    if(!stderrLogger) {
        stderrLogger = createStderrLogger(level);
        stderrLoggers.set(level, stderrLogger);
    }
    return stderrLogger;
}

export const logger: Logger = {
    debug(infoObjectOrMessage, message) {
        getLogger().debug(infoObjectOrMessage, message);
        return this;
    },
    info(infoObjectOrMessage, message) {
        getLogger().info(infoObjectOrMessage, message);
        return this;
    },
    warn(infoObjectOrMessage, message) {
        getLogger().warn(infoObjectOrMessage, message);
        return this;
    },
    error(infoObjectOrMessage, message) {
        getLogger().error(infoObjectOrMessage, message);
        return this;
    },
};
