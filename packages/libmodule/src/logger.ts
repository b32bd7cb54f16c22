// libmodule/src/logger.ts
// Package logger. Resolution traces are logged at debug level.

import { pino, stdTimeFunctions } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { loadSettings } from './settings.js';
import type { LogLevel } from './settings.js';

export type { Logger };

export function createLoggerOptions(level: LogLevel): LoggerOptions {
    return {
        name: 'libmodule',
        level,
        base: undefined,
        timestamp: stdTimeFunctions.isoTime,
    };
}

export function createLogger(level: LogLevel = loadSettings().logLevel): Logger {
    return pino(createLoggerOptions(level));
}

export const logger: Logger = createLogger();
