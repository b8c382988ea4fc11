/**
 * src/utils/logging.ts
 *
 * Level and format for crawlee's shared `log` instance.
 */

import { LogLevel, LoggerJson, LoggerText, log } from 'crawlee';
import type { LOG_LEVEL_NAMES } from '../config/envSchema.js';

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

const LEVELS: Record<LogLevelName, LogLevel> = {
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARNING: LogLevel.WARNING,
    ERROR: LogLevel.ERROR,
    OFF: LogLevel.OFF,
};

export interface LoggingOptions {
    level: LogLevelName;
    json?: boolean;
    /** `--verbose` / `-v`: forces DEBUG. */
    verbose?: boolean;
}

export function isVerboseArgv(argv: readonly string[] = process.argv): boolean {
    return argv.includes('--verbose') || argv.includes('-v');
}

export function configureLogging(options: LoggingOptions): LogLevel {
    const level = options.verbose ? LogLevel.DEBUG : LEVELS[options.level];
    log.setLevel(level);
    log.setOptions({ logger: options.json ? new LoggerJson() : new LoggerText() });
    return level;
}
