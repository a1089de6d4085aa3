/**
 * Leveled console logger with chalk colors.
 *
 * One process-wide level. `logger.scoped('workflow')` returns the same API
 * with every line prefixed by the scope, so turns from different parts of the
 * engine can be told apart at debug level.
 *
 * Dependency direction: logger.ts → chalk (external only)
 * Used by: every layer; the CLI sets the level from --verbose/--quiet or STEPWISE_LOG_LEVEL
 */

import chalk from 'chalk';

export enum LogLevel {
    Debug = 0,
    Info = 1,
    Warn = 2,
    Error = 3,
    Silent = 4,
}

let currentLevel: LogLevel = LogLevel.Info;

/** Set the global log level. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

/** Get the current global log level. */
export function getLogLevel(): LogLevel {
    return currentLevel;
}

const LEVEL_NAMES = new Map<string, LogLevel>([
    ['debug', LogLevel.Debug],
    ['info', LogLevel.Info],
    ['warn', LogLevel.Warn],
    ['error', LogLevel.Error],
    ['silent', LogLevel.Silent],
]);

/** Map a level name ("debug", "warn", ...) to a LogLevel; undefined if unknown. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
    return name ? LEVEL_NAMES.get(name.trim().toLowerCase()) : undefined;
}

type Sink = (line: string, ...args: unknown[]) => void;

function emit(level: LogLevel, sink: Sink, line: string, args: unknown[]): void {
    if (currentLevel <= level) {
        sink(line, ...args);
    }
}

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    success(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
    /** Numbered progress line, e.g. "[2/4] Provider settings". */
    step(stepNumber: number, total: number, message: string): void;
    /** Bold title with an underline. */
    header(message: string): void;
}

function createLogger(scope?: string): Logger {
    const tag = scope ? `${scope}: ` : '';

    return {
        debug: (message, ...args) =>
            emit(LogLevel.Debug, console.debug, chalk.gray(`[DEBUG] ${tag}${message}`), args),
        info: (message, ...args) => emit(LogLevel.Info, console.info, chalk.blue(`[INFO]  ${tag}${message}`), args),
        success: (message, ...args) => emit(LogLevel.Info, console.info, chalk.green(`✔ ${tag}${message}`), args),
        warn: (message, ...args) => emit(LogLevel.Warn, console.warn, chalk.yellow(`[WARN]  ${tag}${message}`), args),
        error: (message, ...args) => emit(LogLevel.Error, console.error, chalk.red(`[ERROR] ${tag}${message}`), args),
        step: (stepNumber, total, message) =>
            emit(LogLevel.Info, console.info, chalk.cyan(`[${stepNumber}/${total}] ${message}`), []),
        header: (message) => {
            if (currentLevel > LogLevel.Info) return;
            console.log();
            console.log(chalk.bold.white(message));
            console.log(chalk.gray('─'.repeat(Math.min(message.length + 4, 60))));
        },
    };
}

export const logger = {
    ...createLogger(),
    /** A logger whose lines carry a scope prefix. */
    scoped: (scope: string): Logger => createLogger(scope),
    setLogLevel,
    getLogLevel,
    parseLogLevel,
};
