/**
 * @fileoverview Loggers
 *
 * Console and file loggers that satisfy the engine's logger interface,
 * so the same object can be handed to the engine, the plugin loader
 * and the archive extractor.
 *
 * @module logging/logger
 */

import { appendFileSync } from "fs";
import type { EngineLogger } from "@filekit/engine";

/**
 * Logger used throughout the app.
 */
export type Logger = EngineLogger;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ConsoleLoggerOptions {
    /** Print debug lines (default: false) */
    verbose?: boolean;
}

function hasData(data?: Record<string, unknown>): data is Record<string, unknown> {
    return data !== undefined && Object.keys(data).length > 0;
}

/**
 * Create a console logger that prints `[LEVEL] message` followed by the data, if any.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ verbose: true });
 * logger.info("Renamed", { from: "a+b.mp3", to: "a b.mp3" });
 * // [INFO] Renamed { from: 'a+b.mp3', to: 'a b.mp3' }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
    const verbose = options.verbose ?? false;

    const write = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
        const line = `[${level.toUpperCase()}] ${message}`;
        const sink = level === "debug" ? console.debug
            : level === "info" ? console.info
            : level === "warn" ? console.warn
            : console.error;

        if (hasData(data)) {
            sink(line, data);
        }
        else {
            sink(line);
        }
    };

    return {
        debug: (msg, data) => {
            if (verbose) {
                write("debug", msg, data);
            }
        },
        info : (msg, data) => write("info", msg, data),
        warn : (msg, data) => write("warn", msg, data),
        error: (msg, data) => write("error", msg, data),
    };
}

/**
 * Format one file log line: `ISO - LEVEL - message {json}`.
 */
export function formatFileLine(level: LogLevel, message: string, data?: Record<string, unknown>, now: Date = new Date()): string {
    const suffix = hasData(data) ? ` ${JSON.stringify(data)}` : "";
    return `${now.toISOString()} - ${level.toUpperCase()} - ${message}${suffix}\n`;
}

/**
 * Create a logger that appends to a file.
 *
 * Write failures are reported once on stderr; logging never stops the caller.
 */
export function createFileLogger(filePath: string): Logger {
    let reported = false;

    const write = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
        try {
            appendFileSync(filePath, formatFileLine(level, message, data), "utf-8");
        }
        catch (error) {
            if (!reported) {
                reported = true;
                console.error(`[ERROR] Cannot write log file ${filePath}:`, error instanceof Error ? error.message : String(error));
            }
        }
    };

    return {
        debug: (msg, data) => write("debug", msg, data),
        info : (msg, data) => write("info", msg, data),
        warn : (msg, data) => write("warn", msg, data),
        error: (msg, data) => write("error", msg, data),
    };
}

/**
 * Fan one logger out to several.
 */
export function combineLoggers(...loggers: Logger[]): Logger {
    return {
        debug: (msg, data) => loggers.forEach(logger => logger.debug(msg, data)),
        info : (msg, data) => loggers.forEach(logger => logger.info(msg, data)),
        warn : (msg, data) => loggers.forEach(logger => logger.warn(msg, data)),
        error: (msg, data) => loggers.forEach(logger => logger.error(msg, data)),
    };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};
