/**
 * @fileoverview Logging barrel exports
 *
 * @module logging
 */

export {
    createConsoleLogger,
    createFileLogger,
    combineLoggers,
    formatFileLine,
    silentLogger,
    type Logger,
    type LogLevel,
    type ConsoleLoggerOptions,
} from "./logger.js";
