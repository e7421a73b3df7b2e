// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import chalk from 'chalk';

export enum LogLevel {
    SILENT = 0,
    STANDARD = 1,
    VERBOSE = 2,
}

export enum LogCategory {
    HTTP = 'HTTP',
    BUNDLE = 'BUNDLE',
    VERIFY = 'VERIFY',
    CACHE = 'CACHE',
    PERF = 'PERF',
}

const CATEGORY_COLORS: Record<LogCategory, chalk.Chalk> = {
    [LogCategory.HTTP]: chalk.blue,
    [LogCategory.BUNDLE]: chalk.cyan,
    [LogCategory.VERIFY]: chalk.magenta,
    [LogCategory.CACHE]: chalk.green,
    [LogCategory.PERF]: chalk.yellow,
};

const BYTE_UNITS = ['bytes', 'KB', 'MB', 'GB'];

/**
 * Console output for the CLI and library. Results go to stdout; warnings,
 * failures and verbose traces go to stderr so stdout stays pipeable.
 */
export class Logger {
    private level: LogLevel;
    private readonly startTime = Date.now();

    constructor(level: LogLevel = LogLevel.STANDARD) {
        this.level = level;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    info(message: string): void {
        if (this.level >= LogLevel.STANDARD) {
            console.log(message);
        }
    }

    success(message: string): void {
        if (this.level >= LogLevel.STANDARD) {
            console.log(chalk.green(`[OK] ${message}`));
        }
    }

    warn(message: string): void {
        if (this.level >= LogLevel.STANDARD) {
            console.error(chalk.yellow(`[WARN] ${message}`));
        }
    }

    /**
     * The stack of `error` is printed only in verbose mode.
     */
    error(message: string, error?: Error): void {
        if (this.level < LogLevel.STANDARD) {
            return;
        }
        console.error(chalk.red(`[FAIL] ${message}`));
        if (error && this.level >= LogLevel.VERBOSE) {
            console.error(chalk.gray(error.stack || error.message));
        }
    }

    verbose(category: LogCategory, message: string): void {
        this.trace(category, ' ', message);
    }

    verboseIndent(category: LogCategory, message: string, indent = 1): void {
        this.trace(category, '  '.repeat(indent), message);
    }

    formatBytes(bytes: number): string {
        if (bytes === 0) return '0 bytes';
        const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), BYTE_UNITS.length - 1);
        return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${BYTE_UNITS[i]}`;
    }

    formatDuration(ms: number): string {
        return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
    }

    private trace(category: LogCategory, separator: string, message: string): void {
        if (this.level < LogLevel.VERBOSE) {
            return;
        }
        const elapsed = Date.now() - this.startTime;
        const timestamp = `[${String(Math.floor(elapsed / 1000)).padStart(2, '0')}.${String(elapsed % 1000).padStart(3, '0')}]`;
        const tag = chalk.bold(CATEGORY_COLORS[category](`[${category}]`));
        console.error(`${chalk.gray(timestamp)} ${tag}${separator}${message}`);
    }
}

let globalLogger: Logger | undefined;

export function getLogger(): Logger {
    if (!globalLogger) {
        globalLogger = new Logger();
    }
    return globalLogger;
}

export function setLogLevel(level: LogLevel): void {
    getLogger().setLevel(level);
}
