// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { InvalidArgumentError } from 'commander';
import { MAX_WORKERS } from '../concurrency/cpu';
import { errorMessage } from '../utils/errors';
import { LogLevel, getLogger, setLogLevel } from '../utils/logger';

/** Issues printed per category before the listing is cut short. */
export const MAX_DISPLAYED_ISSUES = 10;

/**
 * Print the single failure line of a command and flag the exit code.
 */
export function reportFailure(operation: string, error: unknown): void {
    getLogger().error(`${operation} failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
    process.exitCode = 1;
}

/**
 * Commander argument parser for non-negative integers.
 */
export function parseCount(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError(`"${value}" is not a non-negative integer.`);
    }
    return parsed;
}

/**
 * `--quiet` keeps only the exit code.
 */
export function applyQuiet(quiet?: boolean): void {
    if (quiet) {
        setLogLevel(LogLevel.SILENT);
    }
}

export function splitList(value?: string): string[] | undefined {
    if (!value) {
        return undefined;
    }
    const items = value
        .split(',')
        .map(item => item.trim())
        .filter(item => item !== '');
    return items.length > 0 ? items : undefined;
}

export function checkWorkers(workers: number): void {
    if (workers > MAX_WORKERS) {
        throw new Error(`concurrency value ${workers} exceeds maximum allowed (${MAX_WORKERS})`);
    }
}

/**
 * Print a validation report, flagging the exit code when there are issues.
 */
export function printIssues(file: string, issues: ReadonlyArray<{ line: number; message: string }>): void {
    const logger = getLogger();
    if (issues.length === 0) {
        logger.success(`${file} is valid`);
        return;
    }
    logger.error(`${file} has validation errors:`);
    for (const issue of issues) {
        logger.info(`  Line ${issue.line}: ${issue.message}`);
    }
    if (issues.length >= MAX_DISPLAYED_ISSUES) {
        logger.info(`(showing first ${MAX_DISPLAYED_ISSUES} errors)`);
    }
    process.exitCode = 1;
}
