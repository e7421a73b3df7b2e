// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import chalk from 'chalk';
import { Logger, LogLevel, LogCategory, getLogger, setLogLevel } from '../logger';

describe('Logger', () => {
    let consoleLogSpy: jest.SpyInstance;
    let consoleErrorSpy: jest.SpyInstance;
    let chalkLevel: chalk.Level;

    beforeEach(() => {
        chalkLevel = chalk.level;
        chalk.level = 0;
        consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
        consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    });

    afterEach(() => {
        chalk.level = chalkLevel;
        jest.restoreAllMocks();
    });

    describe('standard output', () => {
        it('should print results on stdout and problems on stderr', () => {
            const logger = new Logger();

            logger.info('2026-01-02 (commit abc123)');
            logger.success('Bundle written to tpm-ca-certificates.pem');
            logger.warn('cached bundle 2026-01-02 is stale');
            logger.error('bundle verify failed: checksum mismatch');

            expect(consoleLogSpy.mock.calls).toEqual([
                ['2026-01-02 (commit abc123)'],
                ['[OK] Bundle written to tpm-ca-certificates.pem'],
            ]);
            expect(consoleErrorSpy.mock.calls).toEqual([
                ['[WARN] cached bundle 2026-01-02 is stale'],
                ['[FAIL] bundle verify failed: checksum mismatch'],
            ]);
        });

        it('should print nothing when silent', () => {
            const logger = new Logger(LogLevel.SILENT);

            logger.info('result');
            logger.success('done');
            logger.warn('careful');
            logger.error('broken', new Error('broken'));
            logger.verbose(LogCategory.HTTP, 'GET https://example.com/root.crt');

            expect(consoleLogSpy).not.toHaveBeenCalled();
            expect(consoleErrorSpy).not.toHaveBeenCalled();
        });

        it('should add the stack of a failure only in verbose mode', () => {
            const error = new Error('signature rejected');
            error.stack = 'Error: signature rejected\n    at verify';

            new Logger().error('bundle verify failed', error);
            new Logger(LogLevel.VERBOSE).error('bundle verify failed', error);

            expect(consoleErrorSpy.mock.calls).toEqual([
                ['[FAIL] bundle verify failed'],
                ['[FAIL] bundle verify failed'],
                ['Error: signature rejected\n    at verify'],
            ]);
        });
    });

    describe('verbose traces', () => {
        it('should stay quiet in standard mode', () => {
            new Logger().verbose(LogCategory.BUNDLE, 'Processing vendor IFX');

            expect(consoleErrorSpy).not.toHaveBeenCalled();
        });

        it('should stamp traces with elapsed time and category', () => {
            const now = jest.spyOn(Date, 'now').mockReturnValue(1000);
            const logger = new Logger(LogLevel.VERBOSE);
            now.mockReturnValue(2345);

            logger.verbose(LogCategory.HTTP, 'GET https://example.com/root.crt');
            logger.verboseIndent(LogCategory.HTTP, 'Status: 200');
            logger.verboseIndent(LogCategory.CACHE, 'root bundle', 2);

            expect(consoleErrorSpy.mock.calls).toEqual([
                ['[01.345] [HTTP] GET https://example.com/root.crt'],
                ['[01.345] [HTTP]  Status: 200'],
                ['[01.345] [CACHE]    root bundle'],
            ]);
            expect(consoleLogSpy).not.toHaveBeenCalled();
        });
    });

    describe('formatting', () => {
        const logger = new Logger();

        it('should format sizes', () => {
            expect(logger.formatBytes(0)).toBe('0 bytes');
            expect(logger.formatBytes(512)).toBe('512.0 bytes');
            expect(logger.formatBytes(1536)).toBe('1.5 KB');
            expect(logger.formatBytes(5 * 1024 * 1024)).toBe('5.0 MB');
        });

        it('should format durations', () => {
            expect(logger.formatDuration(250)).toBe('250ms');
            expect(logger.formatDuration(1500)).toBe('1.50s');
        });
    });

    describe('global logger', () => {
        afterEach(() => setLogLevel(LogLevel.STANDARD));

        it('should apply the level to the shared instance', () => {
            expect(getLogger()).toBe(getLogger());

            setLogLevel(LogLevel.SILENT);
            getLogger().success('hidden');
            setLogLevel(LogLevel.STANDARD);
            getLogger().success('shown');

            expect(consoleLogSpy.mock.calls).toEqual([['[OK] shown']]);
        });
    });
});
