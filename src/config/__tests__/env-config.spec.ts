// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { homedir } from 'os';
import { join } from 'path';
import { EnvConfigParser } from '../env-config';

describe('EnvConfigParser', () => {
    describe('parseTimeout', () => {
        it('should accept positive integers', () => {
            expect(EnvConfigParser.parseTimeout('2500')).toBe(2500);
            expect(EnvConfigParser.parseTimeout(100)).toBe(100);
        });

        it('should reject anything else', () => {
            expect(() => EnvConfigParser.parseTimeout('soon')).toThrow(
                'invalid HTTP timeout "soon": must be a positive number of milliseconds'
            );
            expect(() => EnvConfigParser.parseTimeout(0)).toThrow('invalid HTTP timeout "0"');
        });
    });

    describe('loadConfig', () => {
        it('should use default values', () => {
            const config = EnvConfigParser.loadConfig({}, {});

            expect(config).toEqual({
                githubToken: undefined,
                cacheDir: join(homedir(), '.tpmtb'),
                tufCacheDir: join(homedir(), '.tpmtb', 'tuf-cache'),
                httpTimeout: 5000,
                sourceRepo: { owner: 'loicsikidi', name: 'tpm-ca-certificates' },
            });
        });

        it('should load from environment variables', () => {
            const config = EnvConfigParser.loadConfig(
                {},
                {
                    TPMTB_GITHUB_TOKEN: 'test-token',
                    TPMTB_CACHE_DIR: '/var/cache/tpmtb',
                    TPMTB_HTTP_TIMEOUT: '1500',
                    TPMTB_SOURCE_REPO: 'example/bundles',
                }
            );

            expect(config).toEqual({
                githubToken: 'test-token',
                cacheDir: '/var/cache/tpmtb',
                tufCacheDir: '/var/cache/tpmtb/tuf-cache',
                httpTimeout: 1500,
                sourceRepo: { owner: 'example', name: 'bundles' },
            });
        });

        it('should fall back to GITHUB_TOKEN', () => {
            expect(EnvConfigParser.loadConfig({}, { GITHUB_TOKEN: 'fallback-token' }).githubToken).toBe('fallback-token');
        });

        it('should prefer options over the environment', () => {
            const config = EnvConfigParser.loadConfig(
                { token: 'option-token', cacheDir: '/tmp/a', tufCacheDir: '/tmp/tuf', timeout: 42 },
                { TPMTB_GITHUB_TOKEN: 'env-token', TPMTB_CACHE_DIR: '/tmp/b', TPMTB_HTTP_TIMEOUT: '9' }
            );

            expect(config.githubToken).toBe('option-token');
            expect(config.cacheDir).toBe('/tmp/a');
            expect(config.tufCacheDir).toBe('/tmp/tuf');
            expect(config.httpTimeout).toBe(42);
        });

        it('should reject a malformed source repository', () => {
            expect(() => EnvConfigParser.loadConfig({}, { TPMTB_SOURCE_REPO: 'bundles' })).toThrow(
                'invalid repository "bundles": expected owner/name'
            );
        });
    });
});
