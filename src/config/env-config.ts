// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as path from 'path';
import { defaultCacheDir } from '../cache/cache';
import { DEFAULT_SOURCE_REPO, Repo, parseRepo } from '../github/types';
import { DEFAULT_HTTP_TIMEOUT } from '../utils/http';

/**
 * Settings shared by every command and API call. Built once from CLI options
 * and the environment, then passed down explicitly.
 */
export interface Environment {
    githubToken?: string;
    cacheDir: string;
    tufCacheDir: string;
    /** Milliseconds. */
    httpTimeout: number;
    sourceRepo: Repo;
}

export interface EnvironmentOptions {
    token?: string;
    cacheDir?: string;
    tufCacheDir?: string;
    timeout?: number | string;
    sourceRepo?: string;
}

export class EnvConfigParser {
    /**
     * Parse a timeout in milliseconds
     */
    static parseTimeout(input: number | string): number {
        const value = typeof input === 'number' ? input : Number(input.trim());
        if (!Number.isInteger(value) || value <= 0) {
            throw new Error(`invalid HTTP timeout "${input}": must be a positive number of milliseconds`);
        }
        return value;
    }

    /**
     * Load configuration from CLI options, then environment, then defaults
     */
    static loadConfig(options: EnvironmentOptions = {}, env: NodeJS.ProcessEnv = process.env): Environment {
        const cacheDir = options.cacheDir || env.TPMTB_CACHE_DIR || defaultCacheDir();
        const timeout = options.timeout ?? env.TPMTB_HTTP_TIMEOUT;
        const repo = options.sourceRepo || env.TPMTB_SOURCE_REPO;

        return {
            githubToken: options.token || env.TPMTB_GITHUB_TOKEN || env.GITHUB_TOKEN || undefined,
            cacheDir,
            tufCacheDir: options.tufCacheDir || env.TPMTB_TUF_CACHE_DIR || path.join(cacheDir, 'tuf-cache'),
            httpTimeout: timeout !== undefined && timeout !== '' ? this.parseTimeout(timeout) : DEFAULT_HTTP_TIMEOUT,
            sourceRepo: repo ? parseRepo(repo) : DEFAULT_SOURCE_REPO,
        };
    }
}
