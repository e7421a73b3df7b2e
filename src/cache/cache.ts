// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import stringify from 'fast-json-stable-stringify';
import {
    CHECKSUMS_FILENAME,
    CHECKSUMS_SIGNATURE_FILENAME,
    INTERMEDIATE_BUNDLE_FILENAME,
    ROOT_BUNDLE_FILENAME,
} from '../bundle/constants';
import { isValidVendorId } from '../vendors/registry';
import { CacheCorruptError, errorMessage } from '../utils/errors';
import { getLogger, LogCategory } from '../utils/logger';

export const CACHE_DIR_NAME = '.tpmtb';

export const CacheFile = {
    Config: 'config.json',
    RootBundle: ROOT_BUNDLE_FILENAME,
    IntermediateBundle: INTERMEDIATE_BUNDLE_FILENAME,
    Checksums: CHECKSUMS_FILENAME,
    ChecksumsSignature: CHECKSUMS_SIGNATURE_FILENAME,
    Provenance: 'provenance.json',
    TrustedRoot: 'trusted-root.json',
} as const;

export type CacheFile = (typeof CacheFile)[keyof typeof CacheFile];

/** One day, in seconds. */
export const DEFAULT_UPDATE_INTERVAL = 24 * 60 * 60;

const FILE_MODE = 0o600;
const DIR_MODE = 0o700;

/** Intervals are in seconds. */
export interface AutoUpdateConfig {
    disableAutoUpdate: boolean;
    minInterval?: number;
    maxInterval?: number;
}

export interface CacheConfig {
    /** Release tag of the cached bundle. */
    version: string;
    commit?: string;
    skipVerify: boolean;
    /** RFC 3339. */
    lastTimestamp: string;
    vendorIDs?: string[];
    autoUpdate?: AutoUpdateConfig;
}

export interface CacheArtifacts {
    rootBundle: Buffer;
    intermediateBundle?: Buffer;
    checksums?: Buffer;
    checksumsSignature?: Buffer;
    provenance?: Buffer;
    trustedRoot?: Buffer;
}

export interface LoadedCache {
    artifacts: CacheArtifacts;
    config: CacheConfig;
    stale: boolean;
}

export function defaultCacheDir(home: string = os.homedir()): string {
    return path.join(home || os.tmpdir(), CACHE_DIR_NAME);
}

/**
 * Validate a decoded `config.json`.
 */
export function checkCacheConfig(value: unknown): CacheConfig {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new Error('cache config must be a JSON object');
    }
    const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));

    if (typeof record.version !== 'string' || !record.version) {
        throw new Error('version cannot be empty');
    }
    if (typeof record.lastTimestamp !== 'string' || Number.isNaN(Date.parse(record.lastTimestamp))) {
        throw new Error('lastTimestamp must be an RFC 3339 timestamp');
    }

    const config: CacheConfig = {
        version: record.version,
        skipVerify: record.skipVerify === true,
        lastTimestamp: record.lastTimestamp,
    };
    if (typeof record.commit === 'string' && record.commit) {
        config.commit = record.commit;
    }
    if (record.vendorIDs !== undefined) {
        if (!Array.isArray(record.vendorIDs)) {
            throw new Error('vendorIDs must be a list');
        }
        config.vendorIDs = record.vendorIDs.map(id => {
            if (typeof id !== 'string' || !isValidVendorId(id)) {
                throw new Error(`invalid vendor ID "${String(id)}": not found in TCG TPM Vendor ID Registry`);
            }
            return id;
        });
    }
    if (record.autoUpdate !== undefined) {
        config.autoUpdate = checkAutoUpdateConfig(record.autoUpdate);
    }
    return config;
}

export function checkAutoUpdateConfig(value: unknown): AutoUpdateConfig {
    if (typeof value !== 'object' || value === null) {
        throw new Error('invalid auto-update config: expected an object');
    }
    const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
    const autoUpdate: AutoUpdateConfig = { disableAutoUpdate: record.disableAutoUpdate === true };
    for (const key of ['minInterval', 'maxInterval'] as const) {
        const interval = record[key];
        if (interval === undefined) {
            continue;
        }
        if (typeof interval !== 'number' || !Number.isFinite(interval) || interval < 0) {
            throw new Error(`invalid auto-update config: ${key} must be a non-negative number of seconds`);
        }
        autoUpdate[key] = interval;
    }
    if (
        autoUpdate.minInterval !== undefined &&
        autoUpdate.maxInterval !== undefined &&
        autoUpdate.minInterval > autoUpdate.maxInterval
    ) {
        throw new Error('invalid auto-update config: minInterval cannot exceed maxInterval');
    }
    return autoUpdate;
}

export function loadCacheConfig(cacheDir: string): CacheConfig {
    const data = loadFile(cacheDir, CacheFile.Config);
    try {
        return checkCacheConfig(JSON.parse(data.toString('utf8')));
    } catch (error) {
        throw new CacheCorruptError(`invalid cache config: ${errorMessage(error)}`, { cause: error });
    }
}

export function saveCacheConfig(cacheDir: string, config: CacheConfig): void {
    ensureDir(cacheDir);
    saveFile(cacheDir, CacheFile.Config, Buffer.from(stringify(config) + '\n'));
}

export function loadFile(cacheDir: string, filename: string): Buffer {
    try {
        return fs.readFileSync(path.join(cacheDir, filename));
    } catch (error) {
        throw new Error(`failed to read ${filename} from cache: ${errorMessage(error)}`, { cause: error });
    }
}

function loadOptionalFile(cacheDir: string, filename: string): Buffer | undefined {
    const filePath = path.join(cacheDir, filename);
    return fs.existsSync(filePath) ? loadFile(cacheDir, filename) : undefined;
}

/**
 * Empty data is not written.
 */
export function saveFile(cacheDir: string, filename: string, data?: Uint8Array): void {
    if (!data || data.length === 0) {
        return;
    }
    try {
        fs.writeFileSync(path.join(cacheDir, filename), data, { mode: FILE_MODE });
    } catch (error) {
        throw new Error(`failed to write ${filename} to cache: ${errorMessage(error)}`, { cause: error });
    }
}

/**
 * Every file but the intermediate bundle must be present.
 */
export function validateCacheFiles(cacheDir: string): void {
    const missing = Object.values(CacheFile).filter(
        filename => filename !== CacheFile.IntermediateBundle && !fs.existsSync(path.join(cacheDir, filename))
    );
    if (missing.length > 0) {
        throw new Error(`missing required cache files: [${missing.join(' ')}]`);
    }
}

/**
 * True when the cache holds the bundle of `tag`, along with the verification
 * artifacts unless it was saved without verification.
 */
export function cacheExists(cacheDir: string, tag: string): boolean {
    let config: CacheConfig;
    try {
        config = loadCacheConfig(cacheDir);
    } catch {
        return false;
    }
    if (config.version !== tag) {
        return false;
    }
    const required: string[] = [CacheFile.RootBundle];
    if (!config.skipVerify) {
        required.push(CacheFile.Checksums, CacheFile.ChecksumsSignature, CacheFile.Provenance);
    }
    return required.every(filename => fs.existsSync(path.join(cacheDir, filename)));
}

function elapsedSeconds(config: CacheConfig, now: Date): number {
    return (now.getTime() - Date.parse(config.lastTimestamp)) / 1000;
}

/**
 * Auto-update is on and the last check is older than `maxInterval`.
 */
export function isStale(config: CacheConfig, now: Date = new Date()): boolean {
    const autoUpdate = config.autoUpdate;
    if (!autoUpdate || autoUpdate.disableAutoUpdate) {
        return false;
    }
    return elapsedSeconds(config, now) > (autoUpdate.maxInterval ?? DEFAULT_UPDATE_INTERVAL);
}

/**
 * The last check is recent enough that the forge need not be asked for a
 * newer release.
 */
export function isWithinMinInterval(config: CacheConfig, now: Date = new Date()): boolean {
    const minInterval = config.autoUpdate?.minInterval;
    return minInterval !== undefined && elapsedSeconds(config, now) < minInterval;
}

/**
 * Returns undefined when the directory holds no cached bundle.
 */
export function loadCache(cacheDir: string, options: { now?: Date } = {}): LoadedCache | undefined {
    if (!fs.existsSync(path.join(cacheDir, CacheFile.Config)) || !fs.existsSync(path.join(cacheDir, CacheFile.RootBundle))) {
        return undefined;
    }
    const config = loadCacheConfig(cacheDir);
    const artifacts: CacheArtifacts = {
        rootBundle: loadFile(cacheDir, CacheFile.RootBundle),
        intermediateBundle: loadOptionalFile(cacheDir, CacheFile.IntermediateBundle),
        checksums: loadOptionalFile(cacheDir, CacheFile.Checksums),
        checksumsSignature: loadOptionalFile(cacheDir, CacheFile.ChecksumsSignature),
        provenance: loadOptionalFile(cacheDir, CacheFile.Provenance),
        trustedRoot: loadOptionalFile(cacheDir, CacheFile.TrustedRoot),
    };
    const stale = isStale(config, options.now);
    getLogger().verbose(
        LogCategory.CACHE,
        `Loaded ${config.version} from ${cacheDir}${stale ? ' (stale)' : ''}`
    );
    return { artifacts, config, stale };
}

export function saveCache(cacheDir: string, artifacts: CacheArtifacts, config: CacheConfig): void {
    ensureDir(cacheDir);
    saveFile(cacheDir, CacheFile.RootBundle, artifacts.rootBundle);
    saveFile(cacheDir, CacheFile.IntermediateBundle, artifacts.intermediateBundle);
    saveFile(cacheDir, CacheFile.Checksums, artifacts.checksums);
    saveFile(cacheDir, CacheFile.ChecksumsSignature, artifacts.checksumsSignature);
    saveFile(cacheDir, CacheFile.Provenance, artifacts.provenance);
    saveFile(cacheDir, CacheFile.TrustedRoot, artifacts.trustedRoot);
    saveCacheConfig(cacheDir, config);
    getLogger().verbose(LogCategory.CACHE, `Saved ${config.version} to ${cacheDir}`);
}

function ensureDir(dir: string): void {
    try {
        fs.mkdirSync(dir, { recursive: true, mode: DIR_MODE });
    } catch (error) {
        throw new Error(`failed to create cache directory: ${errorMessage(error)}`, { cause: error });
    }
}
