// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { BundleMetadata, parseMetadata } from '../bundle/metadata';
import { BundleCatalog, certificatesOf, parseBundle } from '../bundle/parser';
import { AutoUpdateConfig, CacheConfig, DEFAULT_UPDATE_INTERVAL, defaultCacheDir, saveCache } from '../cache/cache';
import { CertificateInfo, parseCertificate } from '../x509/certificate';
import { BundleParseError, BundleVerificationFailedError, errorMessage, wrapError } from '../utils/errors';
import { getLogger, LogCategory } from '../utils/logger';
import { BundleAssets, assetsToArtifacts, hasVerificationAssets } from './assets';

/** How long `stop()` waits for a refresh in progress. */
export const STOP_TIMEOUT = 5000;

/**
 * Fetches and verifies the latest release; the watcher calls it on every tick.
 */
export type BundleRefresher = () => Promise<TrustedBundle>;

export interface TrustedBundleOptions {
    /** Restricts every certificate accessor to these vendors. */
    vendorFilter?: readonly string[];
    autoUpdate?: AutoUpdateConfig;
    disableLocalCache?: boolean;
    /** Trusted-root JSON to keep alongside the bundle for offline use. */
    trustedRoot?: Buffer;
}

/**
 * A verified root bundle, with the intermediate bundle of the same release
 * when there is one.
 */
export class TrustedBundle {
    private state: BundleState;
    private readonly vendorFilter: readonly string[];
    private readonly options: TrustedBundleOptions;

    private watcher?: NodeJS.Timeout;
    private inflight?: Promise<boolean>;

    constructor(assets: BundleAssets, options: TrustedBundleOptions = {}) {
        this.state = readState(assets);
        this.vendorFilter = options.vendorFilter ?? [];
        this.options = options;
    }

    /**
     * Build a trusted bundle from raw bundles given in any order.
     */
    static fromBundles(bundles: Uint8Array[], options: TrustedBundleOptions = {}): TrustedBundle {
        let rootBundle: Buffer | undefined;
        let intermediateBundle: Buffer | undefined;
        for (const data of bundles) {
            if (data.length === 0) {
                continue;
            }
            const buffer = Buffer.from(data);
            if (readMetadata(buffer).type === 'intermediate') {
                intermediateBundle = buffer;
            } else {
                rootBundle = buffer;
            }
        }
        if (!rootBundle) {
            throw new BundleParseError('a root bundle is required');
        }
        return new TrustedBundle({ rootBundle, intermediateBundle }, options);
    }

    get rootMetadata(): BundleMetadata {
        return this.state.rootMetadata;
    }

    get intermediateMetadata(): BundleMetadata | undefined {
        return this.state.intermediateMetadata;
    }

    get rawRoot(): Buffer {
        return Buffer.from(this.state.assets.rootBundle);
    }

    get rawIntermediate(): Buffer | undefined {
        const data = this.state.assets.intermediateBundle;
        return data ? Buffer.from(data) : undefined;
    }

    get watching(): boolean {
        return this.watcher !== undefined;
    }

    /**
     * Vendors of the root bundle, in bundle order, narrowed by the vendor filter.
     */
    vendors(): string[] {
        const present = [...this.state.rootCatalog.keys()];
        if (this.vendorFilter.length === 0) {
            return present;
        }
        return this.vendorFilter.filter(id => this.state.rootCatalog.has(id));
    }

    roots(vendorIDs?: readonly string[]): CertificateInfo[] {
        return certificatesOf(this.state.rootCatalog, this.selection(vendorIDs));
    }

    intermediates(vendorIDs?: readonly string[]): CertificateInfo[] {
        return certificatesOf(this.state.intermediateCatalog, this.selection(vendorIDs));
    }

    /**
     * True when the certificate (DER, PEM or parsed) is one of the selected
     * roots or intermediates.
     */
    contains(cert: Uint8Array | CertificateInfo): boolean {
        const der = cert instanceof Uint8Array ? parseCertificate(cert).der : cert.der;
        return [...this.roots(), ...this.intermediates()].some(candidate => candidate.der.equals(der));
    }

    /**
     * Write the bundle and its verification artifacts to a cache directory.
     */
    persist(cachePath: string = defaultCacheDir(), now: Date = new Date()): void {
        if (this.options.disableLocalCache) {
            throw new Error('cannot persist trusted bundle: local cache is disabled');
        }
        const config: CacheConfig = {
            version: this.rootMetadata.date,
            commit: this.rootMetadata.commit,
            skipVerify: !hasVerificationAssets(this.state.assets),
            lastTimestamp: now.toISOString(),
        };
        if (this.vendorFilter.length > 0) {
            config.vendorIDs = [...this.vendorFilter];
        }
        if (this.options.autoUpdate) {
            config.autoUpdate = this.options.autoUpdate;
        }
        try {
            saveCache(cachePath, assetsToArtifacts(this.state.assets, this.options.trustedRoot), config);
        } catch (error) {
            throw wrapError('failed to persist trusted bundle', error);
        }
    }

    /**
     * Refresh the bundle every `maxInterval` seconds of the auto-update config
     * (one day by default). Does nothing when auto-update is disabled or a
     * watcher is already running. The timer does not keep the process alive.
     */
    startWatcher(refresh: BundleRefresher): void {
        const autoUpdate = this.options.autoUpdate;
        if (!autoUpdate || autoUpdate.disableAutoUpdate || this.watcher) {
            return;
        }
        const interval = (autoUpdate.maxInterval ?? DEFAULT_UPDATE_INTERVAL) * 1000;
        this.watcher = setInterval(() => {
            void this.checkAndUpdate(refresh);
        }, interval);
        this.watcher.unref();
        getLogger().verbose(LogCategory.CACHE, `Auto-update every ${interval / 1000}s`);
    }

    /**
     * Fetch the latest release and adopt it when it carries another commit
     * and is not older than the current one. Failures keep the current bundle.
     * Resolves to whether the bundle changed.
     */
    checkAndUpdate(refresh: BundleRefresher): Promise<boolean> {
        if (!this.inflight) {
            this.inflight = this.refreshOnce(refresh).finally(() => {
                this.inflight = undefined;
            });
        }
        return this.inflight;
    }

    /**
     * Stop the watcher, waiting up to {@link STOP_TIMEOUT} ms for a refresh
     * in progress. Safe to call more than once.
     */
    async stop(timeout: number = STOP_TIMEOUT): Promise<void> {
        if (this.watcher) {
            clearInterval(this.watcher);
            this.watcher = undefined;
        }
        const inflight = this.inflight;
        if (!inflight) {
            return;
        }

        let timer: NodeJS.Timeout | undefined;
        const expired = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error('timeout waiting for auto-update watcher to stop')), timeout);
        });
        try {
            await Promise.race([inflight, expired]);
        } finally {
            clearTimeout(timer);
        }
    }

    private async refreshOnce(refresh: BundleRefresher): Promise<boolean> {
        const logger = getLogger();
        let latest: TrustedBundle;
        try {
            latest = await refresh();
        } catch (error) {
            logger.warn(`auto-update failed, keeping bundle ${this.rootMetadata.date}: ${errorMessage(error)}`);
            return false;
        }

        const current = this.rootMetadata;
        const next = latest.rootMetadata;
        if (next.commit === current.commit || next.date < current.date) {
            logger.verbose(LogCategory.CACHE, `Bundle ${current.date} is up to date`);
            return false;
        }
        this.state = latest.state;
        logger.verbose(LogCategory.CACHE, `Updated bundle ${current.date} -> ${next.date} (${next.commit})`);
        return true;
    }

    private selection(vendorIDs?: readonly string[]): readonly string[] | undefined {
        if (vendorIDs && vendorIDs.length > 0) {
            return vendorIDs;
        }
        return this.vendorFilter.length > 0 ? this.vendorFilter : undefined;
    }
}

interface BundleState {
    assets: BundleAssets;
    rootMetadata: BundleMetadata;
    intermediateMetadata?: BundleMetadata;
    rootCatalog: BundleCatalog;
    intermediateCatalog: BundleCatalog;
}

function readState(assets: BundleAssets): BundleState {
    const rootMetadata = readMetadata(assets.rootBundle, 'root');
    const rootCatalog = readCatalog(assets.rootBundle, 'root');
    if (!assets.intermediateBundle || assets.intermediateBundle.length === 0) {
        return { assets, rootMetadata, rootCatalog, intermediateCatalog: new Map() };
    }

    const intermediateMetadata = readMetadata(assets.intermediateBundle, 'intermediate');
    if (intermediateMetadata.date !== rootMetadata.date || intermediateMetadata.commit !== rootMetadata.commit) {
        throw new BundleVerificationFailedError(
            `intermediate bundle (date ${intermediateMetadata.date}, commit ${intermediateMetadata.commit}) does not match root bundle (date ${rootMetadata.date}, commit ${rootMetadata.commit})`
        );
    }
    return {
        assets,
        rootMetadata,
        intermediateMetadata,
        rootCatalog,
        intermediateCatalog: readCatalog(assets.intermediateBundle, 'intermediate'),
    };
}

function readMetadata(data: Buffer, expected?: BundleMetadata['type']): BundleMetadata {
    let metadata: BundleMetadata;
    try {
        metadata = parseMetadata(data);
    } catch (error) {
        throw wrapError('failed to parse bundle metadata', error);
    }
    if (expected && metadata.type !== expected) {
        throw new BundleParseError(`expected a ${expected} bundle, got ${metadata.type}`);
    }
    return metadata;
}

function readCatalog(data: Buffer, label: string): BundleCatalog {
    try {
        return parseBundle(data);
    } catch (error) {
        throw wrapError(`failed to parse ${label} bundle`, error);
    }
}
