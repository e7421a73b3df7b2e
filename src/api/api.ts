// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as fs from 'fs';
import * as path from 'path';
import stringify from 'fast-json-stable-stringify';
import { TrustedRoot } from '@sigstore/protobuf-specs';
import { CHECKSUMS_FILENAME, CHECKSUMS_SIGNATURE_FILENAME } from '../bundle/constants';
import { BundleMetadata, parseMetadata, validateCommit, validateDate } from '../bundle/metadata';
import {
    AutoUpdateConfig,
    CacheFile,
    LoadedCache,
    cacheExists,
    checkAutoUpdateConfig,
    isWithinMinInterval,
    loadCache,
} from '../cache/cache';
import { EnvConfigParser, Environment } from '../config/env-config';
import { GitHubClient } from '../github/client';
import { Release, Repo, repoToString } from '../github/types';
import { sha256Hex } from '../transparency/checksums';
import { AcceptanceMode } from '../transparency/policy';
import { SignatureVerifier, SigstoreSignatureVerifier } from '../transparency/signature';
import { resolveTrustedRoot } from '../transparency/trusted-root';
import { BundleVerifier, VerifyResult } from '../transparency/verifier';
import { validateVendorId } from '../vendors/registry';
import {
    BundleVerificationFailedError,
    CacheCorruptError,
    CacheStaleError,
    OfflineAndEmptyError,
    errorMessage,
    isErrorKind,
    wrapError,
} from '../utils/errors';
import { getLogger, LogCategory } from '../utils/logger';
import { BundleAssets, assetsFromCache, downloadAssets, parseProvenance } from './assets';
import { TrustedBundle } from './trusted-bundle';

const LATEST_RELEASE_PAGE_SIZE = 50;

export interface VerificationOptions {
    /** Replaces the Sigstore verifier; the trusted root is then unused. */
    signatureVerifier?: SignatureVerifier;
    /** Custom trusted-root JSON instead of the one distributed over TUF. */
    trustedRoot?: Uint8Array | string;
    acceptance?: AcceptanceMode;
    /** Repository publishing the bundles; defaults to the environment's. */
    sourceRepo?: Repo;
}

export interface GetConfig extends VerificationOptions {
    /** Release date `YYYY-MM-DD`; the latest release when omitted. */
    date?: string;
    vendorIDs?: string[];
    cachePath?: string;
    disableLocalCache?: boolean;
    skipVerify?: boolean;
    /** Serve from the cache only, never touching the network. */
    offline?: boolean;
    autoUpdate?: AutoUpdateConfig;
    client?: GitHubClient;
    signal?: AbortSignal;
    now?: Date;
}

export interface VerifyConfig extends VerificationOptions {
    bundle: Uint8Array;
    /** Read from the bundle header when omitted. */
    metadata?: BundleMetadata;
    checksums?: Uint8Array;
    checksumsSignature?: Uint8Array;
    /** Attestation bundles as JSON values. */
    attestations?: unknown[];
    /** `provenance.json` content, used when `attestations` is not given. */
    provenance?: Uint8Array;
    disableLocalCache?: boolean;
    client?: GitHubClient;
    signal?: AbortSignal;
}

export interface LoadConfig extends VerificationOptions {
    cachePath?: string;
    skipVerify?: boolean;
    offline?: boolean;
    disableLocalCache?: boolean;
    /** Overrides the vendor filter recorded in the cache. */
    vendorIDs?: string[];
    /** Fail with `CacheStale` instead of warning. */
    rejectStale?: boolean;
    now?: Date;
}

export interface SaveConfig extends VerificationOptions {
    date?: string;
    vendorIDs?: string[];
    cachePath?: string;
    client?: GitHubClient;
    signal?: AbortSignal;
    now?: Date;
}

export interface SaveResult {
    bundle: TrustedBundle;
    outputDir: string;
    files: string[];
}

interface VerificationInputs {
    checksums: Buffer;
    checksumsSignature: Buffer;
    attestations: unknown[];
}

interface VerificationContext {
    signatureVerifier: SignatureVerifier;
    sourceRepo: Repo;
    acceptance?: AcceptanceMode;
    /** Trusted-root JSON in use, kept for offline verification. */
    trustedRoot?: Buffer;
}

/**
 * Resolve, fetch, verify and cache a trusted bundle. With auto-update
 * enabled the bundle refreshes itself in the background until `stop()`.
 */
export async function getTrustedBundle(
    config: GetConfig = {},
    env: Environment = EnvConfigParser.loadConfig()
): Promise<TrustedBundle> {
    const bundle = await fetchTrustedBundle(config, env);
    if (!config.offline) {
        bundle.startWatcher(() => fetchTrustedBundle({ ...config, date: undefined, now: undefined }, env));
    }
    return bundle;
}

async function fetchTrustedBundle(config: GetConfig, env: Environment): Promise<TrustedBundle> {
    try {
        checkGetConfig(config);
    } catch (error) {
        throw wrapError('invalid config', error);
    }
    const cachePath = config.cachePath || env.cacheDir;
    const now = config.now ?? new Date();

    if (config.offline) {
        const bundle = await loadTrustedBundle({ ...config, cachePath, offline: true }, env);
        if (config.date && bundle.rootMetadata.date !== config.date) {
            throw new Error(`offline mode: cached bundle is ${bundle.rootMetadata.date}, not ${config.date}`);
        }
        return bundle;
    }

    const sourceRepo = config.sourceRepo ?? env.sourceRepo;
    const client = config.client ?? new GitHubClient({ token: env.githubToken, timeout: env.httpTimeout });
    const skipVerify = config.skipVerify === true;
    const cached = config.disableLocalCache ? undefined : readCache(cachePath, now);

    const tag = await resolveReleaseTag(client, sourceRepo, config, cached, now);
    const usable = usableCache(cached, cachePath, tag, skipVerify);

    let assets: BundleAssets;
    if (usable) {
        getLogger().verbose(LogCategory.CACHE, `Using cached bundle ${tag}`);
        assets = assetsFromCache(usable);
    } else {
        assets = await downloadAssets({ client, repo: sourceRepo, tag, verification: !skipVerify, signal: config.signal });
    }

    let trustedRoot = usable?.artifacts.trustedRoot;
    if (!skipVerify) {
        const context = await createVerificationContext(config, env, { disableLocalCache: config.disableLocalCache });
        await verifyAssets(assets, context);
        trustedRoot = context.trustedRoot ?? trustedRoot;
    }

    const bundle = new TrustedBundle(assets, {
        vendorFilter: config.vendorIDs,
        autoUpdate: config.autoUpdate,
        disableLocalCache: config.disableLocalCache,
        trustedRoot,
    });
    if (!config.disableLocalCache && !usable) {
        try {
            bundle.persist(cachePath, now);
        } catch (error) {
            throw wrapError(
                'failed to persist bundle to cache (on a read-only filesystem, set disableLocalCache)',
                error
            );
        }
    }
    return bundle;
}

/**
 * Verify one bundle, fetching whatever verification input was not supplied
 * from the release named by the bundle date.
 */
export async function verifyTrustedBundle(
    config: VerifyConfig,
    env: Environment = EnvConfigParser.loadConfig()
): Promise<VerifyResult> {
    if (!config.bundle || config.bundle.length === 0) {
        throw new Error("invalid config: 'bundle' is required");
    }
    let metadata: BundleMetadata;
    try {
        metadata = config.metadata ?? parseMetadata(config.bundle);
        validateDate(metadata.date);
        validateCommit(metadata.commit);
    } catch (error) {
        throw wrapError('invalid config: invalid bundle metadata', error);
    }

    const sourceRepo = config.sourceRepo ?? env.sourceRepo;
    let inputs: VerificationInputs;
    try {
        inputs = await fetchMissingInputs(config, metadata.date, sourceRepo, env);
    } catch (error) {
        throw wrapError('failed to download verification assets', error);
    }

    const context = await createVerificationContext(config, env, { disableLocalCache: config.disableLocalCache });
    try {
        return await new BundleVerifier({
            date: metadata.date,
            commit: metadata.commit,
            sourceRepo,
            acceptance: config.acceptance,
            signatureVerifier: context.signatureVerifier,
        }).verify({
            bundle: config.bundle,
            checksums: inputs.checksums,
            checksumsSignature: parseJsonArtifact(inputs.checksumsSignature, 'checksum signature'),
            attestations: inputs.attestations,
        });
    } catch (error) {
        throw asVerificationFailure(error);
    }
}

/**
 * Rebuild a trusted bundle from a cache directory, verifying it again unless
 * it was cached without verification or `skipVerify` is set.
 */
export async function loadTrustedBundle(
    config: LoadConfig | string = {},
    env: Environment = EnvConfigParser.loadConfig()
): Promise<TrustedBundle> {
    const options: LoadConfig = typeof config === 'string' ? { cachePath: config } : config;
    const cachePath = options.cachePath || env.cacheDir;
    const logger = getLogger();

    const cached = loadCache(cachePath, { now: options.now });
    if (!cached) {
        if (options.offline) {
            throw new OfflineAndEmptyError(cachePath);
        }
        throw new Error(`no cached bundle found in ${cachePath}`);
    }
    if (cached.stale) {
        const message = `cached bundle ${cached.config.version} is stale (last checked ${cached.config.lastTimestamp})`;
        if (options.rejectStale) {
            throw new CacheStaleError(message);
        }
        logger.warn(message);
    }

    const assets = assetsFromCache(cached);
    if (!options.skipVerify && !cached.config.skipVerify) {
        const required: Array<[string, Buffer | undefined]> = [
            [CacheFile.Checksums, assets.checksums],
            [CacheFile.ChecksumsSignature, assets.checksumsSignature],
            [CacheFile.Provenance, assets.provenance],
        ];
        const missing = required.flatMap(([name, data]) => (data && data.length > 0 ? [] : [name]));
        if (missing.length > 0) {
            throw new CacheCorruptError(`missing required cache files: [${missing.join(' ')}]`);
        }
        const context = await createVerificationContext(
            { ...options, trustedRoot: options.trustedRoot ?? (options.offline ? cached.artifacts.trustedRoot : undefined) },
            env,
            { disableLocalCache: options.disableLocalCache, offline: options.offline }
        );
        await verifyAssets(assets, context);
    }

    const bundle = new TrustedBundle(assets, {
        vendorFilter: options.vendorIDs ?? cached.config.vendorIDs,
        autoUpdate: cached.config.autoUpdate,
        disableLocalCache: options.disableLocalCache,
        trustedRoot: cached.artifacts.trustedRoot,
    });
    // Offline bundles never refresh: the cached trusted root may predate a key rotation.
    if (!options.offline) {
        bundle.startWatcher(() =>
            fetchTrustedBundle(
                {
                    cachePath,
                    skipVerify: options.skipVerify || cached.config.skipVerify,
                    disableLocalCache: options.disableLocalCache,
                    vendorIDs: options.vendorIDs ?? cached.config.vendorIDs,
                    autoUpdate: cached.config.autoUpdate,
                    signatureVerifier: options.signatureVerifier,
                    trustedRoot: options.trustedRoot,
                    acceptance: options.acceptance,
                    sourceRepo: options.sourceRepo,
                },
                env
            )
        );
    }
    return bundle;
}

/**
 * Fetch and verify a bundle, then write every artifact needed to verify it
 * again offline, trusted root included, to `outputDir`.
 */
export async function saveTrustedBundle(
    config: SaveConfig,
    outputDir: string,
    env: Environment = EnvConfigParser.loadConfig()
): Promise<SaveResult> {
    const bundle = await getTrustedBundle(
        { ...config, skipVerify: false, autoUpdate: { disableAutoUpdate: true } },
        env
    );
    try {
        bundle.persist(outputDir, config.now);
    } catch (error) {
        throw wrapError('failed to save bundle', error);
    }
    const files = Object.values(CacheFile).filter(name => fs.existsSync(path.join(outputDir, name)));
    return { bundle, outputDir, files };
}

async function fetchMissingInputs(
    config: VerifyConfig,
    tag: string,
    repo: Repo,
    env: Environment
): Promise<VerificationInputs> {
    let client: GitHubClient | undefined = config.client;
    const forge = (): GitHubClient => {
        client ??= new GitHubClient({ token: env.githubToken, timeout: env.httpTimeout });
        return client;
    };

    const checksums = config.checksums?.length
        ? Buffer.from(config.checksums)
        : await forge().downloadAsset(repo, tag, CHECKSUMS_FILENAME, undefined, config.signal);
    const checksumsSignature = config.checksumsSignature?.length
        ? Buffer.from(config.checksumsSignature)
        : await forge().downloadAsset(repo, tag, CHECKSUMS_SIGNATURE_FILENAME, undefined, config.signal);

    let attestations = config.attestations;
    if (!attestations && config.provenance?.length) {
        attestations = parseProvenance(config.provenance);
    }
    if (!attestations) {
        const digest = `sha256:${sha256Hex(config.bundle)}`;
        attestations = (await forge().getAttestations(repo, digest, config.signal)).map(attestation => attestation.bundle);
    }
    return { checksums, checksumsSignature, attestations };
}

function checkGetConfig(config: GetConfig): void {
    if (config.date) {
        validateDate(config.date);
    }
    for (const vendorID of config.vendorIDs ?? []) {
        try {
            validateVendorId(vendorID);
        } catch (error) {
            throw wrapError('invalid vendor ID', error);
        }
    }
    if (config.autoUpdate) {
        try {
            checkAutoUpdateConfig(config.autoUpdate);
        } catch (error) {
            throw wrapError('invalid auto-update config', error);
        }
    }
    if (config.offline && config.disableLocalCache) {
        throw new Error('offline mode requires the local cache');
    }
}

function readCache(cachePath: string, now: Date): LoadedCache | undefined {
    try {
        return loadCache(cachePath, { now });
    } catch (error) {
        getLogger().verbose(LogCategory.CACHE, `Ignoring unreadable cache: ${errorMessage(error)}`);
        return undefined;
    }
}

/**
 * The cache answers for `tag` when it holds that release, is not stale, and
 * carries the verification artifacts that will be needed.
 */
function usableCache(
    cached: LoadedCache | undefined,
    cachePath: string,
    tag: string,
    skipVerify: boolean
): LoadedCache | undefined {
    if (!cached || cached.stale || cached.config.version !== tag || !cacheExists(cachePath, tag)) {
        return undefined;
    }
    if (!skipVerify && cached.config.skipVerify) {
        return undefined;
    }
    return cached;
}

async function resolveReleaseTag(
    client: GitHubClient,
    repo: Repo,
    config: GetConfig,
    cached: LoadedCache | undefined,
    now: Date
): Promise<string> {
    const logger = getLogger();
    if (config.date) {
        if (cached && !cached.stale && cached.config.version === config.date) {
            return config.date;
        }
        try {
            await client.releaseExists(repo, config.date, config.signal);
        } catch (error) {
            throw wrapError(`release ${config.date} not found`, error);
        }
        return config.date;
    }

    if (cached && !cached.stale && isWithinMinInterval(cached.config, now)) {
        logger.verbose(LogCategory.CACHE, `Checked for releases recently, keeping ${cached.config.version}`);
        return cached.config.version;
    }

    let releases: Release[];
    try {
        releases = await client.listReleases(
            repo,
            { pageSize: LATEST_RELEASE_PAGE_SIZE, sortOrder: 'desc', returnFirstValue: true },
            config.signal
        );
    } catch (error) {
        throw wrapError('failed to fetch releases', error);
    }
    if (releases.length === 0) {
        throw new Error(`no releases found in ${repoToString(repo)}`);
    }
    logger.verbose(LogCategory.BUNDLE, `Latest release is ${releases[0].tagName}`);
    return releases[0].tagName;
}

async function createVerificationContext(
    options: VerificationOptions,
    env: Environment,
    trustOptions: { disableLocalCache?: boolean; offline?: boolean }
): Promise<VerificationContext> {
    const sourceRepo = options.sourceRepo ?? env.sourceRepo;
    const custom = options.trustedRoot && options.trustedRoot.length > 0 ? Buffer.from(options.trustedRoot) : undefined;
    if (options.signatureVerifier) {
        return { signatureVerifier: options.signatureVerifier, sourceRepo, acceptance: options.acceptance, trustedRoot: custom };
    }

    let root: TrustedRoot;
    try {
        root = await resolveTrustedRoot({
            trustedRoot: custom,
            tufCachePath: env.tufCacheDir,
            disableLocalCache: trustOptions.disableLocalCache,
            offline: trustOptions.offline,
        });
    } catch (error) {
        throw new BundleVerificationFailedError(errorMessage(error), { cause: error });
    }
    return {
        signatureVerifier: new SigstoreSignatureVerifier(root),
        sourceRepo,
        acceptance: options.acceptance,
        trustedRoot: custom ?? Buffer.from(stringify(TrustedRoot.toJSON(root))),
    };
}

/**
 * Verify the root bundle, then the intermediate bundle against the same
 * checksums and provenance.
 */
async function verifyAssets(assets: BundleAssets, context: VerificationContext): Promise<void> {
    try {
        await verifyBundle(assets.rootBundle, assets, context);
    } catch (error) {
        throw wrapError('root bundle verification failed', asVerificationFailure(error));
    }
    if (assets.intermediateBundle && assets.intermediateBundle.length > 0) {
        try {
            await verifyBundle(assets.intermediateBundle, assets, context);
        } catch (error) {
            throw wrapError('intermediate bundle verification failed', asVerificationFailure(error));
        }
    }
}

async function verifyBundle(bundle: Buffer, assets: BundleAssets, context: VerificationContext): Promise<VerifyResult> {
    if (!assets.checksums?.length || !assets.checksumsSignature?.length || !assets.provenance?.length) {
        throw new Error('verification assets are missing');
    }
    const metadata = parseMetadata(bundle);
    const verifier = new BundleVerifier({
        date: metadata.date,
        commit: metadata.commit,
        sourceRepo: context.sourceRepo,
        acceptance: context.acceptance,
        signatureVerifier: context.signatureVerifier,
    });
    return verifier.verify({
        bundle,
        checksums: assets.checksums,
        checksumsSignature: parseJsonArtifact(assets.checksumsSignature, 'checksum signature'),
        attestations: parseProvenance(assets.provenance),
    });
}

function parseJsonArtifact(data: Uint8Array | undefined, label: string): unknown {
    if (!data || data.length === 0) {
        throw new Error(`${label} is missing`);
    }
    try {
        return JSON.parse(Buffer.from(data).toString('utf8'));
    } catch (error) {
        throw wrapError(`failed to parse ${label}`, error);
    }
}

function asVerificationFailure(error: unknown): Error {
    if (isErrorKind(error, 'BundleVerificationFailed') && error instanceof Error) {
        return error;
    }
    return new BundleVerificationFailedError(errorMessage(error), { cause: error });
}
