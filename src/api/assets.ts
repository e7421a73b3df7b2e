// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import stringify from 'fast-json-stable-stringify';
import {
    CHECKSUMS_FILENAME,
    CHECKSUMS_SIGNATURE_FILENAME,
    INTERMEDIATE_BUNDLE_FILENAME,
    ROOT_BUNDLE_FILENAME,
} from '../bundle/constants';
import { CacheArtifacts, LoadedCache } from '../cache/cache';
import { GitHubClient } from '../github/client';
import { Repo, repoToString } from '../github/types';
import { listsArtifact, sha256Hex } from '../transparency/checksums';
import { wrapError } from '../utils/errors';
import { getLogger, LogCategory } from '../utils/logger';

/**
 * Everything a release publishes for one bundle date. The verification
 * artifacts are absent when they were not requested.
 */
export interface BundleAssets {
    rootBundle: Buffer;
    intermediateBundle?: Buffer;
    checksums?: Buffer;
    checksumsSignature?: Buffer;
    /** JSON list of the attestation bundles recorded for the root digest. */
    provenance?: Buffer;
}

export interface DownloadAssetsOptions {
    client: GitHubClient;
    repo: Repo;
    tag: string;
    /** Also fetch the checksum signature and the provenance. */
    verification: boolean;
    signal?: AbortSignal;
}

export function hasVerificationAssets(assets: BundleAssets): boolean {
    return Boolean(assets.checksums?.length && assets.checksumsSignature?.length && assets.provenance?.length);
}

/**
 * Fetch a release from the forge. `checksums.txt` is always downloaded since
 * it lists which bundles the release carries.
 */
export async function downloadAssets(options: DownloadAssetsOptions): Promise<BundleAssets> {
    const { client, repo, tag, signal } = options;
    const logger = getLogger();
    const startTime = Date.now();
    logger.verbose(LogCategory.BUNDLE, `Downloading release ${tag} from ${repoToString(repo)}`);

    let checksums: Buffer;
    try {
        checksums = await client.downloadAsset(repo, tag, CHECKSUMS_FILENAME, undefined, signal);
    } catch (error) {
        throw wrapError('failed to download checksums', error);
    }
    const checksumsText = checksums.toString('utf8');

    let checksumsSignature: Buffer | undefined;
    if (options.verification) {
        try {
            checksumsSignature = await client.downloadAsset(repo, tag, CHECKSUMS_SIGNATURE_FILENAME, undefined, signal);
        } catch (error) {
            throw wrapError('failed to download checksum signature', error);
        }
    }

    if (!listsArtifact(checksumsText, ROOT_BUNDLE_FILENAME)) {
        throw new Error(`release ${tag} does not publish ${ROOT_BUNDLE_FILENAME}`);
    }
    const [rootBundle, intermediateBundle] = await Promise.all([
        client.downloadAsset(repo, tag, ROOT_BUNDLE_FILENAME, undefined, signal).catch((error: unknown) => {
            throw wrapError('failed to download bundle', error);
        }),
        listsArtifact(checksumsText, INTERMEDIATE_BUNDLE_FILENAME)
            ? client.downloadAsset(repo, tag, INTERMEDIATE_BUNDLE_FILENAME, undefined, signal).catch((error: unknown) => {
                  throw wrapError('failed to download intermediate bundle', error);
              })
            : Promise.resolve(undefined),
    ]);

    const assets: BundleAssets = { rootBundle, intermediateBundle };
    if (options.verification) {
        assets.checksums = checksums;
        assets.checksumsSignature = checksumsSignature;
        assets.provenance = await downloadProvenance(client, repo, rootBundle, signal);
    }

    const size = [rootBundle, intermediateBundle, checksums].reduce((total, data) => total + (data?.length ?? 0), 0);
    logger.verbose(
        LogCategory.PERF,
        `Downloaded ${logger.formatBytes(size)} in ${logger.formatDuration(Date.now() - startTime)}`
    );
    return assets;
}

/**
 * Attestations for the root bundle digest, serialised as a compact JSON list.
 */
export async function downloadProvenance(
    client: GitHubClient,
    repo: Repo,
    rootBundle: Buffer,
    signal?: AbortSignal
): Promise<Buffer> {
    const digest = `sha256:${sha256Hex(rootBundle)}`;
    let bundles: unknown[];
    try {
        bundles = (await client.getAttestations(repo, digest, signal)).map(attestation => attestation.bundle);
    } catch (error) {
        throw wrapError('failed to get attestations', error);
    }
    if (bundles.length === 0) {
        throw new Error(`no attestations found for digest ${digest}`);
    }
    getLogger().verbose(LogCategory.VERIFY, `Fetched ${bundles.length} attestation(s) for ${digest}`);
    return Buffer.from(stringify(bundles));
}

/**
 * Decode `provenance.json`: a list of Sigstore bundles, or a single one.
 */
export function parseProvenance(data: Uint8Array | string): unknown[] {
    let value: unknown;
    try {
        value = JSON.parse(typeof data === 'string' ? data : Buffer.from(data).toString('utf8'));
    } catch (error) {
        throw wrapError('failed to parse provenance', error);
    }
    if (Array.isArray(value)) {
        return value;
    }
    if (typeof value === 'object' && value !== null) {
        return [value];
    }
    throw new Error('failed to parse provenance: expected a bundle or a list of bundles');
}

export function assetsFromCache(cache: LoadedCache): BundleAssets {
    const { artifacts } = cache;
    return {
        rootBundle: artifacts.rootBundle,
        intermediateBundle: artifacts.intermediateBundle,
        checksums: artifacts.checksums,
        checksumsSignature: artifacts.checksumsSignature,
        provenance: artifacts.provenance,
    };
}

export function assetsToArtifacts(assets: BundleAssets, trustedRoot?: Buffer): CacheArtifacts {
    return { ...assets, trustedRoot };
}
