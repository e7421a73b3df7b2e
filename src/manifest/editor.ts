// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { URL } from 'url';
import { AxiosInstance } from 'axios';
import { execute } from '../concurrency/pool';
import { MAX_WORKERS } from '../concurrency/cpu';
import { HashAlgorithm, ParsedFingerprint, hash, isHashAlgorithm, parse, validateFingerprintWithAlgorithm } from '../fingerprint/fingerprint';
import { fetchCertificate } from '../source/resolver';
import { validateVendorId } from '../vendors/registry';
import { CertificateInfo } from '../x509/certificate';
import { errorMessage, wrapError } from '../utils/errors';
import { getLogger } from '../utils/logger';
import { checkCertificate } from './duplicates';
import { Certificate, TrustBundleConfig, Vendor, findVendor, newFingerprint } from './model';

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha256';

export interface AddCertificatesOptions {
    vendorId: string;
    /** Comma-separated list of `https://` or `file://` locations. */
    uris: string;
    /** Comma-separated `ALG:HEX` values, one per URI. */
    fingerprints?: string;
    /** Ignored when several URIs are given; the certificate CN is used instead. */
    name?: string;
    hashAlgorithm?: string;
    workers?: number;
    client?: AxiosInstance;
    signal?: AbortSignal;
}

export interface AddFailure {
    uri: string;
    error: Error;
}

export interface AddCertificatesResult {
    added: Certificate[];
    failures: AddFailure[];
}

type DownloadOutcome = { uri: string; info: CertificateInfo; fingerprint: string } | { uri: string; error: Error };

export function requireVendor(config: TrustBundleConfig, id: string): Vendor {
    const vendor = findVendor(config, id);
    if (!vendor) {
        throw new Error(`vendor with ID '${id}' not found`);
    }
    return vendor;
}

export function parseUriList(input: string): string[] {
    const uris = input
        .split(',')
        .map(uri => uri.trim())
        .filter(uri => uri !== '');
    if (uris.length === 0) {
        throw new Error('no valid URIs provided');
    }

    for (const uri of uris) {
        let scheme: string;
        try {
            scheme = new URL(uri).protocol.toLowerCase();
        } catch {
            throw new Error(`invalid URI: ${uri}`);
        }
        if (scheme === 'http:') {
            throw new Error(`insecure HTTP URL not allowed: ${uri} (use HTTPS instead)`);
        }
        if (scheme !== 'https:' && scheme !== 'file:') {
            throw new Error(`invalid URI scheme: ${uri} (must use https or file)`);
        }
    }
    return uris;
}

/**
 * Every fingerprint must use the same algorithm, which then overrides the
 * `--hash-algorithm` flag.
 */
export function parseFingerprintList(input: string = ''): ParsedFingerprint[] {
    const fingerprints: ParsedFingerprint[] = [];
    for (const raw of input.split(',')) {
        const value = raw.trim();
        if (!value) {
            continue;
        }
        let parsed: ParsedFingerprint;
        try {
            parsed = parse(value);
        } catch (error) {
            throw wrapError('invalid fingerprint format', error);
        }
        if (fingerprints.length > 0 && fingerprints[0].algorithm !== parsed.algorithm) {
            throw new Error(
                `all fingerprints must use the same hash algorithm, found '${fingerprints[0].algorithm}' and '${parsed.algorithm}'`
            );
        }
        fingerprints.push(parsed);
    }
    return fingerprints;
}

export function resolveHashAlgorithm(fingerprints: readonly ParsedFingerprint[], flag: string = DEFAULT_HASH_ALGORITHM): HashAlgorithm {
    const requested = flag.toLowerCase();
    if (fingerprints.length > 0) {
        const inferred = fingerprints[0].algorithm;
        if (requested !== DEFAULT_HASH_ALGORITHM && requested !== inferred) {
            getLogger().warn(`Ignoring --hash-algorithm flag, using '${inferred}' from provided fingerprint(s)`);
        }
        return inferred;
    }
    if (!isHashAlgorithm(requested)) {
        throw new Error(`invalid hash algorithm '${flag}', must be one of: sha1, sha256, sha384, sha512`);
    }
    return requested;
}

/**
 * Download certificates and append them to a vendor of `config`. Each URI
 * succeeds or fails on its own; nothing is written to disk.
 */
export async function addCertificates(
    config: TrustBundleConfig,
    options: AddCertificatesOptions
): Promise<AddCertificatesResult> {
    const logger = getLogger();
    validateVendorId(options.vendorId);
    const workers = options.workers ?? 0;
    if (workers > MAX_WORKERS) {
        throw new Error(`concurrency value ${workers} exceeds maximum allowed (${MAX_WORKERS})`);
    }

    const fingerprints = parseFingerprintList(options.fingerprints);
    const algorithm = resolveHashAlgorithm(fingerprints, options.hashAlgorithm);
    const uris = parseUriList(options.uris);
    if (fingerprints.length > 0 && fingerprints.length !== uris.length) {
        throw new Error(
            `number of fingerprints (${fingerprints.length}) doesn't match number of URLs (${uris.length})`
        );
    }
    if (uris.length > 1 && options.name) {
        logger.warn('Multiple URIs provided, ignoring -n flag (names will be deduced from certificate CN)');
    }

    const vendor = requireVendor(config, options.vendorId);

    const outcomes = await execute(workers, uris, async (index, uri): Promise<DownloadOutcome> => {
        try {
            const info = await fetchCertificate(uri, { client: options.client, signal: options.signal });
            const expected = fingerprints[index];
            if (expected) {
                validateFingerprintWithAlgorithm(info.der, expected.hex, expected.algorithm);
                return { uri, info, fingerprint: expected.hex };
            }
            if (uris.length === 1) {
                logger.warn(`No fingerprint provided, calculating ${algorithm.toUpperCase()} fingerprint automatically`);
            }
            return { uri, info, fingerprint: hash(info.der, algorithm) };
        } catch (error) {
            return { uri, error: error instanceof Error ? error : new Error(errorMessage(error)) };
        }
    });

    const result: AddCertificatesResult = { added: [], failures: [] };
    for (const outcome of outcomes) {
        if ('error' in outcome) {
            result.failures.push(outcome);
            continue;
        }

        let name = uris.length === 1 ? options.name ?? '' : '';
        if (!name) {
            name = outcome.info.commonName.trim();
            if (!name) {
                result.failures.push({
                    uri: outcome.uri,
                    error: new Error('certificate CN is empty, please provide a name with -n flag'),
                });
                continue;
            }
            if (uris.length === 1) {
                logger.warn(`No name provided, using certificate CN: ${name}`);
            }
        }

        try {
            checkCertificate(vendor.certificates, outcome.uri, outcome.info.der);
        } catch (error) {
            result.failures.push({ uri: outcome.uri, error: error instanceof Error ? error : new Error(errorMessage(error)) });
            continue;
        }

        const cert: Certificate = {
            name,
            uri: outcome.uri,
            validation: { fingerprint: newFingerprint(algorithm, outcome.fingerprint) },
        };
        vendor.certificates.push(cert);
        result.added.push(cert);
    }
    return result;
}

/**
 * Remove a certificate by name, compared case-insensitively.
 */
export function removeCertificate(config: TrustBundleConfig, vendorId: string, name: string): Certificate {
    const vendor = requireVendor(config, vendorId);
    const index = vendor.certificates.findIndex(cert => cert.name.toLowerCase() === name.toLowerCase());
    if (index < 0) {
        throw new Error(`certificate with name '${name}' not found in vendor '${vendorId}'`);
    }
    const [removed] = vendor.certificates.splice(index, 1);
    return removed;
}

export function addVendor(config: TrustBundleConfig, id: string, name: string): Vendor {
    validateVendorId(id);
    if (findVendor(config, id)) {
        throw new Error(`vendor with ID '${id}' already exists`);
    }
    const vendor: Vendor = { id, name, certificates: [] };
    config.vendors.push(vendor);
    return vendor;
}
