// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { URL } from 'url';
import {
    HashAlgorithm,
    hash,
    normalizeHex,
    validateFingerprintWithAlgorithm,
} from '../fingerprint/fingerprint';
import { ManifestInvariantError } from '../utils/errors';

export const DEFAULT_ROOTS_CONFIG = '.tpm-roots.yaml';
export const DEFAULT_INTERMEDIATES_CONFIG = '.tpm-intermediates.yaml';

/** Token replaced by the absolute manifest directory in `file://` URIs. */
export const REPO_PLACEHOLDER = '{repo}';

export interface Fingerprint {
    sha1?: string;
    sha256?: string;
    sha384?: string;
    sha512?: string;
}

export interface Certificate {
    name: string;
    /** Legacy source field; https only. */
    url?: string;
    uri?: string;
    validation: {
        fingerprint: Fingerprint;
    };
}

export interface Vendor {
    id: string;
    name: string;
    certificates: Certificate[];
}

export interface TrustBundleConfig {
    version: string;
    vendors: Vendor[];
}

export function getSourceLocation(cert: Certificate): string {
    return cert.uri || cert.url || '';
}

export function isRemoteSource(cert: Certificate): boolean {
    return getSourceLocation(cert).startsWith('https://');
}

/**
 * The strongest algorithm present, SHA-512 first.
 */
export function strongestFingerprint(fp: Fingerprint): { algorithm: HashAlgorithm; value: string } | undefined {
    if (fp.sha512) return { algorithm: 'sha512', value: fp.sha512 };
    if (fp.sha384) return { algorithm: 'sha384', value: fp.sha384 };
    if (fp.sha256) return { algorithm: 'sha256', value: fp.sha256 };
    if (fp.sha1) return { algorithm: 'sha1', value: fp.sha1 };
    return undefined;
}

export function fingerprintValues(fp: Fingerprint): string[] {
    return [fp.sha1, fp.sha256, fp.sha384, fp.sha512]
        .filter((value): value is string => Boolean(value))
        .map(normalizeHex);
}

/**
 * Build a fingerprint holding a single algorithm.
 */
export function newFingerprint(algorithm: HashAlgorithm, value: string): Fingerprint {
    return { [algorithm]: value };
}

export function fingerprintOf(data: Uint8Array, algorithm: HashAlgorithm): Fingerprint {
    return newFingerprint(algorithm, hash(data, algorithm));
}

/**
 * Validate certificate bytes against the strongest algorithm of a manifest entry.
 */
export function validateFingerprint(der: Uint8Array, fp: Fingerprint): void {
    const strongest = strongestFingerprint(fp);
    if (!strongest) {
        throw new Error('no fingerprint provided');
    }
    validateFingerprintWithAlgorithm(der, strongest.value, strongest.algorithm);
}

/**
 * Two entries describe the same certificate when they share a name, a source
 * location or their strongest fingerprint.
 */
export function certificatesEqual(a: Certificate, b: Certificate): boolean {
    if (a.name === b.name) {
        return true;
    }
    if (getSourceLocation(a) !== '' && getSourceLocation(a) === getSourceLocation(b)) {
        return true;
    }
    const fa = strongestFingerprint(a.validation.fingerprint);
    const fb = strongestFingerprint(b.validation.fingerprint);
    return Boolean(fa && fb && fa.algorithm === fb.algorithm && normalizeHex(fa.value) === normalizeHex(fb.value));
}

export function findVendor(config: TrustBundleConfig, id: string): Vendor | undefined {
    return config.vendors.find(vendor => vendor.id === id);
}

export function countCertificates(config: TrustBundleConfig): number {
    return config.vendors.reduce((total, vendor) => total + vendor.certificates.length, 0);
}

/**
 * Structural checks run on every load. Ordering, registry membership and
 * canonical spelling are left to the manifest validator.
 */
export function checkAndSetDefaults(config: TrustBundleConfig): void {
    if (!config.version) {
        throw new ManifestInvariantError("invalid input: 'version' cannot be empty", 'version');
    }
    if (config.vendors.length === 0) {
        throw new ManifestInvariantError('invalid input: at least one vendor is required', 'vendors');
    }

    config.vendors.forEach((vendor, vi) => {
        const vendorPath = `vendors[${vi}]`;
        if (!vendor.id) {
            throw new ManifestInvariantError(`vendor.name: ${vendor.name}: 'id' cannot be empty`, `${vendorPath}.id`);
        }
        if (!vendor.name) {
            throw new ManifestInvariantError(`vendor.id: ${vendor.id}: 'name' cannot be empty`, `${vendorPath}.name`);
        }

        vendor.certificates.forEach((cert, ci) => {
            const certPath = `${vendorPath}.certificates[${ci}]`;
            try {
                checkCertificate(cert);
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                throw new ManifestInvariantError(
                    `vendor.name: ${vendor.name}: certificate.name: ${cert.name}: ${reason}`,
                    certPath,
                );
            }
        });
    });
}

function checkCertificate(cert: Certificate): void {
    if (!cert.name) {
        throw new Error("'name' cannot be empty");
    }
    if (!cert.url && !cert.uri) {
        throw new Error("either 'url' or 'uri' must be set");
    }
    if (cert.url && cert.uri) {
        throw new Error("'url' and 'uri' are mutually exclusive");
    }
    if (cert.url && !cert.url.startsWith('https://')) {
        throw new Error(`'url' must use https scheme: ${cert.url}`);
    }
    if (cert.uri) {
        let parsed: URL;
        try {
            parsed = new URL(cert.uri);
        } catch {
            throw new Error(`invalid 'uri': ${cert.uri}`);
        }
        if (parsed.protocol !== 'https:' && parsed.protocol !== 'file:') {
            throw new Error(`'uri' scheme must be https or file, got '${parsed.protocol.replace(/:$/, '')}'`);
        }
    }
    if (!strongestFingerprint(cert.validation.fingerprint)) {
        throw new Error('at least one fingerprint (sha1, sha256, sha384 or sha512) is required');
    }
}
