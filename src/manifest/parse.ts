// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as path from 'path';
import { parse } from 'yaml';
import { ManifestParseError } from '../utils/errors';
import { Certificate, Fingerprint, REPO_PLACEHOLDER, TrustBundleConfig, Vendor } from './model';

const FILE_SCHEME = 'file://';

export function parseConfig(text: string): TrustBundleConfig {
    let raw: unknown;
    try {
        raw = parse(text);
    } catch (error) {
        throw new ManifestParseError(`failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`, {
            cause: error,
        });
    }
    return decodeConfig(raw);
}

export function resolvePlaceholders(config: TrustBundleConfig, baseDir: string): void {
    const absDir = path.resolve(baseDir);
    transformFileUris(config, p => replacePathPrefix(p, `/${REPO_PLACEHOLDER}`, absDir));
}

export function createPlaceholders(config: TrustBundleConfig, baseDir: string): void {
    const absDir = path.resolve(baseDir);
    transformFileUris(config, p => replacePathPrefix(p, absDir, `/${REPO_PLACEHOLDER}`));
}

/** Swap `prefix` for `replacement` when it is a whole leading path, so `/repo` never matches `/repo2`. */
function replacePathPrefix(filePath: string, prefix: string, replacement: string): string {
    if (filePath === prefix) {
        return replacement;
    }
    if (filePath.startsWith(`${prefix}/`)) {
        return replacement + filePath.slice(prefix.length);
    }
    return filePath;
}

function transformFileUris(config: TrustBundleConfig, transform: (filePath: string) => string): void {
    for (const vendor of config.vendors) {
        for (const cert of vendor.certificates) {
            if (cert.uri && cert.uri.startsWith(FILE_SCHEME)) {
                cert.uri = FILE_SCHEME + transform(cert.uri.slice(FILE_SCHEME.length));
            }
        }
    }
}

function decodeConfig(raw: unknown): TrustBundleConfig {
    if (!isRecord(raw)) {
        throw new ManifestParseError('failed to parse YAML: document is not a mapping');
    }
    const vendors = raw.vendors ?? [];
    if (!Array.isArray(vendors)) {
        throw new ManifestParseError("failed to parse YAML: 'vendors' must be a list");
    }
    return {
        version: scalar(raw.version),
        vendors: vendors.map((v, i) => decodeVendor(v, `vendors[${i}]`)),
    };
}

function decodeVendor(raw: unknown, at: string): Vendor {
    if (!isRecord(raw)) {
        throw new ManifestParseError(`failed to parse YAML: ${at} is not a mapping`);
    }
    const certificates = raw.certificates ?? [];
    if (!Array.isArray(certificates)) {
        throw new ManifestParseError(`failed to parse YAML: ${at}.certificates must be a list`);
    }
    return {
        id: scalar(raw.id),
        name: scalar(raw.name),
        certificates: certificates.map((c, i) => decodeCertificate(c, `${at}.certificates[${i}]`)),
    };
}

function decodeCertificate(raw: unknown, at: string): Certificate {
    if (!isRecord(raw)) {
        throw new ManifestParseError(`failed to parse YAML: ${at} is not a mapping`);
    }
    const validation = isRecord(raw.validation) ? raw.validation : {};
    const fp = isRecord(validation.fingerprint) ? validation.fingerprint : {};

    const fingerprint: Fingerprint = {};
    for (const alg of ['sha1', 'sha256', 'sha384', 'sha512'] as const) {
        const value = scalar(fp[alg]);
        if (value) {
            fingerprint[alg] = value;
        }
    }

    const cert: Certificate = { name: scalar(raw.name), validation: { fingerprint } };
    const url = scalar(raw.url);
    const uri = scalar(raw.uri);
    if (url) cert.url = url;
    if (uri) cert.uri = uri;
    return cert;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalar(value: unknown): string {
    if (value === undefined || value === null) {
        return '';
    }
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    throw new ManifestParseError(`failed to parse YAML: expected a scalar, got ${typeof value}`);
}
