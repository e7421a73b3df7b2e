// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as fs from 'fs';
import { URL } from 'url';
import { Document, ToStringOptions } from 'yaml';
import { formatFingerprint } from '../fingerprint/fingerprint';
import { wrapError } from '../utils/errors';
import { Certificate, Fingerprint, TrustBundleConfig, checkAndSetDefaults } from './model';
import { createPlaceholders, parseConfig } from './parse';

export const DOCUMENT_MARKER = '---';

const STRINGIFY_OPTIONS: ToStringOptions = {
    defaultStringType: 'QUOTE_DOUBLE',
    defaultKeyType: 'PLAIN',
    lineWidth: 0,
};

/**
 * Byte order, as the canonical form requires.
 */
export function compareBytes(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Canonical serialisation of a manifest. When `baseDir` is given, `file://`
 * URIs under it are rewritten with the `{repo}` placeholder.
 */
export function formatConfig(config: TrustBundleConfig, baseDir?: string): string {
    const canonical = canonicalize(config);
    if (baseDir !== undefined) {
        createPlaceholders(canonical, baseDir);
    }

    const doc = new Document({
        version: canonical.version,
        vendors: canonical.vendors.map(vendor => ({
            id: vendor.id,
            name: vendor.name,
            certificates: vendor.certificates.map(toPlainCertificate),
        })),
    });

    return ensureDocumentMarker(doc.toString(STRINGIFY_OPTIONS));
}

/**
 * Format manifest text without resolving placeholders, so what is already on
 * disk round-trips untouched.
 */
export function formatContent(text: string): string {
    const config = parseConfig(text);
    checkAndSetDefaults(config);
    return formatConfig(config);
}

export function formatFile(inputPath: string, outputPath: string = inputPath): void {
    const formatted = formatContent(readManifest(inputPath));
    try {
        fs.writeFileSync(outputPath, formatted, { mode: 0o644 });
    } catch (error) {
        throw wrapError('failed to write output file', error);
    }
}

export function needsFormatting(inputPath: string): boolean {
    const original = readManifest(inputPath);
    return formatContent(original) !== original;
}

/**
 * Sorted copy with canonical fingerprints and re-encoded URLs.
 */
export function canonicalize(config: TrustBundleConfig): TrustBundleConfig {
    const vendors = config.vendors
        .map(vendor => ({
            id: vendor.id,
            name: vendor.name,
            certificates: vendor.certificates
                .map(canonicalCertificate)
                .sort((a, b) => compareBytes(a.name, b.name)),
        }))
        .sort((a, b) => compareBytes(a.id, b.id));

    return { version: config.version, vendors };
}

export function encodeUrl(raw: string): string {
    try {
        return new URL(raw).href;
    } catch {
        return raw;
    }
}

/**
 * Only https URIs are re-encoded; file URIs may carry the `{repo}` token.
 */
export function encodeUri(raw: string): string {
    return raw.startsWith('https://') ? encodeUrl(raw) : raw;
}

function canonicalCertificate(cert: Certificate): Certificate {
    const fingerprint: Fingerprint = {};
    for (const alg of ['sha1', 'sha256', 'sha384', 'sha512'] as const) {
        const value = cert.validation.fingerprint[alg];
        if (value) {
            fingerprint[alg] = formatFingerprint(value);
        }
    }

    const out: Certificate = { name: cert.name, validation: { fingerprint } };
    if (cert.url) out.url = encodeUrl(cert.url);
    if (cert.uri) out.uri = encodeUri(cert.uri);
    return out;
}

function toPlainCertificate(cert: Certificate): Record<string, unknown> {
    const plain: Record<string, unknown> = { name: cert.name };
    if (cert.url) plain.url = cert.url;
    if (cert.uri) plain.uri = cert.uri;
    plain.validation = { fingerprint: { ...cert.validation.fingerprint } };
    return plain;
}

function ensureDocumentMarker(text: string): string {
    if (text.split('\n')[0] === DOCUMENT_MARKER) {
        return text;
    }
    return `${DOCUMENT_MARKER}\n${text}`;
}

function readManifest(inputPath: string): string {
    try {
        return fs.readFileSync(inputPath, 'utf8');
    } catch (error) {
        throw wrapError('failed to read config file', error);
    }
}
