// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { createHash } from 'crypto';
import { FingerprintMismatchError } from '../utils/errors';

export type HashAlgorithm = 'sha1' | 'sha256' | 'sha384' | 'sha512';

/** Strongest first. */
export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['sha512', 'sha384', 'sha256', 'sha1'];

const CANONICAL_PATTERN = /^[0-9A-F]{2}(:[0-9A-F]{2})*$/;

export function isHashAlgorithm(value: string): value is HashAlgorithm {
    return HASH_ALGORITHMS.some(alg => alg === value);
}

/**
 * Hash `data` and return the digest in canonical form (`AA:BB:...`).
 */
export function hash(data: Uint8Array, algorithm: string): string {
    const alg = algorithm.toLowerCase();
    if (!isHashAlgorithm(alg)) {
        throw new Error(`unsupported hash algorithm: ${algorithm}`);
    }
    return toCanonical(createHash(alg).update(data).digest('hex'));
}

export function isCanonical(value: string): boolean {
    return CANONICAL_PATTERN.test(value);
}

/**
 * Normalises any common spelling of a fingerprint (lower case, no separators,
 * spaces) into the canonical form. The result is not validated.
 */
export function formatFingerprint(value: string): string {
    return toCanonical(value.replace(/[:\s]/g, ''));
}

/**
 * Lower-case hex without separators; the form digests are compared in.
 */
export function normalizeHex(value: string): string {
    return value.replace(/[:\s]/g, '').toLowerCase();
}

export interface ParsedFingerprint {
    algorithm: HashAlgorithm;
    hex: string;
}

/**
 * Parse a fingerprint written as `ALG:HEX`, e.g. `SHA256:ab:cd:...`.
 * The returned hex is canonical.
 */
export function parse(value: string): ParsedFingerprint {
    const separator = value.indexOf(':');
    if (separator < 0) {
        throw new Error('fingerprint must be in format HASH_ALG:HASH');
    }

    const algorithm = value.slice(0, separator).trim().toLowerCase().replace('-', '');
    if (!isHashAlgorithm(algorithm)) {
        throw new Error(
            `unsupported hash algorithm '${value.slice(0, separator)}', must be one of: sha1, sha256, sha384, sha512`
        );
    }

    const hex = formatFingerprint(value.slice(separator + 1));
    if (!isCanonical(hex)) {
        throw new Error(`invalid fingerprint value: ${value.slice(separator + 1)}`);
    }

    return { algorithm, hex };
}

export function validateFingerprintWithAlgorithm(data: Uint8Array, expected: string, algorithm: HashAlgorithm): void {
    const actual = createHash(algorithm).update(data).digest('hex');
    if (normalizeHex(expected) !== actual) {
        throw new FingerprintMismatchError(algorithm, formatFingerprint(expected), toCanonical(actual));
    }
}

function toCanonical(hex: string): string {
    const upper = hex.toUpperCase();
    const pairs: string[] = [];
    for (let i = 0; i < upper.length; i += 2) {
        pairs.push(upper.slice(i, i + 2));
    }
    return pairs.join(':');
}
