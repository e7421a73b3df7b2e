// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { createHash } from 'crypto';
import { SignatureVerificationError } from '../utils/errors';

/**
 * Parse a `sha256sum` style file: `<hex>  <filename>` per line.
 */
export function parseChecksums(text: string): Map<string, string> {
    const entries = new Map<string, string>();
    for (const raw of text.split('\n')) {
        const line = raw.trim();
        if (!line) {
            continue;
        }
        const match = /^([0-9a-fA-F]+)\s+\*?(.+)$/.exec(line);
        if (match) {
            entries.set(match[2].trim(), match[1].toLowerCase());
        }
    }
    return entries;
}

export function sha256Hex(data: Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
}

/**
 * Returns the digest recorded for `filename` once it has been checked against
 * `data`.
 */
export function verifyChecksum(checksums: string, filename: string, data: Uint8Array): string {
    const expected = parseChecksums(checksums).get(filename);
    if (!expected) {
        throw new SignatureVerificationError(`artifact ${filename} not found in checksums file`);
    }
    const actual = sha256Hex(data);
    if (actual !== expected) {
        throw new SignatureVerificationError(`checksum mismatch for ${filename}: expected ${expected}, got ${actual}`);
    }
    return actual;
}

export function listsArtifact(checksums: string, filename: string): boolean {
    return parseChecksums(checksums).has(filename);
}
