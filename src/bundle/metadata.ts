// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { BundleParseError } from '../utils/errors';
import { BundleType, GLOBAL_METADATA_PREFIX, MetadataKey, globalKey } from './constants';

export interface BundleMetadata {
    date: string;
    commit: string;
    type: BundleType;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const COMMIT_PATTERN = /^[0-9a-f]{40}$/;

/**
 * Read the `##` header of a bundle. Parsing stops at the first line that is
 * not part of the header.
 */
export function parseMetadata(data: string | Uint8Array): BundleMetadata {
    const text = typeof data === 'string' ? data : Buffer.from(data).toString('utf8');
    let date = '';
    let commit = '';
    let type: BundleType = 'root';

    for (const line of text.split('\n')) {
        if (!line.startsWith(GLOBAL_METADATA_PREFIX)) {
            break;
        }
        if (line.startsWith(globalKey(MetadataKey.Date))) {
            date = line.slice(globalKey(MetadataKey.Date).length).trim();
        } else if (line.startsWith(globalKey(MetadataKey.Commit))) {
            commit = line.slice(globalKey(MetadataKey.Commit).length).trim();
        } else if (line.includes('Intermediate Endorsement Certificates')) {
            type = 'intermediate';
        }
    }

    if (!date) {
        throw new BundleParseError("bundle does not contain required 'Date' metadata in header");
    }
    if (!commit) {
        throw new BundleParseError("bundle does not contain required 'Commit' metadata in header");
    }
    return { date, commit, type };
}

/**
 * `YYYY-MM-DD` naming a real calendar day.
 */
export function validateDate(date: string): void {
    if (!DATE_PATTERN.test(date)) {
        throw new Error(`date must be in YYYY-MM-DD format, got: ${date}`);
    }
    const [year, month, day] = date.split('-').map(Number);
    const parsed = new Date(Date.UTC(year, month - 1, day));
    if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
        throw new Error(`invalid date: ${date}`);
    }
}

/**
 * 40 lower-case hex characters.
 */
export function validateCommit(commit: string): void {
    if (commit.length !== 40) {
        throw new Error(`commit must be a 40-character hex string, got ${commit.length} characters: ${commit}`);
    }
    if (!COMMIT_PATTERN.test(commit)) {
        throw new Error(`commit must be a 40-character hex string, got: ${commit}`);
    }
}
