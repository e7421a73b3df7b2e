// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { X509Certificate } from 'crypto';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { TrustedRoot } from '@sigstore/protobuf-specs';
import { getTrustedRoot } from '@sigstore/tuf';
import { errorMessage, wrapError } from '../utils/errors';
import { getLogger, LogCategory } from '../utils/logger';

export const PUBLIC_GOOD_ISSUER_ORG = 'sigstore.dev';
export const DEFAULT_TUF_MIRROR = 'https://tuf-repo-cdn.sigstore.dev';

export interface TrustedRootOptions {
    /** Custom trusted-root JSON; skips TUF entirely. */
    trustedRoot?: Uint8Array | string;
    tufCachePath?: string;
    /** Keep TUF metadata in a throwaway directory. */
    disableLocalCache?: boolean;
    /** Use the cached TUF metadata without refreshing it. */
    offline?: boolean;
    mirrorURL?: string;
}

/**
 * Parse a trusted-root JSON document. Every Fulcio authority must be issued by
 * the public-good organisation.
 */
export function loadTrustedRoot(json: Uint8Array | string): TrustedRoot {
    let raw: unknown;
    try {
        raw = JSON.parse(typeof json === 'string' ? json : Buffer.from(json).toString('utf8'));
    } catch (error) {
        throw wrapError('failed to parse trusted root JSON', error);
    }

    const root = TrustedRoot.fromJSON(raw);
    for (const authority of root.certificateAuthorities) {
        const lowest = authority.certChain?.certificates[0];
        if (!lowest) {
            throw new Error('certificate authority had no certificates');
        }
        const organisation = organisationOf(new X509Certificate(lowest.rawBytes).issuer);
        if (!organisation) {
            throw new Error('certificate authority has no issuer organization');
        }
        if (organisation !== PUBLIC_GOOD_ISSUER_ORG) {
            throw new Error(`untrusted issuer organization: ${organisation} (expected ${PUBLIC_GOOD_ISSUER_ORG})`);
        }
    }
    return root;
}

/**
 * Resolve the trusted root: a custom document when given, otherwise the
 * public-good root refreshed through TUF.
 */
export async function resolveTrustedRoot(options: TrustedRootOptions = {}): Promise<TrustedRoot> {
    const logger = getLogger();
    if (options.trustedRoot && options.trustedRoot.length > 0) {
        logger.verbose(LogCategory.VERIFY, 'Using custom trusted root');
        try {
            return loadTrustedRoot(options.trustedRoot);
        } catch (error) {
            throw wrapError('failed to load custom trusted root', error);
        }
    }

    const scratch = options.disableLocalCache ? mkdtempSync(join(tmpdir(), 'tpmtb-tuf-')) : undefined;
    const cachePath = scratch ?? options.tufCachePath;
    logger.verbose(LogCategory.VERIFY, `Fetching trusted root via TUF (cache: ${cachePath ?? 'default'})`);
    try {
        return await getTrustedRoot({
            cachePath,
            mirrorURL: options.mirrorURL ?? DEFAULT_TUF_MIRROR,
            forceCache: options.offline === true,
        });
    } catch (error) {
        throw new Error(`failed to fetch trusted root: ${errorMessage(error)}`, { cause: error });
    } finally {
        if (scratch) {
            rmSync(scratch, { recursive: true, force: true });
        }
    }
}

function organisationOf(name: string): string | undefined {
    const entry = name.split('\n').find(part => part.startsWith('O='));
    return entry?.slice(2);
}
