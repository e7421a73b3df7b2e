// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { isValidVendorId } from '../vendors/registry';
import { CertificateInfo, decodePemBlocks, fromDer } from '../x509/certificate';
import { BundleParseError, errorMessage } from '../utils/errors';
import {
    CERT_METADATA_PREFIX,
    GLOBAL_METADATA_PREFIX,
    MetadataKey,
    PEM_BEGIN_MARKER,
    PEM_END_MARKER,
} from './constants';

export type BundleCatalog = Map<string, CertificateInfo[]>;

/**
 * Split a bundle into its certificates, keyed by the `Owner` vendor ID of the
 * metadata block preceding each PEM block.
 */
export function parseBundle(data: string | Uint8Array): BundleCatalog {
    const text = typeof data === 'string' ? data : Buffer.from(data).toString('utf8');
    const catalog: BundleCatalog = new Map();
    const ownerPrefix = `${CERT_METADATA_PREFIX} ${MetadataKey.Owner}: `;

    let owner = '';
    let pem: string[] = [];
    let inPem = false;

    for (const line of text.split('\n')) {
        if (line.startsWith(GLOBAL_METADATA_PREFIX)) {
            continue;
        }
        if (line.startsWith(ownerPrefix)) {
            owner = line.slice(ownerPrefix.length).trim();
            if (!isValidVendorId(owner)) {
                throw new BundleParseError(
                    `invalid vendor ID in certificate metadata: invalid vendor ID "${owner}": not found in TCG TPM Vendor ID Registry`
                );
            }
            continue;
        }
        if (line.startsWith(CERT_METADATA_PREFIX)) {
            continue;
        }
        if (line.startsWith(PEM_BEGIN_MARKER)) {
            inPem = true;
            pem = [line];
            continue;
        }
        if (!inPem) {
            continue;
        }

        pem.push(line);
        if (line.startsWith(PEM_END_MARKER)) {
            inPem = false;
            const blocks = decodePemBlocks(pem.join('\n'));
            if (blocks.length === 0) {
                throw new BundleParseError('failed to decode PEM block');
            }
            let info: CertificateInfo;
            try {
                info = fromDer(blocks[0]);
            } catch (error) {
                throw new BundleParseError(`failed to parse certificate: ${errorMessage(error)}`, { cause: error });
            }
            if (!owner) {
                throw new BundleParseError('certificate found without owner metadata');
            }
            const certs = catalog.get(owner) ?? [];
            certs.push(info);
            catalog.set(owner, certs);
        }
    }

    if (catalog.size === 0) {
        throw new BundleParseError('no certificates found in bundle');
    }
    return catalog;
}

/**
 * Flatten a catalog, optionally keeping only some vendors.
 */
export function certificatesOf(catalog: BundleCatalog, vendorIds?: readonly string[]): CertificateInfo[] {
    const wanted = vendorIds && vendorIds.length > 0 ? new Set(vendorIds) : undefined;
    const out: CertificateInfo[] = [];
    for (const [vendorId, certs] of catalog) {
        if (!wanted || wanted.has(vendorId)) {
            out.push(...certs);
        }
    }
    return out;
}
