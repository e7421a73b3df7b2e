// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

export const ROOT_BUNDLE_FILENAME = 'tpm-ca-certificates.pem';
export const INTERMEDIATE_BUNDLE_FILENAME = 'tpm-intermediate-ca-certificates.pem';
export const CHECKSUMS_FILENAME = 'checksums.txt';
export const CHECKSUMS_SIGNATURE_FILENAME = 'checksums.txt.sigstore.json';

export type BundleType = 'root' | 'intermediate';

export const BUNDLE_TYPES: readonly BundleType[] = ['root', 'intermediate'];

export function isBundleType(value: string): value is BundleType {
    return BUNDLE_TYPES.some(type => type === value);
}

export function parseBundleType(value: string): BundleType {
    if (!isBundleType(value)) {
        throw new Error(`invalid bundle type "${value}": must be one of [root, intermediate]`);
    }
    return value;
}

export function defaultFilename(type: BundleType): string {
    return type === 'intermediate' ? INTERMEDIATE_BUNDLE_FILENAME : ROOT_BUNDLE_FILENAME;
}

/** Human description used in the bundle header. */
export function describeBundleType(type: BundleType): string {
    return type === 'intermediate'
        ? 'TPM Intermediate Endorsement Certificates'
        : 'TPM Root Endorsement Certificates';
}

export const GLOBAL_METADATA_PREFIX = '##';
export const CERT_METADATA_PREFIX = '#';
export const PEM_BEGIN_MARKER = '-----BEGIN CERTIFICATE-----';
export const PEM_END_MARKER = '-----END CERTIFICATE-----';

export const MetadataKey = {
    Date: 'Date',
    Commit: 'Commit',
    Certificate: 'Certificate',
    Owner: 'Owner',
    Issuer: 'Issuer',
    SerialNumber: 'Serial Number',
    Subject: 'Subject',
    NotValidBefore: 'Not Valid Before',
    NotValidAfter: 'Not Valid After',
    FingerprintSha256: 'Fingerprint (SHA-256)',
    FingerprintSha1: 'Fingerprint (SHA1)',
} as const;

export type MetadataKey = (typeof MetadataKey)[keyof typeof MetadataKey];

/** `## Date: ` */
export function globalKey(key: MetadataKey): string {
    return `${GLOBAL_METADATA_PREFIX} ${key}: `;
}
