// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { DuplicateCertificateError } from '../utils/errors';
import { Certificate, certificatesEqual, getSourceLocation, validateFingerprint } from './model';

export function containsCertificate(certs: Certificate[], cert: Certificate): boolean {
    return certs.some(existing => certificatesEqual(existing, cert));
}

/**
 * Reject a candidate already present in `certs`, either by source location
 * (exact match) or by fingerprint of its DER bytes.
 */
export function checkCertificate(certs: Certificate[], uri: string, der: Uint8Array): void {
    if (certs.some(existing => getSourceLocation(existing) === uri)) {
        throw new DuplicateCertificateError('uri');
    }
    for (const existing of certs) {
        if (matchesFingerprint(der, existing)) {
            throw new DuplicateCertificateError('fingerprint', existing.name);
        }
    }
}

function matchesFingerprint(der: Uint8Array, cert: Certificate): boolean {
    try {
        validateFingerprint(der, cert.validation.fingerprint);
        return true;
    } catch {
        return false;
    }
}
