// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

export type ErrorKind =
    | 'ManifestParseError'
    | 'ManifestInvariantError'
    | 'FetchError'
    | 'FingerprintMismatch'
    | 'DuplicateCertificate'
    | 'BundleParseError'
    | 'BundleMetadataMismatch'
    | 'SignatureVerificationFailed'
    | 'AttestationPolicyFailed'
    | 'TransparencyLogMissing'
    | 'CertificateIdentityMismatch'
    | 'BundleVerificationFailed'
    | 'CacheCorrupt'
    | 'CacheStale'
    | 'OfflineAndEmpty'
    | 'CancelledOrTimedOut';

/**
 * Base class of every error raised by tpmtb. The `kind` survives wrapping, so
 * callers can test for a sentinel with {@link isErrorKind} whatever the depth.
 */
export class TpmtbError extends Error {
    readonly kind: ErrorKind;

    constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = kind;
        this.kind = kind;
    }
}

export class ManifestParseError extends TpmtbError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('ManifestParseError', message, options);
    }
}

export class ManifestInvariantError extends TpmtbError {
    readonly path: string;
    readonly line?: number;

    constructor(message: string, path: string = '', line?: number) {
        super('ManifestInvariantError', message);
        this.path = path;
        this.line = line;
    }
}

export class FetchError extends TpmtbError {
    readonly url: string;
    readonly status?: number;

    constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
        super('FetchError', message, options);
        this.url = url;
        this.status = status;
    }
}

export class FingerprintMismatchError extends TpmtbError {
    readonly expected: string;
    readonly actual: string;
    readonly algorithm: string;

    constructor(algorithm: string, expected: string, actual: string) {
        super('FingerprintMismatch', `fingerprint mismatch: expected ${expected}, got ${actual}`);
        this.algorithm = algorithm;
        this.expected = expected;
        this.actual = actual;
    }
}

export class DuplicateCertificateError extends TpmtbError {
    readonly duplicateType: 'uri' | 'fingerprint';
    readonly existingName?: string;

    constructor(duplicateType: 'uri' | 'fingerprint', existingName?: string) {
        super(
            'DuplicateCertificate',
            duplicateType === 'uri'
                ? 'certificate already exists (duplicate URI)'
                : `certificate already exists (duplicate fingerprint, matches '${existingName ?? ''}')`
        );
        this.duplicateType = duplicateType;
        this.existingName = existingName;
    }
}

export class BundleParseError extends TpmtbError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('BundleParseError', message, options);
    }
}

export class BundleMetadataMismatchError extends TpmtbError {
    readonly line: number;

    constructor(message: string, line: number) {
        super('BundleMetadataMismatch', message);
        this.line = line;
    }
}

export class SignatureVerificationError extends TpmtbError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('SignatureVerificationFailed', message, options);
    }
}

export class AttestationPolicyError extends TpmtbError {
    constructor(message: string) {
        super('AttestationPolicyFailed', message);
    }
}

export class TransparencyLogMissingError extends TpmtbError {
    constructor(message: string) {
        super('TransparencyLogMissing', message);
    }
}

export class CertificateIdentityMismatchError extends TpmtbError {
    constructor(message: string) {
        super('CertificateIdentityMismatch', message);
    }
}

export class BundleVerificationFailedError extends TpmtbError {
    constructor(reason: string, options?: { cause?: unknown }) {
        super('BundleVerificationFailed', `trusted bundle verification failed: ${reason}`, options);
    }
}

export class CacheCorruptError extends TpmtbError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CacheCorrupt', message, options);
    }
}

export class CacheStaleError extends TpmtbError {
    constructor(message: string) {
        super('CacheStale', message);
    }
}

export class OfflineAndEmptyError extends TpmtbError {
    constructor(cachePath: string) {
        super('OfflineAndEmpty', `offline mode: no cached bundle found in ${cachePath}`);
    }
}

export class CancelledError extends TpmtbError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CancelledOrTimedOut', message, options);
    }
}

/**
 * Walks the `cause` chain looking for an error of the given kind.
 */
export function isErrorKind(error: unknown, kind: ErrorKind): boolean {
    let current: unknown = error;
    while (current instanceof Error) {
        if (current instanceof TpmtbError && current.kind === kind) {
            return true;
        }
        current = current.cause;
    }
    return false;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Prefixes an error with caller context, keeping the original as `cause`.
 * The wrapped error keeps the kind of a TpmtbError so sentinels stay visible.
 */
export function wrapError(context: string, error: unknown): Error {
    const message = `${context}: ${errorMessage(error)}`;
    if (error instanceof TpmtbError) {
        return new TpmtbError(error.kind, message, { cause: error });
    }
    return new Error(message, { cause: error });
}
