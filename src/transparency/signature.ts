// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { Bundle, bundleFromJSON } from '@sigstore/bundle';
import { ASN1Obj, X509Certificate } from '@sigstore/core';
import { TrustedRoot } from '@sigstore/protobuf-specs';
import { Verifier, toSignedEntity, toTrustMaterial } from '@sigstore/verify';
import { SignatureVerificationError, TransparencyLogMissingError, errorMessage } from '../utils/errors';
import { getLogger, LogCategory } from '../utils/logger';
import { CertificateIdentity } from './policy';
import { ProvenanceStatement, decodeStatement } from './statement';

/** Fulcio certificate extensions. */
export const FulcioOID = {
    IssuerV1: '1.3.6.1.4.1.57264.1.1',
    IssuerV2: '1.3.6.1.4.1.57264.1.8',
    BuildSignerURI: '1.3.6.1.4.1.57264.1.9',
    SourceRepositoryURI: '1.3.6.1.4.1.57264.1.12',
    SourceRepositoryDigest: '1.3.6.1.4.1.57264.1.13',
} as const;

export interface VerifiedSignature {
    identity: CertificateIdentity;
    /** Verified log timestamps, earliest first. */
    timestamps: Date[];
    /** Present for DSSE bundles carrying an in-toto statement. */
    statement?: ProvenanceStatement;
}

/**
 * Cryptographic verification of one Sigstore bundle. `artifact` is required
 * for message-signature bundles and ignored for DSSE envelopes.
 */
export interface SignatureVerifier {
    verify(bundleJSON: unknown, artifact?: Buffer): Promise<VerifiedSignature>;
}

/**
 * Verifies Sigstore bundles against a trusted root, requiring at least one
 * transparency log entry and one signed certificate timestamp.
 */
export class SigstoreSignatureVerifier implements SignatureVerifier {
    private readonly verifier: Verifier;

    constructor(trustedRoot: TrustedRoot) {
        this.verifier = new Verifier(toTrustMaterial(trustedRoot), { tlogThreshold: 1, ctlogThreshold: 1 });
    }

    async verify(bundleJSON: unknown, artifact?: Buffer): Promise<VerifiedSignature> {
        let bundle: Bundle;
        try {
            bundle = bundleFromJSON(bundleJSON);
        } catch (error) {
            throw new SignatureVerificationError(`invalid sigstore bundle: ${errorMessage(error)}`, { cause: error });
        }

        try {
            this.verifier.verify(toSignedEntity(bundle, artifact));
        } catch (error) {
            throw new SignatureVerificationError(`signature verification failed: ${errorMessage(error)}`, {
                cause: error,
            });
        }

        const der = leafCertificate(bundle);
        if (!der) {
            throw new SignatureVerificationError('bundle carries no signing certificate');
        }
        const identity = readIdentity(X509Certificate.parse(der));
        const timestamps = logTimestamps(bundle);
        getLogger().verboseIndent(
            LogCategory.VERIFY,
            `Signature verified for ${identity.subjectAlternativeName} (${timestamps.length} log entr${timestamps.length === 1 ? 'y' : 'ies'})`
        );

        const content = bundle.content;
        return {
            identity,
            timestamps,
            statement: content?.$case === 'dsseEnvelope' ? decodeStatement(content.dsseEnvelope.payload) : undefined,
        };
    }
}

function leafCertificate(bundle: Bundle): Buffer | undefined {
    const content = bundle.verificationMaterial.content;
    if (content?.$case === 'certificate') {
        return content.certificate.rawBytes;
    }
    if (content?.$case === 'x509CertificateChain') {
        return content.x509CertificateChain.certificates[0]?.rawBytes;
    }
    return undefined;
}

function logTimestamps(bundle: Bundle): Date[] {
    const timestamps = bundle.verificationMaterial.tlogEntries
        .map(entry => Number(entry.integratedTime))
        .filter(seconds => Number.isFinite(seconds) && seconds > 0)
        .map(seconds => new Date(seconds * 1000))
        .sort((a, b) => a.getTime() - b.getTime());
    if (timestamps.length === 0) {
        throw new TransparencyLogMissingError('no verified timestamps found in bundle');
    }
    return timestamps;
}

export function readIdentity(cert: X509Certificate): CertificateIdentity {
    return {
        subjectAlternativeName: cert.subjectAltName ?? '',
        issuer: derString(cert, FulcioOID.IssuerV2) || rawString(cert, FulcioOID.IssuerV1),
        buildSignerURI: derString(cert, FulcioOID.BuildSignerURI),
        sourceRepositoryURI: derString(cert, FulcioOID.SourceRepositoryURI),
        sourceRepositoryDigest: derString(cert, FulcioOID.SourceRepositoryDigest),
    };
}

/** Extensions from 1.3.6.1.4.1.57264.1.8 on hold a DER UTF8String. */
function derString(cert: X509Certificate, oid: string): string {
    const extension = cert.extension(oid);
    if (!extension) {
        return '';
    }
    return ASN1Obj.parseBuffer(extension.value).value.toString('utf8');
}

function rawString(cert: X509Certificate, oid: string): string {
    return cert.extension(oid)?.value.toString('utf8') ?? '';
}
