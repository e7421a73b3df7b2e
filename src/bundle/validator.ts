// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { isCanonical } from '../fingerprint/fingerprint';
import { isValidVendorId } from '../vendors/registry';
import { CertificateInfo, decodePemBlocks, formatCertificateTime, fromDer } from '../x509/certificate';
import { BundleMetadataMismatchError, errorMessage } from '../utils/errors';
import {
    CERT_METADATA_PREFIX,
    GLOBAL_METADATA_PREFIX,
    MetadataKey,
    PEM_BEGIN_MARKER,
    PEM_END_MARKER,
    globalKey,
} from './constants';
import { validateCommit, validateDate } from './metadata';

export const DEFAULT_MAX_ERRORS = 10;

export interface BundleValidationError {
    line: number;
    message: string;
}

export interface BundleValidatorOptions {
    maxErrors?: number;
}

interface CertificateMetadata {
    certificate: string;
    owner: string;
    issuer: string;
    serialNumber: string;
    subject: string;
    notBefore: string;
    notAfter: string;
    sha256: string;
    sha1: string;
}

const REQUIRED_FIELDS: ReadonlyArray<[keyof CertificateMetadata, string]> = [
    ['certificate', MetadataKey.Certificate],
    ['owner', MetadataKey.Owner],
    ['issuer', MetadataKey.Issuer],
    ['serialNumber', MetadataKey.SerialNumber],
    ['subject', MetadataKey.Subject],
    ['notBefore', MetadataKey.NotValidBefore],
    ['notAfter', MetadataKey.NotValidAfter],
    ['sha256', MetadataKey.FingerprintSha256],
    ['sha1', MetadataKey.FingerprintSha1],
];

function emptyMetadata(): CertificateMetadata {
    return {
        certificate: '',
        owner: '',
        issuer: '',
        serialNumber: '',
        subject: '',
        notBefore: '',
        notAfter: '',
        sha256: '',
        sha1: '',
    };
}

/**
 * Line-oriented checker of the bundle format: header fields, metadata blocks,
 * and the agreement of each block with the certificate that follows it.
 */
export class BundleValidator {
    private errors: BundleValidationError[] = [];
    private readonly maxErrors: number;

    constructor(options: BundleValidatorOptions = {}) {
        this.maxErrors = options.maxErrors ?? DEFAULT_MAX_ERRORS;
    }

    validate(data: string | Uint8Array): BundleValidationError[] {
        this.errors = [];
        const text = typeof data === 'string' ? data : Buffer.from(data).toString('utf8');
        const lines = text.split('\n');
        if (lines.length > 0 && lines[lines.length - 1] === '') {
            lines.pop();
        }

        let inGlobal = false;
        let foundDate = false;
        let foundCommit = false;
        let inCertMetadata = false;
        let metadata: CertificateMetadata | undefined;
        let certStartLine = 0;
        let pem: string[] = [];
        let inPem = false;
        let pemStartLine = 0;
        let lineNum = 0;

        for (const line of lines) {
            lineNum++;

            if (lineNum === 1) {
                if (line !== GLOBAL_METADATA_PREFIX) {
                    this.addError(lineNum, `bundle must start with global metadata block marker '${GLOBAL_METADATA_PREFIX}'`);
                }
                inGlobal = true;
                continue;
            }

            if (inGlobal) {
                if (!line.startsWith(GLOBAL_METADATA_PREFIX)) {
                    inGlobal = false;
                    this.checkGlobalFields(lineNum, foundDate, foundCommit);
                } else {
                    if (line.startsWith(globalKey(MetadataKey.Date))) {
                        foundDate = true;
                        this.check(lineNum, 'invalid date format', () =>
                            validateDate(line.slice(globalKey(MetadataKey.Date).length).trim())
                        );
                    }
                    if (line.startsWith(globalKey(MetadataKey.Commit))) {
                        foundCommit = true;
                        this.check(lineNum, 'invalid commit hash', () =>
                            validateCommit(line.slice(globalKey(MetadataKey.Commit).length).trim())
                        );
                    }
                    continue;
                }
            }

            if (line === '' && !inPem) {
                continue;
            }

            if (line === CERT_METADATA_PREFIX && !inCertMetadata && !inPem) {
                inCertMetadata = true;
                metadata = emptyMetadata();
                certStartLine = lineNum;
                continue;
            }

            if (inCertMetadata && metadata && line.startsWith(CERT_METADATA_PREFIX)) {
                if (line !== CERT_METADATA_PREFIX) {
                    this.readMetadataField(lineNum, line.slice(CERT_METADATA_PREFIX.length + 1), metadata);
                }
                continue;
            }

            if (line.startsWith(PEM_BEGIN_MARKER)) {
                if (!metadata) {
                    this.addError(lineNum, 'certificate found without metadata block');
                    continue;
                }
                inCertMetadata = false;
                inPem = true;
                pemStartLine = lineNum;
                pem = [line];
                this.checkRequiredFields(metadata, certStartLine);
                continue;
            }

            if (inPem && metadata) {
                pem.push(line);
                if (line.startsWith(PEM_END_MARKER)) {
                    inPem = false;
                    const cert = this.decode(pem, pemStartLine);
                    if (cert) {
                        this.checkConsistency(cert, metadata, certStartLine);
                    }
                    metadata = undefined;
                }
            }
        }

        if (inGlobal) {
            this.checkGlobalFields(lineNum, foundDate, foundCommit);
        }

        return this.errors;
    }

    private addError(line: number, message: string): void {
        if (this.errors.length < this.maxErrors) {
            this.errors.push({ line, message });
        }
    }

    private check(line: number, context: string, fn: () => void): void {
        try {
            fn();
        } catch (error) {
            this.addError(line, `${context}: ${errorMessage(error)}`);
        }
    }

    private checkGlobalFields(line: number, foundDate: boolean, foundCommit: boolean): void {
        if (!foundDate) {
            this.addError(line, `global metadata missing required '${MetadataKey.Date}' field`);
        }
        if (!foundCommit) {
            this.addError(line, `global metadata missing required '${MetadataKey.Commit}' field`);
        }
    }

    private readMetadataField(lineNum: number, field: string, metadata: CertificateMetadata): void {
        let key: string;
        let value: string;

        // Only "Not Valid After" carries a space before its colon.
        if (field.includes(' : ')) {
            const at = field.indexOf(' : ');
            key = field.slice(0, at).trim();
            value = field.slice(at + 3);
            if (key !== MetadataKey.NotValidAfter) {
                this.addError(lineNum, `invalid metadata format: unexpected space before colon in ${JSON.stringify(field)}`);
                return;
            }
        } else {
            const at = field.indexOf(': ');
            if (at < 0) {
                this.addError(lineNum, `invalid metadata format: expected 'Key: Value', got ${JSON.stringify(field)}`);
                return;
            }
            key = field.slice(0, at);
            value = field.slice(at + 2);
        }

        switch (key) {
            case MetadataKey.Certificate:
                metadata.certificate = value;
                break;
            case MetadataKey.Owner:
                metadata.owner = value;
                if (!isValidVendorId(value)) {
                    this.addError(
                        lineNum,
                        `invalid vendor ID: invalid vendor ID "${value}": not found in TCG TPM Vendor ID Registry`
                    );
                }
                break;
            case MetadataKey.Issuer:
                metadata.issuer = value;
                break;
            case MetadataKey.SerialNumber:
                metadata.serialNumber = value;
                break;
            case MetadataKey.Subject:
                metadata.subject = value;
                break;
            case MetadataKey.NotValidBefore:
                metadata.notBefore = value;
                break;
            case MetadataKey.NotValidAfter:
                metadata.notAfter = value;
                break;
            case MetadataKey.FingerprintSha256:
                metadata.sha256 = value;
                this.checkFingerprintFormat(lineNum, 'SHA-256', value, 32);
                break;
            case MetadataKey.FingerprintSha1:
                metadata.sha1 = value;
                this.checkFingerprintFormat(lineNum, 'SHA1', value, 20);
                break;
        }
    }

    private checkFingerprintFormat(line: number, label: string, value: string, octets: number): void {
        const parts = value.split(':').length;
        if (parts !== octets) {
            this.addError(line, `invalid ${label} fingerprint: expected ${octets} colon-separated parts, got ${parts}`);
        } else if (!isCanonical(value)) {
            this.addError(line, `invalid ${label} fingerprint: expected uppercase hexadecimal with colon separators`);
        }
    }

    private checkRequiredFields(metadata: CertificateMetadata, line: number): void {
        for (const [field, key] of REQUIRED_FIELDS) {
            if (!metadata[field]) {
                this.addError(line, `certificate metadata missing required '${key}' field`);
            }
        }
    }

    private decode(pem: string[], line: number): CertificateInfo | undefined {
        const blocks = decodePemBlocks(pem.join('\n'));
        if (blocks.length === 0) {
            this.addError(line, 'failed to decode PEM block');
            return undefined;
        }
        try {
            return fromDer(blocks[0]);
        } catch (error) {
            this.addError(line, `failed to parse certificate: ${errorMessage(error)}`);
            return undefined;
        }
    }

    private checkConsistency(cert: CertificateInfo, metadata: CertificateMetadata, line: number): void {
        const expectations: Array<[string, string, string]> = [
            ['subject', metadata.subject, cert.subject],
            ['issuer', metadata.issuer, cert.issuer],
        ];
        if (metadata.sha256) expectations.push(['SHA-256 fingerprint', metadata.sha256, cert.sha256]);
        if (metadata.sha1) expectations.push(['SHA1 fingerprint', metadata.sha1, cert.sha1]);
        expectations.push(
            ['not valid before', metadata.notBefore, formatCertificateTime(cert.notBefore)],
            ['not valid after', metadata.notAfter, formatCertificateTime(cert.notAfter)],
            ['serial number', metadata.serialNumber, cert.serialNumber]
        );

        for (const [label, declared, actual] of expectations) {
            if (declared !== actual) {
                this.addError(
                    line,
                    `${label} mismatch: metadata has ${JSON.stringify(declared)}, certificate has ${JSON.stringify(actual)}`
                );
            }
        }
    }
}

export function validateBundle(data: string | Uint8Array, options: BundleValidatorOptions = {}): BundleValidationError[] {
    return new BundleValidator(options).validate(data);
}

/**
 * Throw the first problem found as a {@link BundleMetadataMismatchError}
 * carrying its line number.
 */
export function assertValidBundle(data: string | Uint8Array): void {
    const [first] = validateBundle(data, { maxErrors: 1 });
    if (first) {
        throw new BundleMetadataMismatchError(`line ${first.line}: ${first.message}`, first.line);
    }
}
