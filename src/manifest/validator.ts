// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as fs from 'fs';
import { URL } from 'url';
import { LineCounter, isMap, isNode, isScalar, isSeq, parseDocument } from 'yaml';
import { isCanonical } from '../fingerprint/fingerprint';
import { isValidVendorId } from '../vendors/registry';
import { wrapError } from '../utils/errors';
import { TrustBundleConfig, checkAndSetDefaults } from './model';
import { parseConfig } from './parse';
import { DOCUMENT_MARKER } from './formatter';
import { containsCertificate } from './duplicates';

export const DEFAULT_MAX_ERRORS = 10;

export interface ValidationIssue {
    line: number;
    message: string;
}

export interface ManifestValidatorOptions {
    maxErrors?: number;
}

/**
 * Checks that a manifest is in canonical form. Errors are collected, not
 * thrown, up to `maxErrors`; a manifest that cannot be loaded at all throws.
 */
export class ManifestValidator {
    private errors: ValidationIssue[] = [];
    private readonly maxErrors: number;
    private readonly lineMapping = new Map<string, number>();
    private lineCounter = new LineCounter();

    constructor(options: ManifestValidatorOptions = {}) {
        this.maxErrors = options.maxErrors ?? DEFAULT_MAX_ERRORS;
    }

    validateFile(path: string): ValidationIssue[] {
        let text: string;
        try {
            text = fs.readFileSync(path, 'utf8');
        } catch (error) {
            throw wrapError('failed to read file', error);
        }
        return this.validate(text);
    }

    validate(text: string): ValidationIssue[] {
        this.errors = [];
        this.lineMapping.clear();
        this.lineCounter = new LineCounter();

        this.validateDocumentMarker(text);

        let config: TrustBundleConfig;
        try {
            config = parseConfig(text);
            checkAndSetDefaults(config);
        } catch (error) {
            throw wrapError('failed to load config', error);
        }

        const doc = parseDocument(text, { lineCounter: this.lineCounter });
        this.walk(doc.contents, '');

        this.validateVendorIds(config);
        this.validateDuplicateVendorIds(config);
        this.validateVendorsSorting(config);
        this.validateCertificatesSorting(config);
        this.validateDuplicateCertificates(config);
        this.validateUrls(config);
        this.validateFingerprintFormat(config);
        this.validateQuotes(doc.contents, '');

        return this.errors;
    }

    private validateDocumentMarker(text: string): void {
        if (text.split('\n')[0] !== DOCUMENT_MARKER) {
            this.push(1, `file must start with YAML document marker '${DOCUMENT_MARKER}' on the first line`);
        }
    }

    /**
     * Record the line of every key and sequence item under its dotted path,
     * e.g. `vendors[0].certificates[1].name`.
     */
    private walk(node: unknown, path: string): void {
        if (!isMap(node)) {
            return;
        }
        for (const pair of node.items) {
            if (!isScalar(pair.key)) {
                continue;
            }
            const keyPath = path ? `${path}.${String(pair.key.value)}` : String(pair.key.value);
            this.lineMapping.set(keyPath, this.lineOf(pair.key));

            if (isSeq(pair.value)) {
                pair.value.items.forEach((item, index) => {
                    const itemPath = `${keyPath}[${index}]`;
                    this.lineMapping.set(itemPath, this.lineOf(item));
                    this.walk(item, itemPath);
                });
            } else {
                this.walk(pair.value, keyPath);
            }
        }
    }

    private lineOf(node: unknown): number {
        if (isNode(node) && node.range) {
            return this.lineCounter.linePos(node.range[0]).line;
        }
        return 0;
    }

    private addError(path: string, message: string): void {
        this.push(this.lineMapping.get(path) || 1, message);
    }

    private push(line: number, message: string): void {
        if (this.errors.length < this.maxErrors) {
            this.errors.push({ line, message });
        }
    }

    private validateVendorIds(config: TrustBundleConfig): void {
        config.vendors.forEach((vendor, i) => {
            if (!isValidVendorId(vendor.id)) {
                this.addError(
                    `vendors[${i}].id`,
                    `invalid vendor ID ${quote(vendor.id)}: not found in TCG TPM Vendor ID Registry`
                );
            }
        });
    }

    private validateDuplicateVendorIds(config: TrustBundleConfig): void {
        const seen = new Map<string, number>();
        config.vendors.forEach((vendor, i) => {
            const first = seen.get(vendor.id);
            if (first !== undefined) {
                this.addError(
                    `vendors[${i}].id`,
                    `duplicate vendor ID ${quote(vendor.id)} (first defined at vendors[${first}])`
                );
            } else {
                seen.set(vendor.id, i);
            }
        });
    }

    private validateVendorsSorting(config: TrustBundleConfig): void {
        const ids = config.vendors.map(vendor => vendor.id);
        const sorted = [...ids].sort();
        ids.forEach((id, i) => {
            if (id !== sorted[i]) {
                this.addError(
                    `vendors[${i}].id`,
                    `vendors not sorted by ID: expected ${quote(sorted[i])} at position ${i}, got ${quote(id)}`
                );
            }
        });
    }

    private validateCertificatesSorting(config: TrustBundleConfig): void {
        config.vendors.forEach((vendor, i) => {
            const names = vendor.certificates.map(cert => cert.name);
            const sorted = [...names].sort();
            names.forEach((name, j) => {
                if (name !== sorted[j]) {
                    this.addError(
                        `vendors[${i}].certificates[${j}].name`,
                        `certificates not sorted by name in vendor ${quote(vendor.id)}: ` +
                            `expected ${quote(sorted[j])} at position ${j}, got ${quote(name)}`
                    );
                }
            });
        });
    }

    private validateDuplicateCertificates(config: TrustBundleConfig): void {
        config.vendors.forEach((vendor, i) => {
            vendor.certificates.forEach((cert, j) => {
                if (containsCertificate(vendor.certificates.slice(0, j), cert)) {
                    this.addError(
                        `vendors[${i}].certificates[${j}]`,
                        `duplicate certificate ${quote(cert.name)} in vendor ${quote(vendor.id)}`
                    );
                }
            });
        });
    }

    private validateUrls(config: TrustBundleConfig): void {
        config.vendors.forEach((vendor, i) => {
            vendor.certificates.forEach((cert, j) => {
                const base = `vendors[${i}].certificates[${j}]`;
                if (cert.url) {
                    this.checkUrl(`${base}.url`, cert.url, ['https:'], 'URL must use HTTPS scheme');
                }
                if (cert.uri) {
                    this.checkUrl(`${base}.uri`, cert.uri, ['https:', 'file:'], 'URI must use https or file scheme');
                }
            });
        });
    }

    private checkUrl(path: string, raw: string, schemes: string[], schemeMessage: string): void {
        let parsed: URL;
        try {
            parsed = new URL(raw);
        } catch (error) {
            this.addError(path, `invalid URL: ${error instanceof Error ? error.message : String(error)}`);
            return;
        }
        if (!schemes.includes(parsed.protocol)) {
            this.addError(path, `${schemeMessage}: got ${quote(parsed.protocol.replace(/:$/, ''))}`);
            return;
        }
        if (parsed.protocol === 'https:' && parsed.href !== raw) {
            this.addError(path, `URL not properly encoded: got ${quote(raw)}, expected ${quote(parsed.href)}`);
        }
    }

    private validateFingerprintFormat(config: TrustBundleConfig): void {
        config.vendors.forEach((vendor, i) => {
            vendor.certificates.forEach((cert, j) => {
                const fp = cert.validation.fingerprint;
                for (const alg of ['sha1', 'sha256', 'sha384', 'sha512'] as const) {
                    const value = fp[alg];
                    if (value && !isCanonical(value)) {
                        this.addError(
                            `vendors[${i}].certificates[${j}].validation.fingerprint.${alg}`,
                            `fingerprint not in uppercase with colons: got ${quote(value)}`
                        );
                    }
                }
            });
        });
    }

    private validateQuotes(node: unknown, path: string): void {
        if (!isMap(node)) {
            return;
        }
        for (const pair of node.items) {
            if (!isScalar(pair.key)) {
                continue;
            }
            const keyPath = path ? `${path}.${String(pair.key.value)}` : String(pair.key.value);
            const value = pair.value;

            if (isSeq(value)) {
                value.items.forEach((item, index) => this.validateQuotes(item, `${keyPath}[${index}]`));
            } else if (isScalar(value)) {
                if (value.type !== 'QUOTE_DOUBLE') {
                    this.push(
                        this.lineOf(value) || 1,
                        `string value not double-quoted at ${keyPath}: ${quote(String(value.value))}`
                    );
                }
            } else {
                this.validateQuotes(value, keyPath);
            }
        }
    }
}

export function validateManifest(text: string, options: ManifestValidatorOptions = {}): ValidationIssue[] {
    return new ManifestValidator(options).validate(text);
}

export function validateManifestFile(path: string, options: ManifestValidatorOptions = {}): ValidationIssue[] {
    return new ManifestValidator(options).validateFile(path);
}

function quote(value: string): string {
    return JSON.stringify(value);
}
