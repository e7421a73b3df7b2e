// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { certificatesOf, parseBundle } from '../parser';
import { parseMetadata, validateCommit, validateDate } from '../metadata';
import { parseBundleType, defaultFilename } from '../constants';
import { ROOT_A, ROOT_B, TEST_COMMIT, TEST_DATE, blockFor, headerFor, sampleBundle } from '../../../tests/fixtures';

describe('bundle metadata', () => {
    it('should read date, commit and type from the header', () => {
        expect(parseMetadata(sampleBundle())).toEqual({ date: TEST_DATE, commit: TEST_COMMIT, type: 'root' });
    });

    it('should detect intermediate bundles', () => {
        const text = headerFor(TEST_DATE, TEST_COMMIT, 'x.pem', 'TPM Intermediate Endorsement Certificates');
        expect(parseMetadata(Buffer.from(text)).type).toBe('intermediate');
    });

    it('should require the date and commit', () => {
        expect(() => parseMetadata('##\n## Commit: abc\n')).toThrow(
            "bundle does not contain required 'Date' metadata in header"
        );
        expect(() => parseMetadata('##\n## Date: 2026-01-01\n')).toThrow(
            "bundle does not contain required 'Commit' metadata in header"
        );
    });

    it('should validate dates', () => {
        expect(() => validateDate('2026-02-28')).not.toThrow();
        expect(() => validateDate('2026-2-28')).toThrow('date must be in YYYY-MM-DD format, got: 2026-2-28');
        expect(() => validateDate('2026-02-30')).toThrow('invalid date: 2026-02-30');
    });

    it('should validate commits', () => {
        expect(() => validateCommit(TEST_COMMIT)).not.toThrow();
        expect(() => validateCommit('abc')).toThrow('commit must be a 40-character hex string, got 3 characters: abc');
        expect(() => validateCommit(TEST_COMMIT.toUpperCase())).toThrow('commit must be a 40-character hex string, got:');
    });

    it('should parse bundle types', () => {
        expect(parseBundleType('intermediate')).toBe('intermediate');
        expect(defaultFilename('intermediate')).toBe('tpm-intermediate-ca-certificates.pem');
        expect(() => parseBundleType('leaf')).toThrow('invalid bundle type "leaf": must be one of [root, intermediate]');
    });
});

describe('parseBundle', () => {
    it('should group certificates by owner', () => {
        const catalog = parseBundle(sampleBundle());

        expect([...catalog.keys()]).toEqual(['IFX', 'INTC']);
        expect(catalog.get('IFX')?.[0].sha256).toBe(ROOT_A.sha256);
        expect(catalog.get('INTC')?.[0].sha256).toBe(ROOT_B.sha256);
    });

    it('should filter by vendor', () => {
        const catalog = parseBundle(sampleBundle());

        expect(certificatesOf(catalog)).toHaveLength(2);
        expect(certificatesOf(catalog, ['INTC']).map(cert => cert.sha1)).toEqual([ROOT_B.sha1]);
    });

    it('should reject unknown owners', () => {
        const text = headerFor() + blockFor(ROOT_A, 'Root A', 'ZZZZ');
        expect(() => parseBundle(text)).toThrow('invalid vendor ID in certificate metadata');
    });

    it('should reject certificates without an owner', () => {
        expect(() => parseBundle(headerFor() + ROOT_A.pem)).toThrow('certificate found without owner metadata');
    });

    it('should reject bundles without certificates', () => {
        expect(() => parseBundle(headerFor())).toThrow('no certificates found in bundle');
    });
});
