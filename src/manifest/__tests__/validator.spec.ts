// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { readFileSync } from 'fs';
import { join } from 'path';
import { ManifestValidator, validateManifest } from '../validator';

const canonical = readFileSync(join(__dirname, '../../../tests/fixtures/manifests/canonical.yaml'), 'utf8');

describe('ManifestValidator', () => {
    it('should accept a canonical manifest', () => {
        expect(validateManifest(canonical)).toEqual([]);
    });

    it('should require the document marker on the first line', () => {
        const errors = validateManifest(canonical.replace('---\n', ''));

        expect(errors).toEqual([
            { line: 1, message: "file must start with YAML document marker '---' on the first line" },
        ]);
    });

    it('should report unknown vendor IDs at the id line', () => {
        const text = canonical.replace('id: "INTC"', 'id: "ZZZZ"');

        expect(validateManifest(text)).toEqual([
            { line: 12, message: 'invalid vendor ID "ZZZZ": not found in TCG TPM Vendor ID Registry' },
        ]);
    });

    it('should report the same lines when an instance is reused', () => {
        const validator = new ManifestValidator();
        const text = canonical.replace('id: "INTC"', 'id: "ZZZZ"');
        const expected = [
            { line: 12, message: 'invalid vendor ID "ZZZZ": not found in TCG TPM Vendor ID Registry' },
        ];

        expect(validator.validate(canonical)).toEqual([]);
        expect(validator.validate(text)).toEqual(expected);
        expect(validator.validate(text)).toEqual(expected);
    });

    it('should report vendors out of order', () => {
        const text = canonical
            .replace('id: "IFX"', 'id: "@@"')
            .replace('id: "INTC"', 'id: "IFX"')
            .replace('id: "@@"', 'id: "INTC"');
        const errors = validateManifest(text);

        expect(errors).toEqual([
            { line: 4, message: 'vendors not sorted by ID: expected "IFX" at position 0, got "INTC"' },
            { line: 12, message: 'vendors not sorted by ID: expected "INTC" at position 1, got "IFX"' },
        ]);
    });

    it('should report duplicate vendor IDs', () => {
        const text = canonical.replace('id: "INTC"', 'id: "IFX"');
        const errors = validateManifest(text);

        expect(errors[0]).toEqual({
            line: 12,
            message: 'duplicate vendor ID "IFX" (first defined at vendors[0])',
        });
    });

    it('should report fingerprints that are not canonical', () => {
        const text = canonical.replace('sha256: "AA:BB"', 'sha256: "aa:bb"');

        expect(validateManifest(text)).toEqual([
            { line: 11, message: 'fingerprint not in uppercase with colons: got "aa:bb"' },
        ]);
    });

    it('should report URLs that are not percent-encoded', () => {
        const text = canonical.replace('https://example.com/a.crt', 'https://example.com/a b.crt');

        expect(validateManifest(text)).toEqual([
            {
                line: 8,
                message:
                    'URL not properly encoded: got "https://example.com/a b.crt", expected "https://example.com/a%20b.crt"',
            },
        ]);
    });

    it('should report values that are not double-quoted', () => {
        const text = canonical.replace('name: "Infineon"', 'name: Infineon');

        expect(validateManifest(text)).toEqual([
            { line: 5, message: 'string value not double-quoted at vendors[0].name: "Infineon"' },
        ]);
    });

    it('should report duplicate certificates within a vendor', () => {
        const text = [
            '---',
            'version: "alpha"',
            'vendors:',
            '  - id: "IFX"',
            '    name: "Infineon"',
            '    certificates:',
            '      - name: "Root A"',
            '        url: "https://example.com/a.crt"',
            '        validation:',
            '          fingerprint:',
            '            sha256: "AA:BB"',
            '      - name: "Root A2"',
            '        url: "https://example.com/a.crt"',
            '        validation:',
            '          fingerprint:',
            '            sha256: "CC:DD"',
            '',
        ].join('\n');

        expect(validateManifest(text)).toEqual([
            { line: 12, message: 'duplicate certificate "Root A2" in vendor "IFX"' },
        ]);
    });

    it('should cap the number of reported errors', () => {
        const text = canonical
            .replace('---\n', '')
            .replace('name: "Infineon"', 'name: Infineon')
            .replace('name: "Intel"', 'name: Intel');

        expect(new ManifestValidator({ maxErrors: 2 }).validate(text)).toHaveLength(2);
    });

    it('should throw when the manifest cannot be loaded', () => {
        const text = canonical.replace('https://example.com/a.crt', 'http://example.com/a.crt');

        expect(() => validateManifest(text)).toThrow('failed to load config');
    });
});
