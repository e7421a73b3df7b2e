// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { TrustedBundle } from '../trusted-bundle';
import { parseProvenance } from '../assets';
import { isErrorKind } from '../../utils/errors';
import { CERTS_DIR, ROOT_A, ROOT_B, ROOT_C, TEST_COMMIT, TEST_DATE, sampleBundle } from '../../../tests/fixtures';
import { intermediateBundle } from '../../../tests/fixtures/forge';

describe('TrustedBundle', () => {
    const root = Buffer.from(sampleBundle());
    const intermediate = Buffer.from(intermediateBundle());

    it('should sort bundles given in any order', () => {
        const bundle = TrustedBundle.fromBundles([intermediate, root]);

        expect(bundle.rootMetadata).toEqual({ date: TEST_DATE, commit: TEST_COMMIT, type: 'root' });
        expect(bundle.intermediateMetadata).toEqual({ date: TEST_DATE, commit: TEST_COMMIT, type: 'intermediate' });
        expect(bundle.rawRoot.equals(root)).toBe(true);
        expect(bundle.rawIntermediate?.equals(intermediate)).toBe(true);
    });

    it('should require a root bundle', () => {
        expect(() => TrustedBundle.fromBundles([intermediate])).toThrow('a root bundle is required');
        expect(() => new TrustedBundle({ rootBundle: intermediate })).toThrow('expected a root bundle, got intermediate');
    });

    it('should reject an intermediate bundle from another release', () => {
        let caught: unknown;
        try {
            new TrustedBundle({ rootBundle: root, intermediateBundle: Buffer.from(intermediateBundle('2026-10-12')) });
        } catch (e) {
            caught = e;
        }

        expect(isErrorKind(caught, 'BundleVerificationFailed')).toBe(true);
        expect(caught instanceof Error && caught.message).toBe(
            `trusted bundle verification failed: intermediate bundle (date 2026-10-12, commit ${TEST_COMMIT}) does not match root bundle (date ${TEST_DATE}, commit ${TEST_COMMIT})`
        );
    });

    it('should hand out copies of the raw bundles', () => {
        const bundle = new TrustedBundle({ rootBundle: root });
        bundle.rawRoot.fill(0);

        expect(bundle.rawRoot.equals(root)).toBe(true);
        expect(bundle.rawIntermediate).toBeUndefined();
        expect(bundle.intermediates()).toEqual([]);
    });

    describe('certificate accessors', () => {
        const bundle = new TrustedBundle({ rootBundle: root, intermediateBundle: intermediate });

        it('should list vendors in bundle order', () => {
            expect(bundle.vendors()).toEqual(['IFX', 'INTC']);
        });

        it('should return roots and intermediates', () => {
            expect(bundle.roots().map(cert => cert.commonName)).toEqual(['Example Root CA A', 'Example Root CA B']);
            expect(bundle.roots(['INTC']).map(cert => cert.commonName)).toEqual(['Example Root CA B']);
            expect(bundle.intermediates().map(cert => cert.commonName)).toEqual(['Example Root CA C']);
        });

        it('should find certificates given as PEM, DER or parsed', () => {
            expect(bundle.contains(Buffer.from(ROOT_A.pem))).toBe(true);
            expect(bundle.contains(readFileSync(join(CERTS_DIR, 'root-a.der')))).toBe(true);
            expect(bundle.contains(bundle.intermediates()[0])).toBe(true);
        });
    });

    describe('vendor filter', () => {
        const bundle = new TrustedBundle(
            { rootBundle: root, intermediateBundle: intermediate },
            { vendorFilter: ['INTC', 'NTC'] }
        );

        it('should narrow vendors to those present in the bundle', () => {
            expect(bundle.vendors()).toEqual(['INTC']);
        });

        it('should narrow every accessor', () => {
            expect(bundle.roots().map(cert => cert.commonName)).toEqual(['Example Root CA B']);
            expect(bundle.intermediates()).toEqual([]);
            expect(bundle.contains(Buffer.from(ROOT_A.pem))).toBe(false);
            expect(bundle.contains(Buffer.from(ROOT_B.pem))).toBe(true);
            expect(bundle.contains(Buffer.from(ROOT_C.pem))).toBe(false);
        });

        it('should let an explicit selection override the filter', () => {
            expect(bundle.roots(['IFX']).map(cert => cert.commonName)).toEqual(['Example Root CA A']);
        });
    });

    describe('persist', () => {
        let cacheDir: string;

        beforeEach(() => {
            cacheDir = join(mkdtempSync(join(tmpdir(), 'tpmtb-persist-')), 'cache');
        });

        afterEach(() => {
            rmSync(join(cacheDir, '..'), { recursive: true, force: true });
        });

        it('should write an unverified bundle with its config', () => {
            const now = new Date('2026-10-19T12:00:00Z');
            new TrustedBundle(
                { rootBundle: root, intermediateBundle: intermediate },
                { vendorFilter: ['IFX'], autoUpdate: { disableAutoUpdate: true } }
            ).persist(cacheDir, now);

            expect(readFileSync(join(cacheDir, 'tpm-ca-certificates.pem')).equals(root)).toBe(true);
            expect(readFileSync(join(cacheDir, 'tpm-intermediate-ca-certificates.pem')).equals(intermediate)).toBe(true);
            expect(existsSync(join(cacheDir, 'checksums.txt'))).toBe(false);
            expect(JSON.parse(readFileSync(join(cacheDir, 'config.json'), 'utf8'))).toEqual({
                version: TEST_DATE,
                commit: TEST_COMMIT,
                skipVerify: true,
                lastTimestamp: '2026-10-19T12:00:00.000Z',
                vendorIDs: ['IFX'],
                autoUpdate: { disableAutoUpdate: true },
            });
        });

        it('should refuse when the local cache is disabled', () => {
            const bundle = new TrustedBundle({ rootBundle: root }, { disableLocalCache: true });

            expect(() => bundle.persist(cacheDir)).toThrow('cannot persist trusted bundle: local cache is disabled');
            expect(existsSync(cacheDir)).toBe(false);
        });
    });
});

describe('parseProvenance', () => {
    it('should accept a list of bundles or a single bundle', () => {
        expect(parseProvenance('[{"a":1},{"b":2}]')).toEqual([{ a: 1 }, { b: 2 }]);
        expect(parseProvenance(Buffer.from('{"a":1}'))).toEqual([{ a: 1 }]);
    });

    it('should reject anything else', () => {
        expect(() => parseProvenance('"text"')).toThrow(
            'failed to parse provenance: expected a bundle or a list of bundles'
        );
        expect(() => parseProvenance('{')).toThrow(/^failed to parse provenance: /);
    });
});

describe('TrustedBundle auto-update', () => {
    const NEXT_DATE = '2026-10-26';
    const NEXT_COMMIT = 'a'.repeat(40);
    const HOUR = 3600 * 1000;
    const autoUpdate = { disableAutoUpdate: false, maxInterval: 3600 };
    let consoleErrorSpy: jest.SpyInstance;

    function releaseOf(date: string, commit: string): TrustedBundle {
        return TrustedBundle.fromBundles([Buffer.from(sampleBundle(date, commit))]);
    }

    beforeEach(() => {
        jest.useFakeTimers();
        consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    });

    afterEach(() => {
        jest.useRealTimers();
        consoleErrorSpy.mockRestore();
    });

    it('should adopt a newer release once the interval elapses', async () => {
        const bundle = new TrustedBundle({ rootBundle: Buffer.from(sampleBundle()) }, { autoUpdate });
        const refresh = jest.fn(() => Promise.resolve(releaseOf(NEXT_DATE, NEXT_COMMIT)));

        bundle.startWatcher(refresh);
        expect(bundle.watching).toBe(true);

        await jest.advanceTimersByTimeAsync(HOUR - 1000);
        expect(refresh).not.toHaveBeenCalled();

        await jest.advanceTimersByTimeAsync(1000);
        await bundle.stop();

        expect(refresh).toHaveBeenCalledTimes(1);
        expect(bundle.watching).toBe(false);
        expect(bundle.rootMetadata).toEqual({ date: NEXT_DATE, commit: NEXT_COMMIT, type: 'root' });
        expect(bundle.rawRoot.toString('utf8')).toBe(sampleBundle(NEXT_DATE, NEXT_COMMIT));
    });

    it('should keep the bundle when the release is unchanged or older', async () => {
        const bundle = new TrustedBundle({ rootBundle: Buffer.from(sampleBundle()) }, { autoUpdate });

        await expect(bundle.checkAndUpdate(() => Promise.resolve(releaseOf(TEST_DATE, TEST_COMMIT)))).resolves.toBe(false);
        await expect(bundle.checkAndUpdate(() => Promise.resolve(releaseOf('2026-10-12', NEXT_COMMIT)))).resolves.toBe(
            false
        );
        expect(bundle.rootMetadata).toEqual({ date: TEST_DATE, commit: TEST_COMMIT, type: 'root' });
    });

    it('should keep the bundle and warn when the refresh fails', async () => {
        const bundle = new TrustedBundle({ rootBundle: Buffer.from(sampleBundle()) }, { autoUpdate });

        await expect(bundle.checkAndUpdate(() => Promise.reject(new Error('forge unavailable')))).resolves.toBe(false);

        expect(bundle.rootMetadata.commit).toBe(TEST_COMMIT);
        expect(consoleErrorSpy).toHaveBeenCalledWith(
            expect.stringContaining(`[WARN] auto-update failed, keeping bundle ${TEST_DATE}: forge unavailable`)
        );
    });

    it('should not refresh after stop', async () => {
        const bundle = new TrustedBundle({ rootBundle: Buffer.from(sampleBundle()) }, { autoUpdate });
        const refresh = jest.fn(() => Promise.resolve(releaseOf(NEXT_DATE, NEXT_COMMIT)));

        bundle.startWatcher(refresh);
        await bundle.stop();
        await bundle.stop();
        await jest.advanceTimersByTimeAsync(3 * HOUR);

        expect(refresh).not.toHaveBeenCalled();
        expect(bundle.rootMetadata.date).toBe(TEST_DATE);
    });

    it('should not start without auto-update', async () => {
        const refresh = jest.fn(() => Promise.resolve(releaseOf(NEXT_DATE, NEXT_COMMIT)));
        const unset = new TrustedBundle({ rootBundle: Buffer.from(sampleBundle()) });
        const disabled = new TrustedBundle(
            { rootBundle: Buffer.from(sampleBundle()) },
            { autoUpdate: { disableAutoUpdate: true, maxInterval: 3600 } }
        );

        unset.startWatcher(refresh);
        disabled.startWatcher(refresh);
        await jest.advanceTimersByTimeAsync(48 * HOUR);

        expect(unset.watching).toBe(false);
        expect(disabled.watching).toBe(false);
        expect(refresh).not.toHaveBeenCalled();
    });

    it('should default to a daily interval', async () => {
        const bundle = new TrustedBundle(
            { rootBundle: Buffer.from(sampleBundle()) },
            { autoUpdate: { disableAutoUpdate: false } }
        );
        const refresh = jest.fn(() => Promise.resolve(releaseOf(TEST_DATE, TEST_COMMIT)));

        bundle.startWatcher(refresh);
        await jest.advanceTimersByTimeAsync(24 * HOUR - 1000);
        expect(refresh).not.toHaveBeenCalled();
        await jest.advanceTimersByTimeAsync(1000);
        await bundle.stop();

        expect(refresh).toHaveBeenCalledTimes(1);
    });
});
