// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { TEST_COMMIT, TEST_DATE, sampleBundle } from '../../../tests/fixtures';
import {
    FakeSignatureVerifier,
    TEST_REPO,
    attestationFor,
    checksumSignatureFor,
    checksumsFor,
    identityFor,
    sha256,
} from '../../../tests/fixtures/sigstore';
import { isErrorKind } from '../../utils/errors';
import { BundleVerifier, VerifyInput } from '../verifier';

const OTHER_COMMIT = 'f'.repeat(40);

describe('BundleVerifier', () => {
    const bundle = sampleBundle();
    const digest = sha256(bundle);
    const checksums = checksumsFor({ 'tpm-ca-certificates.pem': bundle });
    let fake: FakeSignatureVerifier;

    function input(overrides: Partial<VerifyInput> = {}): VerifyInput {
        return {
            bundle: Buffer.from(bundle),
            checksums,
            checksumsSignature: checksumSignatureFor(checksums),
            attestations: [attestationFor({ digest })],
            ...overrides,
        };
    }

    function verifier(commit: string = TEST_COMMIT, acceptance: 'any' | 'all' = 'any'): BundleVerifier {
        return new BundleVerifier({
            date: TEST_DATE,
            commit,
            sourceRepo: TEST_REPO,
            acceptance,
            signatureVerifier: fake,
        });
    }

    async function failure(promise: Promise<unknown>): Promise<Error> {
        let caught: unknown;
        try {
            await promise;
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(Error);
        return caught instanceof Error ? caught : new Error('no error');
    }

    beforeEach(() => {
        fake = new FakeSignatureVerifier();
    });

    it('should accept a bundle whose checksum and provenance match', async () => {
        const result = await verifier().verify(input());

        expect(result.ok).toBe(true);
        expect(result.checksum).toEqual({ filename: 'tpm-ca-certificates.pem', digest });
        expect(result.attestations).toEqual([{ index: 0, state: 'Accepted' }]);
        expect(result.policy.tag).toBe(TEST_DATE);
        expect(fake.calls[0].artifact?.toString('utf8')).toBe(checksums);
        expect(fake.calls[1].artifact).toBeUndefined();
    });

    it('should fail phase 1 when the expected commit differs', async () => {
        const error = await failure(verifier(OTHER_COMMIT).verify(input()));

        expect(isErrorKind(error, 'BundleVerificationFailed')).toBe(true);
        expect(error.message).toBe(
            `trusted bundle verification failed: checksum verification failed: commit mismatch: expected ${OTHER_COMMIT}, got ${TEST_COMMIT}`
        );
    });

    it('should reject every attestation built from another commit', async () => {
        const outcomes = await verifier(OTHER_COMMIT).verifyAttestations(
            [attestationFor({ digest }), attestationFor({ digest })],
            digest
        );

        expect(outcomes).toEqual([0, 1].map(index => ({
            index,
            state: 'Rejected',
            stage: 'Verified',
            kind: 'AttestationPolicyFailed',
            reason: `commit mismatch: expected ${OTHER_COMMIT}, got ${TEST_COMMIT}`,
        })));
    });

    it('should fail when every attestation is rejected', async () => {
        const error = await failure(
            verifier().verify(input({ attestations: [attestationFor({ digest, commit: OTHER_COMMIT })] }))
        );

        expect(isErrorKind(error, 'BundleVerificationFailed')).toBe(true);
        expect(error.message).toBe(
            'trusted bundle verification failed: attestation verification failed (0/1 accepted, mode any): ' +
                `#0: commit mismatch: expected ${TEST_COMMIT}, got ${OTHER_COMMIT}`
        );
    });

    it('should compare commits case-insensitively', async () => {
        const result = await verifier(TEST_COMMIT.toUpperCase()).verify(input());

        expect(result.ok).toBe(true);
    });

    it('should detect a tampered bundle', async () => {
        const tampered = bundle.replace('Root A', 'Root Z');

        const error = await failure(verifier().verify(input({ bundle: Buffer.from(tampered) })));

        expect(error.message).toBe(
            'trusted bundle verification failed: checksum verification failed: ' +
                `checksum mismatch for tpm-ca-certificates.pem: expected ${digest}, got ${sha256(tampered)}`
        );
    });

    it('should require the bundle in the checksums file', async () => {
        const other = checksumsFor({ 'other.pem': 'x' });

        const error = await failure(
            verifier().verify(input({ checksums: other, checksumsSignature: checksumSignatureFor(other) }))
        );

        expect(error.message).toBe(
            'trusted bundle verification failed: checksum verification failed: artifact tpm-ca-certificates.pem not found in checksums file'
        );
    });

    it('should reject a signature made over other checksums', async () => {
        const error = await failure(
            verifier().verify(input({ checksumsSignature: checksumSignatureFor('something else') }))
        );

        expect(isErrorKind(error, 'SignatureVerificationFailed')).toBe(true);
        expect(error.message).toContain('artifact digest mismatch');
    });

    it('should reject a checksum signature logged on another day', async () => {
        const signature = checksumSignatureFor(checksums, { timestamps: ['2026-10-20T00:30:00Z'] });

        const error = await failure(verifier().verify(input({ checksumsSignature: signature })));

        expect(error.message).toContain('date mismatch between tag and Rekor entry: expected 2026-10-19, got 2026-10-20');
    });

    it('should reject a checksum signature from another repository', async () => {
        const signature = checksumSignatureFor(checksums, {
            identity: identityFor({ owner: 'someone', name: 'else' }),
        });

        const error = await failure(verifier().verify(input({ checksumsSignature: signature })));

        expect(isErrorKind(error, 'CertificateIdentityMismatch')).toBe(true);
    });

    describe('attestation policy', () => {
        async function outcome(attestation: unknown) {
            const [result] = await verifier().verifyAttestations([attestation], digest);
            return result;
        }

        it('should bind the statement to the bundle digest', async () => {
            await expect(outcome(attestationFor({ digest: 'ab'.repeat(32) }))).resolves.toEqual({
                index: 0,
                state: 'Rejected',
                stage: 'Verified',
                kind: 'AttestationPolicyFailed',
                reason: `attestation subject does not match artifact digest sha256:${digest}`,
            });
        });

        it('should check the predicate type', async () => {
            const result = await outcome(attestationFor({ digest, predicateType: 'https://example.com/other' }));

            expect(result).toMatchObject({
                state: 'Rejected',
                reason: 'predicate type mismatch: expected https://slsa.dev/provenance/v1, got https://example.com/other',
            });
        });

        it('should check the signer identity', async () => {
            const result = await outcome(
                attestationFor({ digest }, { identity: identityFor({ owner: 'someone', name: 'else' }) })
            );

            expect(result).toMatchObject({ state: 'Rejected', stage: 'Verified', kind: 'CertificateIdentityMismatch' });
        });

        it('should check the OIDC issuer', async () => {
            const identity = { ...identityFor(), issuer: 'https://issuer.example.com' };

            const result = await outcome(attestationFor({ digest }, { identity }));

            expect(result).toMatchObject({
                state: 'Rejected',
                reason: 'OIDC issuer mismatch: expected https://token.actions.githubusercontent.com, got https://issuer.example.com',
            });
        });

        it('should check the build workflow tag', async () => {
            const result = await outcome(attestationFor({ digest }, { identity: identityFor(TEST_REPO, '2026-10-18') }));

            expect(result).toMatchObject({ state: 'Rejected', kind: 'CertificateIdentityMismatch' });
            expect(result.state === 'Rejected' && result.reason).toContain('build signer URI mismatch');
        });

        it('should surface signature failures', async () => {
            const result = await outcome(attestationFor({ digest }, { error: 'bad signature' }));

            expect(result).toEqual({
                index: 0,
                state: 'Rejected',
                stage: 'Fetched',
                kind: 'SignatureVerificationFailed',
                reason: 'signature verification failed: bad signature',
            });
        });

        it('should require a log timestamp', async () => {
            const result = await outcome(attestationFor({ digest }, { timestamps: [] }));

            expect(result).toEqual({
                index: 0,
                state: 'Rejected',
                stage: 'PolicyMatched',
                kind: 'TransparencyLogMissing',
                reason: 'no verified timestamps found in attestation',
            });
        });

        it('should use the earliest timestamp', async () => {
            const result = await outcome(
                attestationFor({ digest }, { timestamps: ['2026-10-20T01:00:00Z', '2026-10-19T23:59:00Z'] })
            );

            expect(result).toEqual({ index: 0, state: 'Accepted' });
        });

        it('should reject statements without a git commit', async () => {
            const attestation = attestationFor({ digest });
            attestation.statement = { subject: [{ digest: { sha256: digest } }], predicateType: 'https://slsa.dev/provenance/v1' };

            await expect(outcome(attestation)).resolves.toMatchObject({ reason: 'git commit not found in attestation' });
        });
    });

    describe('acceptance modes', () => {
        const attestations = () => [attestationFor({ digest }, { error: 'bad signature' }), attestationFor({ digest })];

        it('should accept one good attestation in mode any', async () => {
            const result = await verifier().verify(input({ attestations: attestations() }));

            expect(result.attestations.map(o => o.state)).toEqual(['Rejected', 'Accepted']);
        });

        it('should require every attestation in mode all', async () => {
            const error = await failure(verifier(TEST_COMMIT, 'all').verify(input({ attestations: attestations() })));

            expect(error.message).toContain('(1/2 accepted, mode all)');
        });
    });

    it('should fail without attestations', async () => {
        const error = await failure(verifier().verify(input({ attestations: [] })));

        expect(error.message).toBe('trusted bundle verification failed: no attestations found for the bundle digest');
    });

    it('should require a date and a commit', () => {
        expect(() => new BundleVerifier({ date: '', commit: TEST_COMMIT, signatureVerifier: fake })).toThrow(
            'date cannot be empty'
        );
        expect(() => new BundleVerifier({ date: TEST_DATE, commit: '', signatureVerifier: fake })).toThrow(
            'commit cannot be empty'
        );
    });
});
