// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { defaultFilename } from '../bundle/constants';
import { parseMetadata } from '../bundle/metadata';
import { formatDate } from '../x509/certificate';
import {
    AttestationPolicyError,
    BundleVerificationFailedError,
    ErrorKind,
    TpmtbError,
    TransparencyLogMissingError,
    errorMessage,
} from '../utils/errors';
import { getLogger, LogCategory } from '../utils/logger';
import { verifyChecksum } from './checksums';
import { PolicyConfig, PolicyInput, checkIdentity, createPolicy } from './policy';
import { SignatureVerifier, VerifiedSignature } from './signature';

export interface BundleVerifierConfig extends Omit<PolicyInput, 'tag'> {
    /** Bundle date, which is also the release tag. */
    date: string;
    commit: string;
    signatureVerifier: SignatureVerifier;
}

export interface VerifyInput {
    bundle: Uint8Array;
    checksums: Uint8Array | string;
    /** `checksums.txt.sigstore.json` as JSON. */
    checksumsSignature: unknown;
    /** Sigstore bundles of the provenance attestations, as JSON. */
    attestations: unknown[];
}

export type AttestationStage = 'Fetched' | 'Verified' | 'PolicyMatched';

export type AttestationOutcome =
    | { index: number; state: 'Accepted' }
    | { index: number; state: 'Rejected'; stage: AttestationStage; kind: ErrorKind | 'Error'; reason: string };

export interface VerifyResult {
    ok: boolean;
    policy: PolicyConfig;
    checksum: { filename: string; digest: string };
    attestations: AttestationOutcome[];
}

/**
 * Proves a bundle came out of the expected release workflow at the expected
 * commit. Phase 1 checks the signed checksum file and is fatal; phase 2 judges
 * every provenance attestation on its own.
 */
export class BundleVerifier {
    private readonly policy: PolicyConfig;
    private readonly commit: string;
    private readonly signatureVerifier: SignatureVerifier;

    constructor(config: BundleVerifierConfig) {
        if (!config.date) {
            throw new Error('date cannot be empty');
        }
        if (!config.commit) {
            throw new Error('commit cannot be empty');
        }
        this.policy = createPolicy({ ...config, tag: config.date });
        this.commit = config.commit;
        this.signatureVerifier = config.signatureVerifier;
    }

    getPolicy(): PolicyConfig {
        return this.policy;
    }

    async verify(input: VerifyInput): Promise<VerifyResult> {
        const logger = getLogger();
        const startTime = Date.now();

        let checksum: VerifyResult['checksum'];
        try {
            checksum = await this.verifyChecksums(input);
        } catch (error) {
            throw new BundleVerificationFailedError(`checksum verification failed: ${errorMessage(error)}`, {
                cause: error,
            });
        }
        logger.verbose(LogCategory.VERIFY, `Checksum verified for ${checksum.filename} (sha256:${checksum.digest})`);

        const attestations = await this.verifyAttestations(input.attestations, checksum.digest);
        const accepted = attestations.filter(outcome => outcome.state === 'Accepted').length;
        logger.verbose(
            LogCategory.VERIFY,
            `${accepted}/${attestations.length} attestation(s) accepted in ${logger.formatDuration(Date.now() - startTime)}`
        );

        if (attestations.length === 0) {
            throw new BundleVerificationFailedError('no attestations found for the bundle digest');
        }
        const satisfied = this.policy.acceptance === 'all' ? accepted === attestations.length : accepted > 0;
        if (!satisfied) {
            const reasons = attestations.flatMap(outcome =>
                outcome.state === 'Rejected' ? [`#${outcome.index}: ${outcome.reason}`] : []
            );
            throw new BundleVerificationFailedError(
                `attestation verification failed (${accepted}/${attestations.length} accepted, mode ${this.policy.acceptance}): ${reasons.join('; ')}`
            );
        }
        return { ok: true, policy: this.policy, checksum, attestations };
    }

    /**
     * Phase 1.
     */
    async verifyChecksums(input: VerifyInput): Promise<VerifyResult['checksum']> {
        const metadata = parseMetadata(input.bundle);
        const filename = defaultFilename(metadata.type);
        const checksumsData = Buffer.from(input.checksums);

        const signature = await this.signatureVerifier.verify(input.checksumsSignature, checksumsData);
        checkIdentity(signature.identity, this.policy);
        const digest = verifyChecksum(checksumsData.toString('utf8'), filename, input.bundle);

        const commit = signature.identity.sourceRepositoryDigest;
        if (!commit) {
            throw new AttestationPolicyError('git commit not found in certificate extensions');
        }
        checkCommit(commit, this.commit);
        checkTimestampDate(signature, this.policy.tag);
        return { filename, digest };
    }

    /**
     * Phase 2. Never throws; each attestation ends Accepted or Rejected.
     */
    async verifyAttestations(attestations: unknown[], digest: string): Promise<AttestationOutcome[]> {
        const outcomes: AttestationOutcome[] = [];
        for (const [index, attestation] of attestations.entries()) {
            outcomes.push(await this.verifyAttestation(index, attestation, digest));
        }
        return outcomes;
    }

    private async verifyAttestation(index: number, attestation: unknown, digest: string): Promise<AttestationOutcome> {
        const logger = getLogger();
        let stage: AttestationStage = 'Fetched';
        try {
            const signature = await this.signatureVerifier.verify(attestation);
            stage = 'Verified';
            this.checkPolicy(signature, digest);
            stage = 'PolicyMatched';
            checkTimestampDate(signature, this.policy.tag);
            logger.verboseIndent(LogCategory.VERIFY, `Attestation #${index}: accepted`);
            return { index, state: 'Accepted' };
        } catch (error) {
            const reason = errorMessage(error);
            logger.verboseIndent(LogCategory.VERIFY, `Attestation #${index}: rejected after ${stage}: ${reason}`);
            return {
                index,
                state: 'Rejected',
                stage,
                kind: error instanceof TpmtbError ? error.kind : 'Error',
                reason,
            };
        }
    }

    private checkPolicy(signature: VerifiedSignature, digest: string): void {
        const statement = signature.statement;
        if (!statement) {
            throw new AttestationPolicyError('attestation has no statement or predicate');
        }
        if (!statement.subjects.some(subject => subject.sha256?.toLowerCase() === digest.toLowerCase())) {
            throw new AttestationPolicyError(`attestation subject does not match artifact digest sha256:${digest}`);
        }
        if (statement.predicateType !== this.policy.predicateType) {
            throw new AttestationPolicyError(
                `predicate type mismatch: expected ${this.policy.predicateType}, got ${statement.predicateType || '(none)'}`
            );
        }
        checkIdentity(signature.identity, this.policy);
        if (!statement.gitCommit) {
            throw new AttestationPolicyError('git commit not found in attestation');
        }
        checkCommit(statement.gitCommit, this.commit);
    }
}

function checkCommit(actual: string, expected: string): void {
    if (actual.toLowerCase() !== expected.toLowerCase()) {
        throw new AttestationPolicyError(`commit mismatch: expected ${expected}, got ${actual}`);
    }
}

/**
 * The earliest log timestamp must fall on the release day, in UTC.
 */
function checkTimestampDate(signature: VerifiedSignature, expectedDate: string): void {
    if (signature.timestamps.length === 0) {
        throw new TransparencyLogMissingError('no verified timestamps found in attestation');
    }
    const earliest = signature.timestamps.reduce((a, b) => (b.getTime() < a.getTime() ? b : a));
    const actualDate = formatDate(earliest);
    if (actualDate !== expectedDate) {
        throw new AttestationPolicyError(
            `date mismatch between tag and Rekor entry: expected ${expectedDate}, got ${actualDate} (full timestamp: ${earliest.toISOString()})`
        );
    }
}
