// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { DEFAULT_SOURCE_REPO, RELEASE_BUNDLE_WORKFLOW_PATH, Repo, repoUrl } from '../github/types';
import { CertificateIdentityMismatchError } from '../utils/errors';

export const DEFAULT_OIDC_ISSUER = 'https://token.actions.githubusercontent.com';
export const DEFAULT_PREDICATE_TYPE = 'https://slsa.dev/provenance/v1';

/**
 * `any`: one accepted attestation is enough. `all`: every attestation must be
 * accepted.
 */
export type AcceptanceMode = 'any' | 'all';

export interface PolicyConfig {
    sourceRepo: Repo;
    oidcIssuer: string;
    predicateType: string;
    /** Workflow path inside the repository. */
    buildWorkflow: string;
    /** Release tag, equal to the bundle date. */
    tag: string;
    acceptance: AcceptanceMode;
}

export type PolicyInput = Partial<PolicyConfig> & { tag: string };

/**
 * The signer identity read from a Fulcio certificate.
 */
export interface CertificateIdentity {
    subjectAlternativeName: string;
    issuer: string;
    buildSignerURI: string;
    sourceRepositoryURI: string;
    sourceRepositoryDigest: string;
}

export function createPolicy(input: PolicyInput): PolicyConfig {
    if (!input.tag) {
        throw new Error("invalid input: 'tag' is required");
    }
    const policy: PolicyConfig = {
        sourceRepo: input.sourceRepo ?? DEFAULT_SOURCE_REPO,
        oidcIssuer: input.oidcIssuer || DEFAULT_OIDC_ISSUER,
        predicateType: input.predicateType || DEFAULT_PREDICATE_TYPE,
        buildWorkflow: input.buildWorkflow || RELEASE_BUNDLE_WORKFLOW_PATH,
        tag: input.tag,
        acceptance: input.acceptance ?? 'any',
    };
    if (!policy.sourceRepo.owner || !policy.sourceRepo.name) {
        throw new Error("invalid input: 'sourceRepo' must name an owner and a repository");
    }
    return policy;
}

/**
 * e.g. `https://github.com/owner/repo`
 */
export function sourceRepositoryURI(policy: PolicyConfig): string {
    return repoUrl(policy.sourceRepo);
}

/**
 * e.g. `https://github.com/owner/repo/.github/workflows/release-bundle.yaml@refs/tags/2025-12-03`
 */
export function buildSignerURI(policy: PolicyConfig): string {
    return `${sourceRepositoryURI(policy)}/${policy.buildWorkflow}@refs/tags/${policy.tag}`;
}

/**
 * Case-insensitive match of any SAN under the source repository.
 */
export function sanPattern(policy: PolicyConfig): RegExp {
    return new RegExp(`^${escapeRegExp(sourceRepositoryURI(policy))}/`, 'i');
}

/**
 * Throws when the certificate was not issued to the expected workflow run.
 */
export function checkIdentity(identity: CertificateIdentity, policy: PolicyConfig): void {
    if (identity.issuer !== policy.oidcIssuer) {
        throw new CertificateIdentityMismatchError(
            `OIDC issuer mismatch: expected ${policy.oidcIssuer}, got ${identity.issuer || '(none)'}`
        );
    }
    const pattern = sanPattern(policy);
    if (!pattern.test(identity.subjectAlternativeName)) {
        throw new CertificateIdentityMismatchError(
            `subject alternative name ${JSON.stringify(identity.subjectAlternativeName)} does not match ${pattern.source}`
        );
    }
    const expectedSigner = buildSignerURI(policy);
    if (identity.buildSignerURI !== expectedSigner) {
        throw new CertificateIdentityMismatchError(
            `build signer URI mismatch: expected ${expectedSigner}, got ${identity.buildSignerURI || '(none)'}`
        );
    }
    const expectedSource = sourceRepositoryURI(policy);
    if (identity.sourceRepositoryURI !== expectedSource) {
        throw new CertificateIdentityMismatchError(
            `source repository URI mismatch: expected ${expectedSource}, got ${identity.sourceRepositoryURI || '(none)'}`
        );
    }
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
