// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

export interface Repo {
    owner: string;
    name: string;
}

export const DEFAULT_SOURCE_REPO: Repo = { owner: 'loicsikidi', name: 'tpm-ca-certificates' };
export const RELEASE_BUNDLE_WORKFLOW_PATH = '.github/workflows/release-bundle.yaml';

export interface Asset {
    name: string;
    browserDownloadUrl: string;
    size: number;
}

export interface Release {
    tagName: string;
    name: string;
    createdAt: string;
    publishedAt: string;
    assets: Asset[];
}

/**
 * One attestation of the forge API. `bundle` is the Sigstore bundle as JSON,
 * fetched from `bundle_url` when the API did not inline it.
 */
export interface Attestation {
    bundle: unknown;
    bundleUrl?: string;
}

export type SortOrder = 'asc' | 'desc';

export interface ReleasesOptions {
    /** Default 10, at most 100. */
    pageSize?: number;
    sortOrder?: SortOrder;
    returnFirstValue?: boolean;
}

export function repoToString(repo: Repo): string {
    return `${repo.owner}/${repo.name}`;
}

export function parseRepo(value: string): Repo {
    const parts = value.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
        throw new Error(`invalid repository "${value}": expected owner/name`);
    }
    return { owner: parts[0], name: parts[1] };
}

export function repoUrl(repo: Repo): string {
    return `https://github.com/${repoToString(repo)}`;
}
