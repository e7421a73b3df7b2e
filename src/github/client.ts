// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as fs from 'fs/promises';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { FetchError, errorMessage } from '../utils/errors';
import { DEFAULT_HTTP_TIMEOUT, httpGet, toRequestError } from '../utils/http';
import { getLogger, LogCategory } from '../utils/logger';
import { Asset, Attestation, Release, ReleasesOptions, Repo, repoToString } from './types';

export const GITHUB_API_BASE_URL = 'https://api.github.com';
export const GITHUB_API_VERSION = '2022-11-28';

const DATE_TAG = /^\d{4}-\d{2}-\d{2}$/;

export interface GitHubClientOptions {
    token?: string;
    timeout?: number;
    baseURL?: string;
}

/**
 * Minimal REST client for releases, release assets and artifact attestations.
 */
export class GitHubClient {
    private readonly http: AxiosInstance;

    constructor(options: GitHubClientOptions = {}) {
        const headers: Record<string, string> = {
            Accept: 'application/vnd.github+json',
            'X-GitHub-Api-Version': GITHUB_API_VERSION,
        };
        if (options.token) {
            headers.Authorization = `Bearer ${options.token}`;
        }
        this.http = axios.create({
            baseURL: options.baseURL ?? GITHUB_API_BASE_URL,
            timeout: options.timeout ?? DEFAULT_HTTP_TIMEOUT,
            headers,
        });
    }

    /**
     * Releases tagged `YYYY-MM-DD`, newest first unless `sortOrder` is `asc`.
     */
    async listReleases(repo: Repo, options: ReleasesOptions = {}, signal?: AbortSignal): Promise<Release[]> {
        const pageSize = Math.min(options.pageSize && options.pageSize > 0 ? options.pageSize : 10, 100);
        const body = await this.getJson(`/repos/${repoToString(repo)}/releases?per_page=${pageSize}`, signal);
        if (!Array.isArray(body)) {
            throw new Error('failed to decode response: expected a list of releases');
        }

        const releases = body
            .map(decodeRelease)
            .filter(release => DATE_TAG.test(release.tagName))
            .sort(compareReleasesDesc);
        if (options.sortOrder === 'asc') {
            releases.reverse();
        }

        getLogger().verbose(LogCategory.HTTP, `Found ${releases.length} bundle release(s) in ${repoToString(repo)}`);
        return options.returnFirstValue ? releases.slice(0, 1) : releases;
    }

    async releaseExists(repo: Repo, tag: string, signal?: AbortSignal): Promise<void> {
        await this.getRelease(repo, tag, signal);
    }

    async getRelease(repo: Repo, tag: string, signal?: AbortSignal): Promise<Release> {
        const url = `/repos/${repoToString(repo)}/releases/tags/${tag}`;
        const body = await this.getJson(url, signal, status => (status === 404 ? 'release not found' : undefined));
        return decodeRelease(body);
    }

    /**
     * Download a release asset by name, writing it to `destination` when given.
     */
    async downloadAsset(
        repo: Repo,
        tag: string,
        assetName: string,
        destination?: string,
        signal?: AbortSignal
    ): Promise<Buffer> {
        const release = await this.getRelease(repo, tag, signal);
        const asset = release.assets.find(candidate => candidate.name === assetName);
        if (!asset) {
            throw new Error(`asset ${JSON.stringify(assetName)} not found in release ${JSON.stringify(tag)}`);
        }

        const data = await httpGet(this.http, asset.browserDownloadUrl, { signal });
        if (destination) {
            await fs.writeFile(destination, data, { mode: 0o644 });
        }
        return data;
    }

    /**
     * Attestations recorded for an artifact digest (`sha256:<hex>`).
     */
    async getAttestations(repo: Repo, digest: string, signal?: AbortSignal): Promise<Attestation[]> {
        const body = await this.getJson(`/repos/${repoToString(repo)}/attestations/${digest}`, signal);
        if (!isRecord(body) || !Array.isArray(body.attestations)) {
            throw new Error('failed to decode response: missing attestations');
        }

        const attestations: Attestation[] = [];
        for (const [index, raw] of body.attestations.entries()) {
            if (!isRecord(raw)) {
                continue;
            }
            const bundleUrl = typeof raw.bundle_url === 'string' ? raw.bundle_url : undefined;
            let bundle: unknown = raw.bundle ?? undefined;
            if (bundle === undefined && bundleUrl) {
                try {
                    bundle = JSON.parse((await httpGet(this.http, bundleUrl, { signal })).toString('utf8'));
                } catch (error) {
                    throw new Error(`failed to fetch bundle ${index}: ${errorMessage(error)}`, { cause: error });
                }
            }
            attestations.push({ bundle, bundleUrl });
        }
        return attestations;
    }

    private async getJson(
        url: string,
        signal?: AbortSignal,
        describeStatus?: (status: number) => string | undefined
    ): Promise<unknown> {
        getLogger().verbose(LogCategory.HTTP, `GET ${url}`);
        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.get<unknown>(url, { signal, validateStatus: () => true });
        } catch (error) {
            throw toRequestError(url, error);
        }

        if (response.status !== 200) {
            const message =
                describeStatus?.(response.status) ??
                `GitHub API returned status ${response.status}: ${stringifyBody(response.data)}`;
            throw new FetchError(message, url, response.status);
        }
        return response.data;
    }
}

function compareReleasesDesc(a: Release, b: Release): number {
    if (a.tagName !== b.tagName) {
        return a.tagName < b.tagName ? 1 : -1;
    }
    return Date.parse(b.createdAt || '0') - Date.parse(a.createdAt || '0');
}

function decodeRelease(raw: unknown): Release {
    if (!isRecord(raw)) {
        throw new Error('failed to decode release');
    }
    const assets: Asset[] = Array.isArray(raw.assets)
        ? raw.assets.filter(isRecord).map(asset => ({
              name: stringField(asset.name),
              browserDownloadUrl: stringField(asset.browser_download_url),
              size: typeof asset.size === 'number' ? asset.size : 0,
          }))
        : [];
    return {
        tagName: stringField(raw.tag_name),
        name: stringField(raw.name),
        createdAt: stringField(raw.created_at),
        publishedAt: stringField(raw.published_at),
        assets,
    };
}

function stringField(value: unknown): string {
    return typeof value === 'string' ? value : '';
}

function stringifyBody(data: unknown): string {
    if (typeof data === 'string') return data;
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    return JSON.stringify(data) ?? '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
