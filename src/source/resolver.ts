// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as fs from 'fs/promises';
import * as path from 'path';
import { URL } from 'url';
import { AxiosInstance } from 'axios';
import { CertificateInfo, parseCertificate } from '../x509/certificate';
import { FetchError, errorMessage, wrapError } from '../utils/errors';
import { createHttpClient, httpGet } from '../utils/http';

const FILE_SCHEME = 'file://';

export type CertificateSource =
    | { kind: 'https'; url: string }
    | { kind: 'file'; path: string };

export interface FetchOptions {
    client?: AxiosInstance;
    signal?: AbortSignal;
}

/**
 * Classify a manifest location. `file://` URIs must carry an absolute path;
 * placeholders are expected to be resolved already.
 */
export function resolveSource(uri: string): CertificateSource {
    let scheme: string;
    try {
        scheme = new URL(uri).protocol.replace(/:$/, '');
    } catch (error) {
        throw wrapError('invalid URI', error);
    }

    switch (scheme) {
        case 'https':
            return { kind: 'https', url: uri };
        case 'file': {
            const filePath = uri.startsWith(FILE_SCHEME) ? uri.slice(FILE_SCHEME.length) : uri;
            if (!path.isAbsolute(filePath)) {
                throw new Error('relative paths are not supported');
            }
            return { kind: 'file', path: filePath };
        }
        default:
            throw new Error(`unsupported URI scheme '${scheme}': must be 'https' or 'file'`);
    }
}

export async function fetchSource(source: CertificateSource, options: FetchOptions = {}): Promise<Buffer> {
    switch (source.kind) {
        case 'https':
            return httpGet(options.client ?? createHttpClient(), source.url, { signal: options.signal });
        case 'file':
            try {
                return await fs.readFile(source.path);
            } catch (error) {
                throw new FetchError(`failed to read file ${source.path}: ${errorMessage(error)}`, source.path, undefined, {
                    cause: error,
                });
            }
    }
}

/**
 * Fetch and parse the certificate behind a manifest location.
 */
export async function fetchCertificate(uri: string, options: FetchOptions = {}): Promise<CertificateInfo> {
    const data = await fetchSource(resolveSource(uri), options);
    try {
        return parseCertificate(data);
    } catch (error) {
        throw wrapError(`failed to parse certificate from ${uri}`, error);
    }
}
