// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import axios, { AxiosInstance } from 'axios';
import { CancelledError, FetchError } from './errors';
import { getLogger, LogCategory } from './logger';

export const DEFAULT_HTTP_TIMEOUT = 5000;

/** 5 MiB. */
export const DEFAULT_MAX_LENGTH = 5 * 1024 * 1024;

export interface HttpClientOptions {
    timeout?: number;
    baseURL?: string;
    headers?: Record<string, string>;
}

export interface HttpGetOptions {
    signal?: AbortSignal;
    maxLength?: number;
}

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
    return axios.create({
        baseURL: options.baseURL,
        timeout: options.timeout ?? DEFAULT_HTTP_TIMEOUT,
        headers: options.headers,
    });
}

/**
 * GET `url` and return the body. A single attempt: any status other than
 * 200 fails.
 */
export async function httpGet(client: AxiosInstance, url: string, options: HttpGetOptions = {}): Promise<Buffer> {
    const logger = getLogger();
    const maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
    logger.verbose(LogCategory.HTTP, `GET ${url}`);

    let status: number;
    let data: unknown;
    try {
        const response = await client.get<unknown>(url, {
            responseType: 'arraybuffer',
            signal: options.signal,
            validateStatus: () => true,
        });
        status = response.status;
        data = response.data;
    } catch (error) {
        throw toRequestError(url, error);
    }

    logger.verboseIndent(LogCategory.HTTP, `Status: ${status}`);
    if (status !== 200) {
        throw new FetchError(`failed to download from ${url}: HTTP ${status}`, url, status);
    }

    const body = toBuffer(data);
    if (body.length > maxLength) {
        throw new FetchError(
            `download failed for ${url}, length ${body.length} is larger than expected ${maxLength}`,
            url,
            status
        );
    }
    logger.verboseIndent(LogCategory.HTTP, `Response size: ${logger.formatBytes(body.length)}`);
    return body;
}

/**
 * Map a transport failure (no response) to `CancelledError` for aborts and
 * timeouts, `FetchError` otherwise.
 */
export function toRequestError(url: string, error: unknown): Error {
    if (axios.isCancel(error)) {
        return new CancelledError(`request to ${url} was cancelled`, { cause: error });
    }
    if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
        return new CancelledError(`request to ${url} timed out`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new FetchError(`failed to download from ${url}: ${message}`, url, undefined, { cause: error });
}

function toBuffer(data: unknown): Buffer {
    if (Buffer.isBuffer(data)) {
        return data;
    }
    if (data instanceof ArrayBuffer) {
        return Buffer.from(new Uint8Array(data));
    }
    if (ArrayBuffer.isView(data)) {
        return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    }
    if (typeof data === 'string') {
        return Buffer.from(data);
    }
    if (data === undefined || data === null) {
        return Buffer.alloc(0);
    }
    return Buffer.from(JSON.stringify(data));
}
