// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { AxiosInstance } from 'axios';
import { execute } from '../concurrency/pool';
import { Certificate, TrustBundleConfig, getSourceLocation, validateFingerprint } from '../manifest/model';
import { fetchSource, resolveSource } from '../source/resolver';
import { formatDate, parseCertificate } from '../x509/certificate';
import { errorMessage, wrapError } from '../utils/errors';
import { createHttpClient } from '../utils/http';

export const DEFAULT_THRESHOLD_DAYS = 365;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SanityValidationError {
    vendorId: string;
    vendorName: string;
    certName: string;
    error: Error;
}

export interface ExpirationWarning {
    vendorId: string;
    vendorName: string;
    certName: string;
    daysLeft: number;
    isExpired: boolean;
    expiryDate: Date;
}

export interface SanityResult {
    validationErrors: SanityValidationError[];
    expirationWarnings: ExpirationWarning[];
}

export interface SanityOptions {
    workers?: number;
    thresholdDays?: number;
    now?: Date;
    client?: AxiosInstance;
    signal?: AbortSignal;
}

interface CheckOutcome {
    validationError?: SanityValidationError;
    expirationWarning?: ExpirationWarning;
    error?: Error;
}

export function hasIssues(result: SanityResult): boolean {
    return result.validationErrors.length > 0 || result.expirationWarnings.length > 0;
}

/**
 * Fetch every certificate of a manifest, checking its fingerprint and how long
 * it stays valid. A fetch failure aborts the run.
 */
export async function runSanityCheck(config: TrustBundleConfig, options: SanityOptions = {}): Promise<SanityResult> {
    const client = options.client ?? createHttpClient();
    const threshold = options.thresholdDays ?? DEFAULT_THRESHOLD_DAYS;
    const now = options.now ?? new Date();

    const tasks = config.vendors.flatMap(vendor =>
        vendor.certificates.map(cert => ({ vendorId: vendor.id, vendorName: vendor.name, cert }))
    );

    const outcomes = await execute(options.workers ?? 0, tasks, async (_, task): Promise<CheckOutcome> => {
        try {
            return await checkCertificate(task.cert, task.vendorId, task.vendorName, threshold, now, client, options.signal);
        } catch (error) {
            return { error: error instanceof Error ? error : new Error(String(error)) };
        }
    });

    const result: SanityResult = { validationErrors: [], expirationWarnings: [] };
    for (const outcome of outcomes) {
        if (outcome.error) {
            throw outcome.error;
        }
        if (outcome.validationError) result.validationErrors.push(outcome.validationError);
        if (outcome.expirationWarning) result.expirationWarnings.push(outcome.expirationWarning);
    }
    return result;
}

async function checkCertificate(
    cert: Certificate,
    vendorId: string,
    vendorName: string,
    threshold: number,
    now: Date,
    client: AxiosInstance,
    signal?: AbortSignal
): Promise<CheckOutcome> {
    let data: Buffer;
    try {
        data = await fetchSource(resolveSource(getSourceLocation(cert)), { client, signal });
    } catch (error) {
        throw wrapError(
            `failed to download certificate ${JSON.stringify(cert.name)} from vendor ${JSON.stringify(vendorName)}`,
            error
        );
    }
    const info = parseCertificate(data);
    const outcome: CheckOutcome = {};

    try {
        validateFingerprint(info.der, cert.validation.fingerprint);
    } catch (error) {
        outcome.validationError = {
            vendorId,
            vendorName,
            certName: cert.name,
            error: error instanceof Error ? error : new Error(errorMessage(error)),
        };
    }

    const daysLeft = Math.floor((info.notAfter.getTime() - now.getTime()) / DAY_MS);
    if (daysLeft < threshold) {
        outcome.expirationWarning = {
            vendorId,
            vendorName,
            certName: cert.name,
            daysLeft,
            isExpired: daysLeft < 0,
            expiryDate: info.notAfter,
        };
    }
    return outcome;
}

export function formatValidationError(e: SanityValidationError): string {
    return [
        `  Vendor: ${e.vendorName} (${e.vendorId})`,
        `  Certificate: ${e.certName}`,
        `  Error: ${e.error.message}`,
        '',
    ].join('\n');
}

export function formatExpirationWarning(w: ExpirationWarning): string {
    const status = w.isExpired
        ? `Expired on ${formatDate(w.expiryDate)}`
        : `Expires in ${w.daysLeft} days (${formatDate(w.expiryDate)})`;
    return [`  Vendor: ${w.vendorName} (${w.vendorId})`, `  Certificate: ${w.certName}`, `  Status: ${status}`, ''].join(
        '\n'
    );
}
