// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as path from 'path';
import { AxiosInstance } from 'axios';
import { execute } from '../concurrency/pool';
import { Certificate, TrustBundleConfig, getSourceLocation, validateFingerprint } from '../manifest/model';
import { fetchSource, resolveSource } from '../source/resolver';
import { CertificateInfo, encodePem, formatCertificateTime, parseCertificate } from '../x509/certificate';
import { CancelledError, wrapError } from '../utils/errors';
import { createHttpClient } from '../utils/http';
import { getLogger, LogCategory } from '../utils/logger';
import { BundleType, MetadataKey, defaultFilename, describeBundleType } from './constants';

export interface GenerateOptions {
    /** 0 detects the CPU count. */
    workers?: number;
    /** Only the base name is written in the header. */
    outputPath?: string;
    date?: string;
    commit?: string;
    type?: BundleType;
    signal?: AbortSignal;
}

type CertificateOutcome = { ok: true; block: string } | { ok: false; error: Error };

interface Task {
    vendorId: string;
    vendorName: string;
    cert: Certificate;
}

/**
 * Builds a PEM trust bundle from a manifest. Every certificate is fetched and
 * checked against its fingerprint; the first failure, in manifest order,
 * aborts generation.
 */
export class BundleGenerator {
    private readonly client: AxiosInstance;

    constructor(client?: AxiosInstance) {
        this.client = client ?? createHttpClient();
    }

    async generate(config: TrustBundleConfig, options: GenerateOptions = {}): Promise<string> {
        const logger = getLogger();
        const type = options.type ?? 'root';
        const startTime = Date.now();

        const tasks: Task[] = config.vendors.flatMap(vendor =>
            vendor.certificates.map(cert => ({ vendorId: vendor.id, vendorName: vendor.name, cert }))
        );
        logger.verbose(LogCategory.BUNDLE, `Generating ${type} bundle from ${tasks.length} certificate(s)`);

        const outcomes = await execute(options.workers ?? 0, tasks, (_, task) => this.process(task, options.signal));

        if (options.signal?.aborted) {
            throw new CancelledError('bundle generation cancelled');
        }

        const blocks: string[] = [];
        for (const outcome of outcomes) {
            if (!outcome.ok) {
                throw outcome.error;
            }
            blocks.push(outcome.block);
        }

        logger.verbose(LogCategory.PERF, `Bundle generated in ${logger.formatDuration(Date.now() - startTime)}`);
        const filename = options.outputPath ? path.basename(options.outputPath) : defaultFilename(type);
        return buildBundleHeader(filename, type, options.date, options.commit) + blocks.join('\n');
    }

    private async process(task: Task, signal?: AbortSignal): Promise<CertificateOutcome> {
        const logger = getLogger();
        const location = getSourceLocation(task.cert);
        try {
            logger.verboseIndent(LogCategory.BUNDLE, `${task.vendorId}: ${task.cert.name} (${location})`);
            const data = await fetchSource(resolveSource(location), { client: this.client, signal });
            const info = parseCertificate(data);
            try {
                validateFingerprint(info.der, task.cert.validation.fingerprint);
            } catch (error) {
                throw wrapError('fingerprint validation failed', error);
            }
            return { ok: true, block: buildCertificateBlock(info, task.cert.name, task.vendorId) };
        } catch (error) {
            return {
                ok: false,
                error: wrapError(
                    `failed to process certificate ${JSON.stringify(task.cert.name)} from vendor ${JSON.stringify(task.vendorName)}`,
                    error
                ),
            };
        }
    }
}

export function buildBundleHeader(filename: string, type: BundleType, date?: string, commit?: string): string {
    const lines = ['##', `## ${filename}`, '##'];
    if (date) lines.push(`## ${MetadataKey.Date}: ${date}`);
    if (commit) lines.push(`## ${MetadataKey.Commit}: ${commit}`);
    lines.push(
        '##',
        '## This file has been auto-generated by tpmtb (TPM Trust Bundle)',
        `## and contains a list of verified ${describeBundleType(type)}.`,
        '##',
        '',
        ''
    );
    return lines.join('\n');
}

export function buildCertificateBlock(info: CertificateInfo, name: string, vendorId: string): string {
    const header = [
        '#',
        `# ${MetadataKey.Certificate}: ${name}`,
        `# ${MetadataKey.Owner}: ${vendorId}`,
        '#',
        `# ${MetadataKey.Issuer}: ${info.issuer}`,
        `# ${MetadataKey.SerialNumber}: ${info.serialNumber}`,
        `# ${MetadataKey.Subject}: ${info.subject}`,
        `# ${MetadataKey.NotValidBefore}: ${formatCertificateTime(info.notBefore)}`,
        `# ${MetadataKey.NotValidAfter} : ${formatCertificateTime(info.notAfter)}`,
        `# ${MetadataKey.FingerprintSha256}: ${info.sha256}`,
        `# ${MetadataKey.FingerprintSha1}: ${info.sha1}`,
    ];
    return header.join('\n') + '\n' + encodePem(info.der);
}
