// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { X509Certificate } from 'crypto';
import { hash } from '../fingerprint/fingerprint';

const PEM_BLOCK = /-----BEGIN CERTIFICATE-----([\s\S]*?)-----END CERTIFICATE-----/g;
const PEM_LINE_LENGTH = 64;

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * The fields of a certificate that appear in bundle metadata, rendered once so
 * the generator and the validator always agree on their text.
 */
export interface CertificateInfo {
    der: Buffer;
    subject: string;
    issuer: string;
    commonName: string;
    serialNumber: string;
    notBefore: Date;
    notAfter: Date;
    sha256: string;
    sha1: string;
}

/**
 * Parse a certificate given as DER, or as PEM when the data carries a PEM
 * header. Only the first PEM block is read.
 */
export function parseCertificate(data: Uint8Array): CertificateInfo {
    const buffer = Buffer.from(data);
    const text = buffer.toString('latin1');
    if (text.includes('-----BEGIN CERTIFICATE-----')) {
        const blocks = decodePemBlocks(text);
        if (blocks.length === 0) {
            throw new Error('failed to decode PEM block containing certificate');
        }
        return fromDer(blocks[0]);
    }

    try {
        return fromDer(buffer);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`failed to parse certificate (neither DER nor PEM): ${reason}`);
    }
}

export function fromDer(der: Buffer): CertificateInfo {
    const cert = new X509Certificate(der);
    return {
        der: Buffer.from(cert.raw),
        subject: formatDistinguishedName(cert.subject),
        issuer: formatDistinguishedName(cert.issuer),
        commonName: commonNameOf(cert.subject),
        serialNumber: formatSerialNumber(cert.serialNumber),
        notBefore: parseCertificateTime(cert.validFrom),
        notAfter: parseCertificateTime(cert.validTo),
        sha256: hash(cert.raw, 'sha256'),
        sha1: hash(cert.raw, 'sha1'),
    };
}

/**
 * Decode every CERTIFICATE block of a PEM document into DER.
 */
export function decodePemBlocks(text: string): Buffer[] {
    const blocks: Buffer[] = [];
    for (const match of text.matchAll(PEM_BLOCK)) {
        blocks.push(Buffer.from(match[1].replace(/\s+/g, ''), 'base64'));
    }
    return blocks;
}

export function encodePem(der: Uint8Array): string {
    const body = Buffer.from(der).toString('base64');
    const lines: string[] = ['-----BEGIN CERTIFICATE-----'];
    for (let i = 0; i < body.length; i += PEM_LINE_LENGTH) {
        lines.push(body.slice(i, i + PEM_LINE_LENGTH));
    }
    lines.push('-----END CERTIFICATE-----');
    return lines.join('\n') + '\n';
}

/**
 * Node prints names one RDN per line, least specific first. Metadata uses the
 * RFC 4514 order: most specific first, comma separated.
 */
export function formatDistinguishedName(name: string): string {
    return name
        .split('\n')
        .filter(part => part.length > 0)
        .reverse()
        .join(',');
}

function commonNameOf(name: string): string {
    const cn = name.split('\n').find(part => part.startsWith('CN='));
    return cn ? cn.slice(3).trim() : '';
}

/**
 * `1A2B` becomes `6699 (0x1a2b)`.
 */
export function formatSerialNumber(hex: string): string {
    const value = BigInt(`0x${hex}`);
    return `${value.toString(10)} (0x${value.toString(16)})`;
}

/**
 * Parse the OpenSSL validity format Node exposes, e.g. `Jan  2 15:04:05 2006 GMT`.
 */
export function parseCertificateTime(value: string): Date {
    const match = /^([A-Z][a-z]{2})\s+(\d{1,2}) (\d{2}):(\d{2}):(\d{2}) (\d{4}) GMT$/.exec(value.trim());
    if (!match) {
        throw new Error(`unrecognised certificate time: ${value}`);
    }
    const month = MONTHS.indexOf(match[1]);
    if (month < 0) {
        throw new Error(`unrecognised certificate month: ${match[1]}`);
    }
    return new Date(Date.UTC(
        Number(match[6]),
        month,
        Number(match[2]),
        Number(match[3]),
        Number(match[4]),
        Number(match[5]),
    ));
}

/**
 * `Mon Jan 02 15:04:05 2006`, always UTC.
 */
export function formatCertificateTime(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return [
        WEEKDAYS[date.getUTCDay()],
        MONTHS[date.getUTCMonth()],
        pad(date.getUTCDate()),
        `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`,
        String(date.getUTCFullYear()),
    ].join(' ');
}

/**
 * `2006-01-02` in UTC.
 */
export function formatDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}
