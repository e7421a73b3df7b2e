// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { Command } from 'commander';
import { formatFile, needsFormatting } from '../manifest/formatter';
import { loadConfig, saveConfig } from '../manifest/loader';
import { DEFAULT_ROOTS_CONFIG, TrustBundleConfig, getSourceLocation } from '../manifest/model';
import { DEFAULT_HASH_ALGORITHM, addCertificates, addVendor, removeCertificate, requireVendor } from '../manifest/editor';
import { validateManifestFile } from '../manifest/validator';
import {
    DEFAULT_THRESHOLD_DAYS,
    SanityResult,
    formatExpirationWarning,
    formatValidationError,
    hasIssues,
    runSanityCheck,
} from '../sanity/checker';
import { wrapError } from '../utils/errors';
import { getLogger } from '../utils/logger';
import { MAX_DISPLAYED_ISSUES, applyQuiet, checkWorkers, parseCount, printIssues, reportFailure } from './shared';

interface FormatCommandOptions {
    config: string;
    output?: string;
    dryRun?: boolean;
}

interface SanityCommandOptions {
    config: string;
    quiet?: boolean;
    workers: number;
    threshold: number;
}

interface AddCertificateCommandOptions {
    config: string;
    vendorId: string;
    uri: string;
    name?: string;
    fingerprint?: string;
    hashAlgorithm: string;
    workers: number;
}

const FINGERPRINT_LABELS = [
    ['sha1', 'SHA1:  '],
    ['sha256', 'SHA256:'],
    ['sha384', 'SHA384:'],
    ['sha512', 'SHA512:'],
] as const;

export function registerConfigCommands(program: Command): void {
    const config = program.command('config').description('Edit and check the certificate manifest');

    config
        .command('format')
        .description('Rewrite a manifest in canonical form')
        .option('-c, --config <path>', 'Path to the manifest', DEFAULT_ROOTS_CONFIG)
        .option('-o, --output <path>', 'Write the result here instead of in place')
        .option('--dry-run', 'Only report whether the file needs formatting')
        .action((opts: FormatCommandOptions) => {
            const logger = getLogger();
            try {
                if (opts.dryRun) {
                    if (needsFormatting(opts.config)) {
                        logger.warn(`File needs formatting: ${opts.config}`);
                        throw new Error('file is not properly formatted');
                    }
                    logger.success(`File is properly formatted: ${opts.config}`);
                    return;
                }
                const output = opts.output ?? opts.config;
                formatFile(opts.config, output);
                logger.success(`Formatted: ${output}`);
            } catch (e) {
                reportFailure('config format', e);
            }
        });

    config
        .command('validate')
        .description('Check a manifest for formatting and content errors')
        .option('-c, --config <path>', 'Path to the manifest', DEFAULT_ROOTS_CONFIG)
        .option('-q, --quiet', 'Suppress output, only set the exit code')
        .action((opts: { config: string; quiet?: boolean }) => {
            applyQuiet(opts.quiet);
            try {
                printIssues(opts.config, validateManifestFile(opts.config, { maxErrors: MAX_DISPLAYED_ISSUES }));
            } catch (e) {
                reportFailure('config validation', e);
            }
        });

    config
        .command('sanity')
        .description('Download every certificate and check its fingerprint and expiry')
        .option('-c, --config <path>', 'Path to the manifest', DEFAULT_ROOTS_CONFIG)
        .option('-q, --quiet', 'Suppress output, only set the exit code')
        .option('-j, --workers <n>', 'Concurrent downloads (0 = detect)', parseCount, 0)
        .option('-t, --threshold <days>', 'Warn about certificates expiring within this many days', parseCount, DEFAULT_THRESHOLD_DAYS)
        .action(async (opts: SanityCommandOptions) => {
            applyQuiet(opts.quiet);
            const logger = getLogger();
            try {
                const manifest = loadManifest(opts.config);
                checkWorkers(opts.workers);

                let result: SanityResult;
                try {
                    result = await runSanityCheck(manifest, { workers: opts.workers, thresholdDays: opts.threshold });
                } catch (error) {
                    throw wrapError('sanity check failed', error);
                }

                if (!hasIssues(result)) {
                    logger.success('All certificates passed sanity checks.');
                    return;
                }

                if (result.validationErrors.length > 0) {
                    logger.error('Certificate validation errors:');
                    for (const issue of result.validationErrors.slice(0, MAX_DISPLAYED_ISSUES)) {
                        logger.info(formatValidationError(issue));
                    }
                    if (result.validationErrors.length > MAX_DISPLAYED_ISSUES) {
                        logger.info(`(showing first ${MAX_DISPLAYED_ISSUES} errors)`);
                    }
                }
                if (result.expirationWarnings.length > 0) {
                    logger.warn('Certificate expiration warnings:');
                    for (const warning of result.expirationWarnings.slice(0, MAX_DISPLAYED_ISSUES)) {
                        logger.info(formatExpirationWarning(warning));
                    }
                    if (result.expirationWarnings.length > MAX_DISPLAYED_ISSUES) {
                        logger.info(`(showing first ${MAX_DISPLAYED_ISSUES} warnings)`);
                    }
                }
                process.exitCode = 1;
            } catch (e) {
                reportFailure('config sanity', e);
            }
        });

    registerCertificateCommands(config);
    registerVendorCommands(config);
}

function registerCertificateCommands(config: Command): void {
    const certificates = config.command('certificates').description('Manage the certificates of a vendor');

    certificates
        .command('add')
        .description('Download certificates and add them to a vendor')
        .option('-c, --config <path>', 'Path to the manifest', DEFAULT_ROOTS_CONFIG)
        .requiredOption('-i, --vendor-id <id>', 'Vendor ID from the TCG registry')
        .requiredOption('-u, --uri <uris>', 'Comma-separated https:// or file:// locations')
        .option('-n, --name <name>', 'Certificate name (default: the certificate CN)')
        .option('-f, --fingerprint <values>', 'Comma-separated ALG:HEX fingerprints, one per URI')
        .option('-a, --hash-algorithm <alg>', 'Algorithm of computed fingerprints', DEFAULT_HASH_ALGORITHM)
        .option('-j, --workers <n>', 'Concurrent downloads (0 = detect)', parseCount, 0)
        .action(async (opts: AddCertificateCommandOptions) => {
            const logger = getLogger();
            try {
                const manifest = loadManifest(opts.config);
                const result = await addCertificates(manifest, {
                    vendorId: opts.vendorId,
                    uris: opts.uri,
                    fingerprints: opts.fingerprint,
                    name: opts.name,
                    hashAlgorithm: opts.hashAlgorithm,
                    workers: opts.workers,
                });

                for (const failure of result.failures) {
                    logger.warn(`Failed to add certificate from ${failure.uri}: ${failure.error.message}`);
                }
                if (result.added.length === 0) {
                    throw new Error('no certificates were added');
                }
                saveManifest(opts.config, manifest);

                const total = result.added.length + result.failures.length;
                if (total === 1) {
                    logger.success(`Certificate '${result.added[0].name}' added successfully to vendor '${opts.vendorId}'`);
                } else {
                    logger.success(
                        `${result.added.length}/${total} certificates added successfully to vendor '${opts.vendorId}'`
                    );
                }
                if (result.failures.length > 0) {
                    process.exitCode = 1;
                }
            } catch (e) {
                reportFailure('adding certificates', e);
            }
        });

    certificates
        .command('remove')
        .description('Remove a certificate from a vendor')
        .option('-c, --config <path>', 'Path to the manifest', DEFAULT_ROOTS_CONFIG)
        .requiredOption('-i, --vendor-id <id>', 'Vendor ID')
        .requiredOption('-n, --name <name>', 'Certificate name (case-insensitive)')
        .action((opts: { config: string; vendorId: string; name: string }) => {
            try {
                const manifest = loadManifest(opts.config);
                const removed = removeCertificate(manifest, opts.vendorId, opts.name);
                saveManifest(opts.config, manifest);
                getLogger().success(`Certificate '${removed.name}' removed from vendor '${opts.vendorId}'`);
            } catch (e) {
                reportFailure('removing certificate', e);
            }
        });

    certificates
        .command('list')
        .description('List the certificates of the manifest')
        .option('-c, --config <path>', 'Path to the manifest', DEFAULT_ROOTS_CONFIG)
        .option('-i, --vendor-id <id>', 'Only list this vendor')
        .action((opts: { config: string; vendorId?: string }) => {
            const logger = getLogger();
            try {
                const manifest = loadManifest(opts.config);
                const vendors = opts.vendorId ? [requireVendor(manifest, opts.vendorId)] : manifest.vendors;

                for (const vendor of vendors) {
                    logger.info(`Vendor: ${vendor.name} (ID: ${vendor.id})`);
                    logger.info('-'.repeat(80));
                    if (vendor.certificates.length === 0) {
                        logger.info('  No certificates');
                        logger.info('');
                        continue;
                    }
                    for (const cert of vendor.certificates) {
                        logger.info(`  Certificate: ${cert.name}`);
                        logger.info(`    URI: ${getSourceLocation(cert)}`);
                        const fingerprint = cert.validation.fingerprint;
                        const lines = FINGERPRINT_LABELS.flatMap(([key, label]) => {
                            const value = fingerprint[key];
                            return value ? [`    ${label} ${value}`] : [];
                        });
                        for (const line of lines.length > 0 ? lines : ['    No fingerprints']) {
                            logger.info(line);
                        }
                        logger.info('');
                    }
                }
            } catch (e) {
                reportFailure('listing certificates', e);
            }
        });
}

function registerVendorCommands(config: Command): void {
    const vendors = config.command('vendors').description('Manage the vendors of the manifest');

    vendors
        .command('add <id> <name>')
        .description('Add a vendor from the TCG registry')
        .option('-c, --config <path>', 'Path to the manifest', DEFAULT_ROOTS_CONFIG)
        .action((id: string, name: string, opts: { config: string }) => {
            try {
                const manifest = loadManifest(opts.config);
                addVendor(manifest, id, name);
                saveManifest(opts.config, manifest);
                getLogger().success(`Vendor '${name}' (${id}) added successfully`);
            } catch (e) {
                reportFailure('adding vendor', e);
            }
        });

    vendors
        .command('list')
        .description('List the vendors of the manifest')
        .option('-c, --config <path>', 'Path to the manifest', DEFAULT_ROOTS_CONFIG)
        .option('--short', 'One line per vendor')
        .action((opts: { config: string; short?: boolean }) => {
            const logger = getLogger();
            try {
                const manifest = loadManifest(opts.config);
                if (manifest.vendors.length === 0) {
                    logger.info('No vendors found');
                    return;
                }
                if (opts.short) {
                    for (const vendor of manifest.vendors) {
                        logger.info(`${vendor.name} (${vendor.id})`);
                    }
                    return;
                }

                const idWidth = Math.max('VENDOR ID'.length, ...manifest.vendors.map(vendor => vendor.id.length));
                const nameWidth = Math.max('VENDOR NAME'.length, ...manifest.vendors.map(vendor => vendor.name.length));
                const row = (id: string, name: string, count: string) =>
                    `${id.padEnd(idWidth)}  ${name.padEnd(nameWidth)}  ${count}`;
                logger.info(row('VENDOR ID', 'VENDOR NAME', 'CERTIFICATES'));
                for (const vendor of manifest.vendors) {
                    logger.info(row(vendor.id, vendor.name, String(vendor.certificates.length)));
                }
            } catch (e) {
                reportFailure('listing vendors', e);
            }
        });
}

function loadManifest(configPath: string): TrustBundleConfig {
    try {
        return loadConfig(configPath);
    } catch (error) {
        throw wrapError('failed to load configuration', error);
    }
}

function saveManifest(configPath: string, manifest: TrustBundleConfig): void {
    try {
        saveConfig(configPath, manifest);
    } catch (error) {
        throw wrapError('failed to save configuration', error);
    }
}
