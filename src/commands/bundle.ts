// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { getTrustedBundle, saveTrustedBundle, verifyTrustedBundle } from '../api/api';
import {
    BundleType,
    CHECKSUMS_FILENAME,
    CHECKSUMS_SIGNATURE_FILENAME,
    INTERMEDIATE_BUNDLE_FILENAME,
    defaultFilename,
    parseBundleType,
} from '../bundle/constants';
import { BundleGenerator } from '../bundle/generator';
import { BundleMetadata, parseMetadata, validateCommit, validateDate } from '../bundle/metadata';
import { validateBundle } from '../bundle/validator';
import { CacheFile } from '../cache/cache';
import { EnvConfigParser } from '../config/env-config';
import { GitHubClient } from '../github/client';
import { SortOrder } from '../github/types';
import { loadConfig } from '../manifest/loader';
import { DEFAULT_INTERMEDIATES_CONFIG, DEFAULT_ROOTS_CONFIG, TrustBundleConfig } from '../manifest/model';
import { AcceptanceMode, buildSignerURI, sourceRepositoryURI } from '../transparency/policy';
import { AttestationOutcome } from '../transparency/verifier';
import { wrapError } from '../utils/errors';
import { resolveGitMetadata } from '../utils/git';
import { getLogger } from '../utils/logger';
import { MAX_DISPLAYED_ISSUES, applyQuiet, checkWorkers, parseCount, printIssues, reportFailure, splitList } from './shared';

const STDOUT = '-';

interface GenerateCommandOptions {
    config: string;
    output?: string;
    workers: number;
    date?: string;
    commit?: string;
    type?: string;
}

interface VerifyCommandOptions {
    checksumsFile?: string;
    checksumsSignature?: string;
    provenance?: string;
    trustedRoot?: string;
    date?: string;
    commit?: string;
    acceptance: string;
}

interface DownloadCommandOptions {
    date?: string;
    outputDir: string;
    type?: string;
    skipVerify?: boolean;
    force?: boolean;
    offline?: boolean;
}

interface ListCommandOptions {
    limit: number;
    sort: string;
}

interface SaveCommandOptions {
    date?: string;
    vendorIds?: string;
    outputDir: string;
    force?: boolean;
}

export function registerBundleCommands(program: Command): void {
    const bundle = program.command('bundle').description('Generate, verify and fetch TPM trust bundles');

    bundle
        .command('generate')
        .description('Generate a PEM trust bundle from a manifest')
        .option('-c, --config <path>', 'Path to the manifest', DEFAULT_ROOTS_CONFIG)
        .option('-o, --output <path>', 'Write the bundle to this file instead of stdout')
        .option('-j, --workers <n>', 'Concurrent downloads (0 = detect)', parseCount, 0)
        .option('-d, --date <date>', 'Bundle date (YYYY-MM-DD); read from the git tag on HEAD when omitted')
        .option('--commit <hash>', 'Source commit; read from git HEAD when omitted')
        .option('-t, --type <type>', 'Bundle type: root or intermediate (default: from the manifest name)')
        .action(async (opts: GenerateCommandOptions) => {
            try {
                const type = opts.type ? parseBundleType(opts.type) : detectBundleType(opts.config);
                checkWorkers(opts.workers);
                const { date, commit } = await resolveReleaseMetadata(opts.date, opts.commit);

                let config: TrustBundleConfig;
                try {
                    config = loadConfig(opts.config);
                } catch (error) {
                    throw wrapError('failed to load configuration', error);
                }

                let content: string;
                try {
                    content = await new BundleGenerator().generate(config, {
                        workers: opts.workers,
                        outputPath: opts.output,
                        date,
                        commit,
                        type,
                    });
                } catch (error) {
                    throw wrapError('failed to generate bundle', error);
                }

                if (!opts.output) {
                    process.stdout.write(content);
                    return;
                }
                fs.writeFileSync(opts.output, content, { mode: 0o644 });
                getLogger().success(`Bundle generated: ${opts.output}`);
            } catch (e) {
                reportFailure('bundle generation', e);
            }
        });

    bundle
        .command('verify <bundle-file>')
        .description('Verify a bundle against its signed checksums and provenance attestations')
        .option('--checksums-file <path>', `Checksums file (default: ${CHECKSUMS_FILENAME} beside the bundle, else the release)`)
        .option('--checksums-signature <path>', `Checksums signature (default: ${CHECKSUMS_SIGNATURE_FILENAME} beside the bundle)`)
        .option('--provenance <path>', `Attestation bundles (default: ${CacheFile.Provenance} beside the bundle)`)
        .option('--trusted-root <path>', 'Sigstore trusted root JSON instead of the TUF-distributed one')
        .option('--date <date>', 'Expected bundle date (default: from the bundle header)')
        .option('--commit <hash>', 'Expected source commit (default: from the bundle header)')
        .option('--acceptance <mode>', "Attestations that must pass: 'any' or 'all'", 'any')
        .action(async (bundleFile: string, opts: VerifyCommandOptions) => {
            const logger = getLogger();
            try {
                const acceptance = parseAcceptance(opts.acceptance);
                const bundleData = readInput(bundleFile, 'bundle');
                const metadata = verificationMetadata(bundleFile, bundleData, opts);
                const dir = path.dirname(bundleFile);

                const result = await verifyTrustedBundle({
                    bundle: bundleData,
                    metadata,
                    checksums: readBeside(opts.checksumsFile, dir, CHECKSUMS_FILENAME, 'checksums file'),
                    checksumsSignature: readBeside(
                        opts.checksumsSignature,
                        dir,
                        CHECKSUMS_SIGNATURE_FILENAME,
                        'checksums signature'
                    ),
                    provenance: readBeside(opts.provenance, dir, CacheFile.Provenance, 'provenance'),
                    trustedRoot: opts.trustedRoot ? readInput(opts.trustedRoot, 'trusted root') : undefined,
                    acceptance,
                });

                logger.info(`Bundle: ${bundleFile}`);
                logger.info(`  Date:   ${metadata.date}`);
                logger.info(`  Commit: ${metadata.commit}`);
                logger.info(`  Digest: sha256:${result.checksum.digest}`);
                logger.info('Policy:');
                logger.info(`  Source repository: ${sourceRepositoryURI(result.policy)}`);
                logger.info(`  Build signer:      ${buildSignerURI(result.policy)}`);
                logger.info(`  OIDC issuer:       ${result.policy.oidcIssuer}`);
                logger.info(`  Predicate type:    ${result.policy.predicateType}`);
                logger.info(`  Acceptance:        ${result.policy.acceptance}`);
                logger.info('Attestations:');
                for (const outcome of result.attestations) {
                    logger.info(`  ${describeOutcome(outcome)}`);
                }
                logger.success('Bundle verified successfully');
            } catch (e) {
                reportFailure('bundle verification', e);
            }
        });

    bundle
        .command('download')
        .description('Download, verify and cache a released bundle')
        .option('-d, --date <date>', 'Release date (YYYY-MM-DD); the latest release when omitted')
        .option('-o, --output-dir <dir>', `Output directory, or ${STDOUT} for stdout`, '.')
        .option('-t, --type <type>', 'Bundle type: root or intermediate (default: both when available)')
        .option('--skip-verify', 'Skip signature and provenance verification')
        .option('-f, --force', 'Overwrite existing files')
        .option('--offline', 'Serve the bundle from the local cache only')
        .action(async (opts: DownloadCommandOptions) => {
            try {
                const toStdout = opts.outputDir === STDOUT;
                const requested = opts.type ? parseBundleType(opts.type) : undefined;
                if (toStdout && !requested) {
                    throw new Error('when using stdout (--output-dir -), you must specify --type (root or intermediate)');
                }
                if (!toStdout && !fs.existsSync(opts.outputDir)) {
                    throw new Error(`output directory ${opts.outputDir} does not exist`);
                }

                const trusted = await getTrustedBundle({
                    date: opts.date,
                    skipVerify: opts.skipVerify,
                    offline: opts.offline,
                });

                const outputs: Array<[BundleType, Buffer]> = [];
                if (requested !== 'intermediate') {
                    outputs.push(['root', trusted.rawRoot]);
                }
                if (requested !== 'root') {
                    const intermediate = trusted.rawIntermediate;
                    if (intermediate) {
                        outputs.push(['intermediate', intermediate]);
                    } else if (requested === 'intermediate') {
                        throw new Error('intermediate bundle not available for this release');
                    }
                }

                if (toStdout) {
                    process.stdout.write(outputs[0][1]);
                    return;
                }
                for (const [type, data] of outputs) {
                    const target = path.join(opts.outputDir, defaultFilename(type));
                    if (fs.existsSync(target) && !opts.force) {
                        throw new Error(`file ${target} already exists (use --force to overwrite)`);
                    }
                    fs.writeFileSync(target, data, { mode: 0o644 });
                    getLogger().success(`Downloaded ${type} bundle to ${target}`);
                }
            } catch (e) {
                reportFailure('bundle download', e);
            }
        });

    bundle
        .command('list')
        .description('List released bundles')
        .option('-l, --limit <n>', 'Maximum number of releases', parseCount, 10)
        .option('-s, --sort <order>', "Sort order: 'asc' or 'desc'", 'desc')
        .action(async (opts: ListCommandOptions) => {
            const logger = getLogger();
            try {
                const sortOrder = parseSortOrder(opts.sort);
                if (opts.limit <= 0) {
                    throw new Error('limit must be greater than 0');
                }
                const env = EnvConfigParser.loadConfig();
                const client = new GitHubClient({ token: env.githubToken, timeout: env.httpTimeout });
                const releases = await client.listReleases(env.sourceRepo, { pageSize: opts.limit, sortOrder });

                if (releases.length === 0) {
                    logger.info('No bundle releases found');
                    return;
                }
                logger.info(`Available TPM trust bundle releases (${releases.length}):`);
                for (const release of releases) {
                    logger.info(`  ${release.tagName}`);
                }
            } catch (e) {
                reportFailure('listing releases', e);
            }
        });

    bundle
        .command('validate <bundle-file>')
        .description('Check a bundle file for format and metadata errors')
        .option('-q, --quiet', 'Suppress output, only set the exit code')
        .action((bundleFile: string, opts: { quiet?: boolean }) => {
            applyQuiet(opts.quiet);
            try {
                const issues = validateBundle(readInput(bundleFile, 'bundle'), { maxErrors: MAX_DISPLAYED_ISSUES });
                printIssues(bundleFile, issues);
            } catch (e) {
                reportFailure('bundle validation', e);
            }
        });

    bundle
        .command('save')
        .description('Save a verified bundle with everything needed to verify it again offline')
        .option('-d, --date <date>', 'Release date (YYYY-MM-DD); the latest release when omitted')
        .option('--vendor-ids <ids>', 'Comma-separated vendor IDs to record as the filter')
        .requiredOption('-o, --output-dir <dir>', 'Directory receiving the bundle files')
        .option('-f, --force', 'Write into a directory that already holds a bundle')
        .action(async (opts: SaveCommandOptions) => {
            const logger = getLogger();
            try {
                if (!opts.force && fs.existsSync(path.join(opts.outputDir, CacheFile.Config))) {
                    throw new Error(`${opts.outputDir} already contains a bundle (use --force to overwrite)`);
                }
                const result = await saveTrustedBundle(
                    { date: opts.date, vendorIDs: splitList(opts.vendorIds) },
                    opts.outputDir
                );
                logger.success(`Saved bundle ${result.bundle.rootMetadata.date} to ${result.outputDir}`);
                for (const file of result.files) {
                    logger.info(`  ${file}`);
                }
            } catch (e) {
                reportFailure('bundle save', e);
            }
        });
}

function detectBundleType(configPath: string): BundleType {
    return path.basename(configPath) === DEFAULT_INTERMEDIATES_CONFIG ? 'intermediate' : 'root';
}

async function resolveReleaseMetadata(date?: string, commit?: string): Promise<{ date: string; commit: string }> {
    if (Boolean(date) !== Boolean(commit)) {
        throw new Error('both --date and --commit flags must be provided together');
    }
    const metadata = date && commit ? { date, commit } : await resolveGitMetadata();
    try {
        validateDate(metadata.date);
    } catch (error) {
        throw wrapError('invalid --date flag', error);
    }
    try {
        validateCommit(metadata.commit);
    } catch (error) {
        throw wrapError('invalid --commit flag', error);
    }
    return metadata;
}

function verificationMetadata(bundleFile: string, data: Buffer, opts: VerifyCommandOptions): BundleMetadata {
    if (!opts.date && !opts.commit) {
        return parseMetadata(data);
    }
    if (!opts.date || !opts.commit) {
        throw new Error('both --date and --commit flags must be provided together');
    }
    const type: BundleType = path.basename(bundleFile) === INTERMEDIATE_BUNDLE_FILENAME ? 'intermediate' : 'root';
    return { date: opts.date, commit: opts.commit, type };
}

function parseAcceptance(value: string): AcceptanceMode {
    if (value !== 'any' && value !== 'all') {
        throw new Error(`invalid acceptance mode "${value}", must be 'any' or 'all'`);
    }
    return value;
}

function parseSortOrder(value: string): SortOrder {
    if (value !== 'asc' && value !== 'desc') {
        throw new Error(`invalid sort order "${value}", must be 'asc' or 'desc'`);
    }
    return value;
}

function readInput(file: string, label: string): Buffer {
    try {
        return fs.readFileSync(file);
    } catch (error) {
        throw wrapError(`failed to read ${label}`, error);
    }
}

/**
 * An explicit path must exist; otherwise a file of the default name beside
 * the bundle is used when present.
 */
function readBeside(explicit: string | undefined, dir: string, filename: string, label: string): Buffer | undefined {
    if (explicit) {
        return readInput(explicit, label);
    }
    const candidate = path.join(dir, filename);
    return fs.existsSync(candidate) ? readInput(candidate, label) : undefined;
}

function describeOutcome(outcome: AttestationOutcome): string {
    if (outcome.state === 'Accepted') {
        return `#${outcome.index}: accepted`;
    }
    return `#${outcome.index}: rejected at ${outcome.stage} (${outcome.kind}): ${outcome.reason}`;
}
