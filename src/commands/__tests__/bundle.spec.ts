// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { Command } from 'commander';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { registerBundleCommands } from '../bundle';
import { getTrustedBundle, saveTrustedBundle, verifyTrustedBundle } from '../../api/api';
import { TrustedBundle } from '../../api/trusted-bundle';
import { GitHubClient } from '../../github/client';
import { saveConfig } from '../../manifest/loader';
import { createPolicy } from '../../transparency/policy';
import { resolveGitMetadata } from '../../utils/git';
import { LogLevel, setLogLevel } from '../../utils/logger';
import { ROOT_A, ROOT_C, TEST_COMMIT, TEST_DATE, sampleBundle, sampleManifest } from '../../../tests/fixtures';
import { intermediateBundle } from '../../../tests/fixtures/forge';
import { TEST_REPO } from '../../../tests/fixtures/sigstore';

jest.mock('../../api/api');
jest.mock('../../github/client');
jest.mock('../../utils/git');

describe('Bundle Commands CLI', () => {
    let workDir: string;
    let consoleLogSpy: jest.SpyInstance;
    let consoleErrorSpy: jest.SpyInstance;
    let stdoutSpy: jest.SpyInstance;

    beforeEach(() => {
        jest.clearAllMocks();
        workDir = mkdtempSync(join(tmpdir(), 'tpmtb-bundle-cmd-'));
        consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
        consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
        stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
        consoleLogSpy.mockRestore();
        consoleErrorSpy.mockRestore();
        stdoutSpy.mockRestore();
        rmSync(workDir, { recursive: true, force: true });
        setLogLevel(LogLevel.STANDARD);
        process.exitCode = undefined;
    });

    function run(...args: string[]): Promise<Command> {
        const program = new Command();
        registerBundleCommands(program);
        return program.parseAsync(['node', 'test', 'bundle', ...args]);
    }

    describe('bundle generate', () => {
        let configPath: string;

        beforeEach(() => {
            configPath = join(workDir, '.tpm-roots.yaml');
            saveConfig(configPath, sampleManifest());
        });

        it('should write the bundle to a file', async () => {
            const output = join(workDir, 'tpm-ca-certificates.pem');

            await run('generate', '-c', configPath, '-o', output, '--date', TEST_DATE, '--commit', TEST_COMMIT);

            expect(readFileSync(output, 'utf8')).toBe(sampleBundle());
            expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining(`[OK] Bundle generated: ${output}`));
            expect(resolveGitMetadata).not.toHaveBeenCalled();
            expect(process.exitCode).toBeUndefined();
        });

        it('should read the date and commit from git and print to stdout', async () => {
            jest.mocked(resolveGitMetadata).mockResolvedValue({ date: TEST_DATE, commit: TEST_COMMIT });

            await run('generate', '-c', configPath);

            expect(stdoutSpy).toHaveBeenCalledWith(sampleBundle());
            expect(consoleLogSpy).not.toHaveBeenCalled();
        });

        it('should detect an intermediate manifest from its name', async () => {
            const intermediatePath = join(workDir, '.tpm-intermediates.yaml');
            saveConfig(intermediatePath, {
                version: 'alpha',
                vendors: [
                    {
                        id: 'STM',
                        name: 'STMicroelectronics',
                        certificates: [
                            {
                                name: 'Intermediate C',
                                uri: `file://${ROOT_C.file}`,
                                validation: { fingerprint: { sha256: ROOT_C.sha256 } },
                            },
                        ],
                    },
                ],
            });

            await run('generate', '-c', intermediatePath, '--date', TEST_DATE, '--commit', TEST_COMMIT);

            expect(stdoutSpy).toHaveBeenCalledWith(intermediateBundle());
        });

        it('should require --date and --commit together', async () => {
            await run('generate', '-c', configPath, '--date', TEST_DATE);

            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining(
                    '[FAIL] bundle generation failed: both --date and --commit flags must be provided together'
                )
            );
            expect(process.exitCode).toBe(1);
        });

        it('should reject a malformed date', async () => {
            await run('generate', '-c', configPath, '--date', '2026-02-30', '--commit', TEST_COMMIT);

            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining('[FAIL] bundle generation failed: invalid --date flag: invalid date: 2026-02-30')
            );
        });

        it('should report certificates that fail their fingerprint', async () => {
            const manifest = sampleManifest();
            manifest.vendors[0].certificates[0].validation.fingerprint = { sha256: ROOT_C.sha256 };
            saveConfig(configPath, manifest);

            await run('generate', '-c', configPath, '--date', TEST_DATE, '--commit', TEST_COMMIT);

            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining(
                    '[FAIL] bundle generation failed: failed to generate bundle: failed to process certificate "Root A" from vendor "Infineon"'
                )
            );
            expect(stdoutSpy).not.toHaveBeenCalled();
            expect(process.exitCode).toBe(1);
        });
    });

    describe('bundle verify', () => {
        let bundlePath: string;

        beforeEach(() => {
            bundlePath = join(workDir, 'tpm-ca-certificates.pem');
            writeFileSync(bundlePath, sampleBundle());
            writeFileSync(join(workDir, 'checksums.txt'), 'abc  tpm-ca-certificates.pem\n');
            jest.mocked(verifyTrustedBundle).mockResolvedValue({
                ok: true,
                policy: createPolicy({ tag: TEST_DATE, sourceRepo: TEST_REPO }),
                checksum: { filename: 'tpm-ca-certificates.pem', digest: 'abc' },
                attestations: [
                    { index: 0, state: 'Accepted' },
                    {
                        index: 1,
                        state: 'Rejected',
                        stage: 'PolicyMatched',
                        kind: 'AttestationPolicyFailed',
                        reason: 'commit mismatch',
                    },
                ],
            });
        });

        it('should verify with the files found beside the bundle', async () => {
            await run('verify', bundlePath);

            expect(verifyTrustedBundle).toHaveBeenCalledWith({
                bundle: Buffer.from(sampleBundle()),
                metadata: { date: TEST_DATE, commit: TEST_COMMIT, type: 'root' },
                checksums: Buffer.from('abc  tpm-ca-certificates.pem\n'),
                checksumsSignature: undefined,
                provenance: undefined,
                trustedRoot: undefined,
                acceptance: 'any',
            });
            expect(consoleLogSpy).toHaveBeenCalledWith('  Digest: sha256:abc');
            expect(consoleLogSpy).toHaveBeenCalledWith(
                '  Build signer:      https://github.com/example/bundles/.github/workflows/release-bundle.yaml@refs/tags/2026-10-19'
            );
            expect(consoleLogSpy).toHaveBeenCalledWith('  #0: accepted');
            expect(consoleLogSpy).toHaveBeenCalledWith(
                '  #1: rejected at PolicyMatched (AttestationPolicyFailed): commit mismatch'
            );
            expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('[OK] Bundle verified successfully'));
        });

        it('should take explicit metadata and acceptance mode', async () => {
            const provenance = join(workDir, 'attestations.json');
            writeFileSync(provenance, '[]');

            await run(
                'verify',
                bundlePath,
                '--provenance',
                provenance,
                '--date',
                '2026-10-12',
                '--commit',
                TEST_COMMIT,
                '--acceptance',
                'all'
            );

            expect(verifyTrustedBundle).toHaveBeenCalledWith(
                expect.objectContaining({
                    metadata: { date: '2026-10-12', commit: TEST_COMMIT, type: 'root' },
                    provenance: Buffer.from('[]'),
                    acceptance: 'all',
                })
            );
        });

        it('should report verification failures', async () => {
            jest.mocked(verifyTrustedBundle).mockRejectedValue(
                new Error('trusted bundle verification failed: checksum verification failed: no entry')
            );

            await run('verify', bundlePath);

            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining(
                    '[FAIL] bundle verification failed: trusted bundle verification failed: checksum verification failed: no entry'
                )
            );
            expect(process.exitCode).toBe(1);
        });

        it('should reject an unknown acceptance mode', async () => {
            await run('verify', bundlePath, '--acceptance', 'most');

            expect(verifyTrustedBundle).not.toHaveBeenCalled();
            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining(`invalid acceptance mode "most", must be 'any' or 'all'`)
            );
        });
    });

    describe('bundle download', () => {
        beforeEach(() => {
            jest.mocked(getTrustedBundle).mockResolvedValue(TrustedBundle.fromBundles([Buffer.from(sampleBundle())]));
        });

        it('should write the root bundle to the output directory', async () => {
            await run('download', '-o', workDir, '--date', TEST_DATE, '--skip-verify');

            const target = join(workDir, 'tpm-ca-certificates.pem');
            expect(getTrustedBundle).toHaveBeenCalledWith({ date: TEST_DATE, skipVerify: true, offline: undefined });
            expect(readFileSync(target, 'utf8')).toBe(sampleBundle());
            expect(existsSync(join(workDir, 'tpm-intermediate-ca-certificates.pem'))).toBe(false);
            expect(consoleLogSpy).toHaveBeenCalledWith(
                expect.stringContaining(`[OK] Downloaded root bundle to ${target}`)
            );
        });

        it('should write both bundles when the release has an intermediate', async () => {
            jest.mocked(getTrustedBundle).mockResolvedValue(
                TrustedBundle.fromBundles([Buffer.from(intermediateBundle()), Buffer.from(sampleBundle())])
            );

            await run('download', '-o', workDir);

            expect(readFileSync(join(workDir, 'tpm-intermediate-ca-certificates.pem'), 'utf8')).toBe(
                intermediateBundle()
            );
            expect(readFileSync(join(workDir, 'tpm-ca-certificates.pem'), 'utf8')).toBe(sampleBundle());
        });

        it('should refuse to overwrite without --force', async () => {
            const target = join(workDir, 'tpm-ca-certificates.pem');
            writeFileSync(target, 'old');

            await run('download', '-o', workDir);

            expect(readFileSync(target, 'utf8')).toBe('old');
            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining(
                    `[FAIL] bundle download failed: file ${target} already exists (use --force to overwrite)`
                )
            );

            process.exitCode = undefined;
            await run('download', '-o', workDir, '--force');

            expect(readFileSync(target, 'utf8')).toBe(sampleBundle());
            expect(process.exitCode).toBeUndefined();
        });

        it('should write only the raw bytes to stdout', async () => {
            await run('download', '-o', '-', '-t', 'root');

            expect(stdoutSpy).toHaveBeenCalledTimes(1);
            expect(stdoutSpy).toHaveBeenCalledWith(Buffer.from(sampleBundle()));
            expect(consoleLogSpy).not.toHaveBeenCalled();
        });

        it('should require --type for stdout', async () => {
            await run('download', '-o', '-');

            expect(getTrustedBundle).not.toHaveBeenCalled();
            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining(
                    'when using stdout (--output-dir -), you must specify --type (root or intermediate)'
                )
            );
        });

        it('should report a missing intermediate bundle', async () => {
            await run('download', '-o', workDir, '-t', 'intermediate');

            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining('[FAIL] bundle download failed: intermediate bundle not available for this release')
            );
        });

        it('should require an existing output directory', async () => {
            const missing = join(workDir, 'missing');

            await run('download', '-o', missing);

            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining(`output directory ${missing} does not exist`)
            );
        });
    });

    describe('bundle list', () => {
        const previousRepo = process.env.TPMTB_SOURCE_REPO;

        beforeEach(() => {
            process.env.TPMTB_SOURCE_REPO = 'example/bundles';
        });

        afterEach(() => {
            if (previousRepo === undefined) {
                delete process.env.TPMTB_SOURCE_REPO;
            } else {
                process.env.TPMTB_SOURCE_REPO = previousRepo;
            }
        });

        it('should list release tags', async () => {
            jest.mocked(GitHubClient.prototype.listReleases).mockResolvedValue([
                { tagName: '2026-10-12', name: '2026-10-12', createdAt: '', publishedAt: '', assets: [] },
                { tagName: '2026-10-19', name: '2026-10-19', createdAt: '', publishedAt: '', assets: [] },
            ]);

            await run('list', '-l', '2', '-s', 'asc');

            expect(GitHubClient.prototype.listReleases).toHaveBeenCalledWith(TEST_REPO, { pageSize: 2, sortOrder: 'asc' });
            expect(consoleLogSpy.mock.calls).toEqual([
                ['Available TPM trust bundle releases (2):'],
                ['  2026-10-12'],
                ['  2026-10-19'],
            ]);
        });

        it('should say when there are no releases', async () => {
            jest.mocked(GitHubClient.prototype.listReleases).mockResolvedValue([]);

            await run('list');

            expect(consoleLogSpy).toHaveBeenCalledWith('No bundle releases found');
        });

        it('should validate the sort order', async () => {
            await run('list', '-s', 'newest');

            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining(`invalid sort order "newest", must be 'asc' or 'desc'`)
            );
            expect(GitHubClient.prototype.listReleases).not.toHaveBeenCalled();
        });

        it('should validate the limit', async () => {
            await run('list', '-l', '0');

            expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining('limit must be greater than 0'));
            expect(GitHubClient.prototype.listReleases).not.toHaveBeenCalled();
        });
    });

    describe('bundle validate', () => {
        it('should accept a generated bundle', async () => {
            const file = join(workDir, 'bundle.pem');
            writeFileSync(file, sampleBundle());

            await run('validate', file);

            expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining(`[OK] ${file} is valid`));
            expect(process.exitCode).toBeUndefined();
        });

        it('should list errors with their line numbers', async () => {
            const file = join(workDir, 'bundle.pem');
            writeFileSync(file, sampleBundle().replace(`# Subject: ${ROOT_A.subject}`, '# Subject: CN=Somebody Else'));

            await run('validate', file);

            expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining(`[FAIL] ${file} has validation errors:`));
            expect(consoleLogSpy).toHaveBeenCalledWith(
                `  Line 11: subject mismatch: metadata has "CN=Somebody Else", certificate has "${ROOT_A.subject}"`
            );
            expect(process.exitCode).toBe(1);
        });

        it('should print nothing in quiet mode', async () => {
            const file = join(workDir, 'bundle.pem');
            writeFileSync(file, 'not a bundle');

            await run('validate', file, '--quiet');

            expect(consoleLogSpy).not.toHaveBeenCalled();
            expect(consoleErrorSpy).not.toHaveBeenCalled();
            expect(process.exitCode).toBe(1);
        });
    });

    describe('bundle save', () => {
        it('should save the bundle and list the files', async () => {
            const outputDir = join(workDir, 'saved');
            jest.mocked(saveTrustedBundle).mockResolvedValue({
                bundle: TrustedBundle.fromBundles([Buffer.from(sampleBundle())]),
                outputDir,
                files: ['config.json', 'tpm-ca-certificates.pem'],
            });

            await run('save', '-o', outputDir, '-d', TEST_DATE, '--vendor-ids', 'IFX, INTC');

            expect(saveTrustedBundle).toHaveBeenCalledWith({ date: TEST_DATE, vendorIDs: ['IFX', 'INTC'] }, outputDir);
            expect(consoleLogSpy).toHaveBeenCalledWith(
                expect.stringContaining(`[OK] Saved bundle ${TEST_DATE} to ${outputDir}`)
            );
            expect(consoleLogSpy).toHaveBeenCalledWith('  config.json');
            expect(consoleLogSpy).toHaveBeenCalledWith('  tpm-ca-certificates.pem');
        });

        it('should not overwrite a saved bundle without --force', async () => {
            writeFileSync(join(workDir, 'config.json'), '{}');

            await run('save', '-o', workDir);

            expect(saveTrustedBundle).not.toHaveBeenCalled();
            expect(consoleErrorSpy).toHaveBeenCalledWith(
                expect.stringContaining(`${workDir} already contains a bundle (use --force to overwrite)`)
            );
        });
    });
});
