// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { execFile } from 'child_process';
import { promisify } from 'util';
import { validateCommit, validateDate } from '../bundle/metadata';
import { wrapError } from './errors';

const execFileAsync = promisify(execFile);

/** Runs a command in `cwd` and returns its trimmed stdout. */
export type CommandRunner = (file: string, args: string[], cwd: string) => Promise<string>;

export const runCommand: CommandRunner = async (file, args, cwd) => {
    const { stdout } = await execFileAsync(file, args, { cwd });
    return stdout.trim();
};

export interface GitInfo {
    commit: string;
    /** Tag pointing at HEAD, if any. */
    tag?: string;
}

export async function getGitInfo(cwd: string = '.', run: CommandRunner = runCommand): Promise<GitInfo> {
    const commit = await run('git', ['rev-parse', 'HEAD'], cwd);
    let tag: string | undefined;
    try {
        tag = (await run('git', ['describe', '--tags', '--exact-match', 'HEAD'], cwd)) || undefined;
    } catch {
        // HEAD is not tagged
        tag = undefined;
    }
    return { commit, tag };
}

/**
 * Bundle date and commit taken from the release tag on HEAD.
 */
export async function resolveGitMetadata(
    cwd: string = '.',
    run: CommandRunner = runCommand
): Promise<{ date: string; commit: string }> {
    let info: GitInfo;
    try {
        info = await getGitInfo(cwd, run);
    } catch (error) {
        throw wrapError('failed to get git info (use --date and --commit flags to specify manually)', error);
    }
    if (!info.tag) {
        throw new Error(
            'no git tag found for current commit (tag is required in YYYY-MM-DD format, or use --date and --commit flags)'
        );
    }
    try {
        validateDate(info.tag);
    } catch (error) {
        throw wrapError(
            `git tag "${info.tag}" is not in YYYY-MM-DD format (use --date and --commit flags to specify manually)`,
            error
        );
    }
    try {
        validateCommit(info.commit);
    } catch (error) {
        throw wrapError(
            `git commit "${info.commit}" is not a valid commit hash (use --date and --commit flags to specify manually)`,
            error
        );
    }
    return { date: info.tag, commit: info.commit };
}
