// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as fs from 'fs';
import * as os from 'os';

export const MAX_WORKERS = 10;

const CGROUP_V2_CPU_MAX = '/sys/fs/cgroup/cpu.max';
const CGROUP_V1_QUOTA = '/sys/fs/cgroup/cpu/cpu.cfs_quota_us';
const CGROUP_V1_PERIOD = '/sys/fs/cgroup/cpu/cpu.cfs_period_us';

/**
 * Worker count from the container CPU quota (cgroup v2, then v1), falling
 * back to logical CPUs. Capped at {@link MAX_WORKERS}.
 */
export function detectCpuCount(): number {
    const quota = readCgroupV2Quota() || readCgroupV1Quota();
    if (quota > 0) {
        return Math.min(quota, MAX_WORKERS);
    }
    return Math.max(1, Math.min(os.cpus().length, MAX_WORKERS));
}

/**
 * Parses `cpu.max` content (`"<quota> <period>"` or `"max <period>"`).
 */
export function parseCgroupV2(content: string): number {
    const fields = content.trim().split(/\s+/);
    if (fields.length < 2 || fields[0] === 'max') {
        return 0;
    }
    return cpusFromQuota(Number(fields[0]), Number(fields[1]));
}

export function cpusFromQuota(quota: number, period: number): number {
    if (!Number.isInteger(quota) || !Number.isInteger(period) || quota <= 0 || period <= 0) {
        return 0;
    }
    return Math.max(1, Math.ceil(quota / period));
}

function readCgroupV2Quota(): number {
    const content = readOptional(CGROUP_V2_CPU_MAX);
    return content === undefined ? 0 : parseCgroupV2(content);
}

function readCgroupV1Quota(): number {
    const quota = readOptional(CGROUP_V1_QUOTA);
    const period = readOptional(CGROUP_V1_PERIOD);
    if (quota === undefined || period === undefined) {
        return 0;
    }
    return cpusFromQuota(Number(quota.trim()), Number(period.trim()));
}

function readOptional(file: string): string | undefined {
    try {
        return fs.readFileSync(file, 'utf8');
    } catch {
        return undefined;
    }
}
