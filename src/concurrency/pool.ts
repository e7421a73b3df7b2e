// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { MAX_WORKERS, detectCpuCount } from './cpu';

/**
 * Counting semaphore over promises.
 */
export class Semaphore {
    private available: number;
    private readonly waiters: Array<() => void> = [];

    constructor(permits: number) {
        this.available = permits;
    }

    async acquire(): Promise<void> {
        if (this.available > 0) {
            this.available--;
            return;
        }
        await new Promise<void>(resolve => this.waiters.push(resolve));
    }

    release(): void {
        const next = this.waiters.shift();
        if (next) {
            next();
        } else {
            this.available++;
        }
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }
}

export function clampWorkers(workers: number): number {
    const count = workers === 0 ? detectCpuCount() : workers;
    return Math.max(1, Math.min(count, MAX_WORKERS));
}

/**
 * Run `processor` over every item with at most `workers` in flight.
 * `results[i]` is the outcome for `items[i]`; errors are not aggregated, so a
 * processor should return its failure rather than throw.
 */
export async function execute<T, R>(
    workers: number,
    items: readonly T[],
    processor: (index: number, item: T) => Promise<R>
): Promise<R[]> {
    const semaphore = new Semaphore(clampWorkers(workers));
    const results = new Array<R>(items.length);

    await Promise.all(
        items.map((item, index) =>
            semaphore.run(async () => {
                results[index] = await processor(index, item);
            })
        )
    );

    return results;
}
