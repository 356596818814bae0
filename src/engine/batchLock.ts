// src/engine/batchLock.ts

/**
 * Per-batch mutual exclusion for allocation runs
 *
 * Tasks for the same batch run one after another in arrival order.
 * Tasks for different batches do not wait on each other.
 * A failed task releases the lock like a successful one.
 */
export class BatchLock {
    private tails: Map<string, Promise<void>>;

    constructor() {
        this.tails = new Map();
    }

    async runExclusive<T>(batchId: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(batchId) ?? Promise.resolve();

        const run = previous.then(task);
        const tail = run.then(
            () => undefined,
            () => undefined
        );
        this.tails.set(batchId, tail);

        try {
            return await run;
        } finally {
            // Only the last queued task clears the entry
            if (this.tails.get(batchId) === tail) {
                this.tails.delete(batchId);
            }
        }
    }

    /**
     * Whether a run for this batch is in progress or queued
     */
    isLocked(batchId: string): boolean {
        return this.tails.has(batchId);
    }
}
