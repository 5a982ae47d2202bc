/**
 * Counting semaphore that caps concurrent async operations.
 *
 * Used to keep the number of in-flight generation calls per process under
 * `workflow.maxConcurrency`, however many runs are active.
 *
 * Dependency direction: semaphore.ts → core/errors, logger
 * Used by: providers/generation-service
 */

import { CancellationError, ValidationError } from '../core/errors.js';
import { logger } from './logger.js';

interface Waiter {
    grant: () => void;
}

export class Semaphore {
    private readonly capacity: number;
    private available: number;
    private readonly waiters: Waiter[] = [];

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new ValidationError(`Semaphore capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        this.available = capacity;
    }

    /** Permits currently free. */
    get free(): number {
        return this.available;
    }

    /** Callers waiting for a permit. */
    get pending(): number {
        return this.waiters.length;
    }

    /**
     * Wait for a permit. Returns the matching release function.
     * @throws {CancellationError} if `signal` aborts before a permit is granted.
     */
    acquire(signal?: AbortSignal): Promise<() => void> {
        if (signal?.aborted) {
            return Promise.reject(new CancellationError('Aborted while waiting for a generation slot'));
        }

        if (this.available > 0) {
            this.available--;
            return Promise.resolve(this.createRelease());
        }

        logger.debug(`Semaphore full (${this.capacity}), queueing (pending: ${this.waiters.length + 1})`);

        return new Promise((resolve, reject) => {
            const waiter: Waiter = {
                grant: () => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve(this.createRelease());
                },
            };
            const onAbort = (): void => {
                const index = this.waiters.indexOf(waiter);
                if (index >= 0) this.waiters.splice(index, 1);
                reject(new CancellationError('Aborted while waiting for a generation slot'));
            };

            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiters.push(waiter);
        });
    }

    /** Run `task` while holding a permit. */
    async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        const release = await this.acquire(signal);
        try {
            return await task();
        } finally {
            release();
        }
    }

    private createRelease(): () => void {
        let released = false;
        return () => {
            if (released) return;
            released = true;

            const next = this.waiters.shift();
            if (next) {
                // Hand the permit straight to the next waiter.
                next.grant();
            } else {
                this.available++;
            }
        };
    }
}
