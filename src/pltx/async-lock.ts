import { PltxError } from './errors.js';

export class LockTimeoutError extends PltxError {
    constructor(target: string, timeoutMs: number) {
        super(`Failed to acquire lock for ${target} within ${timeoutMs}ms.`);
        this.name = 'LockTimeoutError';
    }
}

/**
 * In-process async mutex. FIFO queue.
 *
 * Single-threaded event loop guarantees: no TOCTOU races, no atomicity
 * concerns. The queue drains synchronously after each release().
 */
export class AsyncMutex {
    private held = false;
    private readonly queue: { resolve: () => void }[] = [];

    constructor(private readonly target: string = '(in-process)') { }

    get locked(): boolean {
        return this.held;
    }

    get waiting(): number {
        return this.queue.length;
    }

    async acquire(timeoutMs: number = 5000): Promise<void> {
        if (!this.held && this.queue.length === 0) {
            this.held = true;
            return;
        }

        return new Promise<void>((resolve, reject) => {
            const entry = { resolve: () => { /* replaced below */ } };
            this.queue.push(entry);

            const timer = setTimeout(() => {
                const idx = this.queue.indexOf(entry);
                if (idx !== -1) {
                    this.queue.splice(idx, 1);
                    reject(new LockTimeoutError(this.target, timeoutMs));
                }
            }, timeoutMs);

            entry.resolve = () => {
                clearTimeout(timer);
                resolve();
            };
        });
    }

    release(): void {
        const next = this.queue.shift();
        if (next) {
            // Ownership passes straight to the next waiter.
            next.resolve();
            return;
        }
        this.held = false;
    }

    async runExclusive<T>(fn: () => Promise<T>, timeoutMs: number = 5000): Promise<T> {
        await this.acquire(timeoutMs);
        try {
            return await fn();
        } finally {
            this.release();
        }
    }
}
