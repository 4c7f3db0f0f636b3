import { AsyncMutex, LockTimeoutError } from '../src/pltx/async-lock.js';

describe('AsyncMutex', () => {
    it('grants a free lock immediately', async () => {
        const mutex = new AsyncMutex('segments');
        await mutex.acquire(50);
        expect(mutex.locked).toBe(true);
        mutex.release();
        expect(mutex.locked).toBe(false);
    });

    it('times out a waiter while the lock is held', async () => {
        const mutex = new AsyncMutex('rec.pltx');
        await mutex.acquire();

        await expect(mutex.acquire(40)).rejects.toBeInstanceOf(LockTimeoutError);
        await expect(mutex.acquire(40)).rejects.toThrow('Failed to acquire lock for rec.pltx within 40ms.');
        expect(mutex.waiting).toBe(0);

        mutex.release();
        expect(mutex.locked).toBe(false);
    });

    it('hands the lock to waiters in arrival order', async () => {
        const mutex = new AsyncMutex();
        const order: string[] = [];
        await mutex.acquire();

        const a = mutex.acquire(1000).then(() => { order.push('a'); mutex.release(); });
        const b = mutex.acquire(1000).then(() => { order.push('b'); mutex.release(); });
        expect(mutex.waiting).toBe(2);

        mutex.release();
        await Promise.all([a, b]);
        expect(order).toEqual(['a', 'b']);
        expect(mutex.locked).toBe(false);
    });

    it('runExclusive never overlaps critical sections', async () => {
        const mutex = new AsyncMutex();
        let active = 0;
        let maxActive = 0;

        await Promise.all(Array.from({ length: 10 }, (_, i) => mutex.runExclusive(async () => {
            active++;
            maxActive = Math.max(maxActive, active);
            await new Promise((resolve) => setTimeout(resolve, 2));
            active--;
            return i;
        })));

        expect(maxActive).toBe(1);
        expect(mutex.locked).toBe(false);
    });

    it('runExclusive releases the lock when the section throws', async () => {
        const mutex = new AsyncMutex();
        await expect(mutex.runExclusive(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
        expect(mutex.locked).toBe(false);
    });
});
