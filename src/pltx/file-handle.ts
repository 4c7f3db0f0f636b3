import * as fs from 'fs/promises';
import { AsyncMutex } from './async-lock.js';
import { ReadError, errorMessage } from './errors.js';

/**
 * Read-only access to one open file. Every physical read holds the mutex
 * for its whole duration, so reads from concurrent cursors never interleave.
 */
export class FileHandle {
    private handle: fs.FileHandle | null;
    private readonly lock: AsyncMutex;

    private constructor(
        public readonly path: string,
        handle: fs.FileHandle,
        public readonly size: number,
        private readonly lockTimeoutMs: number
    ) {
        this.handle = handle;
        this.lock = new AsyncMutex(path);
    }

    static async open(filePath: string, lockTimeoutMs: number = 5000): Promise<FileHandle> {
        const handle = await fs.open(filePath, 'r');
        try {
            const st = await handle.stat();
            if (!st.isFile()) {
                throw new ReadError(`${filePath} is not a regular file`);
            }
            return new FileHandle(filePath, handle, st.size, lockTimeoutMs);
        } catch (e) {
            await handle.close();
            throw e;
        }
    }

    get closed(): boolean {
        return this.handle === null;
    }

    async readRange(offset: number, length: number): Promise<Uint8Array> {
        if (!Number.isSafeInteger(offset) || !Number.isSafeInteger(length) || offset < 0 || length < 0) {
            throw new ReadError(`Invalid read range (offset=${offset}, length=${length})`);
        }
        if (offset + length > this.size) {
            throw new ReadError(`Read past end of ${this.path} (${offset}+${length} > ${this.size})`);
        }

        return this.lock.runExclusive(async () => {
            const handle = this.handle;
            if (!handle) throw new ReadError(`${this.path} is closed`);

            const buffer = new Uint8Array(length);
            let filled = 0;
            while (filled < length) {
                let bytesRead: number;
                try {
                    ({ bytesRead } = await handle.read(buffer, filled, length - filled, offset + filled));
                } catch (e) {
                    throw new ReadError(`Read failed at ${offset + filled} in ${this.path}: ${errorMessage(e)}`, e);
                }
                if (bytesRead === 0) {
                    throw new ReadError(`Unexpected end of file at ${offset + filled} in ${this.path}`);
                }
                filled += bytesRead;
            }
            return buffer;
        }, this.lockTimeoutMs);
    }

    /**
     * Waits for the in-flight read, then closes the descriptor. Idempotent.
     */
    async close(): Promise<void> {
        await this.lock.runExclusive(async () => {
            const handle = this.handle;
            this.handle = null;
            if (handle) await handle.close();
        }, this.lockTimeoutMs);
    }
}
