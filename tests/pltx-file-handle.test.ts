import * as fs from 'fs/promises';
import * as path from 'path';
import { FileHandle } from '../src/pltx/file-handle.js';
import { ReadError } from '../src/pltx/errors.js';
import { withTempDir } from './helpers/test-utils.js';

async function writeCounting(dir: string, size: number): Promise<string> {
    const file = path.join(dir, 'bytes.bin');
    await fs.writeFile(file, Uint8Array.from({ length: size }, (_, i) => i % 256));
    return file;
}

describe('FileHandle', () => {
    it('reads exact byte ranges', async () => {
        await withTempDir(async (dir) => {
            const handle = await FileHandle.open(await writeCounting(dir, 100));
            expect(handle.size).toBe(100);
            expect(Array.from(await handle.readRange(10, 5))).toEqual([10, 11, 12, 13, 14]);
            expect(await handle.readRange(100, 0)).toHaveLength(0);
            await handle.close();
        });
    });

    it('rejects ranges outside the file', async () => {
        await withTempDir(async (dir) => {
            const handle = await FileHandle.open(await writeCounting(dir, 100));
            await expect(handle.readRange(95, 10)).rejects.toBeInstanceOf(ReadError);
            await expect(handle.readRange(-1, 4)).rejects.toThrow('Invalid read range (offset=-1, length=4)');
            await expect(handle.readRange(0.5, 4)).rejects.toBeInstanceOf(ReadError);
            await handle.close();
        });
    });

    it('serves many concurrent reads correctly', async () => {
        await withTempDir(async (dir) => {
            const handle = await FileHandle.open(await writeCounting(dir, 4096));
            const offsets = Array.from({ length: 32 }, (_, i) => i * 100);
            const reads = await Promise.all(offsets.map((o) => handle.readRange(o, 3)));
            reads.forEach((bytes, i) => {
                const o = offsets[i];
                expect(Array.from(bytes)).toEqual([o % 256, (o + 1) % 256, (o + 2) % 256]);
            });
            await handle.close();
        });
    });

    it('fails reads after close and closes idempotently', async () => {
        await withTempDir(async (dir) => {
            const handle = await FileHandle.open(await writeCounting(dir, 16));
            const pending = handle.readRange(0, 4);
            await handle.close();
            expect(Array.from(await pending)).toEqual([0, 1, 2, 3]);

            expect(handle.closed).toBe(true);
            await expect(handle.readRange(0, 4)).rejects.toThrow(`${handle.path} is closed`);
            await handle.close();
        });
    });

    it('refuses to open something that is not a regular file', async () => {
        await withTempDir(async (dir) => {
            await expect(FileHandle.open(dir)).rejects.toBeInstanceOf(ReadError);
        });
    });
});
