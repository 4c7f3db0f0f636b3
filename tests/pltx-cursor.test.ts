import * as fs from 'fs/promises';
import PLTX from '../src/index.js';
import { PltxReader } from '../src/pltx/reader.js';
import { LookupError, PltxError, ReadError } from '../src/pltx/errors.js';
import { sampleRecording, writePltx } from './helpers/pltx-writer.js';
import { drain, withTempDir } from './helpers/test-utils.js';

describe('SignalCursor', () => {
    it('yields samples in order with seq from 0, then a repeatable end', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const reader = await PltxReader.open(file);
            const cursor = reader.openCursor('Voltage');
            expect(reader.refCount).toBe(2);

            const { samples, seqs, last } = await drain(cursor);
            expect(samples).toEqual([
                { timestamp: 1, value: 10 },
                { timestamp: 2, value: 11 },
                { timestamp: 3, value: 12 },
            ]);
            expect(seqs).toEqual([0, 1, 2]);
            expect(last).toEqual({ kind: 'end', seq: 3 });

            expect(await cursor.next()).toEqual({ kind: 'end', seq: 3 });
            expect(cursor.state).toBe('end');
            expect(reader.refCount).toBe(1);
            await reader.release();
        });
    });

    it('ends immediately on a signal without samples', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const reader = await PltxReader.open(file);
            expect(await reader.openCursor('Current').next()).toEqual({ kind: 'end', seq: 0 });
            await reader.release();
        });
    });

    it('restricts samples to an inclusive time range', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const reader = await PltxReader.open(file);

            const mid = await drain(reader.openCursor('Voltage', { start: 2, end: 3 }));
            expect(mid.samples).toEqual([{ timestamp: 2, value: 11 }, { timestamp: 3, value: 12 }]);
            expect(mid.seqs).toEqual([0, 1]);

            expect(await reader.readSignal('Voltage', { start: 3 })).toEqual([{ timestamp: 3, value: 12 }]);
            expect(await reader.readSignal('Voltage', { end: 1 })).toEqual([{ timestamp: 1, value: 10 }]);
            expect(await reader.readSignal('Voltage', { start: 10 })).toEqual([]);
            await reader.release();
        });
    });

    it('rejects a concurrent pull on the same cursor', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const reader = await PltxReader.open(file);
            const cursor = reader.openCursor('Voltage');

            const first = cursor.next();
            await expect(cursor.next()).rejects.toThrow('already being pulled');
            expect(await first).toEqual({ kind: 'sample', sample: { timestamp: 1, value: 10 }, seq: 0 });

            await cursor.close();
            await reader.release();
        });
    });

    it('independent cursors over one file see the same sequence', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const reader = await PltxReader.open(file);
            const results = await Promise.all([
                drain(reader.openCursor('Voltage')),
                drain(reader.openCursor('Voltage')),
                drain(reader.openCursor('Current')),
                drain(reader.openCursor('Voltage')),
            ]);

            expect(results[1].samples).toEqual(results[0].samples);
            expect(results[3].samples).toEqual(results[0].samples);
            expect(results[2].last).toEqual({ kind: 'end', seq: 0 });
            expect(reader.refCount).toBe(1);
            await reader.release();
        });
    });

    it('close() stops the cursor and releases the reader', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const reader = await PltxReader.open(file);
            const cursor = reader.openCursor('Voltage');

            await cursor.next();
            await cursor.close();
            await cursor.close();
            expect(cursor.state).toBe('closed');
            expect(reader.refCount).toBe(1);

            const step = await cursor.next();
            expect(step.kind).toBe('error');
            if (step.kind === 'error') {
                expect(step.error.message).toBe('Cursor closed');
                expect(step.seq).toBe(1);
            }
            await reader.release();
        });
    });

    it('reports a read failure as a terminal error', async () => {
        await withTempDir(async (dir) => {
            const { path: file, layout } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const reader = await PltxReader.open(file);
            const cursor = reader.openCursor('Voltage');
            await fs.truncate(file, layout.chunks[0].offset + 10);

            const first = await cursor.next();
            expect(first.kind).toBe('error');
            if (first.kind === 'error') {
                expect(first.error).toBeInstanceOf(ReadError);
            }
            const again = await cursor.next();
            expect(again.kind === 'error' && again.error).toBe(first.kind === 'error' && first.error);
            expect(cursor.state).toBe('error');
            await reader.release();
        });
    });

    it('two opens of one file drain identical sequences', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const [a, b] = await Promise.all([PltxReader.open(file), PltxReader.open(file)]);
            const [fromA, fromB] = await Promise.all([drain(a.openCursor('Voltage')), drain(b.openCursor('Voltage'))]);

            expect(fromA.samples).toEqual(fromB.samples);
            expect(fromA.seqs).toEqual([0, 1, 2]);
            expect(fromA.samples).toHaveLength(a.getSignalMetadata('Voltage')?.sampleCount ?? -1);
            await a.release();
            await b.release();
        });
    });
});

describe('PltxReader references', () => {
    it('rejects unknown signal names without taking a reference', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const reader = await PltxReader.open(file);
            expect(() => reader.openCursor('voltage')).toThrow(LookupError);
            expect(() => reader.openCursor('Voltage ')).toThrow('Unknown signal: Voltage ');
            expect(reader.refCount).toBe(1);
            await reader.release();
        });
    });

    it('keeps the file open while a cursor outlives the opener', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const reader = await PltxReader.open(file);
            const cursor = reader.openCursor('Voltage');

            await reader.release();
            expect(reader.closed).toBe(false);

            const { samples, last } = await drain(cursor);
            expect(samples).toHaveLength(3);
            expect(last.kind).toBe('end');
            expect(reader.closed).toBe(true);
            expect(() => reader.retain()).toThrow(PltxError);
            expect(() => reader.openCursor('Voltage')).toThrow('is closed');
        });
    });

    it('release after close settles without changing state', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const reader = await PltxReader.open(file);
            await Promise.all([reader.release(), reader.release()]);
            expect(reader.refCount).toBe(0);
        });
    });
});

describe('PLTX facade', () => {
    it('inspects and reads without keeping the file open', async () => {
        await withTempDir(async (dir) => {
            const { path: file } = await writePltx(dir, 'rec.pltx', sampleRecording());
            const signals = await PLTX.inspect(file);
            expect(signals.map((s) => [s.name, s.sampleCount])).toEqual([['Voltage', 3], ['Current', 0]]);
            expect(await PLTX.read(file, 'Voltage', { start: 2 })).toEqual([
                { timestamp: 2, value: 11 },
                { timestamp: 3, value: 12 },
            ]);
            await expect(PLTX.read(file, 'Nope')).rejects.toBeInstanceOf(LookupError);
        });
    });
});
