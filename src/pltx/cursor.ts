import { PltxError, ReadError, DecodeError, errorMessage } from './errors.js';
import type { ChunkDescriptor, Sample, SampleRange, SignalEntry } from './types.js';

/**
 * What a cursor needs from its reader: chunk loading and reference release.
 */
export interface ChunkSource {
    readonly path: string;
    loadChunk(descriptor: ChunkDescriptor): Promise<Sample[]>;
    release(): Promise<void>;
}

export type CursorStep =
    | { kind: 'sample'; sample: Sample; seq: number }
    | { kind: 'end'; seq: number }
    | { kind: 'error'; error: PltxError; seq: number };

export type CursorState = 'open' | 'end' | 'error' | 'closed';

/**
 * Forward-only pull over one signal. Holds at most one decoded chunk.
 * Not safe to share: one consumer per cursor.
 */
export class SignalCursor {
    private readonly chunks: readonly ChunkDescriptor[];
    private chunkIndex = 0;
    private buffer: Sample[] = [];
    private offset = 0;
    private nextSeq = 0;
    private current: CursorState = 'open';
    private failure: PltxError | null = null;
    private pulling = false;
    private released = false;

    constructor(
        private readonly source: ChunkSource,
        private readonly signal: SignalEntry,
        private readonly range: SampleRange = {}
    ) {
        const { start = -Infinity, end = Infinity } = range;
        this.chunks = signal.chunks.filter((c) => !(c.endTimestamp < start || c.startTimestamp > end));
    }

    get signalName(): string {
        return this.signal.metadata.name;
    }

    get state(): CursorState {
        return this.current;
    }

    /** Samples emitted so far; also the seq of the next sample. */
    get seq(): number {
        return this.nextSeq;
    }

    async next(): Promise<CursorStep> {
        if (this.pulling) {
            throw new PltxError(`Cursor for ${this.signalName} is already being pulled`);
        }
        this.pulling = true;
        try {
            return await this.step();
        } finally {
            this.pulling = false;
        }
    }

    private async step(): Promise<CursorStep> {
        switch (this.current) {
            case 'end':
                return { kind: 'end', seq: this.nextSeq };
            case 'error':
            case 'closed':
                return { kind: 'error', error: this.failure ?? new PltxError('Cursor closed'), seq: this.nextSeq };
            case 'open':
                break;
        }

        while (this.offset >= this.buffer.length) {
            if (this.chunkIndex >= this.chunks.length) {
                await this.finish('end', null);
                return { kind: 'end', seq: this.nextSeq };
            }

            const descriptor = this.chunks[this.chunkIndex++];
            let samples: Sample[];
            try {
                samples = await this.source.loadChunk(descriptor);
            } catch (e) {
                const error = e instanceof DecodeError || e instanceof ReadError
                    ? e
                    : new ReadError(`Chunk at ${descriptor.offset}: ${errorMessage(e)}`, e);
                await this.finish('error', error);
                return { kind: 'error', error, seq: this.nextSeq };
            }
            // A close() during the load wins over the loaded data.
            if (this.current !== 'open') return this.step();

            this.buffer = this.applyRange(samples);
            this.offset = 0;
        }

        const sample = this.buffer[this.offset++];
        return { kind: 'sample', sample, seq: this.nextSeq++ };
    }

    private applyRange(samples: Sample[]): Sample[] {
        const { start, end } = this.range;
        if (start === undefined && end === undefined) return samples;
        const lo = start ?? -Infinity;
        const hi = end ?? Infinity;
        return samples.filter((s) => s.timestamp >= lo && s.timestamp <= hi);
    }

    private async finish(state: 'end' | 'error' | 'closed', error: PltxError | null): Promise<void> {
        this.current = state;
        this.failure = error;
        this.buffer = [];
        this.offset = 0;
        if (!this.released) {
            this.released = true;
            await this.source.release();
        }
    }

    /**
     * Drops the buffer and the reader reference. No-op once terminal.
     */
    async close(): Promise<void> {
        if (this.current !== 'open') return;
        await this.finish('closed', new PltxError('Cursor closed'));
    }
}
