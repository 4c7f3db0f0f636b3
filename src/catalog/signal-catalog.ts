import { LookupError, PltxError } from '../pltx/errors.js';
import type { PltxReader } from '../pltx/reader.js';
import type { PltxLogger } from '../pltx/types.js';

export interface CatalogEntry {
    readerId: string;
    reader: PltxReader;
    /** Signal name inside the file. */
    internalName: string;
}

export interface RegisteredFile {
    readerId: string;
    /** Public names, one per signal, in the reader's signal order. */
    publicNames: string[];
}

export interface ReaderSummary {
    id: string;
    path: string;
    signalsCount: number;
    /** Original (file) signal names, sorted, unique. */
    headers: string[];
}

/**
 * Process-wide map from public signal name to (reader, internal name).
 *
 * Colliding names get the first free `_1`, `_2`, … suffix at registration.
 * A public name is never handed out twice, even after its file is closed.
 */
export class SignalCatalog {
    private readonly entries = new Map<string, CatalogEntry>();
    private readonly assigned = new Set<string>();
    private readonly readers = new Map<string, { reader: PltxReader; publicNames: string[] }>();
    private nextReaderId = 1;

    constructor(private readonly logger: PltxLogger | null = null) { }

    /**
     * Registers every signal of `reader` and takes one reference on it.
     */
    registerReader(reader: PltxReader): RegisteredFile {
        reader.retain();
        const readerId = (this.nextReaderId++).toString(16).padStart(8, '0');
        const publicNames: string[] = [];

        for (const meta of reader.listSignals()) {
            const publicName = this.claimName(meta.name);
            this.entries.set(publicName, { readerId, reader, internalName: meta.name });
            publicNames.push(publicName);
            this.logger?.info?.(`Register signal: ${publicName} (original: ${meta.name})`);
        }

        this.readers.set(readerId, { reader, publicNames });
        return { readerId, publicNames };
    }

    private claimName(base: string): string {
        let candidate = base;
        for (let i = 1; this.assigned.has(candidate); i++) {
            candidate = `${base}_${i}`;
        }
        this.assigned.add(candidate);
        return candidate;
    }

    /** Exact match only. */
    resolve(publicName: string): CatalogEntry {
        const entry = this.entries.get(publicName);
        if (!entry) throw new LookupError(publicName);
        return entry;
    }

    has(publicName: string): boolean {
        return this.entries.has(publicName);
    }

    publicNames(): string[] {
        return Array.from(this.entries.keys());
    }

    listReaders(): ReaderSummary[] {
        const out: ReaderSummary[] = [];
        for (const [id, { reader }] of this.readers) {
            const headers = this.originalNames(reader);
            out.push({ id, path: reader.path, signalsCount: headers.length, headers });
        }
        return out;
    }

    readerSignals(readerId: string): string[] {
        const registered = this.readers.get(readerId);
        if (!registered) throw new PltxError(`Unknown reader: ${readerId}`);
        return this.originalNames(registered.reader);
    }

    private originalNames(reader: PltxReader): string[] {
        return Array.from(new Set(reader.listSignals().map((s) => s.name))).sort();
    }

    /**
     * Unregisters a file's signals and releases the catalog's reference.
     * Its public names stay reserved.
     */
    async closeReader(readerId: string): Promise<void> {
        const registered = this.readers.get(readerId);
        if (!registered) throw new PltxError(`Unknown reader: ${readerId}`);
        this.readers.delete(readerId);
        for (const name of registered.publicNames) {
            this.entries.delete(name);
        }
        this.logger?.info?.(`Closed reader ${readerId} (${registered.reader.path})`);
        await registered.reader.release();
    }

    async clear(): Promise<void> {
        for (const readerId of Array.from(this.readers.keys())) {
            await this.closeReader(readerId);
        }
    }
}
