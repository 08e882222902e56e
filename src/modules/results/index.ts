import pLimit from 'p-limit';
import { z } from 'zod';
import { Candidate } from '../../types';
import { readTextIfExists, writeFileAtomic } from '../../utils/fs';
import { PersistenceError, errorMessage } from '../../utils/errors';

const DiscoveryRecord = z.array(z.string());

export interface ResultStoreOptions {
    /** Called with the full sorted listing after every successful write. */
    onPersist?: (all: Candidate[]) => Promise<void>;
}

/**
 * Every live candidate ever found, kept as a sorted JSON array. Each merge
 * re-reads the file, unions, and replaces it whole, so the listing only grows.
 */
export class ResultStore {
    private known = new Set<Candidate>();
    private writeQueue = pLimit(1);

    constructor(private filePath: string, private options: ResultStoreOptions = {}) {}

    get path(): string {
        return this.filePath;
    }

    get size(): number {
        return this.known.size;
    }

    async load(): Promise<ReadonlySet<Candidate>> {
        for (const candidate of await this.readRecord()) this.known.add(candidate);
        return this.known;
    }

    has(candidate: Candidate): boolean {
        return this.known.has(candidate);
    }

    list(): Candidate[] {
        return [...this.known].sort();
    }

    mergeAndPersist(newlyFound: Iterable<Candidate>): Promise<Candidate[]> {
        const batch = [...newlyFound];
        return this.writeQueue(async () => {
            const prior = await this.readRecord();
            const union = new Set<Candidate>([...prior, ...this.known, ...batch]);
            const sorted = [...union].sort();
            try {
                await writeFileAtomic(this.filePath, JSON.stringify(sorted, null, 2) + '\n');
            } catch (e) {
                throw new PersistenceError(`Cannot write discovery record ${this.filePath}: ${errorMessage(e)}`, {
                    path: this.filePath
                });
            }
            this.known = union;
            if (this.options.onPersist) await this.options.onPersist(sorted);
            return sorted;
        });
    }

    private async readRecord(): Promise<Candidate[]> {
        let text: string | null;
        try {
            text = await readTextIfExists(this.filePath);
        } catch (e) {
            throw new PersistenceError(`Cannot read discovery record ${this.filePath}: ${errorMessage(e)}`, { path: this.filePath });
        }
        if (text === null || text.trim() === '') return [];

        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch (e) {
            throw new PersistenceError(`Discovery record ${this.filePath} is not valid JSON: ${errorMessage(e)}`, { path: this.filePath });
        }
        const result = DiscoveryRecord.safeParse(parsed);
        if (!result.success) {
            throw new PersistenceError(`Discovery record ${this.filePath} must be an array of strings`, { path: this.filePath });
        }
        return result.data;
    }
}
