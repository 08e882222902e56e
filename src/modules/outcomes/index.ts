import pLimit from 'p-limit';
import { Candidate } from '../../types';
import { appendLines, readTextIfExists, truncateFile } from '../../utils/fs';
import { PersistenceError, errorMessage } from '../../utils/errors';

export type OutcomeLog = {
    members: ReadonlySet<Candidate>;
    cursor: Candidate | undefined;
};

export interface OutcomeStoreOptions {
    /** Buffered entries are appended once this many are pending. */
    flushEvery?: number;
}

/**
 * Append-only log of candidates classified as not live. Read back as a set
 * for skip-filtering; its last line is the resume cursor.
 */
export class OutcomeStore {
    private members = new Set<Candidate>();
    private pending: Candidate[] = [];
    private tail: Candidate | undefined;
    private writeQueue = pLimit(1);
    private readonly flushEvery: number;

    constructor(private filePath: string, options: OutcomeStoreOptions = {}) {
        this.flushEvery = Math.max(1, options.flushEvery ?? 1);
    }

    get path(): string {
        return this.filePath;
    }

    get size(): number {
        return this.members.size;
    }

    /** Last candidate recorded, persisted or not. */
    get lastRecorded(): Candidate | undefined {
        return this.tail;
    }

    async load(): Promise<OutcomeLog> {
        let text: string | null;
        try {
            text = await readTextIfExists(this.filePath);
            if (text !== null && text.length > 0 && !text.endsWith('\n')) {
                text = await this.dropTornLine(text);
            }
        } catch (e) {
            throw new PersistenceError(`Cannot read outcome log ${this.filePath}: ${errorMessage(e)}`, { path: this.filePath });
        }

        const lines = (text ?? '').split(/\r?\n/).map(line => line.trim()).filter(Boolean);
        for (const line of lines) this.members.add(line);
        this.tail = lines.length > 0 ? lines[lines.length - 1] : undefined;
        return { members: this.members, cursor: this.tail };
    }

    has(candidate: Candidate): boolean {
        return this.members.has(candidate);
    }

    /** Returns false when the candidate was already recorded. */
    async recordNotLive(candidate: Candidate): Promise<boolean> {
        if (this.members.has(candidate)) return false;
        this.members.add(candidate);
        this.pending.push(candidate);
        this.tail = candidate;
        if (this.pending.length >= this.flushEvery) await this.flush();
        return true;
    }

    /**
     * A crash mid-append leaves a last line without its newline. That line is
     * cut from the file, so later appends start on a fresh line.
     */
    private async dropTornLine(text: string): Promise<string> {
        const kept = text.slice(0, text.lastIndexOf('\n') + 1);
        await truncateFile(this.filePath, Buffer.byteLength(kept, 'utf8'));
        return kept;
    }

    /** Appends everything buffered. Calls are serialized in arrival order. */
    flush(): Promise<void> {
        return this.writeQueue(async () => {
            const batch = this.pending.splice(0, this.pending.length);
            try {
                await appendLines(this.filePath, batch);
            } catch (e) {
                throw new PersistenceError(`Cannot append to outcome log ${this.filePath}: ${errorMessage(e)}`, {
                    path: this.filePath,
                    lost: batch.length
                });
            }
        });
    }
}
