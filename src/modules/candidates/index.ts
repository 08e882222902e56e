import { promises as fs } from 'fs';
import { Candidate, SourcePosition } from '../../types';
import { GenerationError, errorMessage } from '../../utils/errors';

/** Words longer than a host name label (63 characters) are dropped. */
export const MAX_LABEL_LENGTH = 63;
export const COMBINATION_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
export const CANDIDATE_SCHEME = 'http://';
/** 36^10 is still below Number.MAX_SAFE_INTEGER, 36^11 is not. */
export const MAX_COMBINATION_LENGTH = 10;

export interface CandidateSourceOptions {
    suffixes: string[];
    combination: {
        startLength: number;
        maxLength?: number;
    };
}

export const toCandidate = (base: string, suffix: string): Candidate =>
    `${CANDIDATE_SCHEME}${base}.${suffix}`;

/** Trims, lower-cases and drops blank or over-long lines, keeping file order. */
export const parseWordList = (text: string): string[] =>
    text
        .split(/\r?\n/)
        .map(line => line.trim().toLowerCase())
        .filter(word => word.length > 0 && word.length <= MAX_LABEL_LENGTH);

export const readWordList = async (filePath: string): Promise<string[]> => {
    try {
        return parseWordList(await fs.readFile(filePath, 'utf8'));
    } catch (e) {
        throw new GenerationError(`Cannot read word list ${filePath}: ${errorMessage(e)}`, { path: filePath });
    }
};

const RADIX = COMBINATION_ALPHABET.length;

const combinationCount = (length: number): number => RADIX ** length;

/** Base name at `index` within all strings of `length`, in alphabet order. */
export const combinationAt = (length: number, index: number): string => {
    const chars = new Array<string>(length);
    let rest = index;
    for (let i = length - 1; i >= 0; i--) {
        chars[i] = COMBINATION_ALPHABET[rest % RADIX];
        rest = Math.floor(rest / RADIX);
    }
    return chars.join('');
};

const combinationIndex = (base: string): number | undefined => {
    let index = 0;
    for (const ch of base) {
        const digit = COMBINATION_ALPHABET.indexOf(ch);
        if (digit < 0) return undefined;
        index = index * RADIX + digit;
    }
    return index;
};

/**
 * Deterministic candidate sequence: every word crossed with every suffix,
 * then every combination of the alphabet by increasing length, crossed with
 * every suffix. The combination phase stops after `maxLength` if one is set.
 */
export class CandidateSource {
    private wordIndex = new Map<string, number>();
    private readonly maxLength: number | undefined;

    constructor(private words: string[], private options: CandidateSourceOptions) {
        if (options.suffixes.length === 0) {
            throw new GenerationError('At least one suffix is required');
        }
        this.maxLength = options.combination.maxLength;
        words.forEach((word, i) => {
            if (!this.wordIndex.has(word)) this.wordIndex.set(word, i);
        });
    }

    static async fromWordList(filePath: string, options: CandidateSourceOptions): Promise<CandidateSource> {
        return new CandidateSource(await readWordList(filePath), options);
    }

    get wordCount(): number {
        return this.words.length;
    }

    first(): SourcePosition | undefined {
        if (this.words.length > 0) return { phase: 'dictionary', wordIndex: 0, suffixIndex: 0 };
        return this.firstCombination();
    }

    candidateAt(position: SourcePosition): Candidate {
        const suffix = this.options.suffixes[position.suffixIndex];
        if (position.phase === 'dictionary') {
            return toCandidate(this.words[position.wordIndex], suffix);
        }
        return toCandidate(combinationAt(position.length, position.index), suffix);
    }

    next(position: SourcePosition): SourcePosition | undefined {
        const suffixCount = this.options.suffixes.length;
        if (position.suffixIndex + 1 < suffixCount) {
            return { ...position, suffixIndex: position.suffixIndex + 1 };
        }
        if (position.phase === 'dictionary') {
            if (position.wordIndex + 1 < this.words.length) {
                return { phase: 'dictionary', wordIndex: position.wordIndex + 1, suffixIndex: 0 };
            }
            return this.firstCombination();
        }
        if (position.index + 1 < combinationCount(position.length)) {
            return { phase: 'combination', length: position.length, index: position.index + 1, suffixIndex: 0 };
        }
        return this.combinationStart(position.length + 1);
    }

    /**
     * First position holding `candidate`, or undefined when this source never
     * generates it (e.g. the word list changed since it was recorded).
     */
    locate(candidate: Candidate): SourcePosition | undefined {
        if (!candidate.startsWith(CANDIDATE_SCHEME)) return undefined;
        const host = candidate.slice(CANDIDATE_SCHEME.length);

        const { suffixes } = this.options;
        for (let suffixIndex = 0; suffixIndex < suffixes.length; suffixIndex++) {
            const suffix = suffixes[suffixIndex];
            if (!host.endsWith(`.${suffix}`)) continue;
            const position = this.locateBase(host.slice(0, host.length - suffix.length - 1), suffixIndex);
            if (position) return position;
        }
        return undefined;
    }

    /** Candidates from `from` onward; nothing when `from` is undefined. */
    *candidates(from: SourcePosition | undefined): Generator<Candidate> {
        for (let position = from; position; position = this.next(position)) {
            yield this.candidateAt(position);
        }
    }

    all(): Generator<Candidate> {
        return this.candidates(this.first());
    }

    private locateBase(base: string, suffixIndex: number): SourcePosition | undefined {
        const wordIndex = this.wordIndex.get(base);
        if (wordIndex !== undefined) {
            return { phase: 'dictionary', wordIndex, suffixIndex };
        }
        const { startLength } = this.options.combination;
        if (base.length < startLength || base.length > (this.maxLength ?? MAX_COMBINATION_LENGTH)) {
            return undefined;
        }
        const index = combinationIndex(base);
        if (index === undefined) return undefined;
        return { phase: 'combination', length: base.length, index, suffixIndex };
    }

    private firstCombination(): SourcePosition | undefined {
        return this.combinationStart(this.options.combination.startLength);
    }

    private combinationStart(length: number): SourcePosition | undefined {
        if (this.maxLength !== undefined && length > this.maxLength) return undefined;
        if (length > MAX_COMBINATION_LENGTH) return undefined;
        return { phase: 'combination', length, index: 0, suffixIndex: 0 };
    }
}
