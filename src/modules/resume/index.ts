import { CandidateSource } from '../candidates';
import { OutcomeStore } from '../outcomes';
import { ResultStore } from '../results';
import { Logger, logger as defaultLogger } from '../observability';
import { Candidate, SourcePosition } from '../../types';

export type ResumePlan = {
    cursor: Candidate | undefined;
    /** Where generation starts; undefined when the sequence is exhausted. */
    start: SourcePosition | undefined;
    /** The cursor was present but this source never generates it. */
    cursorUnknown: boolean;
    knownNotLive: number;
    knownLive: number;
    candidates: Iterable<Candidate>;
};

export interface ResumeOptions {
    resume: boolean;
    logger?: Logger;
}

/**
 * One-time positioning at startup. Loads both stores and places the source
 * right after the outcome log's last line. Nothing here is persisted.
 */
export class ResumeController {

    static async prepare(
        source: CandidateSource,
        outcomes: OutcomeStore,
        results: ResultStore,
        options: ResumeOptions
    ): Promise<ResumePlan> {
        const log = options.logger ?? defaultLogger;
        const { cursor } = await outcomes.load();
        await results.load();

        let start = source.first();
        let cursorUnknown = false;

        if (options.resume && cursor !== undefined) {
            const position = source.locate(cursor);
            if (position) {
                start = source.next(position);
                log.info(`Resuming after ${cursor}`, { position });
            } else {
                cursorUnknown = true;
                log.warn(`Resume cursor ${cursor} is not generated by this word list and suffix set; starting from the beginning`);
            }
        } else if (!options.resume) {
            log.info('Resume disabled; starting from the first candidate');
        }

        return {
            cursor,
            start,
            cursorUnknown,
            knownNotLive: outcomes.size,
            knownLive: results.size,
            candidates: { [Symbol.iterator]: () => source.candidates(start) }
        };
    }
}
