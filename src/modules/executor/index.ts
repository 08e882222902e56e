import pLimit from 'p-limit';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { ContentClassifier } from '../classifier';
import { UserAgentRotator } from '../fetcher';
import { OutcomeStore } from '../outcomes';
import { ResultStore } from '../results';
import { Logger, Metrics, logger as defaultLogger } from '../observability';
import {
    Candidate,
    Classification,
    ClassifierRules,
    FetchCapability,
    FetchResult,
    Outcome,
    ProbeResult,
    RunSummary,
} from '../../types';
import { TransportError, errorMessage } from '../../utils/errors';

/** Long skip runs give signal handlers and timers a turn this often. */
const SKIP_YIELD_EVERY = 10000;

/** Finished probes held for in-order commit, per worker, before submission pauses. */
export const REORDER_BUFFER_PER_WORKER = 64;

/** Extra time a fetch capability gets past its own timeout before the worker gives up on it. */
export const DEADLINE_GRACE_MS = 1000;

export interface ProbeExecutorOptions {
    workers: number;
    timeoutMs: number;
    checkpointEvery: number;
    rules: ClassifierRules;
}

export interface ProbeExecutorDeps {
    fetcher: FetchCapability;
    outcomes: OutcomeStore;
    results: ResultStore;
    userAgents: UserAgentRotator;
    metrics?: Metrics;
    logger?: Logger;
}

type RunState = {
    summary: RunSummary;
    discovered: Set<Candidate>;
    sinceCheckpoint: number;
    failure: unknown;
};

export const withDeadline = async (pending: Promise<FetchResult>, ms: number, url: string): Promise<FetchResult> => {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<FetchResult>(resolve => {
        timer = setTimeout(() => resolve({
            ok: false,
            error: new TransportError(`No response within ${ms}ms`, 'timeout', { url })
        }), ms);
    });
    try {
        return await Promise.race([pending, deadline]);
    } finally {
        clearTimeout(timer);
    }
};

/**
 * Bounded-concurrency probing.
 *
 * The coordinator (the `run` loop) owns the skip-filter and the stores.
 * Workers only fetch and classify; their results are committed one at a time
 * in submission order, so the outcome log's last line is always a candidate
 * before which every submitted candidate has been persisted.
 *
 * Submission is paced by free workers, not by the commit order: a slow probe
 * at the head only holds back commits, and finished results wait in a reorder
 * buffer of `workers * REORDER_BUFFER_PER_WORKER` entries.
 */
export class ProbeExecutor {
    private log: Logger;

    constructor(private deps: ProbeExecutorDeps, private options: ProbeExecutorOptions) {
        this.log = deps.logger ?? defaultLogger;
    }

    async run(candidates: Iterable<Candidate>, signal?: AbortSignal): Promise<RunSummary> {
        const { outcomes, results, metrics } = this.deps;
        const { workers } = this.options;
        const limit = pLimit(workers);
        const reorderLimit = workers * REORDER_BUFFER_PER_WORKER;
        const inFlight = new Set<Promise<ProbeResult>>();
        const uncommitted: Promise<void>[] = [];
        const state: RunState = {
            summary: {
                submitted: 0,
                skipped: 0,
                live: 0,
                parked: 0,
                empty: 0,
                error: 0,
                discovered: [],
                interrupted: false
            },
            discovered: new Set<Candidate>(),
            sinceCheckpoint: 0,
            failure: undefined
        };
        let tail: Promise<void> = Promise.resolve();

        for (const candidate of candidates) {
            if (state.failure !== undefined) break;
            if (signal?.aborted) {
                state.summary.interrupted = true;
                break;
            }

            if (outcomes.has(candidate) || results.has(candidate) || state.discovered.has(candidate)) {
                state.summary.skipped++;
                metrics?.recordSkip();
                if (state.summary.skipped % SKIP_YIELD_EVERY === 0) await yieldToEventLoop();
                continue;
            }

            this.log.debug(`Testing: ${candidate}`);
            const probe: Promise<ProbeResult> = limit(() => this.probe(candidate)).then(result => {
                inFlight.delete(probe);
                return result;
            });
            inFlight.add(probe);
            state.summary.submitted++;

            // Commits settle in order, so each one removes itself from the head.
            tail = tail
                .then(async () => {
                    const result = await probe;
                    if (state.failure === undefined) await this.commit(result, state);
                })
                .catch(error => {
                    if (state.failure === undefined) state.failure = error;
                })
                .then(() => {
                    uncommitted.shift();
                });
            uncommitted.push(tail);

            if (inFlight.size >= workers) {
                await Promise.race(inFlight);
            }
            if (uncommitted.length >= reorderLimit) {
                await uncommitted[0];
            }
        }

        if (signal?.aborted) state.summary.interrupted = true;
        await tail;

        if (state.failure === undefined) {
            try {
                await outcomes.flush();
            } catch (error) {
                state.failure = error;
            }
        }
        if (state.failure !== undefined) {
            this.log.error('Probe run stopped: persistence failed', {
                error: errorMessage(state.failure),
                last_committed: state.summary.lastCommitted
            });
            throw state.failure;
        }

        state.summary.discovered = [...state.discovered];
        return state.summary;
    }

    private async probe(candidate: Candidate): Promise<ProbeResult> {
        const { fetcher, userAgents } = this.deps;
        const { timeoutMs, rules } = this.options;
        const started = Date.now();
        let classification: Classification;

        try {
            const response = await withDeadline(
                fetcher.fetch(candidate, timeoutMs, userAgents.headers()),
                timeoutMs + DEADLINE_GRACE_MS,
                candidate
            );
            classification = ContentClassifier.classify(response, rules);
        } catch (error) {
            classification = { outcome: Outcome.ERROR, reason: 'worker-failure', detail: errorMessage(error) };
        }

        return { candidate, classification, latencyMs: Date.now() - started };
    }

    private async commit(result: ProbeResult, state: RunState): Promise<void> {
        const { outcomes, results, metrics } = this.deps;
        const { candidate, classification } = result;
        metrics?.record(result);

        switch (classification.outcome) {
            case Outcome.LIVE:
                state.summary.live++;
                state.discovered.add(candidate);
                this.log.info(`Live: ${candidate}`, { latency_ms: result.latencyMs });
                await results.mergeAndPersist([candidate]);
                break;
            case Outcome.PARKED:
                state.summary.parked++;
                await outcomes.recordNotLive(candidate);
                break;
            case Outcome.EMPTY:
                state.summary.empty++;
                await outcomes.recordNotLive(candidate);
                break;
            case Outcome.ERROR:
                state.summary.error++;
                this.log.warn(`Probe failed for ${candidate}`, { detail: classification.detail });
                await outcomes.recordNotLive(candidate);
                break;
        }

        if (classification.outcome !== Outcome.LIVE) {
            this.log.debug(`${classification.outcome}: ${candidate}`, {
                reason: classification.reason,
                detail: classification.detail
            });
        }

        state.summary.lastCommitted = candidate;
        state.sinceCheckpoint++;
        if (classification.outcome === Outcome.LIVE || state.sinceCheckpoint >= this.options.checkpointEvery) {
            state.sinceCheckpoint = 0;
            await outcomes.flush();
            this.log.info('Checkpoint', {
                last_committed: candidate,
                submitted: state.summary.submitted,
                live: state.summary.live
            });
        }
    }
}
