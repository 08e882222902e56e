import type { TransportError } from '../utils/errors';

/** A fully-qualified probe target such as `http://example.com`. */
export type Candidate = string;

export enum Outcome {
    LIVE = 'LIVE',
    PARKED = 'PARKED',
    EMPTY = 'EMPTY',
    ERROR = 'ERROR',
}

export type OutcomeReason =
    | 'content'
    | 'status'
    | 'transport'
    | 'short-content'
    | 'parked-phrase'
    | 'worker-failure';

export type Classification = {
    outcome: Outcome;
    reason: OutcomeReason;
    detail?: string;
};

export type TransportErrorKind =
    | 'timeout'
    | 'dns'
    | 'connection'
    | 'tls'
    | 'decode'
    | 'invalid-url'
    | 'unknown';

/**
 * Where a candidate sits in the generated sequence. Combination positions use
 * `(length, index)` rather than a linear offset since that phase has no end.
 */
export type SourcePosition =
    | { phase: 'dictionary'; wordIndex: number; suffixIndex: number }
    | { phase: 'combination'; length: number; index: number; suffixIndex: number };

export type ClassifierRules = {
    minContentLength: number;
    parkedPhrases: string[];
};

export type ProbeResult = {
    candidate: Candidate;
    classification: Classification;
    latencyMs: number;
};

export type RunSummary = {
    submitted: number;
    skipped: number;
    live: number;
    parked: number;
    empty: number;
    error: number;
    discovered: Candidate[];
    lastCommitted?: Candidate;
    interrupted: boolean;
};

export type FetchResponse = {
    ok: true;
    status: number;
    body: string;
    finalUrl: string;
};

export type FetchFailure = {
    ok: false;
    error: TransportError;
};

export type FetchResult = FetchResponse | FetchFailure;

/** The transport the prober consumes. Implementations never throw for network failures. */
export interface FetchCapability {
    fetch(url: string, timeoutMs: number, headers: Record<string, string>): Promise<FetchResult>;
}
