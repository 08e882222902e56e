import { promises as fs } from 'fs';
import crypto from 'crypto';
import { Config, resolveOutputPaths } from '../config';
import { CandidateSource } from '../modules/candidates';
import { OutcomeStore } from '../modules/outcomes';
import { ResultStore } from '../modules/results';
import { ResumeController } from '../modules/resume';
import { ProbeExecutor } from '../modules/executor';
import { AxiosFetcher, UserAgentRotator } from '../modules/fetcher';
import { Heartbeat, Logger, Metrics, MetricsSnapshot, logger as defaultLogger } from '../modules/observability';
import { extractListedLinks, writeHtmlReport } from '../modules/report';
import { Candidate, FetchCapability, RunSummary } from '../types';
import { ProberError, errorMessage } from '../utils/errors';

export interface ScanOptions {
    dictPath: string;
    config: Config;
    fetcher?: FetchCapability;
    signal?: AbortSignal;
    logger?: Logger;
    random?: () => number;
}

export type ScanReport = RunSummary & {
    runId: string;
    cursor: Candidate | undefined;
    metrics: MetricsSnapshot;
};

export type ImportReport = {
    imported: number;
    total: number;
};

const isHttpUrl = (href: string): boolean => /^https?:\/\//i.test(href);

export class Pipeline {

    static async scan(options: ScanOptions): Promise<ScanReport> {
        const { config } = options;
        const log = options.logger ?? defaultLogger;
        const paths = resolveOutputPaths(config);
        const runId = `run-${crypto.randomUUID()}`;

        // Fails here, before anything is probed, when the word list is unreadable.
        const source = await CandidateSource.fromWordList(options.dictPath, {
            suffixes: config.suffixes,
            combination: {
                startLength: config.combination.start_length,
                maxLength: config.combination.max_length
            }
        });

        const outcomes = new OutcomeStore(paths.outcomeLog, { flushEvery: config.probe.checkpoint_every });
        const results = new ResultStore(paths.resultsJson, {
            onPersist: paths.htmlReport ? Pipeline.reportWriter(paths.htmlReport, log) : undefined
        });

        const plan = await ResumeController.prepare(source, outcomes, results, { resume: config.resume, logger: log });
        log.info(`Scan started: ${runId}`, {
            words: source.wordCount,
            suffixes: config.suffixes,
            workers: config.probe.workers,
            known_not_live: plan.knownNotLive,
            known_live: plan.knownLive,
            cursor: plan.cursor
        });

        const metrics = new Metrics();
        const heartbeat = new Heartbeat({
            intervalMs: config.housekeeping.interval_ms,
            memoryWarnMb: config.housekeeping.memory_warn_mb,
            snapshot: () => metrics.getSummary(),
            log
        });
        const executor = new ProbeExecutor(
            {
                fetcher: options.fetcher ?? new AxiosFetcher(),
                outcomes,
                results,
                userAgents: new UserAgentRotator(config.probe.user_agents, options.random),
                metrics,
                logger: log
            },
            {
                workers: config.probe.workers,
                timeoutMs: config.probe.timeout_ms,
                checkpointEvery: config.probe.checkpoint_every,
                rules: {
                    minContentLength: config.classifier.min_content_length,
                    parkedPhrases: config.classifier.parked_phrases
                }
            }
        );

        heartbeat.start();
        let summary: RunSummary;
        try {
            summary = await executor.run(plan.candidates, options.signal);
        } finally {
            heartbeat.stop();
        }

        if (paths.htmlReport) {
            await Pipeline.reportWriter(paths.htmlReport, log)(results.list());
        }

        const report: ScanReport = { ...summary, runId, cursor: plan.cursor, metrics: metrics.getSummary() };
        log.info(`Scan ${summary.interrupted ? 'interrupted' : 'completed'}: ${runId}`, {
            submitted: summary.submitted,
            skipped: summary.skipped,
            live: summary.live,
            not_live: summary.parked + summary.empty + summary.error,
            total_live: results.size,
            last_committed: summary.lastCommitted
        });
        return report;
    }

    /** Rewrites the HTML listing from the discovery record. Returns the number of entries. */
    static async report(config: Config, log: Logger = defaultLogger): Promise<number> {
        const paths = resolveOutputPaths(config);
        const results = new ResultStore(paths.resultsJson);
        await results.load();
        const target = paths.htmlReport ?? `${paths.resultsJson}.html`;
        await writeHtmlReport(target, results.list());
        log.info(`Wrote ${results.size} entries to ${target}`);
        return results.size;
    }

    /** Recovers live entries from an older HTML listing and merges them into the record. */
    static async importHtml(htmlPath: string, config: Config, log: Logger = defaultLogger): Promise<ImportReport> {
        let html: string;
        try {
            html = await fs.readFile(htmlPath, 'utf8');
        } catch (e) {
            throw new ProberError(`Cannot read ${htmlPath}: ${errorMessage(e)}`, 'IMPORT_ERROR', { path: htmlPath });
        }

        const links = extractListedLinks(html).filter(isHttpUrl);
        const paths = resolveOutputPaths(config);
        const results = new ResultStore(paths.resultsJson, {
            onPersist: paths.htmlReport ? Pipeline.reportWriter(paths.htmlReport, log) : undefined
        });
        await results.load();
        const before = results.size;
        const merged = await results.mergeAndPersist(links);
        log.info(`Imported ${merged.length - before} new entries from ${htmlPath}`, { found: links.length, total: merged.length });
        return { imported: merged.length - before, total: merged.length };
    }

    /** The HTML page is a view; failing to write it is logged, not fatal. */
    private static reportWriter(htmlPath: string, log: Logger) {
        return async (all: Candidate[]): Promise<void> => {
            try {
                await writeHtmlReport(htmlPath, all);
            } catch (e) {
                log.warn(`Cannot write HTML report ${htmlPath}`, { error: errorMessage(e) });
            }
        };
    }
}
