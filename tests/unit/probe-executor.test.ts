import path from 'path';
import { promises as fs } from 'fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ProbeExecutor, ProbeExecutorOptions } from '../../src/modules/executor';
import { OutcomeStore } from '../../src/modules/outcomes';
import { ResultStore } from '../../src/modules/results';
import { UserAgentRotator } from '../../src/modules/fetcher';
import { Metrics } from '../../src/modules/observability';
import { PersistenceError } from '../../src/utils/errors';
import { FakeFetcher, FakeResponse } from '../helpers/fake-fetcher';
import { makeTempDir, removeDir } from '../helpers/tmp';

const LIVE_BODY = 'x'.repeat(200);
const PARKED_BODY = `This domain is parked. ${'y'.repeat(100)}`;

const options = (overrides: Partial<ProbeExecutorOptions> = {}): ProbeExecutorOptions => ({
    workers: 3,
    timeoutMs: 1000,
    checkpointEvery: 25,
    rules: { minContentLength: 100, parkedPhrases: ['this domain is parked'] },
    ...overrides
});

describe('ProbeExecutor', () => {
    let dir: string;
    let outcomes: OutcomeStore;
    let results: ResultStore;

    const build = (fetcher: FakeFetcher, overrides: Partial<ProbeExecutorOptions> = {}, metrics?: Metrics) =>
        new ProbeExecutor(
            { fetcher, outcomes, results, userAgents: new UserAgentRotator(['test-agent']), metrics },
            options(overrides)
        );

    const readLog = () => fs.readFile(outcomes.path, 'utf8');

    beforeEach(async () => {
        dir = await makeTempDir();
        outcomes = new OutcomeStore(path.join(dir, 'empty_domains.txt'));
        results = new ResultStore(path.join(dir, 'domains.json'));
        await outcomes.load();
        await results.load();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('persists live and not-live candidates to their stores', async () => {
        const fetcher = new FakeFetcher({
            'http://foo.com': { status: 200, body: LIVE_BODY },
            'http://bar.com': { status: 200, body: 'this domain is for sale' },
            'http://baz.com': { hang: true },
        });
        const metrics = new Metrics();

        const summary = await build(fetcher, { timeoutMs: 100 }, metrics)
            .run(['http://foo.com', 'http://bar.com', 'http://baz.com']);

        expect(summary).toMatchObject({ submitted: 3, skipped: 0, live: 1, parked: 1, empty: 1, error: 0, interrupted: false });
        expect(summary.discovered).toEqual(['http://foo.com']);
        expect(JSON.parse(await fs.readFile(results.path, 'utf8'))).toEqual(['http://foo.com']);
        expect(await readLog()).toBe('http://bar.com\nhttp://baz.com\n');
        expect(metrics.getSummary()).toMatchObject({ probed: 3, live: 1, parked: 1, empty: 1 });
    });

    it('overlaps sparse slow probes instead of waiting on the oldest one', async () => {
        const candidates = Array.from({ length: 64 }, (_, i) => `http://site${i}.com`);
        const slow = new Set(candidates.filter((_, i) => i % 8 === 0));
        const responses: Record<string, FakeResponse> = {};
        for (const candidate of candidates) {
            responses[candidate] = { status: 404, body: 'not found', delayMs: slow.has(candidate) ? 300 : 1 };
        }
        const fetcher = new FakeFetcher(responses);
        let maxSlowActive = 0;
        fetcher.onCall = url => {
            if (!slow.has(url)) return;
            const active = [...fetcher.inFlight].filter(u => slow.has(u)).length + 1;
            maxSlowActive = Math.max(maxSlowActive, active);
        };

        const summary = await build(fetcher, { workers: 4 }).run(candidates);

        expect(summary.submitted).toBe(64);
        expect(maxSlowActive).toBeGreaterThan(1);
        expect(fetcher.maxActive).toBeLessThanOrEqual(4);
        expect((await readLog()).trim().split('\n')).toEqual(candidates);
    });

    it('commits outcomes in submission order even when later probes finish first', async () => {
        const fetcher = new FakeFetcher({
            'http://bar.com': { status: 200, body: PARKED_BODY, delayMs: 80 },
            'http://baz.com': { status: 404, body: 'not found' },
        });

        const summary = await build(fetcher).run(['http://bar.com', 'http://baz.com']);

        expect(await readLog()).toBe('http://bar.com\nhttp://baz.com\n');
        expect(summary.lastCommitted).toBe('http://baz.com');
    });

    it('never fetches candidates already in either store', async () => {
        await outcomes.recordNotLive('http://bar.com');
        await results.mergeAndPersist(['http://foo.com']);
        const fetcher = new FakeFetcher();

        const summary = await build(fetcher).run(['http://foo.com', 'http://bar.com', 'http://baz.com']);

        expect(fetcher.urls).toEqual(['http://baz.com']);
        expect(summary.skipped).toBe(2);
        expect(summary.submitted).toBe(1);
    });

    it('keeps at most `workers` fetches in flight', async () => {
        const fetcher = new FakeFetcher({}, 20);
        const candidates = Array.from({ length: 20 }, (_, i) => `http://site${i}.com`);

        const summary = await build(fetcher, { workers: 3 }).run(candidates);

        expect(summary.submitted).toBe(20);
        expect(fetcher.maxActive).toBeLessThanOrEqual(3);
        expect(fetcher.maxActive).toBeGreaterThan(1);
        expect((await readLog()).trim().split('\n')).toEqual(candidates);
    });

    it('sends the rotated user agent and the configured timeout', async () => {
        const fetcher = new FakeFetcher();
        await build(fetcher, { timeoutMs: 750 }).run(['http://a.com']);
        expect(fetcher.calls[0]).toEqual({ url: 'http://a.com', timeoutMs: 750, headers: { 'User-Agent': 'test-agent' } });
    });

    it('records a throwing fetch as an error and keeps going', async () => {
        const fetcher = new FakeFetcher({
            'http://a.com': { throws: 'boom' },
            'http://b.com': { status: 200, body: LIVE_BODY },
        });

        const summary = await build(fetcher).run(['http://a.com', 'http://b.com']);

        expect(summary.error).toBe(1);
        expect(summary.live).toBe(1);
        expect(await readLog()).toBe('http://a.com\n');
    });

    it('gives up on a fetch that never settles', async () => {
        const fetcher = new FakeFetcher({ 'http://a.com': { hang: true } });

        const summary = await build(fetcher, { timeoutMs: 100 }).run(['http://a.com']);

        expect(summary.empty).toBe(1);
        expect(await readLog()).toBe('http://a.com\n');
    });

    it('submits nothing when aborted before starting', async () => {
        const fetcher = new FakeFetcher();
        const controller = new AbortController();
        controller.abort();

        const summary = await build(fetcher).run(['http://a.com', 'http://b.com'], controller.signal);

        expect(summary.submitted).toBe(0);
        expect(summary.interrupted).toBe(true);
        expect(fetcher.calls).toHaveLength(0);
    });

    it('stops submitting on abort and commits everything already submitted', async () => {
        const fetcher = new FakeFetcher({}, 10);
        const controller = new AbortController();
        fetcher.onCall = url => {
            if (url === 'http://a.com') controller.abort();
        };
        const candidates = ['http://a.com', 'http://b.com', 'http://c.com', 'http://d.com', 'http://e.com'];

        const summary = await build(fetcher, { workers: 1 }).run(candidates, controller.signal);

        expect(summary.interrupted).toBe(true);
        expect(summary.submitted).toBeGreaterThan(0);
        expect(summary.submitted).toBeLessThan(candidates.length);
        expect((await readLog()).trim().split('\n')).toEqual(candidates.slice(0, summary.submitted));
    });

    it('flushes buffered outcomes before returning', async () => {
        outcomes = new OutcomeStore(path.join(dir, 'buffered.txt'), { flushEvery: 100 });
        await outcomes.load();
        const fetcher = new FakeFetcher();

        await build(fetcher, { checkpointEvery: 100 }).run(['http://a.com', 'http://b.com']);

        expect(await readLog()).toBe('http://a.com\nhttp://b.com\n');
    });

    it('fails the run when the outcome log cannot be written', async () => {
        const blocker = path.join(dir, 'blocker');
        await fs.writeFile(blocker, 'file', 'utf8');
        outcomes = new OutcomeStore(path.join(blocker, 'empty_domains.txt'));
        const fetcher = new FakeFetcher({}, 5);
        const candidates = Array.from({ length: 200 }, (_, i) => `http://site${i}.com`);

        await expect(build(fetcher).run(candidates)).rejects.toBeInstanceOf(PersistenceError);
        expect(fetcher.calls.length).toBeLessThan(candidates.length);
    });
});
