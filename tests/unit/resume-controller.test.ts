import path from 'path';
import { promises as fs } from 'fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CandidateSource } from '../../src/modules/candidates';
import { OutcomeStore } from '../../src/modules/outcomes';
import { ResultStore } from '../../src/modules/results';
import { ResumeController } from '../../src/modules/resume';
import { makeTempDir, removeDir, take } from '../helpers/tmp';

const WORDS = ['foo', 'bar', 'baz'];

describe('ResumeController', () => {
    let dir: string;
    let logPath: string;
    let recordPath: string;
    let source: CandidateSource;

    const writeLog = async (...lines: string[]) => {
        await fs.writeFile(logPath, lines.map(line => `${line}\n`).join(''), 'utf8');
    };

    const prepare = (resume = true) =>
        ResumeController.prepare(source, new OutcomeStore(logPath), new ResultStore(recordPath), { resume });

    beforeEach(async () => {
        dir = await makeTempDir();
        logPath = path.join(dir, 'empty_domains.txt');
        recordPath = path.join(dir, 'domains.json');
        source = new CandidateSource(WORDS, { suffixes: ['com'], combination: { startLength: 2, maxLength: 2 } });
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('starts at the first candidate without an outcome log', async () => {
        const plan = await prepare();
        expect(plan.cursor).toBeUndefined();
        expect(plan.cursorUnknown).toBe(false);
        expect(take(plan.candidates, 2)).toEqual(['http://foo.com', 'http://bar.com']);
    });

    it('continues right after the last logged candidate', async () => {
        await writeLog('http://foo.com', 'http://bar.com');
        const plan = await prepare();
        expect(plan.cursor).toBe('http://bar.com');
        expect(plan.knownNotLive).toBe(2);
        expect(take(plan.candidates, 2)).toEqual(['http://baz.com', 'http://aa.com']);
    });

    it('moves into the combination phase when the cursor is the last word', async () => {
        await writeLog('http://baz.com');
        const plan = await prepare();
        expect(plan.start).toEqual({ phase: 'combination', length: 2, index: 0, suffixIndex: 0 });
        expect(take(plan.candidates, 1)).toEqual(['http://aa.com']);
    });

    it('resumes inside the combination phase', async () => {
        await writeLog('http://foo.com', 'http://a9.com');
        const plan = await prepare();
        expect(take(plan.candidates, 2)).toEqual(['http://ba.com', 'http://bb.com']);
    });

    it('yields nothing when the cursor is the final candidate', async () => {
        await writeLog('http://99.com');
        const plan = await prepare();
        expect(plan.start).toBeUndefined();
        expect([...plan.candidates]).toEqual([]);
    });

    it('restarts from the beginning on a cursor this source never generates', async () => {
        await writeLog('http://qux.org');
        const plan = await prepare();
        expect(plan.cursorUnknown).toBe(true);
        expect(take(plan.candidates, 1)).toEqual(['http://foo.com']);
    });

    it('ignores the cursor when resume is off but still reports it', async () => {
        await writeLog('http://bar.com');
        const plan = await prepare(false);
        expect(plan.cursor).toBe('http://bar.com');
        expect(take(plan.candidates, 1)).toEqual(['http://foo.com']);
    });

    it('counts what the discovery record already holds', async () => {
        await fs.writeFile(recordPath, JSON.stringify(['http://foo.com', 'http://bar.com']), 'utf8');
        const plan = await prepare();
        expect(plan.knownLive).toBe(2);
    });

    it('can iterate the planned candidates more than once', async () => {
        await writeLog('http://bar.com');
        const plan = await prepare();
        expect(take(plan.candidates, 1)).toEqual(['http://baz.com']);
        expect(take(plan.candidates, 1)).toEqual(['http://baz.com']);
    });
});
