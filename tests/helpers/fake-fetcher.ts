import { FetchCapability, FetchResult } from '../../src/types';
import { TransportError } from '../../src/utils/errors';

export type FakeResponse =
    | { status: number; body: string; delayMs?: number }
    | { transport: TransportError['kind']; delayMs?: number }
    | { throws: string }
    | { hang: true };

export type FakeCall = {
    url: string;
    timeoutMs: number;
    headers: Record<string, string>;
};

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/** In-process stand-in for the HTTP transport. Unknown URLs answer 404. */
export class FakeFetcher implements FetchCapability {
    calls: FakeCall[] = [];
    active = 0;
    maxActive = 0;
    /** URLs whose fetch has started and not yet settled. */
    inFlight = new Set<string>();
    onCall?: (url: string) => void;

    constructor(private responses: Record<string, FakeResponse> = {}, private defaultDelayMs = 0) {}

    async fetch(url: string, timeoutMs: number, headers: Record<string, string>): Promise<FetchResult> {
        this.calls.push({ url, timeoutMs, headers });
        this.onCall?.(url);
        this.active++;
        this.maxActive = Math.max(this.maxActive, this.active);
        this.inFlight.add(url);
        try {
            const response = this.responses[url] ?? { status: 404, body: 'not found', delayMs: this.defaultDelayMs };
            if ('hang' in response) {
                return await new Promise<FetchResult>(() => undefined);
            }
            if ('throws' in response) {
                throw new Error(response.throws);
            }
            if (response.delayMs) await sleep(response.delayMs);
            if ('transport' in response) {
                return { ok: false, error: new TransportError(`${response.transport} for ${url}`, response.transport) };
            }
            return { ok: true, status: response.status, body: response.body, finalUrl: url };
        } finally {
            this.active--;
            this.inFlight.delete(url);
        }
    }

    get urls(): string[] {
        return this.calls.map(call => call.url);
    }
}
