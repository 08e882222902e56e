import axios, { AxiosInstance, AxiosProxyConfig } from 'axios';
import { FetchCapability, FetchResult, TransportErrorKind } from '../../types';
import { TransportError, errorMessage } from '../../utils/errors';

export interface AxiosFetcherOptions {
    maxRedirects?: number;
    maxContentLength?: number;
    /** Passed to axios; `false` ignores proxy environment variables. */
    proxy?: AxiosProxyConfig | false;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED', 'UND_ERR_CONNECT_TIMEOUT']);
const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_FAIL', 'EAI_NONAME']);
const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH', 'EPIPE', 'ERR_FR_TOO_MANY_REDIRECTS']);
const INVALID_URL_CODES = new Set(['ERR_INVALID_URL', 'ERR_INVALID_CHAR', 'ERR_UNESCAPED_CHARACTERS', 'ERR_INVALID_ARG_VALUE']);
const DECODE_CODES = new Set(['ERR_BAD_RESPONSE', 'Z_DATA_ERROR', 'Z_BUF_ERROR', 'ERR_STRING_TOO_LONG']);

const errorCode = (error: unknown): string | undefined => {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
};

export const transportErrorKind = (error: unknown): TransportErrorKind => {
    const code = errorCode(error) ?? '';
    const message = errorMessage(error).toLowerCase();

    if (TIMEOUT_CODES.has(code) || message.includes('timeout') || message.includes('aborted')) return 'timeout';
    if (DNS_CODES.has(code)) return 'dns';
    if (CONNECTION_CODES.has(code) || message.includes('socket hang up')) return 'connection';
    if (code.startsWith('ERR_TLS') || code.startsWith('CERT_') || code.includes('SSL') || code.includes('SELF_SIGNED')
        || code === 'UNABLE_TO_VERIFY_LEAF_SIGNATURE') return 'tls';
    if (INVALID_URL_CODES.has(code) || message.includes('invalid url')) return 'invalid-url';
    if (DECODE_CODES.has(code) || code.startsWith('HPE_') || message.includes('maxcontentlength')) return 'decode';
    return 'unknown';
};

export const toTransportError = (error: unknown, url: string): TransportError => {
    if (error instanceof TransportError) return error;
    return new TransportError(errorMessage(error), transportErrorKind(error), { url, code: errorCode(error) });
};

/**
 * Single GET per call: no retries, no browser fallback. Any HTTP status is a
 * response; only failures to obtain one become a TransportError.
 */
export class AxiosFetcher implements FetchCapability {
    private client: AxiosInstance;

    constructor(options: AxiosFetcherOptions = {}) {
        this.client = axios.create({
            responseType: 'text',
            validateStatus: () => true,
            maxRedirects: options.maxRedirects ?? 5,
            maxContentLength: options.maxContentLength ?? 5 * 1024 * 1024,
            proxy: options.proxy,
            headers: {
                'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.9',
            }
        });
    }

    async fetch(url: string, timeoutMs: number, headers: Record<string, string>): Promise<FetchResult> {
        try {
            const response = await this.client.get<string>(url, {
                timeout: timeoutMs,
                signal: AbortSignal.timeout(timeoutMs),
                headers
            });
            const responseUrl: unknown = response.request?.res?.responseUrl;
            return {
                ok: true,
                status: response.status,
                body: typeof response.data === 'string' ? response.data : JSON.stringify(response.data),
                finalUrl: typeof responseUrl === 'string' ? responseUrl : url
            };
        } catch (error) {
            return { ok: false, error: toTransportError(error, url) };
        }
    }
}

export class UserAgentRotator {
    constructor(private agents: string[], private random: () => number = Math.random) {
        if (agents.length === 0) throw new Error('UserAgentRotator needs at least one user agent');
    }

    next(): string {
        return this.agents[Math.floor(this.random() * this.agents.length) % this.agents.length];
    }

    headers(): Record<string, string> {
        return { 'User-Agent': this.next() };
    }
}
