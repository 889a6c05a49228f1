import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { getConfig } from '../../config';
import { FetchFailure, FetchFailureKind, FetchResult, PageFetcher } from '../../types';

export interface FetcherOptions {
    timeout_ms: number;
    user_agent: string;
    accept_language: string;
}

const SSL_PREFIXES = ['CERT_', 'UNABLE_TO_', 'ERR_TLS_', 'ERR_SSL_'];

const CONNECTION_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'EPIPE',
]);

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function isSslCode(code: string): boolean {
    return code === 'EPROTO' || code.includes('SELF_SIGNED') || SSL_PREFIXES.some(prefix => code.startsWith(prefix));
}

function kindForCode(code: string | undefined): FetchFailureKind {
    if (!code) return 'other';
    if (isSslCode(code)) return 'ssl';
    if (CONNECTION_CODES.has(code)) return 'connection';
    if (TIMEOUT_CODES.has(code)) return 'timeout';
    return 'other';
}

/**
 * Maps whatever the HTTP client threw onto the fetch failure taxonomy.
 * The raw message is kept in `detail` for server-side logs only.
 */
export function classifyFetchError(error: unknown, url: string): FetchFailure {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            return {
                kind: 'http_status',
                url,
                status: error.response.status,
                detail: `Status code ${error.response.status}`,
            };
        }
        return { kind: kindForCode(error.code), url, detail: error.message };
    }
    const detail = error instanceof Error ? error.message : String(error);
    return { kind: 'other', url, detail };
}

export class Fetcher implements PageFetcher {
    private client: AxiosInstance;

    constructor(options: FetcherOptions = getConfig().fetcher, adapter?: AxiosAdapter) {
        this.client = axios.create({
            adapter,
            timeout: options.timeout_ms,
            responseType: 'text',
            // Non-200 statuses are classified below, never thrown.
            validateStatus: () => true,
            headers: {
                'User-Agent': options.user_agent,
                'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': options.accept_language,
            },
        });
    }

    async fetch(url: string): Promise<FetchResult> {
        try {
            const response = await this.client.get<string>(url);

            if (response.status !== 200) {
                return {
                    ok: false,
                    failure: {
                        kind: 'http_status',
                        url,
                        status: response.status,
                        detail: `Status code ${response.status}`,
                    },
                };
            }

            const responseUrl: unknown = response.request?.res?.responseUrl;
            return {
                ok: true,
                url,
                status: response.status,
                data: typeof response.data === 'string' ? response.data : String(response.data ?? ''),
                finalUrl: typeof responseUrl === 'string' ? responseUrl : url,
            };
        } catch (error) {
            return { ok: false, failure: classifyFetchError(error, url) };
        }
    }
}
