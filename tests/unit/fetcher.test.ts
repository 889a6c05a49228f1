import { describe, expect, it } from 'vitest';
import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from 'axios';
import { Fetcher, FetcherOptions, classifyFetchError } from '../../src/modules/fetcher';

const OPTIONS: FetcherOptions = {
    timeout_ms: 1000,
    user_agent: 'Mozilla/5.0 (test)',
    accept_language: 'en-US',
};

function respond(status: number, data: string, seen?: InternalAxiosRequestConfig[]): AxiosAdapter {
    return async config => {
        seen?.push(config);
        return { data, status, statusText: String(status), headers: {}, config, request: {} };
    };
}

function fail(code: string | undefined, message = 'boom'): AxiosAdapter {
    return async config => {
        throw new AxiosError(message, code, config);
    };
}

describe('Fetcher', () => {
    it('returns the body of a 200 response', async () => {
        const seen: InternalAxiosRequestConfig[] = [];
        const fetcher = new Fetcher(OPTIONS, respond(200, '<h1>Oak Chair</h1>', seen));

        const result = await fetcher.fetch('https://shop.test/chair');

        expect(result).toEqual({
            ok: true,
            url: 'https://shop.test/chair',
            status: 200,
            data: '<h1>Oak Chair</h1>',
            finalUrl: 'https://shop.test/chair',
        });
        expect(seen[0].headers.get('User-Agent')).toBe('Mozilla/5.0 (test)');
        expect(seen[0].timeout).toBe(1000);
    });

    it('treats any status other than 200 as an http_status failure', async () => {
        for (const status of [404, 500, 204]) {
            const fetcher = new Fetcher(OPTIONS, respond(status, ''));
            const result = await fetcher.fetch('https://shop.test/missing');

            expect(result).toEqual({
                ok: false,
                failure: {
                    kind: 'http_status',
                    url: 'https://shop.test/missing',
                    status,
                    detail: `Status code ${status}`,
                },
            });
        }
    });

    it.each([
        ['ECONNREFUSED', 'connection'],
        ['ECONNRESET', 'connection'],
        ['ENOTFOUND', 'connection'],
        ['ECONNABORTED', 'timeout'],
        ['ETIMEDOUT', 'timeout'],
        ['CERT_HAS_EXPIRED', 'ssl'],
        ['DEPTH_ZERO_SELF_SIGNED_CERT', 'ssl'],
        ['ERR_TLS_CERT_ALTNAME_INVALID', 'ssl'],
        ['CERT_SIGNATURE_FAILURE', 'ssl'],
        ['CERT_CHAIN_TOO_LONG', 'ssl'],
        ['UNABLE_TO_DECRYPT_CERT_SIGNATURE', 'ssl'],
        ['SELF_SIGNED_CERT_IN_CHAIN', 'ssl'],
        ['EPROTO', 'ssl'],
        ['ERR_CANCELED', 'other'],
        ['ERR_BAD_OPTION', 'other'],
    ])('classifies %s as %s', async (code, kind) => {
        const fetcher = new Fetcher(OPTIONS, fail(code, `failed with ${code}`));

        const result = await fetcher.fetch('https://shop.test/');

        expect(result).toEqual({
            ok: false,
            failure: { kind, url: 'https://shop.test/', detail: `failed with ${code}` },
        });
    });
});

describe('classifyFetchError', () => {
    it('falls back to other for non-HTTP errors', () => {
        expect(classifyFetchError(new TypeError('bad input'), 'https://x.test/')).toEqual({
            kind: 'other',
            url: 'https://x.test/',
            detail: 'bad input',
        });
    });

    it('treats an axios error without a code as other', () => {
        expect(classifyFetchError(new AxiosError('weird'), 'https://x.test/').kind).toBe('other');
    });
});
