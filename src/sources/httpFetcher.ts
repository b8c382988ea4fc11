/**
 * src/sources/httpFetcher.ts
 *
 * Default Fetcher: plain HTTP GET through got-scraping, which adds
 * browser-like headers and TLS fingerprints. No JavaScript rendering.
 *
 * got's own retries are off; retry policy belongs to the scheduler.
 * Any HTTP status ≥ 400 becomes a FetchError carrying the status code.
 */

import { log } from 'crawlee';
import { gotScraping } from 'got-scraping';
import { FetchError, toErrorMessage } from '../utils/errors.js';
import type { Fetcher } from './types.js';

export interface HttpFetcherOptions {
    /** Sent unless the target's own headers set one. */
    userAgent?: string;
    proxyUrl?: string;
}

export class HttpFetcher implements Fetcher {
    constructor(private readonly options: HttpFetcherOptions = {}) {}

    async fetch(url: string, headers: Record<string, string>, timeoutMs: number): Promise<string> {
        const requestHeaders: Record<string, string> = { ...headers };
        const hasUserAgent = Object.keys(requestHeaders).some((h) => h.toLowerCase() === 'user-agent');
        if (this.options.userAgent && !hasUserAgent) {
            requestHeaders['User-Agent'] = this.options.userAgent;
        }

        let statusCode: number;
        let body: string;
        try {
            const response = await gotScraping({
                url,
                proxyUrl: this.options.proxyUrl,
                headers: requestHeaders,
                timeout: { request: timeoutMs },
                retry: { limit: 0 },
                throwHttpErrors: false,
            });
            statusCode = response.statusCode;
            body = response.body;
        } catch (err) {
            log.debug(`[HttpFetcher] ${url}: ${toErrorMessage(err)}`);
            throw new FetchError(`Request failed for ${url}: ${toErrorMessage(err)}`, url, null, { cause: err });
        }

        if (statusCode >= 400) {
            throw new FetchError(`HTTP ${statusCode} for ${url}`, url, statusCode);
        }

        log.debug(`[HttpFetcher] ${url}: HTTP ${statusCode}, ${body.length} chars`);
        return body;
    }
}
