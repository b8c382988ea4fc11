import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FetchError } from '../utils/errors.js';
import { HttpFetcher } from './httpFetcher.js';

// Only the two response fields the fetcher reads.
const mockedGot = vi.hoisted(() =>
    vi.fn<(options: Record<string, unknown>) => Promise<{ statusCode: number; body: string }>>(),
);

vi.mock('got-scraping', () => ({
    gotScraping: mockedGot,
}));

function respond(statusCode: number, body: string): void {
    mockedGot.mockResolvedValueOnce({ statusCode, body });
}

describe('HttpFetcher', () => {
    beforeEach(() => {
        mockedGot.mockReset();
    });

    it('returns the body and turns off got retries', async () => {
        respond(200, '<html>ok</html>');
        const fetcher = new HttpFetcher({ userAgent: 'pagewatch-test', proxyUrl: 'http://proxy.test:8080' });

        await expect(fetcher.fetch('https://shop.test/', { Accept: 'text/html' }, 5000)).resolves.toBe('<html>ok</html>');
        expect(mockedGot).toHaveBeenCalledWith({
            url: 'https://shop.test/',
            proxyUrl: 'http://proxy.test:8080',
            headers: { Accept: 'text/html', 'User-Agent': 'pagewatch-test' },
            timeout: { request: 5000 },
            retry: { limit: 0 },
            throwHttpErrors: false,
        });
    });

    it('keeps a user agent the target already sets', async () => {
        respond(200, '');
        const fetcher = new HttpFetcher({ userAgent: 'pagewatch-test' });

        await fetcher.fetch('https://shop.test/', { 'user-agent': 'custom' }, 1000);
        expect(mockedGot.mock.calls[0][0]).toMatchObject({ headers: { 'user-agent': 'custom' } });
    });

    it('maps an HTTP error status to a FetchError with the code', async () => {
        respond(503, 'busy');
        const failure = new HttpFetcher().fetch('https://shop.test/', {}, 1000);

        await expect(failure).rejects.toBeInstanceOf(FetchError);
        await expect(failure).rejects.toMatchObject({
            message: 'HTTP 503 for https://shop.test/',
            statusCode: 503,
            retryable: true,
        });
    });

    it('maps a network error to a FetchError without a status', async () => {
        mockedGot.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND shop.test'));
        await expect(new HttpFetcher().fetch('https://shop.test/', {}, 1000)).rejects.toMatchObject({
            message: 'Request failed for https://shop.test/: getaddrinfo ENOTFOUND shop.test',
            statusCode: null,
        });
    });
});
