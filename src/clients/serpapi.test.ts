/**
 * Unit tests for SerpAPI client
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SerpApiClient } from './serpapi.js';
import { ProviderError } from '../errors.js';

// Mock fetch globally
const mockFetch = vi.fn();
global.fetch = mockFetch;

function requestedUrl(callIndex = 0): URL {
    return new URL(String(mockFetch.mock.calls[callIndex][0]));
}

describe('SerpApiClient', () => {
    let client: SerpApiClient;

    beforeEach(() => {
        vi.clearAllMocks();
        client = new SerpApiClient('test-api-key');
    });

    describe('constructor', () => {
        it('should throw an error if API key is empty', () => {
            expect(() => new SerpApiClient('')).toThrow('SERPAPI_KEY is required');
        });

        it('should throw an error if API key is whitespace only', () => {
            expect(() => new SerpApiClient('   ')).toThrow('SERPAPI_KEY is required');
        });
    });

    describe('search', () => {
        it('should request Google results and keep provider order', async () => {
            mockFetch.mockResolvedValueOnce({
                ok: true,
                status: 200,
                json: () => Promise.resolve({
                    organic_results: [
                        { title: 'Second best', link: 'https://b.example', snippet: 'b', displayed_link: 'b.example' },
                        { title: 'Best', link: 'https://a.example', snippet: 'a' },
                    ],
                }),
            });

            const results = await client.search('tide tables', 3);

            const url = requestedUrl();
            expect(url.origin + url.pathname).toBe('https://serpapi.com/search.json');
            expect(url.searchParams.get('engine')).toBe('google');
            expect(url.searchParams.get('q')).toBe('tide tables');
            expect(url.searchParams.get('num')).toBe('3');
            expect(url.searchParams.get('gl')).toBe('us');
            expect(url.searchParams.get('hl')).toBe('en');
            expect(url.searchParams.get('tbm')).toBeNull();
            expect(url.searchParams.get('api_key')).toBe('test-api-key');

            expect(results).toEqual([
                { title: 'Second best', link: 'https://b.example', snippet: 'b', source: 'b.example' },
                { title: 'Best', link: 'https://a.example', snippet: 'a', source: 'https://a.example' },
            ]);
        });

        it('should cap the result count at ten', async () => {
            mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: () => Promise.resolve({}) });

            const results = await client.search('anything', 25);

            expect(requestedUrl().searchParams.get('num')).toBe('10');
            expect(results).toEqual([]);
        });

        it('should raise ProviderError for API-level errors', async () => {
            mockFetch.mockResolvedValueOnce({
                ok: false,
                status: 401,
                json: () => Promise.resolve({ error: 'Invalid API key.' }),
            });

            const error = await client.search('tide tables').catch((e: unknown) => e);

            expect(mockFetch).toHaveBeenCalledTimes(1);
            expect(error).toBeInstanceOf(ProviderError);
            expect(error).toMatchObject({
                message: 'SerpAPI search failed: Invalid API key.',
                query: 'tide tables',
                mode: 'web',
            });
        });

        it('should raise ProviderError for malformed bodies', async () => {
            mockFetch.mockResolvedValueOnce({
                ok: true,
                status: 200,
                json: () => Promise.resolve({ organic_results: 'nope' }),
            });

            await expect(client.search('tide tables')).rejects.toThrow('SerpAPI search failed: malformed response');
        });
    });

    describe('searchNews', () => {
        it('should use the news vertical and read the source name', async () => {
            mockFetch.mockResolvedValueOnce({
                ok: true,
                status: 200,
                json: () => Promise.resolve({
                    news_results: [
                        { title: 'Harbor opens', link: 'https://news.example/1', snippet: 's1', source: 'Coast Daily' },
                        { title: 'Tide record', link: 'https://news.example/2', snippet: 's2', source: { name: 'Bay Times' } },
                        { title: 'Untitled', link: 'https://news.example/3' },
                    ],
                }),
            });

            const results = await client.searchNews('harbor');

            expect(requestedUrl().searchParams.get('tbm')).toBe('nws');
            expect(requestedUrl().searchParams.get('num')).toBe('5');
            expect(results.map((r) => r.source)).toEqual(['Coast Daily', 'Bay Times', 'https://news.example/3']);
            expect(results[2].snippet).toBe('');
        });
    });

    describe('searchMany', () => {
        it('should map a failed query to an empty list', async () => {
            mockFetch
                .mockResolvedValueOnce({
                    ok: true,
                    status: 200,
                    json: () => Promise.resolve({ organic_results: [{ title: 'One', link: 'https://one.example' }] }),
                })
                .mockResolvedValueOnce({
                    ok: false,
                    status: 400,
                    json: () => Promise.resolve({ error: 'Missing query' }),
                });

            const results = await client.searchMany(['first', 'second'], 2);

            expect(results.size).toBe(2);
            expect(results.get('first')?.map((r) => r.title)).toEqual(['One']);
            expect(results.get('second')).toEqual([]);
        });
    });

    describe('retries', () => {
        beforeEach(() => {
            vi.useFakeTimers();
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it('should retry a server error and return the next response', async () => {
            mockFetch
                .mockResolvedValueOnce({ ok: false, status: 503, json: () => Promise.resolve({}) })
                .mockResolvedValueOnce({
                    ok: true,
                    status: 200,
                    json: () => Promise.resolve({ organic_results: [{ title: 'Tides', link: 'https://tides.example' }] }),
                });

            const pending = client.search('tides');
            await vi.runAllTimersAsync();
            const results = await pending;

            expect(mockFetch).toHaveBeenCalledTimes(2);
            expect(results.map((r) => r.title)).toEqual(['Tides']);
        });

        it('should wait longer after a rate limit', async () => {
            mockFetch
                .mockResolvedValueOnce({ ok: false, status: 429, json: () => Promise.resolve({}) })
                .mockResolvedValueOnce({ ok: true, status: 200, json: () => Promise.resolve({ organic_results: [] }) });

            const pending = client.search('tides');
            await vi.advanceTimersByTimeAsync(1999);
            expect(mockFetch).toHaveBeenCalledTimes(1);
            await vi.advanceTimersByTimeAsync(1);
            await pending;

            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should not retry other client errors', async () => {
            mockFetch.mockResolvedValueOnce({ ok: false, status: 400, json: () => Promise.resolve({}) });

            await expect(client.search('tides')).rejects.toThrow('SerpAPI search failed: HTTP 400');
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });
    });
});
