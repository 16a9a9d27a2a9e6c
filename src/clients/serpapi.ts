/**
 * SerpAPI Client
 * Google web and news results through serpapi.com
 */

import { z } from 'zod';
import { ApiKeyError, ProviderError } from '../errors.js';
import { logger } from '../utils/logger.js';

const SERPAPI_BASE = 'https://serpapi.com/search.json';
const MAX_RETRIES = 3;
const INITIAL_RETRY_DELAY_MS = 1000;
const DEFAULT_TIMEOUT_MS = 30_000;
export const MAX_RESULTS_PER_QUERY = 10;

function envTimeoutMs(value: string | undefined, fallback: number): number {
    const parsed = value ? Number(value) : Number.NaN;
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

function isAbortError(error: Error): boolean {
    return error.name === 'AbortError' || error.name === 'TimeoutError';
}

export type SearchMode = 'web' | 'news';

export interface SearchResult {
    title: string;
    link: string;
    snippet: string;
    source: string;
}

/**
 * The slice of a provider the search capability depends on
 */
export interface SearchProvider {
    search(query: string, numResults?: number): Promise<SearchResult[]>;
    searchNews(query: string, numResults?: number): Promise<SearchResult[]>;
}

const OrganicResultSchema = z.object({
    title: z.string().optional(),
    link: z.string().optional(),
    snippet: z.string().optional(),
    displayed_link: z.string().optional(),
});

const NewsResultSchema = z.object({
    title: z.string().optional(),
    link: z.string().optional(),
    snippet: z.string().optional(),
    source: z.union([z.string(), z.object({ name: z.string().optional() }).passthrough()]).optional(),
});

const SearchResponseSchema = z.object({
    error: z.string().optional(),
    organic_results: z.array(OrganicResultSchema).optional(),
    news_results: z.array(NewsResultSchema).optional(),
});

type SearchResponse = z.infer<typeof SearchResponseSchema>;

function clampCount(numResults: number): number {
    if (!Number.isFinite(numResults)) return MAX_RESULTS_PER_QUERY;
    return Math.max(1, Math.min(Math.trunc(numResults), MAX_RESULTS_PER_QUERY));
}

function newsSource(source: z.infer<typeof NewsResultSchema>['source'], fallback: string): string {
    if (typeof source === 'string' && source) return source;
    if (source && typeof source === 'object' && source.name) return source.name;
    return fallback;
}

export class SerpApiClient implements SearchProvider {
    private apiKey: string;

    constructor(apiKey: string) {
        if (!apiKey || apiKey.trim() === '') {
            throw new ApiKeyError('SERPAPI_KEY', undefined, 'https://serpapi.com');
        }
        this.apiKey = apiKey.trim();
    }

    /**
     * Fetch with retry logic and exponential backoff
     */
    private async fetchWithRetry(url: string, retries = MAX_RETRIES): Promise<Response> {
        let lastError: Error | null = null;
        let lastResponse: Response | null = null;

        for (let attempt = 0; attempt < retries; attempt++) {
            const timeoutMs = envTimeoutMs(process.env.SERPAPI_TIMEOUT_MS, DEFAULT_TIMEOUT_MS);
            try {
                const response = await fetch(url, {
                    headers: { Accept: 'application/json' },
                    signal: AbortSignal.timeout(timeoutMs),
                });
                lastResponse = response;

                // Don't retry client errors (4xx except 429), only server errors (5xx) and rate limits
                if (response.ok || (response.status >= 400 && response.status < 500 && response.status !== 429)) {
                    return response;
                }

                // Rate limit or server error - wait and retry
                const delay = response.status === 429
                    ? INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt + 1)
                    : INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt);
                if (attempt < retries - 1) {
                    logger.debug(`[SerpAPI] HTTP ${response.status}, retrying in ${delay}ms`);
                    await new Promise(resolve => setTimeout(resolve, delay));
                }
            } catch (error) {
                const err = toError(error);
                lastError = isAbortError(err)
                    ? new Error(`Request timed out after ${timeoutMs}ms`)
                    : err;

                // Network error - wait and retry
                if (attempt < retries - 1) {
                    const delay = INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt);
                    await new Promise(resolve => setTimeout(resolve, delay));
                }
            }
        }

        if (lastResponse) return lastResponse;
        throw lastError || new Error('Max retries exceeded');
    }

    private buildUrl(query: string, numResults: number, mode: SearchMode): string {
        const url = new URL(SERPAPI_BASE);
        url.searchParams.set('engine', 'google');
        url.searchParams.set('q', query);
        url.searchParams.set('num', String(clampCount(numResults)));
        url.searchParams.set('gl', 'us');
        url.searchParams.set('hl', 'en');
        if (mode === 'news') url.searchParams.set('tbm', 'nws');
        url.searchParams.set('api_key', this.apiKey);
        return url.toString();
    }

    private async request(query: string, numResults: number, mode: SearchMode): Promise<SearchResponse> {
        const label = mode === 'news' ? 'SerpAPI news search' : 'SerpAPI search';
        let response: Response;
        try {
            response = await this.fetchWithRetry(this.buildUrl(query, numResults, mode));
        } catch (error) {
            const err = toError(error);
            throw new ProviderError(`${label} failed: ${err.message}`, query, mode, { cause: err });
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            throw new ProviderError(`${label} failed: HTTP ${response.status} with unreadable body`, query, mode, { cause: error });
        }

        const parsed = SearchResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new ProviderError(`${label} failed: malformed response`, query, mode, { cause: parsed.error });
        }
        if (parsed.data.error) {
            throw new ProviderError(`${label} failed: ${parsed.data.error}`, query, mode);
        }
        if (!response.ok) {
            throw new ProviderError(`${label} failed: HTTP ${response.status}`, query, mode);
        }

        return parsed.data;
    }

    /**
     * Google web search; results keep the provider's relevance order
     */
    async search(query: string, numResults: number = MAX_RESULTS_PER_QUERY): Promise<SearchResult[]> {
        const data = await this.request(query, numResults, 'web');
        return (data.organic_results ?? []).map((result) => {
            const link = result.link ?? '';
            return {
                title: result.title ?? '',
                link,
                snippet: result.snippet ?? '',
                source: result.displayed_link || link,
            };
        });
    }

    /**
     * Google News search
     */
    async searchNews(query: string, numResults: number = 5): Promise<SearchResult[]> {
        const data = await this.request(query, numResults, 'news');
        return (data.news_results ?? []).map((result) => {
            const link = result.link ?? '';
            return {
                title: result.title ?? '',
                link,
                snippet: result.snippet ?? '',
                source: newsSource(result.source, link),
            };
        });
    }

    /**
     * Run several web searches in parallel. A failed query maps to no results.
     */
    async searchMany(queries: string[], resultsPerQuery: number = 5): Promise<Map<string, SearchResult[]>> {
        const results = new Map<string, SearchResult[]>();

        const responses = await Promise.all(queries.map(async (query) => {
            try {
                return { query, results: await this.search(query, resultsPerQuery) };
            } catch (error) {
                logger.warn(`[SerpAPI] Failed to search for '${query}': ${toError(error).message}`);
                return { query, results: [] };
            }
        }));

        for (const response of responses) {
            results.set(response.query, response.results);
        }

        return results;
    }
}
