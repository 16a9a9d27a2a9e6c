// Internet search capability
// Wraps the search provider so the model can look things up before answering

import { z } from 'zod';
import type { SearchMode, SearchProvider, SearchResult } from '../clients/serpapi.js';
import { logger } from '../utils/logger.js';
import type { Capability, CapabilityDefinition } from './types.js';

export const SEARCH_CAPABILITY_NAME = 'search_internet';
export const DEFAULT_NUM_RESULTS = 5;
export const MAX_NUM_RESULTS = 10;

export const SEARCH_CAPABILITY_DEFINITION: CapabilityDefinition = {
    name: SEARCH_CAPABILITY_NAME,
    description:
        'Search the internet for current information about any topic. Use this when you need up-to-date information, ' +
        "facts, news, or data that you don't have in your training.",
    parameters: {
        type: 'object',
        properties: {
            query: {
                type: 'string',
                description: 'The search query to find information about',
            },
            search_type: {
                type: 'string',
                enum: ['web', 'news'],
                description: "Type of search - 'web' for general search, 'news' for recent news",
                default: 'web',
            },
            num_results: {
                type: 'integer',
                description: `Number of results to return (1-${MAX_NUM_RESULTS})`,
                minimum: 1,
                maximum: MAX_NUM_RESULTS,
                default: DEFAULT_NUM_RESULTS,
            },
        },
        required: ['query'],
    },
};

export const SearchArgumentsSchema = z.object({
    query: z.string().trim().min(1, 'query must not be empty'),
    search_type: z.enum(['web', 'news']).default('web'),
    num_results: z.coerce.number().int().min(1).max(MAX_NUM_RESULTS).default(DEFAULT_NUM_RESULTS),
});

export type SearchArguments = z.infer<typeof SearchArgumentsSchema>;

export interface SearchPayload {
    query: string;
    search_type: SearchMode;
    num_results: number;
    results: { title: string; url: string; snippet: string; source: string }[];
}

function toPayloadResult(result: SearchResult): SearchPayload['results'][number] {
    return {
        title: result.title,
        url: result.link,
        snippet: result.snippet,
        source: result.source,
    };
}

export class SearchCapability implements Capability<SearchArguments> {
    readonly definition = SEARCH_CAPABILITY_DEFINITION;
    readonly argumentsSchema = SearchArgumentsSchema;
    private provider: SearchProvider;

    constructor(provider: SearchProvider) {
        this.provider = provider;
    }

    /**
     * Run the lookup and serialize results in provider order.
     * Provider failures are returned as an error payload, never thrown.
     */
    async execute(args: SearchArguments): Promise<string> {
        const { query, search_type: mode, num_results: count } = args;

        try {
            const results = mode === 'news'
                ? await this.provider.searchNews(query, count)
                : await this.provider.search(query, count);

            const payload: SearchPayload = {
                query,
                search_type: mode,
                num_results: results.length,
                results: results.map(toPayloadResult),
            };
            return JSON.stringify(payload, null, 2);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`[Search] ${mode} search for "${query}" failed: ${message}`);
            return JSON.stringify({
                error: `Search failed: ${message}`,
                query,
                search_type: mode,
            });
        }
    }
}
