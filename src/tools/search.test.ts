/**
 * Unit tests for the search capability
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { SearchCapability, SearchArgumentsSchema, SEARCH_CAPABILITY_DEFINITION } from './search.js';
import { CapabilityRegistry } from './registry.js';
import { createCapabilityRegistry } from './index.js';
import type { SearchProvider, SearchResult } from '../clients/serpapi.js';
import { ProviderError } from '../errors.js';

const RESULTS: SearchResult[] = [
    { title: 'Tide tables', link: 'https://tides.example/today', snippet: 'High tide at 6:12', source: 'tides.example' },
    { title: 'Harbor notes', link: 'https://harbor.example', snippet: 'Moorings', source: 'harbor.example' },
];

describe('SearchCapability', () => {
    let search: Mock<SearchProvider['search']>;
    let searchNews: Mock<SearchProvider['searchNews']>;
    let registry: CapabilityRegistry;

    beforeEach(() => {
        search = vi.fn<SearchProvider['search']>().mockResolvedValue(RESULTS);
        searchNews = vi.fn<SearchProvider['searchNews']>().mockResolvedValue([]);
        registry = new CapabilityRegistry();
        registry.register(new SearchCapability({ search, searchNews }));
    });

    it('should declare the search_internet definition', () => {
        expect(SEARCH_CAPABILITY_DEFINITION.name).toBe('search_internet');
        expect(SEARCH_CAPABILITY_DEFINITION.parameters.required).toEqual(['query']);
        expect(SEARCH_CAPABILITY_DEFINITION.parameters.properties.search_type.enum).toEqual(['web', 'news']);
    });

    it('should apply argument defaults', () => {
        expect(SearchArgumentsSchema.parse({ query: 'tides' })).toEqual({
            query: 'tides',
            search_type: 'web',
            num_results: 5,
        });
    });

    it('should reject out-of-range counts and blank queries', () => {
        expect(SearchArgumentsSchema.safeParse({ query: 'tides', num_results: 11 }).success).toBe(false);
        expect(SearchArgumentsSchema.safeParse({ query: 'tides', num_results: 0 }).success).toBe(false);
        expect(SearchArgumentsSchema.safeParse({ query: '   ' }).success).toBe(false);
    });

    it('should serialize web results in provider order', async () => {
        const output = await registry.execute({
            id: 'call_1',
            name: 'search_internet',
            arguments: '{"query":"tides today","num_results":2}',
        });

        expect(search).toHaveBeenCalledWith('tides today', 2);
        expect(searchNews).not.toHaveBeenCalled();
        expect(output).toBe(JSON.stringify({
            query: 'tides today',
            search_type: 'web',
            num_results: 2,
            results: [
                { title: 'Tide tables', url: 'https://tides.example/today', snippet: 'High tide at 6:12', source: 'tides.example' },
                { title: 'Harbor notes', url: 'https://harbor.example', snippet: 'Moorings', source: 'harbor.example' },
            ],
        }, null, 2));
    });

    it('should use the news provider for news searches', async () => {
        const output = await registry.execute({
            id: 'call_1',
            name: 'search_internet',
            arguments: '{"query":"harbor","search_type":"news"}',
        });

        expect(searchNews).toHaveBeenCalledWith('harbor', 5);
        expect(JSON.parse(output)).toEqual({ query: 'harbor', search_type: 'news', num_results: 0, results: [] });
    });

    it('should return a failure payload when the provider fails', async () => {
        search.mockRejectedValueOnce(
            new ProviderError('SerpAPI search failed: Invalid API key.', 'tides', 'web')
        );

        const output = await registry.execute({
            id: 'call_1',
            name: 'search_internet',
            arguments: '{"query":"tides"}',
        });

        expect(JSON.parse(output)).toEqual({
            error: 'Search failed: SerpAPI search failed: Invalid API key.',
            query: 'tides',
            search_type: 'web',
        });
    });
});

describe('createCapabilityRegistry', () => {
    it('should return null without a search key', () => {
        expect(createCapabilityRegistry({ serpapiKey: '' })).toBeNull();
    });

    it('should register search when a key is configured', () => {
        const registry = createCapabilityRegistry({ serpapiKey: 'test-api-key' });
        expect(registry?.names()).toEqual(['search_internet']);
    });
});
