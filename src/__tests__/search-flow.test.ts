/**
 * Integration tests for the search-and-answer pipeline
 * Runs the real clients, registry and agents against mocked HTTP responses
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createChatAgent } from '../agent/chat-agent.js';
import type { Config } from '../config.js';

const mockFetch = vi.fn();
global.fetch = mockFetch;

const CONFIG: Config = {
    openrouterApiKey: 'test-api-key',
    openrouterBaseUrl: 'https://openrouter.test/api/v1',
    serpapiKey: 'test-api-key',
    defaultModel: 'test-model',
    modelTemperature: 0,
    historyTurnLimit: 10,
    uiMode: 'plain',
    renderMarkdown: false,
    streamOutput: false,
    databasePath: ':memory:',
};

function jsonResponse(body: unknown, status = 200) {
    return {
        ok: status >= 200 && status < 300,
        status,
        json: () => Promise.resolve(body),
        text: () => Promise.resolve(JSON.stringify(body)),
    };
}

const SEARCH_DECISION = {
    id: 'gen-1',
    choices: [{
        message: {
            role: 'assistant',
            content: null,
            tool_calls: [{
                id: 'call_1',
                type: 'function',
                function: { name: 'search_internet', arguments: '{"query":"harbor opening hours","num_results":2}' },
            }],
        },
        finish_reason: 'tool_calls',
    }],
};

function finalAnswer(content: string) {
    return {
        id: 'gen-2',
        choices: [{ message: { role: 'assistant', content }, finish_reason: 'stop' }],
    };
}

interface SentBody {
    model: string;
    messages: { role: string; content: string | null; tool_call_id?: string }[];
    tools?: unknown[];
}

function sentBody(callIndex: number): SentBody {
    const init = mockFetch.mock.calls[callIndex][1];
    return JSON.parse(String(init?.body));
}

describe('Search Flow Integration', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should search once and answer from the results', async () => {
        mockFetch
            .mockResolvedValueOnce(jsonResponse(SEARCH_DECISION))
            .mockResolvedValueOnce(jsonResponse({
                organic_results: [
                    { title: 'Harbor hours', link: 'https://harbor.example/hours', snippet: 'Open 9 to 5', displayed_link: 'harbor.example' },
                ],
            }))
            .mockResolvedValueOnce(jsonResponse(finalAnswer('The harbor opens at 9.')));

        const agent = createChatAgent(CONFIG);
        const answer = await agent.search('When does the harbor open?');

        expect(answer).toBe('The harbor opens at 9.');
        expect(mockFetch).toHaveBeenCalledTimes(3);

        expect(mockFetch.mock.calls[0][0]).toBe('https://openrouter.test/api/v1/chat/completions');
        const decide = sentBody(0);
        expect(decide.model).toBe('test-model');
        expect(decide.tools).toHaveLength(1);
        expect(decide.messages.map((m) => m.role)).toEqual(['system', 'user']);

        const searchUrl = new URL(String(mockFetch.mock.calls[1][0]));
        expect(searchUrl.searchParams.get('q')).toBe('harbor opening hours');
        expect(searchUrl.searchParams.get('num')).toBe('2');

        const finalize = sentBody(2);
        expect(finalize.tools).toBeUndefined();
        const toolMessage = finalize.messages[finalize.messages.length - 1];
        expect(toolMessage.role).toBe('tool');
        expect(toolMessage.tool_call_id).toBe('call_1');
        expect(JSON.parse(String(toolMessage.content))).toEqual({
            query: 'harbor opening hours',
            search_type: 'web',
            num_results: 1,
            results: [
                { title: 'Harbor hours', url: 'https://harbor.example/hours', snippet: 'Open 9 to 5', source: 'harbor.example' },
            ],
        });
    });

    it('should hand a search failure back to the model as a tool result', async () => {
        mockFetch
            .mockResolvedValueOnce(jsonResponse(SEARCH_DECISION))
            .mockResolvedValueOnce(jsonResponse({ error: 'Invalid API key.' }, 401))
            .mockResolvedValueOnce(jsonResponse(finalAnswer('Search is unavailable right now.')));

        const answer = await createChatAgent(CONFIG).search('When does the harbor open?');

        expect(answer).toBe('Search is unavailable right now.');
        const finalize = sentBody(2);
        const toolMessage = finalize.messages[finalize.messages.length - 1];
        expect(JSON.parse(String(toolMessage.content))).toEqual({
            error: 'Search failed: SerpAPI search failed: Invalid API key.',
            query: 'harbor opening hours',
            search_type: 'web',
        });
    });

    it('should answer directly when the model needs no search', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(finalAnswer('Four.')));

        const answer = await createChatAgent(CONFIG).search('What is 2+2?');

        expect(answer).toBe('Four.');
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should surface reasoning service failures', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: 'Model overloaded' } }, 503));

        await expect(createChatAgent(CONFIG).search('When does the harbor open?')).rejects.toThrow(
            'OpenRouter API error: 503 - Model overloaded'
        );
    });
});
