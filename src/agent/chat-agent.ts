/**
 * Chat Agent - the entry point the CLI talks to.
 * Routes user questions through the search agent when search is configured,
 * and falls back to a plain conversational answer otherwise.
 */

import { OpenRouterClient } from '../clients/openrouter.js';
import type { Config } from '../config.js';
import { createCapabilityRegistry } from '../tools/index.js';
import { logger } from '../utils/logger.js';
import { getConversationPrompt } from './prompts.js';
import { ReasoningService } from './reasoning.js';
import { SearchAgent, type SearchAgentCallbacks } from './search-agent.js';
import { singleFragment, type ConversationTurn } from './types.js';

export const SEARCH_UNAVAILABLE_MESSAGE =
    'Search functionality requires SERPAPI_KEY to be set. Please set your SerpAPI key and restart.';

export interface ChatRequestOptions {
    stream?: boolean;
    callbacks?: SearchAgentCallbacks;
}

export class ChatAgent {
    private reasoning: ReasoningService;
    private searchAgent: SearchAgent | null;

    constructor(reasoning: ReasoningService, searchAgent: SearchAgent | null = null) {
        this.reasoning = reasoning;
        this.searchAgent = searchAgent;
    }

    get searchEnabled(): boolean {
        return this.searchAgent !== null;
    }

    get model(): string {
        return this.reasoning.model;
    }

    /**
     * Reply to the latest user turn of a conversation
     */
    chat(history: readonly ConversationTurn[], options: ChatRequestOptions & { stream: true }): AsyncGenerator<string, void, undefined>;
    chat(history: readonly ConversationTurn[], options?: ChatRequestOptions & { stream?: false }): Promise<string>;
    chat(history: readonly ConversationTurn[], options: ChatRequestOptions = {}): AsyncGenerator<string, void, undefined> | Promise<string> {
        const lastUserIndex = history.map((turn) => turn.role).lastIndexOf('user');
        const latest = lastUserIndex >= 0 ? history[lastUserIndex] : undefined;
        const query = latest?.content ?? '';

        if (this.searchAgent && query.trim()) {
            const request = { history: history.slice(0, lastUserIndex), callbacks: options.callbacks };
            return options.stream
                ? this.searchAgent.stream(query, request)
                : this.searchAgent.answer(query, request);
        }

        const context: ConversationTurn[] = [{ role: 'system', content: getConversationPrompt() }, ...history];
        return options.stream ? this.converseStream(context) : this.converse(context);
    }

    /**
     * Answer a single question from search results
     */
    search(query: string, options: ChatRequestOptions & { stream: true }): AsyncGenerator<string, void, undefined>;
    search(query: string, options?: ChatRequestOptions & { stream?: false }): Promise<string>;
    search(query: string, options: ChatRequestOptions = {}): AsyncGenerator<string, void, undefined> | Promise<string> {
        if (!this.searchAgent) {
            return options.stream
                ? singleFragment(SEARCH_UNAVAILABLE_MESSAGE)
                : Promise.resolve(SEARCH_UNAVAILABLE_MESSAGE);
        }

        const request = { callbacks: options.callbacks };
        return options.stream
            ? this.searchAgent.stream(query, request)
            : this.searchAgent.answer(query, request);
    }

    private async converse(context: readonly ConversationTurn[]): Promise<string> {
        const answer = await this.reasoning.decideOrAnswer(context);
        return answer.text;
    }

    private async *converseStream(context: readonly ConversationTurn[]): AsyncGenerator<string, void, undefined> {
        const outcome = await this.reasoning.decideOrAnswer(context, undefined, true);
        yield* outcome.fragments;
    }
}

/**
 * Wire the agents from configuration. Without a search key the agent runs in
 * conversation-only mode.
 */
export function createChatAgent(config: Config, options: { model?: string } = {}): ChatAgent {
    const client = new OpenRouterClient(config.openrouterApiKey, { baseUrl: config.openrouterBaseUrl });
    const reasoning = new ReasoningService(client, options.model || config.defaultModel, {
        temperature: config.modelTemperature,
        maxTokens: config.modelMaxTokens,
    });

    const registry = createCapabilityRegistry(config);
    if (!registry) {
        logger.info('[ChatAgent] SERPAPI_KEY is not set; answering without internet search');
        return new ChatAgent(reasoning, null);
    }

    return new ChatAgent(reasoning, new SearchAgent(reasoning, registry, {
        historyTurnLimit: config.historyTurnLimit,
    }));
}
