/**
 * Search Agent - decides whether to search, resolves the requested
 * capability invocations, then finalizes the answer with the results
 * folded back into the conversation.
 */

import type { CapabilityRegistry } from '../tools/registry.js';
import { logger } from '../utils/logger.js';
import { getSearchAgentPrompt } from './prompts.js';
import type { ReasoningService } from './reasoning.js';
import type { CapabilityInvocation, ConversationTurn, Decision } from './types.js';

export const HISTORY_TURN_LIMIT = 10;
export const CAPABILITY_INDICATOR = 'Searching the internet...\n\n';
export const EMPTY_QUERY_MESSAGE = 'Please enter a question to search for.';

export interface SearchAgentCallbacks {
    onStatus?: (status: string) => void;
    onInvocations?: (invocations: readonly CapabilityInvocation[]) => void;
    onCapabilityResults?: (results: ReadonlyMap<string, string>) => void;
}

export interface SearchRequestOptions {
    history?: readonly ConversationTurn[];
    callbacks?: SearchAgentCallbacks;
}

/**
 * Records which capabilities ran during one answer while forwarding to the caller's callbacks
 */
export class InvocationTracker {
    readonly used: CapabilityInvocation[] = [];
    readonly callbacks: SearchAgentCallbacks;

    constructor(callbacks: SearchAgentCallbacks = {}) {
        this.callbacks = {
            ...callbacks,
            onInvocations: (invocations) => {
                this.used.push(...invocations);
                callbacks.onInvocations?.(invocations);
            },
        };
    }

    get searched(): boolean {
        return this.used.length > 0;
    }

    /**
     * Streamed answer text without the leading search indicator
     */
    answerText(text: string): string {
        return this.searched && text.startsWith(CAPABILITY_INDICATOR)
            ? text.slice(CAPABILITY_INDICATOR.length)
            : text;
    }
}

export class SearchAgent {
    private reasoning: ReasoningService;
    private registry: CapabilityRegistry;
    private historyTurnLimit: number;

    constructor(
        reasoning: ReasoningService,
        registry: CapabilityRegistry,
        options: { historyTurnLimit?: number } = {}
    ) {
        this.reasoning = reasoning;
        this.registry = registry;
        this.historyTurnLimit = options.historyTurnLimit ?? HISTORY_TURN_LIMIT;
    }

    /**
     * Instruction turn, then the most recent history turns, then the query.
     * The caller's history array is never modified.
     */
    buildContext(query: string, history: readonly ConversationTurn[] = []): ConversationTurn[] {
        const recent = history.length > this.historyTurnLimit
            ? history.slice(history.length - this.historyTurnLimit)
            : history;

        return [
            { role: 'system', content: getSearchAgentPrompt() },
            ...recent,
            { role: 'user', content: query },
        ];
    }

    async answer(query: string, options: SearchRequestOptions = {}): Promise<string> {
        if (!query.trim()) return EMPTY_QUERY_MESSAGE;

        const { callbacks = {} } = options;
        const context = this.buildContext(query, options.history);

        callbacks.onStatus?.('Thinking...');
        const outcome = await this.reasoning.decideOrAnswer(context, this.registry.listDefinitions());
        if (outcome.kind === 'answer') {
            return outcome.text;
        }

        const extended = await this.resolve(context, outcome, callbacks);
        callbacks.onStatus?.('Writing answer...');
        const final = await this.reasoning.decideOrAnswer(extended);
        return final.text;
    }

    /**
     * Same pipeline, delivered as fragments. When a capability was used the
     * indicator fragment is yielded before any answer text.
     */
    async *stream(query: string, options: SearchRequestOptions = {}): AsyncGenerator<string, void, undefined> {
        if (!query.trim()) {
            yield EMPTY_QUERY_MESSAGE;
            return;
        }

        const { callbacks = {} } = options;
        const context = this.buildContext(query, options.history);

        callbacks.onStatus?.('Thinking...');
        const outcome = await this.reasoning.decideOrAnswer(context, this.registry.listDefinitions(), true);
        if (outcome.kind === 'stream') {
            yield* outcome.fragments;
            return;
        }

        yield CAPABILITY_INDICATOR;

        const extended = await this.resolve(context, outcome, callbacks);
        callbacks.onStatus?.('Writing answer...');
        const final = await this.reasoning.decideOrAnswer(extended, undefined, true);
        yield* final.fragments;
    }

    /**
     * Append the decision's assistant turn and one tool turn per invocation.
     */
    private async resolve(
        context: readonly ConversationTurn[],
        decision: Decision,
        callbacks: SearchAgentCallbacks
    ): Promise<ConversationTurn[]> {
        const { invocations } = decision;
        logger.info(`[SearchAgent] Resolving ${invocations.length} invocation(s): ${invocations.map((i) => i.name).join(', ')}`);
        callbacks.onInvocations?.(invocations);
        callbacks.onStatus?.('Searching the internet...');

        const results = await this.registry.executeAll(invocations);
        callbacks.onCapabilityResults?.(results);

        const toolTurns = invocations.map((invocation): ConversationTurn => ({
            role: 'tool',
            invocationResultOf: invocation.id,
            content: results.get(invocation.id) ?? '',
        }));

        return [
            ...context,
            { role: 'assistant', content: decision.text, invocations },
            ...toolTurns,
        ];
    }
}
