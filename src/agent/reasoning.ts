/**
 * ReasoningService - the model-facing side of the agents.
 * Maps conversation turns onto chat-completion messages and reports either a
 * finished answer or the capability invocations the model asked for.
 */

import type { ChatOptions, ChatResponse, FunctionTool, Message, OpenRouterClient, ToolCall } from '../clients/openrouter.js';
import { ServiceError } from '../errors.js';
import { logger } from '../utils/logger.js';
import {
    isNonEmpty,
    singleFragment,
    type Answer,
    type CapabilityDefinition,
    type CapabilityInvocation,
    type ConversationTurn,
    type FragmentStream,
    type ReasoningOutcome,
    type StreamingOutcome,
} from './types.js';

export type ChatClient = Pick<OpenRouterClient, 'chat' | 'chatStream'>;

export interface ReasoningOptions {
    temperature?: number;
    maxTokens?: number;
}

export function toWireMessages(turns: readonly ConversationTurn[]): Message[] {
    return turns.map((turn): Message => {
        switch (turn.role) {
            case 'system':
            case 'user':
                return { role: turn.role, content: turn.content };
            case 'assistant':
                if (turn.invocations && turn.invocations.length > 0) {
                    return {
                        role: 'assistant',
                        content: turn.content,
                        tool_calls: turn.invocations.map((invocation): ToolCall => ({
                            id: invocation.id,
                            type: 'function',
                            function: { name: invocation.name, arguments: invocation.arguments },
                        })),
                    };
                }
                return { role: 'assistant', content: turn.content };
            case 'tool':
                return { role: 'tool', tool_call_id: turn.invocationResultOf, content: turn.content };
        }
    });
}

function toFunctionTools(capabilities: readonly CapabilityDefinition[]): FunctionTool[] {
    return capabilities.map((definition): FunctionTool => ({
        type: 'function',
        function: {
            name: definition.name,
            description: definition.description,
            parameters: definition.parameters,
        },
    }));
}

export class ReasoningService {
    private client: ChatClient;
    readonly model: string;
    private options: ReasoningOptions;

    constructor(client: ChatClient, model: string, options: ReasoningOptions = {}) {
        this.client = client;
        this.model = model;
        this.options = options;
    }

    /**
     * Ask the model for a response.
     *
     * Without capabilities the result is always a plain answer (or a fragment
     * stream when `incremental`). With capabilities the model may instead return
     * a decision listing invocations to resolve first. Capabilities are never
     * declared on a streaming request: an incremental call with capabilities makes
     * one non-streaming decision call and re-wraps a plain answer as a stream.
     *
     * Every transport failure surfaces as a ServiceError, including failures
     * raised while a returned stream is being consumed.
     */
    decideOrAnswer(turns: readonly ConversationTurn[], capabilities?: undefined, incremental?: false): Promise<Answer>;
    decideOrAnswer(turns: readonly ConversationTurn[], capabilities: readonly CapabilityDefinition[], incremental?: false): Promise<ReasoningOutcome>;
    decideOrAnswer(turns: readonly ConversationTurn[], capabilities: undefined, incremental: true): Promise<FragmentStream>;
    decideOrAnswer(turns: readonly ConversationTurn[], capabilities: readonly CapabilityDefinition[], incremental: true): Promise<StreamingOutcome>;
    async decideOrAnswer(
        turns: readonly ConversationTurn[],
        capabilities?: readonly CapabilityDefinition[],
        incremental = false
    ): Promise<ReasoningOutcome | StreamingOutcome> {
        const messages = toWireMessages(turns);
        const declared = capabilities && capabilities.length > 0 ? capabilities : undefined;

        if (!declared) {
            if (incremental) {
                return { kind: 'stream', fragments: this.streamFragments(messages) };
            }
            return { kind: 'answer', text: await this.complete(messages) };
        }

        const outcome = await this.decide(messages, declared);
        if (incremental && outcome.kind === 'answer') {
            return { kind: 'stream', fragments: singleFragment(outcome.text) };
        }
        return outcome;
    }

    private chatOptions(): ChatOptions {
        return {
            temperature: this.options.temperature,
            maxTokens: this.options.maxTokens,
        };
    }

    private async complete(messages: Message[]): Promise<string> {
        try {
            const response = await this.client.chat(this.model, messages, this.chatOptions());
            return response.choices[0]?.message.content ?? '';
        } catch (error) {
            throw ServiceError.from(error);
        }
    }

    private async decide(messages: Message[], capabilities: readonly CapabilityDefinition[]): Promise<ReasoningOutcome> {
        let response: ChatResponse;
        try {
            response = await this.client.chat(this.model, messages, {
                ...this.chatOptions(),
                tools: toFunctionTools(capabilities),
            });
        } catch (error) {
            throw ServiceError.from(error);
        }

        const message = response.choices[0]?.message;
        const invocations: CapabilityInvocation[] = (message?.toolCalls ?? []).map((call) => ({
            id: call.id,
            name: call.function.name,
            arguments: call.function.arguments,
        }));

        if (isNonEmpty(invocations)) {
            logger.debug(`[Reasoning] Model requested ${invocations.map((i) => i.name).join(', ')}`);
            return { kind: 'decision', text: message?.content ?? null, invocations };
        }
        return { kind: 'answer', text: message?.content ?? '' };
    }

    private async *streamFragments(messages: Message[]): AsyncGenerator<string, void, undefined> {
        try {
            yield* this.client.chatStream(this.model, messages, this.chatOptions());
        } catch (error) {
            throw ServiceError.from(error);
        }
    }
}
