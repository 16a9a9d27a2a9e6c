/**
 * Conversation and capability-invocation types shared by the agents
 */

/**
 * One request from the model to run a capability. `arguments` is the raw
 * JSON object text exactly as the model produced it.
 */
export interface CapabilityInvocation {
    readonly id: string;
    readonly name: string;
    readonly arguments: string;
}

export interface SystemTurn {
    readonly role: 'system';
    readonly content: string;
}

export interface UserTurn {
    readonly role: 'user';
    readonly content: string;
}

export interface AssistantTurn {
    readonly role: 'assistant';
    readonly content: string | null;
    readonly invocations?: readonly CapabilityInvocation[];
}

export interface ToolTurn {
    readonly role: 'tool';
    readonly content: string;
    readonly invocationResultOf: string;
}

export type ConversationTurn = SystemTurn | UserTurn | AssistantTurn | ToolTurn;

export interface JsonSchemaProperty {
    type: 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';
    description: string;
    enum?: readonly string[];
    default?: string | number | boolean;
    minimum?: number;
    maximum?: number;
}

export interface CapabilityDefinition {
    readonly name: string;
    readonly description: string;
    readonly parameters: {
        readonly type: 'object';
        readonly properties: Readonly<Record<string, JsonSchemaProperty>>;
        readonly required: readonly string[];
    };
}

export type NonEmptyArray<T> = readonly [T, ...T[]];

export interface Answer {
    kind: 'answer';
    text: string;
}

export interface Decision {
    kind: 'decision';
    text: string | null;
    invocations: NonEmptyArray<CapabilityInvocation>;
}

export type ReasoningOutcome = Answer | Decision;

/**
 * Outcome of a decision call made on behalf of an incremental caller:
 * either a ready-to-consume fragment stream or invocations to resolve first.
 */
export interface FragmentStream {
    kind: 'stream';
    fragments: AsyncGenerator<string, void, undefined>;
}

export type StreamingOutcome = FragmentStream | Decision;

export function isNonEmpty<T>(items: readonly T[]): items is NonEmptyArray<T> {
    return items.length > 0;
}

/**
 * Re-wrap a complete text as a single-fragment stream.
 */
export async function* singleFragment(text: string): AsyncGenerator<string, void, undefined> {
    yield text;
}
