/**
 * OpenRouter API Client
 * OpenAI-compatible chat completions with function calling and SSE streaming.
 * Requests are made once; retry policy belongs to the caller.
 */

import { z } from 'zod';
import { ApiKeyError, ServiceError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const OPENROUTER_API_BASE = 'https://openrouter.ai/api/v1';
const DEFAULT_LIST_TIMEOUT_MS = 60_000;
const DEFAULT_CHAT_TIMEOUT_MS = 300_000;
const DEFAULT_STREAM_TIMEOUT_MS = 900_000;

function envTimeoutMs(value: string | undefined, fallback: number): number {
    const parsed = value ? Number(value) : Number.NaN;
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function createTimeoutSignal(timeoutMs: number, parentSignal?: AbortSignal): { signal: AbortSignal; cleanup: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort();

    if (parentSignal) {
        if (parentSignal.aborted) {
            controller.abort();
        } else {
            parentSignal.addEventListener('abort', onAbort, { once: true });
        }
    }

    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    return {
        signal: controller.signal,
        cleanup: () => {
            clearTimeout(timeoutId);
            if (parentSignal && !parentSignal.aborted) {
                parentSignal.removeEventListener('abort', onAbort);
            }
        },
    };
}

function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

function isAbortError(error: Error): boolean {
    return error.name === 'AbortError';
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

export interface ToolCall {
    id: string;
    type: 'function';
    function: {
        name: string;
        arguments: string;
    };
}

export type Message =
    | { role: 'system' | 'user'; content: string }
    | { role: 'assistant'; content: string | null; tool_calls?: ToolCall[] }
    | { role: 'tool'; tool_call_id: string; content: string };

export interface FunctionTool {
    type: 'function';
    function: {
        name: string;
        description: string;
        parameters: object;
    };
}

export interface ChatOptions {
    temperature?: number;
    maxTokens?: number;
    topP?: number;
    seed?: number;
    stop?: string[];
    tools?: FunctionTool[];
    toolChoice?: 'auto' | 'none';
    signal?: AbortSignal;
}

export interface Model {
    id: string;
    name: string;
    description?: string;
    contextLength: number;
    pricing: {
        prompt: number;
        completion: number;
    };
}

export interface ChatResponse {
    id: string;
    choices: {
        message: {
            role: string;
            content: string | null;
            toolCalls: ToolCall[];
        };
        finishReason: string | null;
    }[];
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

const ToolCallSchema = z.object({
    id: z.string(),
    type: z.literal('function').default('function'),
    function: z.object({
        name: z.string(),
        arguments: z.string().default(''),
    }),
});

const ChatCompletionSchema = z.object({
    id: z.string().default(''),
    choices: z.array(z.object({
        message: z.object({
            role: z.string().default('assistant'),
            content: z.string().nullable().optional(),
            tool_calls: z.array(ToolCallSchema).nullable().optional(),
        }),
        finish_reason: z.string().nullable().optional(),
    })).min(1),
    usage: z.object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional(),
    }).nullable().optional(),
});

const StreamChunkSchema = z.object({
    choices: z.array(z.object({
        delta: z.object({
            content: z.string().nullable().optional(),
        }).optional(),
    })).optional(),
    error: z.object({ message: z.string().optional() }).passthrough().optional(),
});

const ModelListSchema = z.object({
    data: z.array(z.object({
        id: z.string(),
        name: z.string().optional(),
        description: z.string().optional(),
        context_length: z.number().nullable().optional(),
        top_provider: z.object({ context_length: z.number().nullable().optional() }).nullable().optional(),
        pricing: z.object({
            prompt: z.union([z.string(), z.number()]).optional(),
            completion: z.union([z.string(), z.number()]).optional(),
        }).optional(),
    })),
});

type SseEvent =
    | { kind: 'skip' }
    | { kind: 'done' }
    | { kind: 'content'; text: string };

/**
 * One line of a chat-completions event stream. `data:` may or may not be
 * followed by a space.
 */
function readSseLine(rawLine: string): SseEvent {
    const line = rawLine.trimEnd();
    if (!line.startsWith('data:')) return { kind: 'skip' };

    const data = line.slice(5).replace(/^ /, '');
    if (data === '[DONE]') return { kind: 'done' };

    // Skip invalid JSON
    const parsed = StreamChunkSchema.safeParse(parseJson(data));
    if (!parsed.success) return { kind: 'skip' };

    if (parsed.data.error) {
        throw new ServiceError(`OpenRouter stream error: ${parsed.data.error.message ?? 'unknown error'}`);
    }

    const content = parsed.data.choices?.[0]?.delta?.content;
    return content ? { kind: 'content', text: content } : { kind: 'skip' };
}

export class OpenRouterClient {
    private apiKey: string;
    private baseUrl: string;

    constructor(apiKey: string, options: { baseUrl?: string } = {}) {
        if (!apiKey || apiKey.trim() === '') {
            throw new ApiKeyError('OPENROUTER_API_KEY', undefined, 'https://openrouter.ai');
        }
        this.apiKey = apiKey.trim();
        this.baseUrl = (options.baseUrl || OPENROUTER_API_BASE).replace(/\/+$/, '');
    }

    private getHeaders(): Record<string, string> {
        return {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
            'X-Title': 'AskWeb CLI',
        };
    }

    /**
     * Single fetch attempt bounded by a timeout
     */
    private async fetchWithTimeout(
        url: string,
        options: RequestInit,
        timeoutMs: number
    ): Promise<{ response: Response; cleanup: () => void }> {
        const resolvedTimeoutMs = envTimeoutMs(process.env.OPENROUTER_TIMEOUT_MS, timeoutMs);
        const { signal, cleanup } = createTimeoutSignal(resolvedTimeoutMs, options.signal ?? undefined);
        try {
            const response = await fetch(url, { ...options, signal });
            return { response, cleanup };
        } catch (error) {
            cleanup();
            const err = toError(error);
            if (isAbortError(err)) {
                throw new ServiceError(`Request timed out after ${resolvedTimeoutMs}ms`, { cause: err });
            }
            throw new ServiceError(`OpenRouter request failed: ${err.message}`, { cause: err });
        }
    }

    /**
     * Parse API error response for better error messages
     */
    private async parseError(response: Response): Promise<string> {
        let text: string;
        try {
            text = await response.text();
        } catch {
            return `HTTP ${response.status}`;
        }
        const json = parseJson(text);
        if (json && typeof json === 'object') {
            const error = 'error' in json ? json.error : undefined;
            if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
                return error.message;
            }
            if (typeof error === 'string') return error;
            if ('message' in json && typeof json.message === 'string') return json.message;
        }
        return text || `HTTP ${response.status}`;
    }

    private async raiseForStatus(response: Response): Promise<void> {
        if (response.ok) return;
        const errorMessage = await this.parseError(response);

        if (response.status === 401) {
            throw new ServiceError(
                'OpenRouter API authentication failed.\n' +
                'Please check your OPENROUTER_API_KEY is valid.\n' +
                'Run: askweb init',
                { status: 401 }
            );
        }

        throw new ServiceError(`OpenRouter API error: ${response.status} - ${errorMessage}`, { status: response.status });
    }

    private buildBody(model: string, messages: Message[], options: ChatOptions, stream: boolean): Record<string, unknown> {
        const body: Record<string, unknown> = {
            model,
            messages,
            stream,
        };
        if (typeof options.temperature === 'number') body.temperature = options.temperature;
        if (typeof options.maxTokens === 'number') body.max_tokens = options.maxTokens;
        if (typeof options.topP === 'number') body.top_p = options.topP;
        if (typeof options.seed === 'number') body.seed = options.seed;
        if (options.stop && options.stop.length > 0) body.stop = options.stop;
        if (options.tools && options.tools.length > 0) {
            body.tools = options.tools;
            body.tool_choice = options.toolChoice ?? 'auto';
        }
        return body;
    }

    /**
     * Fetch list of available models
     */
    async listModels(): Promise<Model[]> {
        const { response, cleanup } = await this.fetchWithTimeout(`${this.baseUrl}/models`, {
            headers: {
                Authorization: `Bearer ${this.apiKey}`,
            },
        }, DEFAULT_LIST_TIMEOUT_MS);

        try {
            await this.raiseForStatus(response);
            const parsed = ModelListSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw new ServiceError('OpenRouter returned a malformed model list', { cause: parsed.error });
            }

            return parsed.data.data.map((model) => ({
                id: model.id,
                name: model.name || model.id,
                description: model.description,
                contextLength: model.context_length ?? model.top_provider?.context_length ?? 0,
                pricing: {
                    prompt: Number(model.pricing?.prompt ?? 0),
                    completion: Number(model.pricing?.completion ?? 0),
                },
            }));
        } finally {
            cleanup();
        }
    }

    /**
     * Send a chat completion request (non-streaming)
     */
    async chat(
        model: string,
        messages: Message[],
        options: ChatOptions = {}
    ): Promise<ChatResponse> {
        logger.debug(`[OpenRouter] chat model=${model} messages=${messages.length} tools=${options.tools?.length ?? 0}`);

        const { response, cleanup } = await this.fetchWithTimeout(`${this.baseUrl}/chat/completions`, {
            method: 'POST',
            headers: this.getHeaders(),
            body: JSON.stringify(this.buildBody(model, messages, options, false)),
            signal: options.signal,
        }, DEFAULT_CHAT_TIMEOUT_MS);

        try {
            await this.raiseForStatus(response);
            const parsed = ChatCompletionSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw new ServiceError('OpenRouter returned a malformed chat completion', { cause: parsed.error });
            }

            const data = parsed.data;
            return {
                id: data.id,
                choices: data.choices.map((choice) => ({
                    message: {
                        role: choice.message.role,
                        content: choice.message.content ?? null,
                        toolCalls: choice.message.tool_calls ?? [],
                    },
                    finishReason: choice.finish_reason ?? null,
                })),
                usage: {
                    promptTokens: data.usage?.prompt_tokens || 0,
                    completionTokens: data.usage?.completion_tokens || 0,
                    totalTokens: data.usage?.total_tokens || 0,
                },
            };
        } finally {
            cleanup();
        }
    }

    /**
     * Send a streaming chat completion request, yielding content deltas in order.
     * Returning early cancels the underlying response body.
     */
    async *chatStream(
        model: string,
        messages: Message[],
        options: ChatOptions = {}
    ): AsyncGenerator<string, void, undefined> {
        logger.debug(`[OpenRouter] chatStream model=${model} messages=${messages.length}`);

        const { response, cleanup } = await this.fetchWithTimeout(`${this.baseUrl}/chat/completions`, {
            method: 'POST',
            headers: { ...this.getHeaders(), Accept: 'text/event-stream' },
            body: JSON.stringify(this.buildBody(model, messages, { ...options, tools: undefined }, true)),
            signal: options.signal,
        }, DEFAULT_STREAM_TIMEOUT_MS);

        let cancelReader: (() => Promise<void>) | undefined;
        let finished = false;

        try {
            await this.raiseForStatus(response);

            const reader = response.body?.getReader();
            if (!reader) throw new ServiceError('OpenRouter returned no response body');
            cancelReader = () => reader.cancel();

            const readNext = async () => {
                try {
                    return await reader.read();
                } catch (error) {
                    finished = true;
                    throw ServiceError.from(error);
                }
            };

            const decoder = new TextDecoder();
            let buffer = '';

            while (true) {
                const chunk = await readNext();
                if (chunk.done) finished = true;

                // Flush the decoder and any unterminated last line once the body ends
                buffer += chunk.done ? decoder.decode() : decoder.decode(chunk.value, { stream: true });
                const lines = buffer.split('\n');
                buffer = chunk.done ? '' : lines.pop() ?? '';

                for (const rawLine of lines) {
                    const event = readSseLine(rawLine);
                    if (event.kind === 'done') {
                        finished = true;
                        return;
                    }
                    if (event.kind === 'content') {
                        yield event.text;
                    }
                }

                if (chunk.done) break;
            }
        } finally {
            if (cancelReader && !finished) {
                await cancelReader();
            }
            cleanup();
        }
    }
}
