/**
 * Chat session - the persisted conversation loop without any terminal I/O.
 * Each reply stores the user turn, asks the chat agent with the stored
 * history and stores the assistant turn.
 */

import path from 'path';
import {
    DEFAULT_TITLE_PATTERN,
    type Conversation,
    type ConversationStore,
    type StoredMessage,
} from '../../storage/conversations.js';
import { conversationDocument, getExtension, writeExport, type ExportFormat } from '../../export/formats.js';
import { logger } from '../../utils/logger.js';
import type { ChatAgent } from '../chat-agent.js';
import { InvocationTracker, type SearchAgentCallbacks } from '../search-agent.js';
import type { ConversationTurn } from '../types.js';

export const NO_RESPONSE_MESSAGE = 'No response generated.';

export function errorReply(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    return `I apologize, but I encountered an error: ${message}`;
}

/**
 * conversation_<first 8 of id>_<YYYYMMDD_HHMMSS><ext>
 */
export function defaultExportPath(conversationId: string, date: Date, format: ExportFormat = 'json'): string {
    const pad = (value: number) => String(value).padStart(2, '0');
    const stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `conversation_${conversationId.slice(0, 8)}_${stamp}${getExtension(format)}`;
}

export class ChatSession {
    private store: ConversationStore;
    private agent: ChatAgent;
    private current: Conversation;

    constructor(store: ConversationStore, agent: ChatAgent, conversation: Conversation) {
        this.store = store;
        this.agent = agent;
        this.current = conversation;
    }

    static start(store: ConversationStore, agent: ChatAgent, title?: string): ChatSession {
        return new ChatSession(store, agent, store.createConversation(title));
    }

    /**
     * Reopen a stored conversation by id or id prefix. Null when there is no match.
     */
    static resume(store: ConversationStore, agent: ChatAgent, idOrPrefix: string): ChatSession | null {
        const conversation = store.findConversation(idOrPrefix);
        if (!conversation) return null;
        store.touch(conversation.id);
        return new ChatSession(store, agent, conversation);
    }

    get conversation(): Conversation {
        return this.current;
    }

    get model(): string {
        return this.agent.model;
    }

    get searchEnabled(): boolean {
        return this.agent.searchEnabled;
    }

    /**
     * Reply in one piece
     */
    async reply(text: string, callbacks?: SearchAgentCallbacks): Promise<string> {
        const tracker = new InvocationTracker(callbacks);
        const history = this.recordUserTurn(text);

        let reply: string;
        try {
            reply = await this.agent.chat(history, { callbacks: tracker.callbacks });
        } catch (error) {
            this.recordFailure(error);
            throw error;
        }

        return this.recordReply(reply, tracker);
    }

    /**
     * Reply fragment by fragment. The stored reply drops the search indicator.
     * A consumer that stops early leaves the partial reply stored as interrupted.
     */
    async *replyStream(text: string, callbacks?: SearchAgentCallbacks): AsyncGenerator<string, string, undefined> {
        const tracker = new InvocationTracker(callbacks);
        const history = this.recordUserTurn(text);

        let full = '';
        let outcome: 'complete' | 'failed' | 'stopped' = 'stopped';
        try {
            for await (const fragment of this.agent.chat(history, { stream: true, callbacks: tracker.callbacks })) {
                full += fragment;
                yield fragment;
            }
            outcome = 'complete';
        } catch (error) {
            outcome = 'failed';
            this.recordFailure(error);
            throw error;
        } finally {
            if (outcome === 'stopped') {
                logger.warn(`[Chat] Reply interrupted in ${this.current.id}`);
                this.recordReply(full, tracker, { interrupted: true });
            }
        }

        return this.recordReply(full, tracker);
    }

    rename(title: string): boolean {
        const trimmed = title.trim();
        if (!trimmed || !this.store.updateTitle(this.current.id, trimmed)) return false;
        this.refresh();
        return true;
    }

    transcript(): StoredMessage[] {
        return this.store.getMessages(this.current.id);
    }

    /**
     * Write the conversation to a file and return its path
     */
    async export(outputPath?: string, format: ExportFormat = 'json'): Promise<string> {
        const exported = this.store.exportConversation(this.current.id);
        if (!exported) throw new Error(`Conversation ${this.current.id} no longer exists`);

        const target = path.resolve(outputPath ?? defaultExportPath(this.current.id, exported.exportedAt, format));
        await writeExport(conversationDocument(exported), { format, outputPath: target });
        logger.info(`[Chat] Exported ${this.current.id} to ${target}`);
        return target;
    }

    delete(): boolean {
        return this.store.deleteConversation(this.current.id);
    }

    private recordUserTurn(text: string): ConversationTurn[] {
        const id = this.current.id;
        this.store.addMessage({ conversationId: id, role: 'user', content: text });

        if (DEFAULT_TITLE_PATTERN.test(this.current.title) && this.store.getMessages(id).length === 1) {
            this.store.updateTitle(id, text);
        }
        this.refresh();

        return this.store.getHistory(id);
    }

    private recordReply(reply: string, tracker: InvocationTracker, extra: Record<string, unknown> = {}): string {
        const stripped = tracker.answerText(reply);
        const content = stripped.trim() ? stripped : NO_RESPONSE_MESSAGE;

        const metadata: Record<string, unknown> = { model: this.agent.model };
        if (tracker.searched) {
            metadata.capabilities = tracker.used.map((invocation) => invocation.name);
        }

        this.store.addMessage({
            conversationId: this.current.id,
            role: 'assistant',
            content,
            metadata: { ...metadata, ...extra },
        });
        this.refresh();
        return content;
    }

    private recordFailure(error: unknown): void {
        logger.error(`[Chat] Reply failed in ${this.current.id}:`, error);
        this.store.addMessage({
            conversationId: this.current.id,
            role: 'assistant',
            content: errorReply(error),
            metadata: { model: this.agent.model, error: true },
        });
    }

    private refresh(): void {
        this.current = this.store.getConversation(this.current.id) ?? this.current;
    }
}
