/**
 * Conversation storage. Conversations and their messages live in SQLite;
 * records are snake_case in the database and camelCase everywhere else.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { ConversationTurn } from '../agent/types.js';
import { logger } from '../utils/logger.js';
import type { Db } from './db.js';

export const MAX_TITLE_LENGTH = 255;

export type StoredRole = 'system' | 'user' | 'assistant';

export interface Conversation {
    id: string;
    title: string;
    createdAt: Date;
    lastAccessed: Date;
}

export interface ConversationSummary extends Conversation {
    messageCount: number;
}

export interface StoredMessage {
    id: string;
    conversationId: string;
    role: StoredRole;
    content: string;
    timestamp: Date;
    metadata: Record<string, unknown> | null;
}

export interface ConversationExport {
    conversation: Conversation;
    messages: StoredMessage[];
    exportedAt: Date;
}

export interface AddMessageParams {
    conversationId: string;
    role: StoredRole;
    content: string;
    metadata?: Record<string, unknown> | null;
}

interface ConversationRecord {
    id: string;
    title: string;
    created_at: string;
    last_accessed: string;
}

interface ConversationSummaryRecord extends ConversationRecord {
    message_count: number;
}

interface MessageRecord {
    id: string;
    conversation_id: string;
    role: StoredRole;
    content: string;
    timestamp: string;
    metadata: string | null;
}

const MetadataSchema = z.record(z.unknown());

function parseMetadata(raw: string | null, messageId: string): Record<string, unknown> | null {
    if (raw === null) return null;
    try {
        const parsed = MetadataSchema.safeParse(JSON.parse(raw));
        if (parsed.success) return parsed.data;
    } catch (error) {
        logger.warn(`[Conversations] Unreadable metadata on message ${messageId}:`, error);
        return null;
    }
    logger.warn(`[Conversations] Metadata on message ${messageId} is not an object`);
    return null;
}

function mapConversation(record: ConversationRecord): Conversation {
    return {
        id: record.id,
        title: record.title,
        createdAt: new Date(record.created_at),
        lastAccessed: new Date(record.last_accessed),
    };
}

function mapSummary(record: ConversationSummaryRecord): ConversationSummary {
    return { ...mapConversation(record), messageCount: record.message_count };
}

function mapMessage(record: MessageRecord): StoredMessage {
    return {
        id: record.id,
        conversationId: record.conversation_id,
        role: record.role,
        content: record.content,
        timestamp: new Date(record.timestamp),
        metadata: parseMetadata(record.metadata, record.id),
    };
}

const pad = (value: number) => String(value).padStart(2, '0');

export const DEFAULT_TITLE_PATTERN = /^Conversation \d{4}-\d{2}-\d{2} \d{2}:\d{2}$/;

export function defaultTitle(date: Date): string {
    return `Conversation ${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

const SUMMARY_SELECT = `
    SELECT c.*, (SELECT COUNT(*) FROM messages m WHERE m.conversation_id = c.id) AS message_count
    FROM conversations c`;

export class ConversationStore {
    private db: Db;
    private now: () => Date;

    constructor(db: Db, options: { now?: () => Date } = {}) {
        this.db = db;
        this.now = options.now ?? (() => new Date());
    }

    createConversation(title?: string): Conversation {
        const id = randomUUID();
        const now = this.now();
        const finalTitle = (title?.trim() || defaultTitle(now)).slice(0, MAX_TITLE_LENGTH);

        logger.debug(`[Conversations] Creating conversation ${id} "${finalTitle}"`);
        this.db.prepare<[string, string, string, string]>(
            'INSERT INTO conversations (id, title, created_at, last_accessed) VALUES (?, ?, ?, ?)'
        ).run(id, finalTitle, now.toISOString(), now.toISOString());

        return { id, title: finalTitle, createdAt: now, lastAccessed: now };
    }

    getConversation(id: string): Conversation | null {
        const record = this.db.prepare<[string], ConversationRecord>(
            'SELECT * FROM conversations WHERE id = ?'
        ).get(id);
        return record ? mapConversation(record) : null;
    }

    /**
     * Look up by full id or by an unambiguous id prefix
     */
    findConversation(idOrPrefix: string): Conversation | null {
        const exact = this.getConversation(idOrPrefix);
        if (exact || idOrPrefix.length < 4) return exact;

        const records = this.db.prepare<[string], ConversationRecord>(
            'SELECT * FROM conversations WHERE id LIKE ? LIMIT 2'
        ).all(`${idOrPrefix.replace(/[%_]/g, '')}%`);
        if (records.length > 1) {
            logger.debug(`[Conversations] Prefix ${idOrPrefix} is ambiguous`);
            return null;
        }
        return records.length === 1 ? mapConversation(records[0]) : null;
    }

    /**
     * Most recently accessed first
     */
    listConversations(limit = 10): ConversationSummary[] {
        return this.db.prepare<[number], ConversationSummaryRecord>(
            `${SUMMARY_SELECT} ORDER BY c.last_accessed DESC, c.rowid DESC LIMIT ?`
        ).all(limit).map(mapSummary);
    }

    /**
     * Case-insensitive match on the title or any message content
     */
    searchConversations(term: string, limit = 20): ConversationSummary[] {
        const pattern = `%${term.toLowerCase()}%`;
        return this.db.prepare<[string, string, number], ConversationSummaryRecord>(
            `${SUMMARY_SELECT}
             WHERE lower(c.title) LIKE ?
                OR EXISTS (SELECT 1 FROM messages m WHERE m.conversation_id = c.id AND lower(m.content) LIKE ?)
             ORDER BY c.last_accessed DESC, c.rowid DESC LIMIT ?`
        ).all(pattern, pattern, limit).map(mapSummary);
    }

    updateTitle(id: string, title: string): boolean {
        const info = this.db.prepare<[string, string]>(
            'UPDATE conversations SET title = ? WHERE id = ?'
        ).run(title.slice(0, MAX_TITLE_LENGTH), id);
        if (info.changes === 0) {
            logger.warn(`[Conversations] Cannot rename missing conversation ${id}`);
        }
        return info.changes > 0;
    }

    touch(id: string): void {
        this.db.prepare<[string, string]>(
            'UPDATE conversations SET last_accessed = ? WHERE id = ?'
        ).run(this.now().toISOString(), id);
    }

    addMessage(params: AddMessageParams): StoredMessage {
        const id = randomUUID();
        const timestamp = this.now();
        const metadata = params.metadata ?? null;

        const insert = this.db.transaction(() => {
            this.db.prepare<[string, string, StoredRole, string, string, string | null]>(
                'INSERT INTO messages (id, conversation_id, role, content, timestamp, metadata) VALUES (?, ?, ?, ?, ?, ?)'
            ).run(
                id,
                params.conversationId,
                params.role,
                params.content,
                timestamp.toISOString(),
                metadata ? JSON.stringify(metadata) : null
            );
            this.touch(params.conversationId);
        });

        try {
            insert();
        } catch (error) {
            logger.error(`[Conversations] Failed to add message to ${params.conversationId}:`, error);
            throw error;
        }

        return {
            id,
            conversationId: params.conversationId,
            role: params.role,
            content: params.content,
            timestamp,
            metadata,
        };
    }

    /**
     * Messages in chronological order. With a limit, the most recent `limit` messages.
     */
    getMessages(conversationId: string, limit?: number): StoredMessage[] {
        const records = limit === undefined
            ? this.db.prepare<[string], MessageRecord>(
                'SELECT * FROM messages WHERE conversation_id = ? ORDER BY timestamp ASC, rowid ASC'
            ).all(conversationId)
            : this.db.prepare<[string, number], MessageRecord>(
                'SELECT * FROM messages WHERE conversation_id = ? ORDER BY timestamp DESC, rowid DESC LIMIT ?'
            ).all(conversationId, limit).reverse();
        return records.map(mapMessage);
    }

    /**
     * Stored messages as agent conversation turns
     */
    getHistory(conversationId: string, limit?: number): ConversationTurn[] {
        return this.getMessages(conversationId, limit).map((message): ConversationTurn => ({
            role: message.role,
            content: message.content,
        }));
    }

    deleteConversation(id: string): boolean {
        const info = this.db.prepare<[string]>('DELETE FROM conversations WHERE id = ?').run(id);
        logger.info(`[Conversations] Delete ${id}: ${info.changes > 0 ? 'removed' : 'not found'}`);
        return info.changes > 0;
    }

    /**
     * Remove every conversation. Returns how many were removed.
     */
    clearAll(): number {
        const clear = this.db.transaction(() => {
            this.db.prepare('DELETE FROM messages').run();
            return this.db.prepare('DELETE FROM conversations').run().changes;
        });
        const count = clear();
        logger.info(`[Conversations] Cleared ${count} conversation(s)`);
        return count;
    }

    exportConversation(id: string): ConversationExport | null {
        const conversation = this.getConversation(id);
        if (!conversation) return null;
        return {
            conversation,
            messages: this.getMessages(id),
            exportedAt: this.now(),
        };
    }

    close(): void {
        this.db.close();
    }
}
