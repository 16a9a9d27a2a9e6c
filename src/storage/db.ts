/**
 * SQLite connection for conversation storage
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import { logger } from '../utils/logger.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS conversations (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    created_at TEXT NOT NULL,
    last_accessed TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS messages (
    id TEXT PRIMARY KEY,
    conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
    role TEXT NOT NULL CHECK (role IN ('system', 'user', 'assistant')),
    content TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    metadata TEXT
);

CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id, timestamp);
CREATE INDEX IF NOT EXISTS idx_conversations_last_accessed ON conversations(last_accessed);
`;

export type Db = Database.Database;

/**
 * Open (creating if needed) the database at `dbPath` and apply the schema.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): Db {
    const inMemory = dbPath === ':memory:';
    if (!inMemory) {
        mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    logger.debug(`[DB] Opening ${dbPath}`);
    const db = new Database(dbPath);
    db.pragma('foreign_keys = ON');
    if (!inMemory) {
        db.pragma('journal_mode = WAL');
    }
    db.exec(SCHEMA);
    return db;
}
