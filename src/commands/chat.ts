import { Command, InvalidArgumentError } from 'commander';
import inquirer from 'inquirer';
import path from 'path';
import { createChatAgent } from '../agent/chat-agent.js';
import { ChatSession, InteractiveChat } from '../agent/interactive/index.js';
import { defaultExportPath } from '../agent/interactive/session.js';
import type { Config } from '../config.js';
import { conversationDocument, formatFromPath, getFormatName, parseExportFormat, writeExport } from '../export/formats.js';
import type { ConversationStore } from '../storage/conversations.js';
import {
    formatConversationLines,
    showConversationList,
    showError,
    showHeader,
    showInfo,
    showSuccess,
    showTranscript,
} from '../ui/components.js';
import { errorMessage, openConversationStore, prepareConfig } from './shared.js';

function parsePositiveInt(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) throw new InvalidArgumentError('Must be a positive integer.');
    return parsed;
}

/**
 * Run an action against the conversation store, closing it afterwards
 */
async function withStore(
    required: { openrouter: boolean },
    ui: string | undefined,
    action: (store: ConversationStore, config: Config) => Promise<void>
): Promise<void> {
    let store: ConversationStore | null = null;
    try {
        const config = await prepareConfig(required, ui);
        store = openConversationStore(config);
        await action(store, config);
    } catch (error) {
        showError(errorMessage(error));
        process.exitCode = 1;
    } finally {
        store?.close();
    }
}

async function runSession(session: ChatSession, config: Config): Promise<void> {
    const chat = new InteractiveChat(session, {
        stream: config.streamOutput,
        markdown: config.renderMarkdown,
    });
    await chat.start();
}

async function pickConversation(store: ConversationStore): Promise<string | null> {
    const conversations = store.listConversations(20);
    if (conversations.length === 0) {
        showInfo('No conversations yet. Start one with `askweb chat start`.');
        return null;
    }

    const lines = formatConversationLines(conversations);
    const { id } = await inquirer.prompt<{ id: string }>([
        {
            type: 'list',
            name: 'id',
            message: 'Resume which conversation?',
            choices: conversations.map((conversation, index) => ({ name: lines[index], value: conversation.id })),
            pageSize: 12,
        },
    ]);
    return id;
}

async function confirm(message: string): Promise<boolean> {
    const { ok } = await inquirer.prompt<{ ok: boolean }>([
        { type: 'confirm', name: 'ok', message, default: false },
    ]);
    return ok;
}

export const chatCommand = new Command('chat')
    .description('Chat with search-backed answers, saved between sessions');

chatCommand
    .command('start', { isDefault: true })
    .description('Start a new conversation')
    .option('-t, --title <title>', 'Conversation title')
    .option('-m, --model <model>', 'OpenRouter model to use')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .action(async (options: { title?: string; model?: string; ui?: string }) => {
        await withStore({ openrouter: true }, options.ui, async (store, config) => {
            const agent = createChatAgent(config, { model: options.model });
            await runSession(ChatSession.start(store, agent, options.title), config);
        });
    });

chatCommand
    .command('resume')
    .description('Continue a saved conversation')
    .option('-s, --session <id>', 'Conversation id or id prefix')
    .option('-m, --model <model>', 'OpenRouter model to use')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .action(async (options: { session?: string; model?: string; ui?: string }) => {
        await withStore({ openrouter: true }, options.ui, async (store, config) => {
            const id = options.session ?? await pickConversation(store);
            if (!id) return;

            const agent = createChatAgent(config, { model: options.model });
            const session = ChatSession.resume(store, agent, id);
            if (!session) throw new Error(`Conversation not found: ${id}`);

            showTranscript(session.transcript().slice(-6), { markdown: config.renderMarkdown });
            await runSession(session, config);
        });
    });

chatCommand
    .command('history')
    .description('List saved conversations')
    .option('-l, --limit <n>', 'How many to show', parsePositiveInt, 10)
    .option('-s, --search <term>', 'Only conversations whose title or messages match')
    .action(async (options: { limit: number; search?: string }) => {
        await withStore({ openrouter: false }, undefined, async (store) => {
            const term = options.search?.trim();
            if (term) {
                showConversationList(store.searchConversations(term, options.limit), `Matching "${term}"`);
                return;
            }
            showConversationList(store.listConversations(options.limit));
        });
    });

chatCommand
    .command('show')
    .description('Print a saved conversation')
    .argument('<id>', 'Conversation id or id prefix')
    .action(async (id: string) => {
        await withStore({ openrouter: false }, undefined, async (store, config) => {
            const conversation = store.findConversation(id);
            if (!conversation) throw new Error(`Conversation not found: ${id}`);

            showHeader({ title: conversation.title, subtitle: `Conversation ${conversation.id.slice(0, 8)}` });
            showTranscript(store.getMessages(conversation.id), { markdown: config.renderMarkdown });
        });
    });

chatCommand
    .command('clear')
    .description('Delete one conversation or all of them')
    .option('-s, --session <id>', 'Conversation id or id prefix')
    .option('--all', 'Delete every conversation')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (options: { session?: string; all?: boolean; yes?: boolean }) => {
        await withStore({ openrouter: false }, undefined, async (store) => {
            if (options.all) {
                if (!options.yes && !await confirm('Delete ALL conversations? This cannot be undone.')) return;
                const count = store.clearAll();
                showSuccess(`Deleted ${count} conversation${count === 1 ? '' : 's'}.`);
                return;
            }

            if (!options.session) {
                throw new Error('Specify --all or --session <id>');
            }

            const conversation = store.findConversation(options.session);
            if (!conversation) throw new Error(`Conversation not found: ${options.session}`);
            if (!options.yes && !await confirm(`Delete "${conversation.title}"?`)) return;

            store.deleteConversation(conversation.id);
            showSuccess(`Deleted "${conversation.title}".`);
        });
    });

chatCommand
    .command('export')
    .description('Write a saved conversation to a file')
    .argument('<id>', 'Conversation id or id prefix')
    .option('-o, --output <file>', 'Output file')
    .option('-f, --format <format>', 'json | markdown | html | txt | docx')
    .action(async (id: string, options: { output?: string; format?: string }) => {
        await withStore({ openrouter: false }, undefined, async (store) => {
            const conversation = store.findConversation(id);
            const exported = conversation ? store.exportConversation(conversation.id) : null;
            if (!exported) throw new Error(`Conversation not found: ${id}`);

            const format = options.format
                ? parseExportFormat(options.format)
                : (options.output ? formatFromPath(options.output) : undefined) ?? 'json';
            const outputPath = path.resolve(
                options.output ?? defaultExportPath(exported.conversation.id, exported.exportedAt, format)
            );

            await writeExport(conversationDocument(exported), { format, outputPath });
            showSuccess(`Exported ${getFormatName(format)} to ${outputPath}`);
        });
    });
