/**
 * UI Components - Rich terminal UI elements
 */

import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import gradient from 'gradient-string';
import type { UiMode } from '../config.js';
import type { ConversationSummary, StoredMessage } from '../storage/conversations.js';
import { colors, createHeader, divider, getBoxOuterWidth, icons, sectionHeader, truncate } from './theme.js';

export function getUiMode(): UiMode {
    if (process.env.NO_COLOR !== undefined) return 'plain';
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    if (ui === 'plain') return 'plain';
    if (ui === 'fancy') {
        const isInteractive = Boolean(process.stdout.isTTY && process.stderr.isTTY);
        return isInteractive ? 'fancy' : 'minimal';
    }
    return 'minimal';
}

/**
 * Display the app header
 */
export function showHeader(options: { title?: string; model?: string; subtitle?: string; showDivider?: boolean } = {}): void {
    const { title = 'AskWeb', model, subtitle } = options;
    const showDivider = options.showDivider !== false;
    const mode = getUiMode();

    console.log();

    if (mode === 'fancy') {
        const heading = gradient(['#0E7490', '#0891B2', '#38BDF8'])(title);
        const lines: string[] = [heading];
        if (model) lines.push(colors.muted(`Model: ${model}`));
        if (subtitle) lines.push(colors.muted(subtitle));

        console.log(
            boxen(lines.join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#0E7490',
                width: getBoxOuterWidth(),
            })
        );
        if (showDivider) console.log(colors.muted(divider()));
        return;
    }

    console.log(createHeader(title, model ? `Model: ${model}` : undefined));
    if (subtitle) console.log(colors.muted(subtitle));
    if (showDivider) console.log(colors.muted(divider()));
}

/**
 * Create a spinner with custom styling. Spinners draw on stderr.
 */
export function createSpinner(text: string): Ora {
    const mode = getUiMode();
    return ora({
        text: mode === 'fancy' ? colors.secondary(text) : colors.muted(text),
        spinner: mode === 'fancy' ? 'dots12' : 'dots',
        color: mode === 'fancy' ? 'cyan' : undefined,
        isEnabled: mode !== 'plain' && Boolean(process.stderr.isTTY),
    });
}

let terminalMarked: Marked | null = null;

export function renderMarkdown(markdown: string): string {
    if (!terminalMarked) {
        const width = typeof process.stdout.columns === 'number' && process.stdout.columns > 0
            ? Math.min(process.stdout.columns, 100)
            : 80;
        terminalMarked = new Marked(markedTerminal({
            width,
            emoji: false,
            showSectionPrefix: false,
            reflowText: true,
        }));
    }

    const rendered = terminalMarked.parse(markdown);
    return typeof rendered === 'string' ? rendered : markdown;
}

/**
 * Print fragments as they arrive and return the full text.
 * `onFirstChunk` runs before the first fragment is written.
 */
export async function streamOutput(
    fragments: AsyncIterable<string>,
    options: { onFirstChunk?: () => void } = {}
): Promise<string> {
    let fullOutput = '';
    let started = false;

    for await (const chunk of fragments) {
        if (!started) {
            started = true;
            options.onFirstChunk?.();
        }
        process.stdout.write(chunk);
        fullOutput += chunk;
    }

    if (!fullOutput.endsWith('\n')) process.stdout.write('\n');

    return fullOutput;
}

/**
 * Print a finished answer, rendered as Markdown unless disabled
 */
export function showAnswer(text: string, options: { markdown?: boolean } = {}): void {
    const markdown = options.markdown !== false && getUiMode() !== 'plain';
    console.log(markdown ? renderMarkdown(text).trimEnd() : text);
}

/**
 * Show completion message
 */
export function showComplete(outputPath?: string): void {
    const mode = getUiMode();
    console.log();
    if (mode === 'fancy') {
        const msg = gradient(['#10B981', '#38BDF8'])('Done');
        console.log(`${colors.success(icons.complete)} ${msg}`);
        if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
        return;
    }

    console.log(`${colors.success(icons.complete)} ${colors.success('Done')}`);
    if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
}

export function showSuccess(message: string): void {
    console.log(`${colors.success(icons.complete)} ${message}`);
}

export function showInfo(message: string): void {
    console.log(`${colors.secondary(icons.info)} ${message}`);
}

export function showWarning(message: string): void {
    console.error(`${colors.warning(icons.warning)} ${colors.warning(message)}`);
}

/**
 * Show error message
 */
export function showError(message: string): void {
    const mode = getUiMode();
    if (mode === 'fancy') {
        console.error(
            boxen(`${colors.error('Error')}\n${message}`, {
                padding: 1,
                borderStyle: 'round',
                borderColor: 'red',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }
    console.error(`${colors.error(icons.error)} ${colors.error('Error:')} ${message}`);
}

function formatDate(date: Date): string {
    return date.toLocaleString('en-US', {
        year: 'numeric',
        month: 'short',
        day: 'numeric',
        hour: '2-digit',
        minute: '2-digit',
    });
}

/**
 * One line per conversation: short id, title, message count, last access
 */
export function formatConversationLines(conversations: readonly ConversationSummary[]): string[] {
    return conversations.map((conversation) => {
        const id = colors.dim(conversation.id.slice(0, 8));
        const title = truncate(conversation.title, 40).padEnd(40);
        const count = colors.muted(`${conversation.messageCount} msg`.padStart(7));
        return `${id}  ${title}  ${count}  ${colors.muted(formatDate(conversation.lastAccessed))}`;
    });
}

export function showConversationList(conversations: readonly ConversationSummary[], title = 'Conversations'): void {
    if (conversations.length === 0) {
        showInfo('No conversations found.');
        return;
    }

    const lines = formatConversationLines(conversations);

    if (getUiMode() === 'fancy') {
        console.log(
            boxen(lines.join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#0E7490',
                title,
                titleAlignment: 'left',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }

    console.log(sectionHeader(title));
    lines.forEach((line) => console.log(line));
}

/**
 * Print a conversation transcript
 */
export function showTranscript(messages: readonly StoredMessage[], options: { markdown?: boolean } = {}): void {
    if (messages.length === 0) {
        showInfo('No messages yet.');
        return;
    }

    for (const message of messages) {
        const label = message.role === 'user'
            ? colors.secondary(`${icons.user} You`)
            : colors.primary(`${icons.assistant} ${message.role === 'assistant' ? 'Assistant' : 'System'}`);
        console.log();
        console.log(`${label} ${colors.dim(formatDate(message.timestamp))}`);
        if (message.role === 'user') {
            console.log(message.content);
        } else {
            showAnswer(message.content, options);
        }
    }
    console.log();
}

export function showChatHelp(): void {
    const rows: [string, string][] = [
        ['exit, quit, bye', 'End the chat'],
        ['history', 'Show this conversation'],
        ['/title <title>', 'Rename the conversation'],
        ['/export [file]', 'Export the conversation'],
        ['/clear', 'Delete this conversation'],
        ['/help', 'Show this help'],
    ];
    console.log(sectionHeader('Commands'));
    for (const [command, description] of rows) {
        console.log(`  ${colors.secondary(command.padEnd(18))}${colors.muted(description)}`);
    }
    console.log();
}
