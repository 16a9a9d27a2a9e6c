import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import {
    answerDocument,
    conversationDocument,
    conversationToMarkdown,
    formatFromPath,
    parseExportFormat,
    renderHtml,
    stripMarkdown,
    writeExport,
} from './formats.js';
import type { ConversationExport } from '../storage/conversations.js';

const EXPORTED: ConversationExport = {
    conversation: {
        id: 'conv-1',
        title: 'Harbor hours',
        createdAt: new Date('2026-01-15T09:30:00.000Z'),
        lastAccessed: new Date('2026-01-15T09:31:00.000Z'),
    },
    messages: [
        {
            id: 'msg-1',
            conversationId: 'conv-1',
            role: 'user',
            content: 'When does the harbor open?',
            timestamp: new Date('2026-01-15T09:30:10.000Z'),
            metadata: null,
        },
        {
            id: 'msg-2',
            conversationId: 'conv-1',
            role: 'assistant',
            content: 'At **nine**, see [the notice](https://harbor.example).',
            timestamp: new Date('2026-01-15T09:30:20.000Z'),
            metadata: { searched: true },
        },
    ],
    exportedAt: new Date('2026-01-16T08:00:00.000Z'),
};

describe('export formats', () => {
    it('should render a conversation as Markdown', () => {
        expect(conversationToMarkdown(EXPORTED)).toBe([
            '# Harbor hours',
            '',
            'Created: 2026-01-15T09:30:00.000Z  ',
            'Exported: 2026-01-16T08:00:00.000Z',
            '',
            '## You (2026-01-15T09:30:10.000Z)',
            '',
            'When does the harbor open?',
            '',
            '## Assistant (2026-01-15T09:30:20.000Z)',
            '',
            'At **nine**, see [the notice](https://harbor.example).',
            '',
        ].join('\n'));
    });

    it('should strip Markdown for plain text', () => {
        expect(stripMarkdown('## Title\n\nAt **nine**, see [the notice](https://harbor.example).  \n\n---\n\n`code`'))
            .toBe('Title\n\nAt nine, see the notice (https://harbor.example).\n\ncode');
    });

    it('should parse format names and extensions', () => {
        expect(parseExportFormat('MD')).toBe('markdown');
        expect(parseExportFormat('json')).toBe('json');
        expect(() => parseExportFormat('pdf')).toThrow('Unknown export format "pdf"');
        expect(formatFromPath('notes/answer.HTML')).toBe('html');
        expect(formatFromPath('answer.pdf')).toBeUndefined();
    });

    it('should escape the HTML title', async () => {
        const html = await renderHtml('# Hi', 'Tides <today>');

        expect(html).toContain('<title>Tides &lt;today&gt;</title>');
        expect(html).toContain('<h1>Hi</h1>');
    });

    it('should build an answer document', () => {
        const document = answerDocument('Tides?', 'High at six.\n', 'test-model', new Date('2026-01-15T09:30:00.000Z'));

        expect(document.markdown).toBe('# Tides?\n\nHigh at six.\n\n---\n\nModel: test-model  \nDate: 2026-01-15T09:30:00.000Z\n');
    });

    describe('writeExport', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(path.join(os.tmpdir(), 'askweb-export-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('should write JSON with ISO dates', async () => {
            const outputPath = path.join(dir, 'conversation.json');

            await writeExport(conversationDocument(EXPORTED), { format: 'json', outputPath });

            const written = JSON.parse(await readFile(outputPath, 'utf-8'));
            expect(written.conversation.title).toBe('Harbor hours');
            expect(written.messages[1].timestamp).toBe('2026-01-15T09:30:20.000Z');
            expect(written.messages[1].metadata).toEqual({ searched: true });
            expect(written.exportedAt).toBe('2026-01-16T08:00:00.000Z');
        });

        it('should write Markdown as rendered', async () => {
            const outputPath = path.join(dir, 'conversation.md');

            await writeExport(conversationDocument(EXPORTED), { format: 'markdown', outputPath });

            expect(await readFile(outputPath, 'utf-8')).toBe(conversationToMarkdown(EXPORTED));
        });

        it('should write a non-empty Word document', async () => {
            const outputPath = path.join(dir, 'conversation.docx');

            await writeExport(conversationDocument(EXPORTED), { format: 'docx', outputPath });

            const buffer = await readFile(outputPath);
            // DOCX files are zip archives
            expect(buffer.subarray(0, 2).toString('latin1')).toBe('PK');
        });
    });
});
