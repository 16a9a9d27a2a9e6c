/**
 * Export Formats - Write conversations and answers to files
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import { marked } from 'marked';
import { ConfigError } from '../errors.js';
import type { ConversationExport, StoredRole } from '../storage/conversations.js';

export type ExportFormat = 'json' | 'markdown' | 'html' | 'txt' | 'docx';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'markdown', 'html', 'txt', 'docx'];

/**
 * What gets written: a Markdown rendering for the text formats and the raw
 * data for JSON.
 */
export interface ExportDocument {
    title: string;
    markdown: string;
    data: unknown;
}

export interface ExportOptions {
    format: ExportFormat;
    outputPath: string;
}

/**
 * Get file extension for a format
 */
export function getExtension(format: ExportFormat): string {
    switch (format) {
        case 'json': return '.json';
        case 'markdown': return '.md';
        case 'html': return '.html';
        case 'txt': return '.txt';
        case 'docx': return '.docx';
    }
}

/**
 * Get format display name
 */
export function getFormatName(format: ExportFormat): string {
    switch (format) {
        case 'json': return 'JSON';
        case 'markdown': return 'Markdown';
        case 'html': return 'HTML';
        case 'txt': return 'Plain Text';
        case 'docx': return 'Word Document';
    }
}

function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

export function parseExportFormat(value: string): ExportFormat {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'md') return 'markdown';
    if (isExportFormat(normalized)) return normalized;
    throw new ConfigError(`Unknown export format "${value}". Use one of: ${EXPORT_FORMATS.join(', ')}`, 'format');
}

/**
 * Guess the format from a file name, if its extension is one we write
 */
export function formatFromPath(outputPath: string): ExportFormat | undefined {
    const extension = path.extname(outputPath).toLowerCase();
    return EXPORT_FORMATS.find((format) => getExtension(format) === extension);
}

const ROLE_LABELS: Record<StoredRole, string> = {
    user: 'You',
    assistant: 'Assistant',
    system: 'System',
};

export function conversationToMarkdown(exported: ConversationExport): string {
    const lines = [
        `# ${exported.conversation.title}`,
        '',
        `Created: ${exported.conversation.createdAt.toISOString()}  `,
        `Exported: ${exported.exportedAt.toISOString()}`,
        '',
    ];

    for (const message of exported.messages) {
        lines.push(`## ${ROLE_LABELS[message.role]} (${message.timestamp.toISOString()})`, '', message.content, '');
    }

    return lines.join('\n').trimEnd() + '\n';
}

export function conversationDocument(exported: ConversationExport): ExportDocument {
    return {
        title: exported.conversation.title,
        markdown: conversationToMarkdown(exported),
        data: exported,
    };
}

export function answerDocument(query: string, answer: string, model: string, createdAt: Date = new Date()): ExportDocument {
    return {
        title: query,
        markdown: `# ${query}\n\n${answer.trim()}\n\n---\n\nModel: ${model}  \nDate: ${createdAt.toISOString()}\n`,
        data: { query, answer, model, createdAt },
    };
}

/**
 * Write a document in the requested format
 */
export async function writeExport(document: ExportDocument, options: ExportOptions): Promise<void> {
    const { format, outputPath } = options;

    switch (format) {
        case 'json':
            await writeFile(outputPath, JSON.stringify(document.data, null, 2) + '\n', 'utf-8');
            break;
        case 'markdown':
            await writeFile(outputPath, document.markdown, 'utf-8');
            break;
        case 'html':
            await writeFile(outputPath, await renderHtml(document.markdown, document.title), 'utf-8');
            break;
        case 'txt':
            await writeFile(outputPath, stripMarkdown(document.markdown) + '\n', 'utf-8');
            break;
        case 'docx':
            await exportDocx(document.markdown, outputPath, document.title);
            break;
    }
}

function escapeHtml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

export async function renderHtml(markdown: string, title: string): Promise<string> {
    const htmlContent = await marked.parse(markdown);
    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(title)}</title>
    <style>
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, sans-serif;
            max-width: 800px;
            margin: 0 auto;
            padding: 2rem;
            line-height: 1.6;
            color: #333;
        }
        h1 { border-bottom: 2px solid #0e7490; padding-bottom: 0.5rem; }
        h2 { color: #0e7490; font-size: 1.1rem; margin-top: 2rem; }
        code { background: #f1f5f9; padding: 0.2rem 0.4rem; border-radius: 4px; }
        pre { background: #f1f5f9; padding: 1rem; border-radius: 8px; overflow-x: auto; }
        a { color: #0e7490; }
    </style>
</head>
<body>
${htmlContent}
</body>
</html>
`;
}

/**
 * Plain text rendering of Markdown
 */
export function stripMarkdown(content: string): string {
    return content
        .replace(/```[^\n]*\n([\s\S]*?)```/g, '$1')
        .replace(/^#{1,6}\s+/gm, '')
        .replace(/!\[([^\]]*)\]\([^)]+\)/g, '$1')
        .replace(/\[([^\]]+)\]\(([^)]+)\)/g, '$1 ($2)')
        .replace(/\*\*(.+?)\*\*/g, '$1')
        .replace(/\*(.+?)\*/g, '$1')
        .replace(/__(.+?)__/g, '$1')
        .replace(/`([^`]+)`/g, '$1')
        .replace(/^>\s+/gm, '')
        .replace(/^---+$/gm, '')
        .replace(/ {2}$/gm, '')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

/**
 * Export as Word document (DOCX)
 */
async function exportDocx(markdown: string, outputPath: string, title: string): Promise<void> {
    const { Document, Paragraph, TextRun, HeadingLevel, Packer } = await import('docx');

    // Bold and italic spans become separate runs
    const parseTextRuns = (text: string): InstanceType<typeof TextRun>[] => {
        const runs: InstanceType<typeof TextRun>[] = [];
        const pattern = /(\*\*(.+?)\*\*|\*(.+?)\*|[^*]+)/g;
        let match: RegExpExecArray | null;

        while ((match = pattern.exec(text)) !== null) {
            if (match[2] !== undefined) {
                runs.push(new TextRun({ text: match[2], bold: true }));
            } else if (match[3] !== undefined) {
                runs.push(new TextRun({ text: match[3], italics: true }));
            } else {
                runs.push(new TextRun({ text: match[0] }));
            }
        }

        return runs.length > 0 ? runs : [new TextRun({ text })];
    };

    const children: InstanceType<typeof Paragraph>[] = [];

    for (const line of markdown.split('\n')) {
        const trimmed = line.trim();

        if (trimmed.startsWith('# ')) {
            children.push(new Paragraph({ text: trimmed.slice(2), heading: HeadingLevel.TITLE, spacing: { after: 300 } }));
        } else if (trimmed.startsWith('## ')) {
            children.push(new Paragraph({ text: trimmed.slice(3), heading: HeadingLevel.HEADING_2, spacing: { before: 300, after: 120 } }));
        } else if (trimmed.startsWith('### ')) {
            children.push(new Paragraph({ text: trimmed.slice(4), heading: HeadingLevel.HEADING_3, spacing: { before: 200, after: 100 } }));
        } else if (trimmed.startsWith('- ') || trimmed.startsWith('* ')) {
            children.push(new Paragraph({ children: parseTextRuns(trimmed.slice(2)), bullet: { level: 0 } }));
        } else if (trimmed === '---') {
            children.push(new Paragraph({ text: '' }));
        } else {
            children.push(new Paragraph({ children: parseTextRuns(trimmed) }));
        }
    }

    const doc = new Document({
        title,
        sections: [{ properties: {}, children }],
    });

    await writeFile(outputPath, await Packer.toBuffer(doc));
}
