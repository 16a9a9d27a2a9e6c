import { describe, it, expect } from 'vitest';
import { parseChatInput } from './commands.js';

describe('parseChatInput', () => {
    it('should treat blank lines as empty', () => {
        expect(parseChatInput('   ')).toEqual({ kind: 'empty' });
    });

    it('should recognize exit words in any case', () => {
        for (const word of ['exit', 'QUIT', ' bye ', '/exit']) {
            expect(parseChatInput(word)).toEqual({ kind: 'exit' });
        }
    });

    it('should recognize history with or without a slash', () => {
        expect(parseChatInput('history')).toEqual({ kind: 'history' });
        expect(parseChatInput('/history')).toEqual({ kind: 'history' });
    });

    it('should parse slash commands with arguments', () => {
        expect(parseChatInput('/help')).toEqual({ kind: 'help' });
        expect(parseChatInput('/title  Harbor   plans')).toEqual({ kind: 'title', title: 'Harbor plans' });
        expect(parseChatInput('/title')).toEqual({ kind: 'title', title: '' });
        expect(parseChatInput('/export notes.md')).toEqual({ kind: 'export', outputPath: 'notes.md' });
        expect(parseChatInput('/export')).toEqual({ kind: 'export' });
        expect(parseChatInput('/clear')).toEqual({ kind: 'clear' });
    });

    it('should report unknown slash commands', () => {
        expect(parseChatInput('/weather today')).toEqual({ kind: 'unknown', command: '/weather' });
    });

    it('should pass everything else through as a trimmed message', () => {
        expect(parseChatInput('  What is the history of the harbor? ')).toEqual({
            kind: 'message',
            text: 'What is the history of the harbor?',
        });
    });
});
