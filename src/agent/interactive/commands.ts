/**
 * Input parsing for the interactive chat loop
 */

export type ChatInput =
    | { kind: 'empty' }
    | { kind: 'exit' }
    | { kind: 'history' }
    | { kind: 'help' }
    | { kind: 'title'; title: string }
    | { kind: 'export'; outputPath?: string }
    | { kind: 'clear' }
    | { kind: 'unknown'; command: string }
    | { kind: 'message'; text: string };

const EXIT_WORDS = new Set(['exit', 'quit', 'bye']);

export function parseChatInput(line: string): ChatInput {
    const trimmed = line.trim();
    if (!trimmed) return { kind: 'empty' };

    const lowered = trimmed.toLowerCase();
    if (EXIT_WORDS.has(lowered) || lowered === '/exit' || lowered === '/quit') return { kind: 'exit' };
    if (lowered === 'history' || lowered === '/history') return { kind: 'history' };

    if (!trimmed.startsWith('/')) return { kind: 'message', text: trimmed };

    const [command, ...rest] = trimmed.split(/\s+/);
    const argument = rest.join(' ');

    switch (command.toLowerCase()) {
        case '/help':
            return { kind: 'help' };
        case '/title':
            return { kind: 'title', title: argument };
        case '/export':
            return argument ? { kind: 'export', outputPath: argument } : { kind: 'export' };
        case '/clear':
            return { kind: 'clear' };
        default:
            return { kind: 'unknown', command };
    }
}
