/**
 * Interactive chat - the terminal side of a ChatSession
 */

import inquirer from 'inquirer';
import { formatFromPath } from '../../export/formats.js';
import { colors, icons } from '../../ui/theme.js';
import {
    createSpinner,
    showAnswer,
    showChatHelp,
    showError,
    showHeader,
    showInfo,
    showSuccess,
    showTranscript,
    showWarning,
    streamOutput,
} from '../../ui/components.js';
import type { SearchAgentCallbacks } from '../search-agent.js';
import { parseChatInput } from './commands.js';
import type { ChatSession } from './session.js';

export { ChatSession } from './session.js';

export interface ChatLoopOptions {
    stream: boolean;
    markdown: boolean;
}

export class InteractiveChat {
    private session: ChatSession;
    private options: ChatLoopOptions;

    constructor(session: ChatSession, options: ChatLoopOptions) {
        this.session = session;
        this.options = options;
    }

    /**
     * Read and answer messages until the user leaves
     */
    async start(): Promise<void> {
        this.showWelcome();

        while (true) {
            const { input } = await inquirer.prompt<{ input: string }>([
                {
                    type: 'input',
                    name: 'input',
                    message: colors.primary('You >'),
                },
            ]);

            const command = parseChatInput(input);

            try {
                switch (command.kind) {
                    case 'empty':
                        break;
                    case 'exit':
                        console.log(colors.muted('Goodbye!'));
                        return;
                    case 'history':
                        showTranscript(this.session.transcript(), { markdown: this.options.markdown });
                        break;
                    case 'help':
                        showChatHelp();
                        break;
                    case 'title':
                        this.rename(command.title);
                        break;
                    case 'export':
                        await this.export(command.outputPath);
                        break;
                    case 'clear':
                        if (await this.clear()) return;
                        break;
                    case 'unknown':
                        showWarning(`Unknown command: ${command.command}`);
                        break;
                    case 'message':
                        await this.respond(command.text);
                        break;
                }
            } catch (error) {
                showError(error instanceof Error ? error.message : String(error));
            }
        }
    }

    private showWelcome(): void {
        const { conversation } = this.session;
        showHeader({
            title: conversation.title,
            model: this.session.model,
            subtitle: `Conversation ${conversation.id.slice(0, 8)}`,
        });
        if (!this.session.searchEnabled) {
            showWarning('Internet search is off. Set SERPAPI_KEY to enable it.');
        }
        console.log(colors.muted("Type a message to chat, 'history' to review, /help for commands, or 'exit' to leave."));
        console.log();
    }

    private async respond(text: string): Promise<void> {
        console.log();
        console.log(colors.primary(`${icons.assistant} Assistant`));

        const spinner = createSpinner('Thinking...');
        spinner.start();

        const callbacks: SearchAgentCallbacks = {
            onStatus: (status) => {
                spinner.text = colors.muted(status);
            },
        };

        try {
            if (this.options.stream) {
                await streamOutput(this.session.replyStream(text, callbacks), {
                    onFirstChunk: () => spinner.stop(),
                });
            } else {
                const reply = await this.session.reply(text, callbacks);
                spinner.stop();
                showAnswer(reply, { markdown: this.options.markdown });
            }
        } finally {
            spinner.stop();
        }
        console.log();
    }

    private rename(title: string): void {
        if (!title.trim()) {
            showInfo('Usage: /title <new title>');
            return;
        }
        if (this.session.rename(title)) {
            showSuccess(`Renamed to "${this.session.conversation.title}"`);
        }
    }

    private async export(outputPath?: string): Promise<void> {
        const format = outputPath ? formatFromPath(outputPath) ?? 'json' : 'json';
        const target = await this.session.export(outputPath, format);
        showSuccess(`Exported to ${target}`);
    }

    /**
     * Delete the conversation after confirmation. True when it was deleted.
     */
    private async clear(): Promise<boolean> {
        const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
            {
                type: 'confirm',
                name: 'confirm',
                message: `Delete "${this.session.conversation.title}" and all of its messages?`,
                default: false,
            },
        ]);
        if (!confirm) return false;

        this.session.delete();
        showSuccess('Conversation deleted.');
        return true;
    }
}
