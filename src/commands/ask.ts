import { Command } from 'commander';
import path from 'path';
import { createChatAgent } from '../agent/chat-agent.js';
import { InvocationTracker } from '../agent/search-agent.js';
import { answerDocument, formatFromPath, getFormatName, writeExport } from '../export/formats.js';
import {
    createSpinner,
    showAnswer,
    showComplete,
    showError,
    showHeader,
    showWarning,
    streamOutput,
} from '../ui/components.js';
import { colors, icons, truncate } from '../ui/theme.js';
import { errorMessage, prepareConfig } from './shared.js';

export interface AskOptions {
    model?: string;
    stream?: boolean;
    ui?: string;
    output?: string;
}

/**
 * Answer one query, print it and optionally save it
 */
export async function runAsk(query: string, options: AskOptions = {}): Promise<void> {
    const config = await prepareConfig({ openrouter: true }, options.ui);
    const agent = createChatAgent(config, { model: options.model });

    showHeader({ model: agent.model, subtitle: truncate(query, 70) });
    if (!agent.searchEnabled) {
        showWarning('SERPAPI_KEY is not set; internet search is unavailable.');
    }

    const spinner = createSpinner('Thinking...');
    spinner.start();

    const tracker = new InvocationTracker({
        onInvocations: (invocations) => {
            // Streaming may already have stopped the spinner for the indicator
            const wasSpinning = spinner.isSpinning;
            spinner.stop();
            for (const invocation of invocations) {
                console.error(colors.muted(`${icons.search} ${invocation.name} ${truncate(invocation.arguments, 120)}`));
            }
            if (wasSpinning) spinner.start();
        },
        onStatus: (status) => {
            spinner.text = colors.muted(status);
        },
    });
    const { callbacks } = tracker;

    const shouldStream = options.stream !== false && config.streamOutput;
    let answer: string;

    try {
        if (shouldStream) {
            answer = await streamOutput(agent.search(query, { stream: true, callbacks }), {
                onFirstChunk: () => spinner.stop(),
            });
        } else {
            answer = await agent.search(query, { callbacks });
            spinner.stop();
            showAnswer(answer, { markdown: config.renderMarkdown });
        }
    } finally {
        spinner.stop();
    }

    if (options.output) {
        const format = formatFromPath(options.output) ?? 'markdown';
        const outputPath = path.resolve(options.output);
        await writeExport(answerDocument(query, tracker.answerText(answer), agent.model), { format, outputPath });
        showComplete(`${outputPath} (${getFormatName(format)})`);
    } else {
        showComplete();
    }
}

export const askCommand = new Command('ask')
    .description('Answer a question using internet search')
    .argument('<query...>', 'Question to answer')
    .option('-m, --model <model>', 'OpenRouter model to use')
    .option('--no-stream', 'Print the answer once it is complete')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .option('-o, --output <file>', 'Save the answer to a file (.md, .json, .html, .txt, .docx)')
    .action(async (words: string[], options: AskOptions) => {
        try {
            await runAsk(words.join(' ').trim(), options);
        } catch (error) {
            showError(errorMessage(error));
            process.exitCode = 1;
        }
    });
