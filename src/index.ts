#!/usr/bin/env node
/**
 * AskWeb CLI - Main Entry Point
 * Search-backed answers and saved conversations from the terminal
 */

import 'dotenv/config';
import { checkNodeVersion } from './utils/node-version.js';

// Check Node.js version before anything else
checkNodeVersion();

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { ensureConfig, loadConfig } from './config.js';
import { askCommand } from './commands/ask.js';
import { chatCommand } from './commands/chat.js';
import { modelsCommand } from './commands/models.js';
import { errorMessage } from './commands/shared.js';
import { showError } from './ui/components.js';
import { colors } from './ui/theme.js';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
    const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf-8');
    return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

// Graceful shutdown handling
process.on('SIGINT', () => {
    console.log('\n' + colors.muted('Interrupted. Goodbye!'));
    process.exit(0);
});

process.on('SIGTERM', () => {
    console.log('\n' + colors.muted('Terminated. Goodbye!'));
    process.exit(0);
});

const program = new Command();

program
    .name('askweb')
    .description('Ask questions and get answers backed by live internet search')
    .version(readVersion());

program
    .command('init')
    .description('Set up API keys and defaults')
    .option('-f, --force', 'Re-enter API keys even if set')
    .action(async (options: { force?: boolean }) => {
        try {
            process.env.UI_MODE = loadConfig().uiMode;

            console.log();
            console.log(colors.primary('Setup'));
            console.log(colors.muted('This will save your settings to .env in this folder.'));
            console.log();

            await ensureConfig(
                { openrouter: true, serpapi: false },
                { force: Boolean(options.force), promptPreferences: true }
            );
            console.log(colors.success('Saved configuration to .env'));
        } catch (error) {
            showError(errorMessage(error));
            process.exitCode = 1;
        }
    });

program.addCommand(askCommand);
program.addCommand(chatCommand);
program.addCommand(modelsCommand);

await program.parseAsync();
