/**
 * Setup steps shared by the commands
 */

import { ensureConfig, loadConfig, validateConfig, type Config, type RequiredKeys, type UiMode } from '../config.js';
import { ConfigError } from '../errors.js';
import { openDatabase } from '../storage/db.js';
import { ConversationStore } from '../storage/conversations.js';
import { colors } from '../ui/theme.js';

const UI_MODES: readonly UiMode[] = ['minimal', 'fancy', 'plain'];

export function parseUiMode(value: string): UiMode {
    const normalized = value.trim().toLowerCase();
    const mode = UI_MODES.find((candidate) => candidate === normalized);
    if (!mode) throw new ConfigError(`Unknown UI mode "${value}". Use one of: ${UI_MODES.join(', ')}`, 'UI_MODE');
    return mode;
}

function maybeShowSetupIntro(errors: string[]): void {
    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt || errors.length === 0) return;

    console.log();
    console.log(colors.primary('Quick setup'));
    console.log(colors.muted('Paste your API keys (they will be saved to .env).'));
    console.log(colors.muted(`Missing: ${errors.map(e => e.replace(' is not set', '')).join(', ')}`));
    console.log(colors.muted('Tip: run `askweb init` anytime to change defaults.'));
    console.log();
}

/**
 * Load configuration, prompting for missing keys, and apply the UI mode
 * before anything is drawn.
 */
export async function prepareConfig(required: RequiredKeys, uiOverride?: string): Promise<Config> {
    const preflight = loadConfig();
    const uiMode = uiOverride ? parseUiMode(uiOverride) : preflight.uiMode;
    process.env.UI_MODE = uiMode;

    const validation = validateConfig(preflight, required);
    if (!validation.valid) maybeShowSetupIntro(validation.errors);

    const config = await ensureConfig(required);
    process.env.UI_MODE = uiOverride ? uiMode : config.uiMode;
    return config;
}

export function openConversationStore(config: Pick<Config, 'databasePath'>): ConversationStore {
    return new ConversationStore(openDatabase(config.databasePath));
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
