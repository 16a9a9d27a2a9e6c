/**
 * Configuration management for AskWeb
 */

import { readFile, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigError } from './errors.js';
import { envBool, envNonNegativeNumber, envOptionalInt, envPositiveInt } from './utils/env.js';

export type UiMode = 'minimal' | 'fancy' | 'plain';

/**
 * Centralized default values for the CLI configuration.
 * Use these instead of hardcoding defaults throughout the codebase.
 */
export const DEFAULTS = {
    model: 'openai/gpt-4.1',
    baseUrl: 'https://openrouter.ai/api/v1',
    temperature: 0,
    historyTurnLimit: 10,
    uiMode: 'minimal',
    renderMarkdown: true,
    streamOutput: true,
} as const;

export interface Config {
    openrouterApiKey: string;
    openrouterBaseUrl: string;
    serpapiKey: string;
    defaultModel: string;
    modelTemperature: number;
    modelMaxTokens?: number;
    historyTurnLimit: number;
    uiMode: UiMode;
    renderMarkdown: boolean;
    streamOutput: boolean;
    databasePath: string;
}

export interface RequiredKeys {
    openrouter?: boolean;
    serpapi?: boolean;
}

function envUiMode(value: string | undefined): UiMode {
    const normalized = value?.trim().toLowerCase();
    if (normalized === 'fancy') return 'fancy';
    if (normalized === 'plain') return 'plain';
    if (normalized === 'minimal') return 'minimal';
    return DEFAULTS.uiMode;
}

function expandHome(value: string): string {
    if (value === '~') return os.homedir();
    if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));
    return value;
}

export function getDefaultDatabasePath(): string {
    return path.join(os.homedir(), '.askweb', 'conversations.db');
}

export function loadConfig(): Config {
    const rawDbPath = process.env.ASKWEB_DB_PATH?.trim();

    return {
        openrouterApiKey: process.env.OPENROUTER_API_KEY?.trim() || '',
        openrouterBaseUrl: process.env.OPENROUTER_BASE_URL?.trim() || DEFAULTS.baseUrl,
        serpapiKey: process.env.SERPAPI_KEY?.trim() || '',
        defaultModel: process.env.DEFAULT_MODEL?.trim() || DEFAULTS.model,
        modelTemperature: envNonNegativeNumber(process.env.MODEL_TEMPERATURE, DEFAULTS.temperature),
        modelMaxTokens: envOptionalInt(process.env.MODEL_MAX_TOKENS),
        historyTurnLimit: envPositiveInt(process.env.HISTORY_TURN_LIMIT, DEFAULTS.historyTurnLimit),
        uiMode: envUiMode(process.env.UI_MODE),
        renderMarkdown: envBool(process.env.RENDER_MARKDOWN, DEFAULTS.renderMarkdown),
        streamOutput: envBool(process.env.STREAM_OUTPUT, DEFAULTS.streamOutput),
        databasePath: rawDbPath ? expandHome(rawDbPath) : getDefaultDatabasePath(),
    };
}

export function validateConfig(
    config: Config,
    required: RequiredKeys = { openrouter: true, serpapi: false }
): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (required.openrouter !== false && !config.openrouterApiKey) {
        errors.push('OPENROUTER_API_KEY is not set');
    }

    if (required.serpapi === true && !config.serpapiKey) {
        errors.push('SERPAPI_KEY is not set');
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}

function escapeEnvValue(value: string): string {
    const trimmed = value.trim();
    if (trimmed === '') return '""';
    const needsQuotes = /[\s#"'\\]/.test(trimmed);
    if (!needsQuotes) return trimmed;
    const escaped = trimmed
        .replace(/\\/g, '\\\\')
        .replace(/\n/g, '\\n')
        .replace(/"/g, '\\"');
    return `"${escaped}"`;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Rewrite the given keys in an env file, keeping comments and unrelated lines.
 */
export function mergeEnvContents(existing: string, updates: Record<string, string>): string {
    const lines = existing === '' ? [] : existing.split(/\r?\n/);
    const touched = new Set<string>();

    const nextLines = lines.map((line) => {
        if (line.trim().startsWith('#')) return line;
        const match = line.match(/^\s*([A-Z0-9_]+)\s*=\s*(.*)\s*$/);
        if (!match) return line;

        const key = match[1];
        if (!(key in updates)) return line;

        touched.add(key);
        return `${key}=${escapeEnvValue(updates[key])}`;
    });

    if (nextLines.length > 0 && nextLines[nextLines.length - 1].trim() !== '') {
        nextLines.push('');
    }

    for (const [key, value] of Object.entries(updates)) {
        if (touched.has(key)) continue;
        nextLines.push(`${key}=${escapeEnvValue(value)}`);
    }

    return nextLines.join('\n').replace(/\n+$/g, '\n');
}

async function updateEnvFile(envPath: string, updates: Record<string, string>): Promise<void> {
    let existing = '';
    try {
        existing = await readFile(envPath, 'utf8');
    } catch (error) {
        if (!isMissingFile(error)) throw error;
    }

    const finalContents = mergeEnvContents(existing, updates);
    const isNewFile = existing === '';
    const writeOptions: { encoding: BufferEncoding; mode?: number } = { encoding: 'utf8' };
    if (isNewFile) writeOptions.mode = 0o600;
    await writeFile(envPath, finalContents, writeOptions);
}

export function getDefaultEnvPath(): string {
    const explicit = process.env.ASKWEB_ENV_PATH?.trim();
    if (explicit) return path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit);
    return path.join(process.cwd(), '.env');
}

export async function writeEnvVars(
    updates: Record<string, string>,
    options: { envPath?: string } = {}
): Promise<void> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    await updateEnvFile(envPath, updates);
    for (const [key, value] of Object.entries(updates)) {
        process.env[key] = value;
    }
}

/**
 * Load configuration, prompting for anything required that is missing.
 * Without a TTY a missing required key is a ConfigError.
 */
export async function ensureConfig(
    required: RequiredKeys = { openrouter: true, serpapi: false },
    options: { envPath?: string; promptPreferences?: boolean; force?: boolean } = {}
): Promise<Config> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    const current = loadConfig();
    const validation = validateConfig(current, required);

    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    const missingRequired = validation.errors.length > 0;

    const shouldPrompt = Boolean(options.force || missingRequired || options.promptPreferences);
    if (!shouldPrompt) return current;

    if (!canPrompt) {
        if (!missingRequired) return current;
        throw new ConfigError(`Missing configuration:\n${validation.errors.map(e => `  • ${e}`).join('\n')}`);
    }

    const inquirer = (await import('inquirer')).default;
    const updates: Record<string, string> = {};
    let next: Config = { ...current };

    if (options.force || !current.openrouterApiKey) {
        const { openrouterApiKey } = await inquirer.prompt<{ openrouterApiKey: string }>([
            {
                type: 'password',
                name: 'openrouterApiKey',
                message: 'Paste your OpenRouter API key',
                mask: '*',
                validate: (input: string) => input.trim().length > 0 || 'OpenRouter API key is required',
            },
        ]);
        next = { ...next, openrouterApiKey: openrouterApiKey.trim() };
        updates.OPENROUTER_API_KEY = next.openrouterApiKey;
    }

    if (options.force || !current.serpapiKey) {
        const { serpapiKey } = await inquirer.prompt<{ serpapiKey: string }>([
            {
                type: 'password',
                name: 'serpapiKey',
                message: 'Paste your SerpAPI key (leave blank to chat without web search)',
                mask: '*',
                validate: (input: string) =>
                    required.serpapi !== true || input.trim().length > 0 || 'SerpAPI key is required',
            },
        ]);
        if (serpapiKey.trim()) {
            next = { ...next, serpapiKey: serpapiKey.trim() };
            updates.SERPAPI_KEY = next.serpapiKey;
        }
    }

    if (options.force || options.promptPreferences) {
        const preferences = await inquirer.prompt<{ defaultModel: string; uiMode: UiMode; streamOutput: boolean }>([
            {
                type: 'input',
                name: 'defaultModel',
                message: 'Default model id',
                default: current.defaultModel,
                validate: (input: string) => input.trim().length > 0 || 'Model id is required',
            },
            {
                type: 'list',
                name: 'uiMode',
                message: 'UI style',
                default: current.uiMode,
                choices: [
                    { name: 'Minimal (clean)', value: 'minimal' },
                    { name: 'Fancy (boxed)', value: 'fancy' },
                    { name: 'Plain (no color)', value: 'plain' },
                ],
            },
            {
                type: 'confirm',
                name: 'streamOutput',
                message: 'Stream answers as they are generated?',
                default: current.streamOutput,
            },
        ]);

        next = {
            ...next,
            defaultModel: preferences.defaultModel.trim(),
            uiMode: envUiMode(preferences.uiMode),
            streamOutput: preferences.streamOutput,
        };
        updates.DEFAULT_MODEL = next.defaultModel;
        updates.UI_MODE = next.uiMode;
        updates.STREAM_OUTPUT = next.streamOutput ? '1' : '0';
    }

    if (Object.keys(updates).length > 0) {
        await writeEnvVars(updates, { envPath });
    }

    return next;
}
