/**
 * Unit tests for configuration management
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import os from 'os';
import path from 'path';

// Mock the environment before importing config
const originalEnv = process.env;

describe('Config utilities', () => {
    beforeEach(() => {
        vi.resetModules();
        process.env = { ...originalEnv };
        delete process.env.OPENROUTER_API_KEY;
        delete process.env.OPENROUTER_BASE_URL;
        delete process.env.SERPAPI_KEY;
        delete process.env.DEFAULT_MODEL;
        delete process.env.MODEL_TEMPERATURE;
        delete process.env.MODEL_MAX_TOKENS;
        delete process.env.HISTORY_TURN_LIMIT;
        delete process.env.UI_MODE;
        delete process.env.STREAM_OUTPUT;
        delete process.env.RENDER_MARKDOWN;
        delete process.env.ASKWEB_DB_PATH;
    });

    afterEach(() => {
        process.env = originalEnv;
    });

    describe('loadConfig', () => {
        it('should load default values when env vars are not set', async () => {
            const { loadConfig } = await import('./config.js');
            const config = loadConfig();

            expect(config.openrouterApiKey).toBe('');
            expect(config.serpapiKey).toBe('');
            expect(config.openrouterBaseUrl).toBe('https://openrouter.ai/api/v1');
            expect(config.defaultModel).toBe('openai/gpt-4.1');
            expect(config.modelTemperature).toBe(0);
            expect(config.modelMaxTokens).toBeUndefined();
            expect(config.historyTurnLimit).toBe(10);
            expect(config.uiMode).toBe('minimal');
            expect(config.streamOutput).toBe(true);
            expect(config.databasePath).toBe(path.join(os.homedir(), '.askweb', 'conversations.db'));
        });

        it('should load values from environment variables', async () => {
            process.env.OPENROUTER_API_KEY = ' test-openrouter-key ';
            process.env.SERPAPI_KEY = 'test-serpapi-key';
            process.env.DEFAULT_MODEL = 'openai/gpt-4o-mini';
            process.env.UI_MODE = 'fancy';
            process.env.ASKWEB_DB_PATH = '~/chats/test.db';

            const { loadConfig } = await import('./config.js');
            const config = loadConfig();

            expect(config.openrouterApiKey).toBe('test-openrouter-key');
            expect(config.serpapiKey).toBe('test-serpapi-key');
            expect(config.defaultModel).toBe('openai/gpt-4o-mini');
            expect(config.uiMode).toBe('fancy');
            expect(config.databasePath).toBe(path.join(os.homedir(), 'chats', 'test.db'));
        });

        it('should parse boolean env vars correctly', async () => {
            process.env.STREAM_OUTPUT = '0';
            process.env.RENDER_MARKDOWN = 'yes';

            const { loadConfig } = await import('./config.js');
            const config = loadConfig();

            expect(config.streamOutput).toBe(false);
            expect(config.renderMarkdown).toBe(true);
        });

        it('should parse numeric values and fall back on invalid ones', async () => {
            process.env.MODEL_MAX_TOKENS = '4096';
            process.env.MODEL_TEMPERATURE = '0.7';
            process.env.HISTORY_TURN_LIMIT = '-3';

            const { loadConfig } = await import('./config.js');
            const config = loadConfig();

            expect(config.modelMaxTokens).toBe(4096);
            expect(config.modelTemperature).toBe(0.7);
            expect(config.historyTurnLimit).toBe(10);
        });
    });

    describe('validateConfig', () => {
        it('should only require the reasoning key by default', async () => {
            process.env.OPENROUTER_API_KEY = 'test-key';

            const { loadConfig, validateConfig } = await import('./config.js');
            const result = validateConfig(loadConfig());

            expect(result.valid).toBe(true);
            expect(result.errors).toHaveLength(0);
        });

        it('should return errors when OPENROUTER_API_KEY is missing', async () => {
            const { loadConfig, validateConfig } = await import('./config.js');
            const result = validateConfig(loadConfig());

            expect(result.valid).toBe(false);
            expect(result.errors).toEqual(['OPENROUTER_API_KEY is not set']);
        });

        it('should report SERPAPI_KEY when search is required', async () => {
            process.env.OPENROUTER_API_KEY = 'test-key';

            const { loadConfig, validateConfig } = await import('./config.js');
            const result = validateConfig(loadConfig(), { openrouter: true, serpapi: true });

            expect(result.valid).toBe(false);
            expect(result.errors).toEqual(['SERPAPI_KEY is not set']);
        });
    });

    describe('mergeEnvContents', () => {
        it('should replace existing keys and append new ones', async () => {
            const { mergeEnvContents } = await import('./config.js');
            const existing = '# keys\nOPENROUTER_API_KEY=old\nOTHER=1\n';

            const merged = mergeEnvContents(existing, { OPENROUTER_API_KEY: 'new', UI_MODE: 'plain' });

            expect(merged).toBe('# keys\nOPENROUTER_API_KEY=new\nOTHER=1\n\nUI_MODE=plain');
        });

        it('should quote values containing spaces', async () => {
            const { mergeEnvContents } = await import('./config.js');

            expect(mergeEnvContents('', { DEFAULT_MODEL: 'a b' })).toBe('DEFAULT_MODEL="a b"');
        });
    });
});
