import { describe, it, expect } from 'vitest';
import { filterModels, formatModelLine } from './models.js';
import { parseUiMode } from './shared.js';
import type { Model } from '../clients/openrouter.js';

const MODELS: Model[] = [
    {
        id: 'openai/gpt-4.1',
        name: 'GPT-4.1',
        contextLength: 128000,
        pricing: { prompt: 0.0000025, completion: 0.00001 },
    },
    {
        id: 'acme/small',
        name: 'Acme Small',
        description: 'Fast model with tool calling',
        contextLength: 32000,
        pricing: { prompt: 0, completion: 0 },
    },
];

describe('filterModels', () => {
    it('should match id, name or description case-insensitively', () => {
        expect(filterModels(MODELS, 'GPT').map((m) => m.id)).toEqual(['openai/gpt-4.1']);
        expect(filterModels(MODELS, 'tool calling').map((m) => m.id)).toEqual(['acme/small']);
    });

    it('should return everything without a filter', () => {
        expect(filterModels(MODELS)).toHaveLength(2);
        expect(filterModels(MODELS, '  ')).toHaveLength(2);
    });
});

describe('formatModelLine', () => {
    it('should show context size and price per million tokens', () => {
        expect(formatModelLine(MODELS[0])).toBe('Context: 128k | Price: $2.50/$10.00 per 1M tokens');
        expect(formatModelLine(MODELS[1])).toBe('Context: 32k | Price: $0.00/$0.00 per 1M tokens');
    });
});

describe('parseUiMode', () => {
    it('should accept known modes in any case', () => {
        expect(parseUiMode(' Fancy ')).toBe('fancy');
        expect(parseUiMode('plain')).toBe('plain');
    });

    it('should reject unknown modes', () => {
        expect(() => parseUiMode('loud')).toThrow('Unknown UI mode "loud". Use one of: minimal, fancy, plain');
    });
});
