import { Command, InvalidArgumentError } from 'commander';
import { OpenRouterClient, type Model } from '../clients/openrouter.js';
import { writeEnvVars } from '../config.js';
import { createSpinner, showError, showSuccess } from '../ui/components.js';
import { colors } from '../ui/theme.js';
import { errorMessage, prepareConfig } from './shared.js';

interface ModelsOptions {
    json?: boolean;
    filter?: string;
    limit: number;
    setDefault?: string;
}

function parseLimit(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) throw new InvalidArgumentError('Limit must be a positive integer.');
    return parsed;
}

export function filterModels(models: readonly Model[], filter?: string): Model[] {
    const needle = filter?.trim().toLowerCase();
    if (!needle) return [...models];
    return models.filter((m) =>
        m.id.toLowerCase().includes(needle) ||
        m.name.toLowerCase().includes(needle) ||
        (m.description?.toLowerCase().includes(needle) ?? false)
    );
}

export function formatModelLine(model: Model): string {
    const ctx = `${(model.contextLength / 1000).toFixed(0)}k`;
    const priceIn = (model.pricing.prompt * 1_000_000).toFixed(2);
    const priceOut = (model.pricing.completion * 1_000_000).toFixed(2);
    return `Context: ${ctx} | Price: $${priceIn}/$${priceOut} per 1M tokens`;
}

export const modelsCommand = new Command('models')
    .description('List available reasoning models')
    .option('--json', 'Output JSON')
    .option('--filter <query>', 'Filter models by id, name or description')
    .option('--limit <n>', 'Limit results', parseLimit, 20)
    .option('--set-default <model>', 'Save DEFAULT_MODEL to .env')
    .action(async (options: ModelsOptions) => {
        try {
            const config = await prepareConfig({ openrouter: true });

            if (options.setDefault) {
                await writeEnvVars({ DEFAULT_MODEL: options.setDefault.trim() });
                showSuccess(`Saved DEFAULT_MODEL=${options.setDefault.trim()}`);
                return;
            }

            const spinner = createSpinner('Fetching models...');
            spinner.start();

            const client = new OpenRouterClient(config.openrouterApiKey, { baseUrl: config.openrouterBaseUrl });
            let models: Model[];
            try {
                models = await client.listModels();
            } finally {
                spinner.stop();
            }

            const filtered = filterModels(models, options.filter);
            const visible = filtered.slice(0, options.limit);

            if (options.json) {
                console.log(JSON.stringify(visible, null, 2));
                return;
            }

            console.log(`\n${colors.primary('Available Models')} (${models.length} total)`);
            if (options.filter) console.log(colors.muted(`Filter: ${options.filter} (${filtered.length} matched)`));
            console.log();

            for (const model of visible) {
                const marker = model.id === config.defaultModel ? colors.success(' (default)') : '';
                console.log(`  ${colors.secondary(model.id)}${marker}`);
                console.log(colors.muted(`    ${formatModelLine(model)}`));
            }

            console.log();
        } catch (error) {
            showError(errorMessage(error));
            process.exitCode = 1;
        }
    });
