/**
 * Capability wiring. Search is only offered when a provider key is configured.
 */

import { SerpApiClient } from '../clients/serpapi.js';
import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { CapabilityRegistry } from './registry.js';
import { SearchCapability } from './search.js';

export { CapabilityRegistry } from './registry.js';
export { SearchCapability, SEARCH_CAPABILITY_NAME } from './search.js';
export type { Capability, CapabilityDefinition } from './types.js';

export function createCapabilityRegistry(config: Pick<Config, 'serpapiKey'>): CapabilityRegistry | null {
    if (!config.serpapiKey) {
        logger.info('[Capabilities] SERPAPI_KEY not set, search disabled');
        return null;
    }

    const registry = new CapabilityRegistry();
    registry.register(new SearchCapability(new SerpApiClient(config.serpapiKey)));
    return registry;
}
