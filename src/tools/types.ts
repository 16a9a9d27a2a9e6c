// Capability system types
// A capability is a named function the model may ask us to run on its behalf

import type { z } from 'zod';
import type { CapabilityDefinition } from '../agent/types.js';

export type { CapabilityDefinition, CapabilityInvocation, JsonSchemaProperty } from '../agent/types.js';

export interface Capability<TArgs> {
    readonly definition: CapabilityDefinition;
    // Validates the decoded JSON arguments before execute sees them
    readonly argumentsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
    execute(args: TArgs): Promise<string>;
}
