// Capability Registry - holds the capabilities offered to the model and
// dispatches its invocations. Dispatch failures never throw: they come back
// as JSON payloads so the model can read them on its next turn.

import {
    ArgumentDecodeError,
    CapabilityError,
    CapabilityExecutionError,
    UnknownCapabilityError,
} from '../errors.js';
import { logger } from '../utils/logger.js';
import type { Capability, CapabilityDefinition, CapabilityInvocation } from './types.js';

type Validation =
    | { success: true; run: () => Promise<string> }
    | { success: false; issues: string };

interface RegisteredCapability {
    definition: CapabilityDefinition;
    validate(decoded: unknown): Validation;
}

function decodeArguments(raw: string): unknown {
    // Some models send an empty string for "no arguments"
    if (raw.trim() === '') return {};
    return JSON.parse(raw);
}

export class CapabilityRegistry {
    private capabilities: Map<string, RegisteredCapability> = new Map();

    register<TArgs>(capability: Capability<TArgs>): void {
        const { name } = capability.definition;
        if (this.capabilities.has(name)) {
            logger.warn(`[Capabilities] "${name}" already registered, overwriting`);
        }

        this.capabilities.set(name, {
            definition: capability.definition,
            validate: (decoded) => {
                const parsed = capability.argumentsSchema.safeParse(decoded);
                if (!parsed.success) {
                    const issues = parsed.error.issues
                        .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
                        .join('; ');
                    return { success: false, issues };
                }
                return { success: true, run: () => capability.execute(parsed.data) };
            },
        });
    }

    has(name: string): boolean {
        return this.capabilities.has(name);
    }

    names(): string[] {
        return Array.from(this.capabilities.keys());
    }

    get size(): number {
        return this.capabilities.size;
    }

    listDefinitions(): CapabilityDefinition[] {
        return Array.from(this.capabilities.values(), (capability) => capability.definition);
    }

    /**
     * Run one invocation. Always resolves; failures become an error payload.
     */
    async execute(invocation: CapabilityInvocation): Promise<string> {
        try {
            return await this.dispatch(invocation);
        } catch (error) {
            const failure = error instanceof CapabilityError
                ? error
                : new CapabilityExecutionError(invocation.name, error);
            logger.warn(`[Capabilities] ${invocation.name} (${invocation.id}): ${failure.message}`);
            return failure.toPayload();
        }
    }

    /**
     * Run invocations concurrently. The result has exactly one entry per invocation id.
     */
    async executeAll(invocations: readonly CapabilityInvocation[]): Promise<Map<string, string>> {
        const results = new Map<string, string>();

        const outputs = await Promise.all(invocations.map(async (invocation) => ({
            id: invocation.id,
            output: await this.execute(invocation),
        })));

        for (const { id, output } of outputs) {
            results.set(id, output);
        }

        return results;
    }

    private async dispatch(invocation: CapabilityInvocation): Promise<string> {
        const capability = this.capabilities.get(invocation.name);
        if (!capability) {
            throw new UnknownCapabilityError(invocation.name, this.names());
        }

        let decoded: unknown;
        try {
            decoded = decodeArguments(invocation.arguments);
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            throw new ArgumentDecodeError(`Invalid arguments JSON: ${detail}`, invocation.arguments);
        }

        const validation = capability.validate(decoded);
        if (!validation.success) {
            throw new ArgumentDecodeError(`Invalid arguments: ${validation.issues}`, invocation.arguments);
        }

        logger.debug(`[Capabilities] Running ${invocation.name} (${invocation.id})`);
        try {
            return await validation.run();
        } catch (error) {
            throw new CapabilityExecutionError(invocation.name, error);
        }
    }
}
