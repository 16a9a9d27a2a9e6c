/**
 * Custom error types for AskWeb
 * Separates failures that abort a request from those fed back to the model as context
 */

/**
 * Base error class for AskWeb errors
 */
export class AskWebError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AskWebError';
        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * Error thrown when an API key is missing or invalid
 */
export class ApiKeyError extends AskWebError {
    public readonly keyName: string;
    public readonly helpUrl?: string;

    constructor(keyName: string, message?: string, helpUrl?: string) {
        const defaultMessage = `${keyName} is required.\n` +
            (helpUrl ? `Get your API key at: ${helpUrl}\n` : '') +
            'Then run: askweb init';
        super(message || defaultMessage);
        this.name = 'ApiKeyError';
        this.keyName = keyName;
        this.helpUrl = helpUrl;
    }
}

/**
 * Error thrown when configuration is invalid or incomplete
 */
export class ConfigError extends AskWebError {
    public readonly configKey?: string;

    constructor(message: string, configKey?: string) {
        super(message);
        this.name = 'ConfigError';
        this.configKey = configKey;
    }
}

/**
 * Reasoning service transport or API failure. Never retried, always propagated.
 */
export class ServiceError extends AskWebError {
    public readonly status?: number;

    constructor(message: string, options: { cause?: unknown; status?: number } = {}) {
        super(message, { cause: options.cause });
        this.name = 'ServiceError';
        this.status = options.status;
    }

    static from(error: unknown): ServiceError {
        if (error instanceof ServiceError) return error;
        const message = error instanceof Error ? error.message : String(error);
        return new ServiceError(`Reasoning service request failed: ${message}`, { cause: error });
    }
}

/**
 * Error thrown by the search provider client
 */
export class ProviderError extends AskWebError {
    public readonly query: string;
    public readonly mode: string;

    constructor(message: string, query: string, mode: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ProviderError';
        this.query = query;
        this.mode = mode;
    }
}

/**
 * Base for capability dispatch failures. These are recovered by the registry
 * and turned into the content of a tool turn.
 */
export abstract class CapabilityError extends AskWebError {
    abstract toPayload(): string;
}

export class UnknownCapabilityError extends CapabilityError {
    public readonly capabilityName: string;
    public readonly knownNames: string[];

    constructor(capabilityName: string, knownNames: string[]) {
        super(`Unknown tool: ${capabilityName}`);
        this.name = 'UnknownCapabilityError';
        this.capabilityName = capabilityName;
        this.knownNames = knownNames;
    }

    toPayload(): string {
        return JSON.stringify({
            error: this.message,
            available_tools: this.knownNames,
        });
    }
}

export class ArgumentDecodeError extends CapabilityError {
    public readonly rawArguments: string;

    constructor(message: string, rawArguments: string) {
        super(message);
        this.name = 'ArgumentDecodeError';
        this.rawArguments = rawArguments;
    }

    toPayload(): string {
        return JSON.stringify({
            error: this.message,
            arguments: this.rawArguments,
        });
    }
}

export class CapabilityExecutionError extends CapabilityError {
    public readonly capabilityName: string;

    constructor(capabilityName: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Tool execution failed: ${detail}`, { cause });
        this.name = 'CapabilityExecutionError';
        this.capabilityName = capabilityName;
    }

    toPayload(): string {
        return JSON.stringify({
            error: this.message,
            function: this.capabilityName,
        });
    }
}
