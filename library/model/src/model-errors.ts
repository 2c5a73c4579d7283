export class ConfigurationError extends Error {
    public readonly variableName: string;

    constructor(variableName: string, message?: string) {
        super(message ?? `Missing environment variable ${variableName}`);
        this.name = 'ConfigurationError';
        this.variableName = variableName;
    }
}

/**
 * Base class for failures reported by the cloud provider while tearing down a stack.
 * These are recorded on the outcome of a step, never thrown past the runner.
 */
export abstract class StackOperationError extends Error {
    public readonly stackId: string;
    public readonly providerError: unknown;

    protected constructor(stackId: string, message: string, providerError: unknown) {
        super(message);
        this.stackId = stackId;
        this.providerError = providerError;
    }
}

export class DeleteRequestError extends StackOperationError {
    constructor(stackId: string, cause: unknown) {
        super(stackId, `Failed to delete stack ${stackId}: ${describeError(cause)}`, cause);
        this.name = 'DeleteRequestError';
    }
}

export class WaitError extends StackOperationError {
    constructor(stackId: string, cause: unknown) {
        super(stackId, `Failed waiting for stack ${stackId} deletion: ${describeError(cause)}`, cause);
        this.name = 'WaitError';
    }
}

export const describeError = (error: unknown): string => {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
};
