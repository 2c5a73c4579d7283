import { StackProvider } from '../lib/cloudformation/utils';

export type ProviderCall = { operation: 'delete' | 'wait'; stackId: string; region: string };

/**
 * In-memory provider that records every call in order. Like CloudFormation, deleting
 * a stack that does not exist succeeds; such requests are listed in `alreadyDeleted`.
 * Failures are injected per stack id.
 */
export class FakeStackProvider implements StackProvider {
    public readonly calls: ProviderCall[] = [];
    public readonly existing: Set<string>;
    public readonly alreadyDeleted: string[] = [];
    public readonly deleteFailures = new Map<string, Error>();
    public readonly waitFailures = new Map<string, Error>();

    constructor(existing: string[] = []) {
        this.existing = new Set(existing);
    }

    async deleteStack(stackId: string, region: string): Promise<void> {
        this.calls.push({ operation: 'delete', stackId, region });
        const failure = this.deleteFailures.get(stackId);
        if (failure !== undefined) {
            throw failure;
        }
        if (!this.existing.delete(stackId)) {
            this.alreadyDeleted.push(stackId);
        }
    }

    async waitForStackDeleteComplete(stackId: string, region: string): Promise<void> {
        this.calls.push({ operation: 'wait', stackId, region });
        const failure = this.waitFailures.get(stackId);
        if (failure !== undefined) {
            throw failure;
        }
    }
}
