import {
    CloudFormationClient,
    DeleteStackCommand,
    DescribeStacksCommand,
    StackStatus,
} from '@aws-sdk/client-cloudformation';
import { createWaiter, WaiterResult, WaiterState } from '@smithy/util-waiter';
import {
    STACK_DELETE_WAIT_DELAY_SECONDS,
    STACK_DELETE_WAIT_MAX_DELAY_SECONDS,
    STACK_DELETE_WAIT_MAX_SECONDS,
} from '@serverless-teardown/model';
import { withThrottlingRetry } from '../concurrency/utils';

/**
 * The two provider operations a teardown needs. Both reject with the provider's
 * own error; callers decide whether that is fatal.
 */
export interface StackProvider {
    deleteStack(stackId: string, region: string): Promise<void>;
    waitForStackDeleteComplete(stackId: string, region: string): Promise<void>;
}

export interface WaiterSettings {
    minDelay: number;
    maxWaitTime: number;
}

const DEFAULT_WAITER_SETTINGS: WaiterSettings = {
    minDelay: STACK_DELETE_WAIT_DELAY_SECONDS,
    maxWaitTime: STACK_DELETE_WAIT_MAX_SECONDS,
};

// statuses from which a stack will not reach DELETE_COMPLETE on its own
const DELETE_FAILURE_STATUSES: string[] = [
    StackStatus.DELETE_FAILED,
    StackStatus.CREATE_FAILED,
    StackStatus.ROLLBACK_FAILED,
    StackStatus.UPDATE_ROLLBACK_IN_PROGRESS,
    StackStatus.UPDATE_ROLLBACK_FAILED,
    StackStatus.UPDATE_ROLLBACK_COMPLETE,
    StackStatus.UPDATE_COMPLETE,
];

/**
 * One poll of the stack deletion. A missing stack counts as deleted; any other
 * DescribeStacks error ends the wait at once instead of being polled until timeout.
 */
export const checkStackDeleteState = async (client: CloudFormationClient, stackName: string): Promise<WaiterResult> => {
    try {
        const response = await client.send(new DescribeStacksCommand({ StackName: stackName }));
        const statuses = (response.Stacks ?? []).map(stack => stack.StackStatus);

        if (statuses.length > 0 && statuses.every(status => status === StackStatus.DELETE_COMPLETE)) {
            return { state: WaiterState.SUCCESS };
        }
        const failedStatus = statuses.find(status => status !== undefined && DELETE_FAILURE_STATUSES.indexOf(status) >= 0);
        if (failedStatus !== undefined) {
            return { state: WaiterState.FAILURE, reason: `Stack ${stackName} is in status ${failedStatus}` };
        }
        return { state: WaiterState.RETRY };
    } catch (error) {
        if (error instanceof Error && error.name === 'ValidationError') {
            return { state: WaiterState.SUCCESS };
        }
        return { state: WaiterState.FAILURE, reason: error };
    }
};

export class CloudFormationStackProvider implements StackProvider {
    private readonly clients = new Map<string, CloudFormationClient>();

    constructor(private readonly waiterSettings: WaiterSettings = DEFAULT_WAITER_SETTINGS) {}

    async deleteStack(stackId: string, region: string): Promise<void> {
        const client = this.getClient(region);
        const command = new DeleteStackCommand({ StackName: stackId });
        await withThrottlingRetry(() => client.send(command));
    }

    async waitForStackDeleteComplete(stackId: string, region: string): Promise<void> {
        const result = await createWaiter(
            {
                client: this.getClient(region),
                minDelay: this.waiterSettings.minDelay,
                maxDelay: Math.max(this.waiterSettings.minDelay, STACK_DELETE_WAIT_MAX_DELAY_SECONDS),
                maxWaitTime: this.waiterSettings.maxWaitTime,
            },
            stackId,
            checkStackDeleteState,
        );

        if (result.state === WaiterState.SUCCESS) {
            return;
        }
        if (result.reason instanceof Error) {
            throw result.reason;
        }
        throw new Error(result.reason === undefined
            ? `Waiting for stack ${stackId} deletion ended in state ${result.state}`
            : String(result.reason));
    }

    private getClient(region: string): CloudFormationClient {
        let client = this.clients.get(region);
        if (client === undefined) {
            client = new CloudFormationClient({ region });
            this.clients.set(region, client);
        }
        return client;
    }
}
