import {
    DeleteRequestError,
    makeTeardownSteps,
    StackDeletionOutcome,
    StepDescriptions,
    TEARDOWN_COMPLETE_MESSAGE,
    TeardownStep,
    TeardownTarget,
    WaitError,
} from '@serverless-teardown/model';
import { StackProvider } from './cloudformation/utils';

/**
 * Deletes the application stack and then the infrastructure stack of a target,
 * waiting for each deletion to settle before moving on.
 *
 * Provider failures are recorded on the returned outcomes and never abort the run.
 * The infrastructure step runs even when the application stack could not be confirmed
 * deleted, so its own deletion may fail on a dependency that is still in place.
 */
export class TeardownRunner {

    constructor(private readonly provider: StackProvider) {}

    public async run(target: TeardownTarget): Promise<StackDeletionOutcome[]> {
        const steps = makeTeardownSteps(target);
        const outcomes: StackDeletionOutcome[] = [];

        for (const [index, step] of steps.entries()) {
            console.log(`[${index + 1}/${steps.length}] Deleting ${StepDescriptions[step.layer]}: ${step.stackId}`);
            outcomes.push(await this.teardownStack(step, target.region));
        }

        // stdout carries only the progress and completion lines; the rest goes to stderr
        for (const outcome of outcomes) {
            console.error(`${outcome.stackId}: delete=${outcome.deleteRequestResult} wait=${outcome.waitResult}`);
        }
        console.log(TEARDOWN_COMPLETE_MESSAGE);
        return outcomes;
    }

    private async teardownStack(step: TeardownStep, region: string): Promise<StackDeletionOutcome> {
        const outcome: StackDeletionOutcome = {
            stackId: step.stackId,
            layer: step.layer,
            deleteRequestResult: 'Ok',
            waitResult: 'Skipped',
        };

        try {
            await this.provider.deleteStack(step.stackId, region);
        } catch (error) {
            const failure = new DeleteRequestError(step.stackId, error);
            console.error(failure.message);
            outcome.deleteRequestResult = 'Failed';
            outcome.error = failure.message;
        }

        // still wait after a failed request: an absent stack settles immediately
        try {
            await this.provider.waitForStackDeleteComplete(step.stackId, region);
            outcome.waitResult = 'Completed';
            console.error(`Stack ${step.stackId} deleted.`);
        } catch (error) {
            const failure = new WaitError(step.stackId, error);
            console.error(failure.message);
            outcome.waitResult = 'Failed';
            outcome.error = outcome.error ?? failure.message;
        }

        return outcome;
    }
}
