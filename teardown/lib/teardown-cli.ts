import { ConfigurationError, ConfigurationSource, resolveTeardownTarget, TeardownTarget } from '@serverless-teardown/model';
import { CloudFormationStackProvider, StackProvider } from './cloudformation/utils';
import { TeardownRunner } from './teardown-runner';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Resolves the target from the given environment and runs the teardown.
 * Resolves to the process exit code; only configuration problems yield a failure.
 */
export const runTeardown = async (
    source: ConfigurationSource,
    createProvider: () => StackProvider = () => new CloudFormationStackProvider(),
): Promise<number> => {
    let target: TeardownTarget;
    try {
        target = resolveTeardownTarget(source);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error(`${error.message} (e.g., ENV=dev REGION=us-east-1)`);
            return EXIT_FAILURE;
        }
        throw error;
    }

    await new TeardownRunner(createProvider()).run(target);
    return EXIT_SUCCESS;
};
