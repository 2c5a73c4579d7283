import * as types from './model-types';
import { APP_STACK_PREFIX, ConfigurationVariables, INFRA_STACK_PREFIX } from './model-constants';
import { ConfigurationError } from './model-errors';

const getOptionalValue = (source: types.ConfigurationSource, variableName: string): string | undefined => {
    const value = source[variableName]?.trim();
    return value ? value : undefined;
};

const getRequiredValue = (source: types.ConfigurationSource, variableName: string): string => {
    const result = getOptionalValue(source, variableName);
    if (result === undefined) {
        throw new ConfigurationError(variableName);
    }
    return result;
};

export const makeAppStackName = (environmentName: string) => {
    return `${APP_STACK_PREFIX}-${environmentName}`;
};

export const makeInfraStackName = (environmentName: string) => {
    return `${INFRA_STACK_PREFIX}-${environmentName}`;
};

export const resolveTeardownTarget = (source: types.ConfigurationSource): types.TeardownTarget => {
    const environmentName = getRequiredValue(source, ConfigurationVariables.ENVIRONMENT_NAME);
    const region = getRequiredValue(source, ConfigurationVariables.REGION);

    return {
        environmentName,
        region,
        appStackId: getOptionalValue(source, ConfigurationVariables.APP_STACK) ?? makeAppStackName(environmentName),
        infraStackId: getOptionalValue(source, ConfigurationVariables.INFRA_STACK) ?? makeInfraStackName(environmentName),
    };
};

// application first: it references resources owned by the infrastructure stack
export const makeTeardownSteps = (target: types.TeardownTarget): types.TeardownStep[] => [
    { layer: types.StackLayer.APPLICATION, stackId: target.appStackId },
    { layer: types.StackLayer.INFRASTRUCTURE, stackId: target.infraStackId },
];
