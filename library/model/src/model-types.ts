export type TeardownTarget = {
    environmentName: string;
    region: string;
    appStackId: string;
    infraStackId: string;
};

export enum StackLayer {
    APPLICATION = 'application',
    INFRASTRUCTURE = 'infrastructure',
}

export type DeleteRequestResult = 'Ok' | 'Failed';

export type WaitResult = 'Completed' | 'Failed' | 'Skipped';

export interface StackDeletionOutcome {
    stackId: string;
    layer: StackLayer;
    deleteRequestResult: DeleteRequestResult;
    waitResult: WaitResult;
    error?: string;
}

export interface TeardownStep {
    layer: StackLayer;
    stackId: string;
}

export type ConfigurationSource = { [key: string]: string | undefined; };
