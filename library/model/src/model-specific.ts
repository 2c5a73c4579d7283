import { StackLayer } from './model-types';

export const StepDescriptions: Record<StackLayer, string> = {
    [StackLayer.APPLICATION]: 'application stack',
    [StackLayer.INFRASTRUCTURE]: 'infrastructure stack',
};
