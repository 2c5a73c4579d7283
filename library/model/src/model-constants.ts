export const PRODUCT_NAMESPACE = 'serverless';

export const APP_STACK_PREFIX = `${PRODUCT_NAMESPACE}-app`;
export const INFRA_STACK_PREFIX = `${PRODUCT_NAMESPACE}-platform`;

// same polling profile as `aws cloudformation wait stack-delete-complete`
export const STACK_DELETE_WAIT_DELAY_SECONDS = 30;
export const STACK_DELETE_WAIT_MAX_DELAY_SECONDS = 120;
export const STACK_DELETE_WAIT_MAX_SECONDS = 3600;

export const TEARDOWN_COMPLETE_MESSAGE = 'Teardown complete.';

export enum ConfigurationVariables {
    ENVIRONMENT_NAME = 'ENV',
    REGION = 'REGION',
    APP_STACK = 'APP_STACK',
    INFRA_STACK = 'INFRA_STACK',
}
