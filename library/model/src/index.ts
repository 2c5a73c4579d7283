export * from './model-constants';
export * from './model-types';
export * from './model-errors';
export * from './model-functions';
export * from './model-specific';
