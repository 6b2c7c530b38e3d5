export * from './response-helpers';
export * from './controller-helpers';
