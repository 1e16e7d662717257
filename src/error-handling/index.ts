export * from './error-types';
export * from './error-handler';
