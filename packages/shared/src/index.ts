export * from './logger';
export * from './errors';
export * from './types';
