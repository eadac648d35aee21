export * from './graph';
export * from './run';
export * from './events';
