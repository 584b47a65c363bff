export * from './logger';
export * from './pathUtils';
export * from './localFs';
