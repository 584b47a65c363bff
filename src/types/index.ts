export * from './config';
export * from './connection';
export * from './errors';
export * from './secret';
