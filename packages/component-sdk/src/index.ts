export * from './types';
export * from './interfaces';
export * from './errors';
export * from './context';
export * from './registry';
export * from './run-component';
export * from './http/client';
