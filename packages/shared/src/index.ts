export * from './workflow';
export * from './execution';
