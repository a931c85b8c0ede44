export * from './workflows.schema';
export * from './traces.schema';
