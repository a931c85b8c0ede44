export * from './adapters';
export * from './components';
export * from './config';
export * from './errors';
export { createWorkflowEngineFromConfig, type BootstrapOptions, type WorkflowRuntime } from './bootstrap';
export { resolveDependencies, collectUpstream, type DependencyGraph } from './execution/dependency-resolver';
export { ExecutionRecorder } from './execution/execution-record';
export { runWorkflowWithScheduler, DEFAULT_MAX_CONCURRENCY } from './execution/workflow-scheduler';
export { executeWorkflow, type ExecuteWorkflowOptions } from './execution/workflow-runner';
export {
  WorkflowExecutionManager,
  type ExecuteRequest,
  type WorkflowExecutionManagerOptions,
} from './execution/execution-manager';
export { WorkflowEngine, type CreateWorkflowInput, type WorkflowPatch, type ComponentPatch } from './workflows/workflow-engine';
export { validateWorkflowGraph, wouldCreateCycle, findDanglingConnections } from './workflows/graph-validation';
export { WorkerLogger, createLogger, consoleSink, type LogEntry, type LogLevel, type LogSink } from './utils/logger';
