export { MemoryWorkflowStore } from './memory-workflow.store';
export { FileWorkflowStore } from './file-workflow.store';
export { DrizzleWorkflowStore } from './drizzle-workflow.store';
export { TraceAdapter, toTraceRow, type NewWorkflowTraceRow } from './trace.adapter';
export type { WorkflowStore } from './workflow-store';
