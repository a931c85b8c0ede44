import type { Workflow } from '@flowgraph/shared';

/**
 * Persistence boundary for workflow definitions: one document per workflow id.
 */
export interface WorkflowStore {
  save(workflow: Workflow): Promise<void>;
  load(workflowId: string): Promise<Workflow | undefined>;
  delete(workflowId: string): Promise<boolean>;
  list(): Promise<Workflow[]>;
}
