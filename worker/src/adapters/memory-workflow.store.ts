import type { Workflow } from '@flowgraph/shared';

import type { WorkflowStore } from './workflow-store';

/** Keeps copies, so callers can never mutate stored documents in place. */
export class MemoryWorkflowStore implements WorkflowStore {
  private readonly workflows = new Map<string, Workflow>();

  async save(workflow: Workflow): Promise<void> {
    this.workflows.set(workflow.id, structuredClone(workflow));
  }

  async load(workflowId: string): Promise<Workflow | undefined> {
    const workflow = this.workflows.get(workflowId);
    return workflow ? structuredClone(workflow) : undefined;
  }

  async delete(workflowId: string): Promise<boolean> {
    return this.workflows.delete(workflowId);
  }

  async list(): Promise<Workflow[]> {
    return [...this.workflows.values()].map((workflow) => structuredClone(workflow));
  }
}
