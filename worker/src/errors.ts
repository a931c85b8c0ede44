/**
 * Raised when a workflow definition or an edit to it breaks a graph invariant
 * (unknown endpoint, duplicate id, cycle, schema violation).
 */
export class DefinitionError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [message],
  ) {
    super(message);
    this.name = 'DefinitionError';
  }
}

export class WorkflowNotFoundError extends Error {
  constructor(readonly workflowId: string) {
    super(`Workflow ${workflowId} not found`);
    this.name = 'WorkflowNotFoundError';
  }
}

export class ComponentNotFoundError extends Error {
  constructor(
    readonly workflowId: string,
    readonly componentId: string,
  ) {
    super(`Component ${componentId} not found in workflow ${workflowId}`);
    this.name = 'ComponentNotFoundError';
  }
}

/** An execution record was asked to make a transition its state machine forbids. */
export class ExecutionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExecutionStateError';
  }
}
