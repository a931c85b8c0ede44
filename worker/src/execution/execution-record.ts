import { randomUUID } from 'node:crypto';
import {
  isTerminalStatus,
  type ComponentErrorPayload,
  type ComponentResult,
  type ExecutionStatus,
  type UnreachedReason,
  type WorkflowExecution,
} from '@flowgraph/shared';

import { ExecutionStateError } from '../errors';

export interface ExecutionRecorderOptions {
  id?: string;
  now?: () => Date;
}

/**
 * Owns the `WorkflowExecution` of a single run.
 *
 * pending → running → completed | failed | cancelled. Once a component has an
 * outcome it is never rewritten, and nothing changes after `finish()`.
 */
export class ExecutionRecorder {
  private readonly execution: WorkflowExecution;
  private readonly now: () => Date;

  constructor(workflowId: string, options: ExecutionRecorderOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.execution = {
      id: options.id ?? randomUUID(),
      workflow_id: workflowId,
      status: 'pending',
      results: {},
      errors: {},
      logs: [],
      unreached: {},
    };
  }

  get id(): string {
    return this.execution.id;
  }

  get workflowId(): string {
    return this.execution.workflow_id;
  }

  get status(): ExecutionStatus {
    return this.execution.status;
  }

  get isFinished(): boolean {
    return isTerminalStatus(this.execution.status);
  }

  start(): void {
    if (this.execution.status !== 'pending') {
      throw new ExecutionStateError(`Execution ${this.id} cannot start from status ${this.execution.status}`);
    }
    this.execution.status = 'running';
    this.execution.start_time = this.timestamp();
  }

  /** Stores copies of `result`; the caller keeps no handle on the recorded outcome. */
  recordSuccess(componentId: string, result: ComponentResult): void {
    this.assertOpenSlot(componentId);
    this.execution.results[componentId] = structuredClone(result);
    this.execution.logs.push({
      component_id: componentId,
      timestamp: this.timestamp(),
      status: 'completed',
      result: structuredClone(result),
    });
  }

  recordFailure(componentId: string, error: ComponentErrorPayload): void {
    this.assertOpenSlot(componentId);
    this.execution.errors[componentId] = error;
    this.execution.logs.push({
      component_id: componentId,
      timestamp: this.timestamp(),
      status: 'failed',
      error,
    });
  }

  markUnreached(componentId: string, reason: UnreachedReason): void {
    this.assertOpenSlot(componentId);
    this.execution.unreached[componentId] = reason;
  }

  getResult(componentId: string): ComponentResult | undefined {
    const result = this.execution.results[componentId];
    return result === undefined ? undefined : structuredClone(result);
  }

  hasErrors(): boolean {
    return Object.keys(this.execution.errors).length > 0;
  }

  finish(options: { cancelled?: boolean } = {}): WorkflowExecution {
    this.assertRunning();
    this.execution.end_time = this.timestamp();
    if (options.cancelled) {
      this.execution.status = 'cancelled';
    } else {
      this.execution.status = this.hasErrors() ? 'failed' : 'completed';
    }
    return this.snapshot();
  }

  /** Deep copy of the record; safe to hand to readers while the run continues. */
  snapshot(): WorkflowExecution {
    return structuredClone(this.execution);
  }

  private assertRunning(): void {
    if (this.execution.status !== 'running') {
      throw new ExecutionStateError(`Execution ${this.id} is ${this.execution.status}, not running`);
    }
  }

  private assertOpenSlot(componentId: string): void {
    this.assertRunning();
    if (
      componentId in this.execution.results ||
      componentId in this.execution.errors ||
      componentId in this.execution.unreached
    ) {
      throw new ExecutionStateError(`Component ${componentId} already has an outcome in execution ${this.id}`);
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
