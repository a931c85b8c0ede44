import type { ComponentInputs, ComponentRegistry, HttpClient, ITraceService, Logger } from '@flowgraph/component-sdk';
import { isTerminalStatus, type Workflow, type WorkflowExecution } from '@flowgraph/shared';

import { ExecutionStateError } from '../errors';
import { ExecutionRecorder } from './execution-record';
import { executeWorkflow } from './workflow-runner';

export interface WorkflowExecutionManagerOptions {
  registry: ComponentRegistry;
  http?: HttpClient;
  trace?: ITraceService;
  logger?: Logger;
  maxConcurrency?: number;
  /** Finished executions kept in memory; the oldest are evicted first. Unbounded when unset. */
  maxHistory?: number;
}

export interface ExecuteRequest {
  inputs?: ComponentInputs;
  context?: Record<string, unknown>;
  runId?: string;
  signal?: AbortSignal;
}

/**
 * Runs workflows and keeps their execution records, readable by id while they
 * are still running. A run's trace events are released when its record is
 * evicted.
 */
export class WorkflowExecutionManager {
  private readonly recorders = new Map<string, ExecutionRecorder>();

  constructor(private readonly options: WorkflowExecutionManagerOptions) {}

  async execute(workflow: Workflow, request: ExecuteRequest = {}): Promise<WorkflowExecution> {
    if (request.runId !== undefined && this.recorders.has(request.runId)) {
      throw new ExecutionStateError(`Execution ${request.runId} already exists`);
    }
    const recorder = new ExecutionRecorder(workflow.id, { id: request.runId });
    this.recorders.set(recorder.id, recorder);

    try {
      return await executeWorkflow(workflow, request.inputs ?? {}, request.context ?? {}, {
        registry: this.options.registry,
        http: this.options.http,
        trace: this.options.trace,
        logger: this.options.logger,
        maxConcurrency: this.options.maxConcurrency,
        signal: request.signal,
        recorder,
      });
    } finally {
      if (!recorder.isFinished) {
        this.release(recorder.id);
      }
      this.evict();
    }
  }

  get(executionId: string): WorkflowExecution | undefined {
    return this.recorders.get(executionId)?.snapshot();
  }

  /** Executions in start order, optionally filtered by workflow. */
  list(workflowId?: string): WorkflowExecution[] {
    const executions: WorkflowExecution[] = [];
    for (const recorder of this.recorders.values()) {
      if (workflowId === undefined || recorder.workflowId === workflowId) {
        executions.push(recorder.snapshot());
      }
    }
    return executions;
  }

  private evict(): void {
    const { maxHistory } = this.options;
    if (maxHistory === undefined) return;

    const finished = [...this.recorders.values()].filter((recorder) => isTerminalStatus(recorder.status));
    let excess = finished.length - maxHistory;
    for (const recorder of finished) {
      if (excess <= 0) break;
      this.release(recorder.id);
      excess -= 1;
    }
  }

  private release(executionId: string): void {
    this.recorders.delete(executionId);
    this.options.trace?.finalizeRun?.(executionId);
  }
}
