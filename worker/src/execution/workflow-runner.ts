import {
  EXECUTOR_FAULT,
  createExecutionContext,
  runComponent,
  type ComponentInputs,
  type ComponentOutcome,
  type ComponentRegistry,
  type HttpClient,
  type ITraceService,
  type Logger,
} from '@flowgraph/component-sdk';
import type { Component, Workflow, WorkflowExecution } from '@flowgraph/shared';

import { ExecutionRecorder } from './execution-record';
import { runWorkflowWithScheduler } from './workflow-scheduler';

export interface ExecuteWorkflowOptions {
  registry: ComponentRegistry;
  runId?: string;
  http?: HttpClient;
  trace?: ITraceService;
  logger?: Logger;
  maxConcurrency?: number;
  signal?: AbortSignal;
  /** Supply a recorder to observe the execution while it is running. */
  recorder?: ExecutionRecorder;
}

function summarize(output: Record<string, unknown>): Record<string, unknown> {
  return { keys: Object.keys(output) };
}

/**
 * Execute a workflow against the component registry.
 *
 * `inputs` become the result of every input component; `context` is exposed
 * read-only to every executor as `context.values`. Component failures are
 * recorded, never thrown.
 */
export async function executeWorkflow(
  workflow: Workflow,
  inputs: ComponentInputs = {},
  context: Record<string, unknown> = {},
  options: ExecuteWorkflowOptions,
): Promise<WorkflowExecution> {
  const recorder = options.recorder ?? new ExecutionRecorder(workflow.id, { id: options.runId });
  const runId = recorder.id;
  const { registry, trace, logger } = options;

  const run = async (component: Component, componentInputs: ComponentInputs): Promise<ComponentOutcome> => {
    trace?.record({
      type: 'NODE_STARTED',
      runId,
      nodeRef: component.id,
      timestamp: new Date().toISOString(),
      level: 'info',
    });

    const executor = registry.get(component.type);
    const outcome: ComponentOutcome = executor
      ? await runComponent(
          executor,
          component,
          componentInputs,
          createExecutionContext({
            runId,
            workflowId: workflow.id,
            componentId: component.id,
            values: context,
            logger,
            http: options.http,
            trace,
          }),
        )
      : {
          status: 'failed',
          error: {
            type: EXECUTOR_FAULT,
            message: `No executor registered for component type ${component.type}`,
          },
        };

    if (outcome.status === 'completed') {
      trace?.record({
        type: 'NODE_COMPLETED',
        runId,
        nodeRef: component.id,
        timestamp: new Date().toISOString(),
        level: 'info',
        outputSummary: summarize(outcome.output),
      });
    } else {
      trace?.record({
        type: 'NODE_FAILED',
        runId,
        nodeRef: component.id,
        timestamp: new Date().toISOString(),
        level: 'error',
        error: outcome.error,
      });
    }
    return outcome;
  };

  trace?.setRunMetadata?.(runId, { workflowId: workflow.id });
  recorder.start();
  logger?.info(`Starting execution ${runId} of workflow ${workflow.id}`);

  const summary = await runWorkflowWithScheduler(workflow, {
    recorder,
    inputs,
    run,
    maxConcurrency: options.maxConcurrency,
    signal: options.signal,
    logger,
  });

  const execution = recorder.finish({ cancelled: summary.cancelled });
  logger?.info(`Execution ${runId} finished with status ${execution.status}`);
  return execution;
}
