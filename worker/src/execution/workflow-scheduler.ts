import {
  toComponentErrorPayload,
  type ComponentInputs,
  type ComponentOutcome,
  type Logger,
} from '@flowgraph/component-sdk';
import type { Component, UnreachedReason, Workflow } from '@flowgraph/shared';

import { collectUpstream, resolveDependencies } from './dependency-resolver';
import type { ExecutionRecorder } from './execution-record';

export const DEFAULT_MAX_CONCURRENCY = 4;

export interface WorkflowSchedulerOptions {
  recorder: ExecutionRecorder;
  /** Caller-supplied workflow inputs, seeded as the result of every input component. */
  inputs: ComponentInputs;
  run: (component: Component, inputs: ComponentInputs) => Promise<ComponentOutcome>;
  maxConcurrency?: number;
  /** Once aborted, no further component is dispatched; in-flight ones finish. */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface WorkflowSchedulerSummary {
  completed: string[];
  failed: string[];
  unreached: Record<string, UnreachedReason>;
  cancelled: boolean;
}

/**
 * Drive a workflow to completion.
 *
 * Ready components are taken from a FIFO queue and dispatched with up to
 * `maxConcurrency` in flight. A component becomes ready when every one of its
 * dependencies has completed; a failed dependency never releases its
 * dependents, which end up in `unreached` instead.
 */
export async function runWorkflowWithScheduler(
  workflow: Workflow,
  options: WorkflowSchedulerOptions,
): Promise<WorkflowSchedulerSummary> {
  const { recorder, inputs, run, signal, logger } = options;
  const limit = Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
  const graph = resolveDependencies(workflow);
  const componentsById = new Map(workflow.components.map((component) => [component.id, component]));

  for (const connection of graph.danglingConnections) {
    logger?.warn(
      `Ignoring connection ${connection.id}: ${connection.source_id} -> ${connection.target_id} references a missing component`,
    );
  }

  const completed = new Set<string>();
  const failed = new Set<string>();
  const scheduled = new Set<string>();
  const readyQueue: string[] = [];
  const inFlight = new Map<string, Promise<void>>();

  const enqueue = (componentId: string) => {
    if (scheduled.has(componentId) || completed.has(componentId) || failed.has(componentId)) {
      return;
    }
    scheduled.add(componentId);
    readyQueue.push(componentId);
  };

  const dependenciesSatisfied = (componentId: string) =>
    [...(graph.dependencies.get(componentId) ?? [])].every((dependency) => completed.has(dependency));

  const releaseDependents = (componentId: string) => {
    for (const dependent of graph.dependents.get(componentId) ?? []) {
      if (dependenciesSatisfied(dependent)) {
        enqueue(dependent);
      }
    }
  };

  const gatherInputs = (componentId: string): ComponentInputs => {
    const merged: ComponentInputs = {};
    for (const dependency of graph.dependencies.get(componentId) ?? []) {
      const result = recorder.getResult(dependency);
      if (result) {
        Object.assign(merged, result);
      }
    }
    return merged;
  };

  const dispatch = async (component: Component) => {
    let outcome: ComponentOutcome;
    try {
      outcome = await run(component, gatherInputs(component.id));
    } catch (error) {
      outcome = { status: 'failed', error: toComponentErrorPayload(error) };
    }

    if (outcome.status === 'completed') {
      recorder.recordSuccess(component.id, outcome.output);
      completed.add(component.id);
      releaseDependents(component.id);
    } else {
      recorder.recordFailure(component.id, outcome.error);
      failed.add(component.id);
    }
  };

  const inputComponents = workflow.components.filter((component) => component.type === 'input');
  for (const component of inputComponents) {
    recorder.recordSuccess(component.id, { ...inputs });
    completed.add(component.id);
  }
  for (const componentId of graph.initiallyReady) {
    enqueue(componentId);
  }
  for (const component of inputComponents) {
    releaseDependents(component.id);
  }

  while (readyQueue.length > 0 || inFlight.size > 0) {
    while (!signal?.aborted && inFlight.size < limit && readyQueue.length > 0) {
      const componentId = readyQueue.shift();
      if (componentId === undefined) break;
      if (completed.has(componentId) || failed.has(componentId)) continue;
      const component = componentsById.get(componentId);
      if (!component) continue;

      const task = (async () => {
        try {
          await dispatch(component);
        } finally {
          inFlight.delete(componentId);
        }
      })();
      inFlight.set(componentId, task);
    }

    if (inFlight.size === 0) {
      break;
    }
    await Promise.race(inFlight.values());
  }

  const cancelled = Boolean(signal?.aborted);
  const unreached: Record<string, UnreachedReason> = {};
  for (const component of workflow.components) {
    if (completed.has(component.id) || failed.has(component.id)) continue;
    const upstream = collectUpstream(graph, component.id);
    const reason: UnreachedReason = [...upstream].some((id) => failed.has(id))
      ? 'upstream_failed'
      : cancelled
        ? 'cancelled'
        : 'blocked';
    unreached[component.id] = reason;
    recorder.markUnreached(component.id, reason);
  }

  if (Object.keys(unreached).length > 0) {
    logger?.info(`${Object.keys(unreached).length} component(s) were not reached`, unreached);
  }

  return {
    completed: [...completed],
    failed: [...failed],
    unreached,
    cancelled: cancelled && Object.values(unreached).includes('cancelled'),
  };
}
