import type { Component, ComponentOfType, ComponentType } from '@flowgraph/shared';

import type { HttpClient } from './http/client';
import type { ITraceService } from './interfaces';

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export type ComponentInputs = Record<string, unknown>;
export type ComponentOutputs = Record<string, unknown>;

/**
 * Execution context provided to components during execution.
 * Contains service interfaces (not concrete implementations).
 */
export interface ExecutionContext {
  runId: string;
  workflowId: string;
  componentId: string;
  logger: Logger;
  emitProgress: (message: string) => void;
  http: HttpClient;
  /** Caller-supplied run context, shared read-only by every component of the run. */
  values: Readonly<Record<string, unknown>>;
  trace?: ITraceService;
}

export interface ComponentExecutor<C extends Component = Component> {
  execute(component: C, inputs: ComponentInputs, context: ExecutionContext): Promise<ComponentOutputs>;
}

/**
 * One executor per component type. Building a registry from this map fails to
 * compile when a type is left without an executor.
 */
export type ComponentExecutorMap = {
  [K in ComponentType]: ComponentExecutor<ComponentOfType<K>>;
};

/** Named in-process handler behind a plugin or data-source component. */
export type ComponentHandler<C extends Component = Component> = (
  component: C,
  inputs: ComponentInputs,
  context: ExecutionContext,
) => Promise<ComponentOutputs>;
