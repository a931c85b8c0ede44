import type { ComponentErrorPayload, TraceEventLevel, TraceEventType } from '@flowgraph/shared';

interface TraceEventBase {
  type: TraceEventType;
  runId: string;
  nodeRef: string;
  timestamp: string;
  level: TraceEventLevel;
}

export interface NodeStartedTraceEvent extends TraceEventBase {
  type: 'NODE_STARTED';
}

export interface NodeProgressTraceEvent extends TraceEventBase {
  type: 'NODE_PROGRESS';
  message: string;
}

export interface NodeCompletedTraceEvent extends TraceEventBase {
  type: 'NODE_COMPLETED';
  outputSummary?: Record<string, unknown>;
}

export interface NodeFailedTraceEvent extends TraceEventBase {
  type: 'NODE_FAILED';
  error: ComponentErrorPayload;
}

export type TraceEvent =
  | NodeStartedTraceEvent
  | NodeProgressTraceEvent
  | NodeCompletedTraceEvent
  | NodeFailedTraceEvent;

/**
 * Observer of per-component lifecycle events. Implemented by adapters in the
 * worker; components only ever see this interface.
 */
export interface ITraceService {
  record(event: TraceEvent): void;
  /** Called before the first event of a run. */
  setRunMetadata?(runId: string, metadata: { workflowId?: string }): void;
  /** The run's events will not be read again; drop any in-memory copy. */
  finalizeRun?(runId: string): void;
}
