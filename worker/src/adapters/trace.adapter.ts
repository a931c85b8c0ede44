import type { ITraceService, Logger, TraceEvent } from '@flowgraph/component-sdk';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';

import { workflowTraces } from './schema';
import type * as schema from './schema';

export type NewWorkflowTraceRow = typeof workflowTraces.$inferInsert;

export interface TraceAdapterOptions {
  logger?: Pick<Logger, 'debug' | 'error'>;
}

interface RunTrace {
  workflowId?: string;
  events: TraceEvent[];
  sequence: number;
}

/** Row for one event; `sequence` is 1-based per run. */
export function toTraceRow(event: TraceEvent, sequence: number, workflowId?: string): NewWorkflowTraceRow {
  return {
    runId: event.runId,
    workflowId: workflowId ?? null,
    type: event.type,
    nodeRef: event.nodeRef,
    level: event.level,
    timestamp: new Date(event.timestamp),
    message: event.type === 'NODE_PROGRESS' ? event.message : null,
    error: event.type === 'NODE_FAILED' ? event.error : null,
    outputSummary: event.type === 'NODE_COMPLETED' ? (event.outputSummary ?? null) : null,
    sequence,
  };
}

/**
 * Keeps each run's events in memory until the run is finalized, and writes
 * them to `workflow_traces` when a database is given. Writes are not awaited;
 * a failed write is logged and the in-memory view is kept.
 */
export class TraceAdapter implements ITraceService {
  private readonly runs = new Map<string, RunTrace>();
  private readonly logger?: Pick<Logger, 'debug' | 'error'>;

  constructor(
    private readonly db?: NodePgDatabase<typeof schema>,
    options: TraceAdapterOptions = {},
  ) {
    this.logger = options.logger;
  }

  record(event: TraceEvent): void {
    const run = this.runFor(event.runId);
    run.events.push(event);
    run.sequence += 1;

    this.logger?.debug(`[TRACE] ${event.type} - ${event.nodeRef}`, 'message' in event ? event.message : '');

    if (this.db) {
      this.persist(this.db, toTraceRow(event, run.sequence, run.workflowId));
    }
  }

  getEvents(runId: string): TraceEvent[] {
    return [...(this.runs.get(runId)?.events ?? [])];
  }

  setRunMetadata(runId: string, metadata: { workflowId?: string }): void {
    this.runFor(runId).workflowId = metadata.workflowId;
  }

  finalizeRun(runId: string): void {
    this.runs.delete(runId);
  }

  clear(): void {
    this.runs.clear();
  }

  private runFor(runId: string): RunTrace {
    let run = this.runs.get(runId);
    if (!run) {
      run = { events: [], sequence: 0 };
      this.runs.set(runId, run);
    }
    return run;
  }

  private persist(db: NodePgDatabase<typeof schema>, row: NewWorkflowTraceRow): void {
    void db
      .insert(workflowTraces)
      .values(row)
      .catch((error: unknown) => {
        this.logger?.error('[TRACE] Failed to persist trace event', error);
      });
  }
}
