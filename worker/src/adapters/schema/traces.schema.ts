import { bigserial, integer, jsonb, pgTable, text, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';
import type { ComponentErrorPayload } from '@flowgraph/shared';

export const workflowTraces = pgTable(
  'workflow_traces',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    runId: text('run_id').notNull(),
    workflowId: text('workflow_id'),
    type: text('type').notNull(),
    nodeRef: text('node_ref').notNull(),
    level: text('level').notNull(),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
    message: text('message'),
    error: jsonb('error').$type<ComponentErrorPayload | null>(),
    outputSummary: jsonb('output_summary').$type<Record<string, unknown> | null>(),
    sequence: integer('sequence').notNull(),
  },
  (table) => ({
    runSequenceIdx: uniqueIndex('workflow_traces_run_sequence_idx').on(table.runId, table.sequence),
  }),
);

export type WorkflowTraceRow = typeof workflowTraces.$inferSelect;
