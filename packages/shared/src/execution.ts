import { z } from 'zod';

export const EXECUTION_STATUS = [
  'pending',
  'running',
  'completed',
  'failed',
  'cancelled',
] as const;

export type ExecutionStatus = (typeof EXECUTION_STATUS)[number];

export const ExecutionStatusSchema = z.enum(EXECUTION_STATUS);

export const TERMINAL_EXECUTION_STATUSES: readonly ExecutionStatus[] = [
  'completed',
  'failed',
  'cancelled',
];

export function isTerminalStatus(status: ExecutionStatus): boolean {
  return TERMINAL_EXECUTION_STATUSES.includes(status);
}

export const ComponentErrorPayloadSchema = z.object({
  type: z.string(),
  message: z.string(),
  details: z.record(z.string(), z.unknown()).optional(),
});

export type ComponentErrorPayload = z.infer<typeof ComponentErrorPayloadSchema>;

export const ComponentResultSchema = z.record(z.string(), z.unknown());

export type ComponentResult = z.infer<typeof ComponentResultSchema>;

export const ExecutionLogEntrySchema = z.discriminatedUnion('status', [
  z.object({
    component_id: z.string(),
    timestamp: z.string().datetime({ offset: true }),
    status: z.literal('completed'),
    result: ComponentResultSchema,
  }),
  z.object({
    component_id: z.string(),
    timestamp: z.string().datetime({ offset: true }),
    status: z.literal('failed'),
    error: ComponentErrorPayloadSchema,
  }),
]);

export type ExecutionLogEntry = z.infer<typeof ExecutionLogEntrySchema>;

/**
 * Why a component finished the run without an outcome.
 * - `upstream_failed`: a transitive dependency failed.
 * - `blocked`: its dependencies never completed (a cycle).
 * - `cancelled`: the run was cancelled before it was dispatched.
 */
export const UNREACHED_REASONS = ['upstream_failed', 'blocked', 'cancelled'] as const;

export type UnreachedReason = (typeof UNREACHED_REASONS)[number];

export const UnreachedReasonSchema = z.enum(UNREACHED_REASONS);

export const WorkflowExecutionSchema = z.object({
  id: z.string(),
  workflow_id: z.string(),
  status: ExecutionStatusSchema,
  start_time: z.string().datetime({ offset: true }).optional(),
  end_time: z.string().datetime({ offset: true }).optional(),
  results: z.record(z.string(), ComponentResultSchema),
  errors: z.record(z.string(), ComponentErrorPayloadSchema),
  logs: z.array(ExecutionLogEntrySchema),
  unreached: z.record(z.string(), UnreachedReasonSchema),
});

export type WorkflowExecution = z.infer<typeof WorkflowExecutionSchema>;

export const TRACE_EVENT_TYPES = [
  'NODE_STARTED',
  'NODE_PROGRESS',
  'NODE_COMPLETED',
  'NODE_FAILED',
] as const;

export type TraceEventType = (typeof TRACE_EVENT_TYPES)[number];

export const TRACE_EVENT_LEVELS = ['info', 'warn', 'error', 'debug'] as const;

export type TraceEventLevel = (typeof TRACE_EVENT_LEVELS)[number];
