import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export const COMPONENT_TYPES = ['agent', 'plugin', 'data_source', 'input', 'output'] as const;

export type ComponentType = (typeof COMPONENT_TYPES)[number];

export const ComponentTypeSchema = z.enum(COMPONENT_TYPES);

export const CONNECTION_TYPES = ['data', 'control', 'context'] as const;

export type ConnectionType = (typeof CONNECTION_TYPES)[number];

export const ConnectionTypeSchema = z.enum(CONNECTION_TYPES);

const ConfigSchema = z.record(z.string(), z.unknown());

const generatedId = () => randomUUID();

const componentBaseShape = {
  id: z.string().min(1).default(generatedId),
  name: z.string().min(1),
  description: z.string().optional(),
  config: ConfigSchema.default({}),
  position_x: z.number().default(0),
  position_y: z.number().default(0),
};

export const AgentComponentSchema = z.object({
  ...componentBaseShape,
  type: z.literal('agent'),
  agent_id: z.string().min(1).optional(),
  api_url: z.string().url().optional(),
  api_key: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  system_prompt: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
});

export const PluginComponentSchema = z.object({
  ...componentBaseShape,
  type: z.literal('plugin'),
  plugin_type: z.string().min(1),
});

export const DataSourceComponentSchema = z.object({
  ...componentBaseShape,
  type: z.literal('data_source'),
  source_type: z.string().min(1),
});

export const InputComponentSchema = z.object({
  ...componentBaseShape,
  type: z.literal('input'),
  input_type: z.string().default('text'),
});

export const OutputComponentSchema = z.object({
  ...componentBaseShape,
  type: z.literal('output'),
  output_type: z.string().default('text'),
});

/**
 * A typed node of a workflow graph. The union is closed: a document with any
 * other `type` fails to parse.
 */
export const ComponentSchema = z.discriminatedUnion('type', [
  AgentComponentSchema,
  PluginComponentSchema,
  DataSourceComponentSchema,
  InputComponentSchema,
  OutputComponentSchema,
]);

export type AgentComponent = z.infer<typeof AgentComponentSchema>;
export type PluginComponent = z.infer<typeof PluginComponentSchema>;
export type DataSourceComponent = z.infer<typeof DataSourceComponentSchema>;
export type InputComponent = z.infer<typeof InputComponentSchema>;
export type OutputComponent = z.infer<typeof OutputComponentSchema>;

export type Component = z.infer<typeof ComponentSchema>;
export type ComponentInput = z.input<typeof ComponentSchema>;

export type ComponentOfType<K extends ComponentType> = Extract<Component, { type: K }>;

export function isComponentOfType<K extends ComponentType>(
  component: Component,
  type: K,
): component is ComponentOfType<K> {
  return component.type === type;
}

export const ConnectionSchema = z.object({
  id: z.string().min(1).default(generatedId),
  source_id: z.string().min(1),
  target_id: z.string().min(1),
  source_port: z.string().optional(),
  target_port: z.string().optional(),
  type: ConnectionTypeSchema.default('data'),
  config: ConfigSchema.default({}),
});

export type Connection = z.infer<typeof ConnectionSchema>;
export type ConnectionInput = z.input<typeof ConnectionSchema>;

export const WorkflowSchema = z.object({
  id: z.string().min(1).default(generatedId),
  name: z.string().min(1),
  description: z.string().optional(),
  components: z.array(ComponentSchema).default([]),
  connections: z.array(ConnectionSchema).default([]),
  created_at: z.string().datetime({ offset: true }).optional(),
  updated_at: z.string().datetime({ offset: true }).optional(),
  config: ConfigSchema.default({}),
});

export type Workflow = z.infer<typeof WorkflowSchema>;
export type WorkflowInput = z.input<typeof WorkflowSchema>;
