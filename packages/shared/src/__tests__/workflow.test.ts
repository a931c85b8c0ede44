import { describe, it, expect } from 'vitest';

import { ComponentSchema, ConnectionSchema, WorkflowSchema } from '../workflow';
import { WorkflowExecutionSchema, isTerminalStatus } from '../execution';

describe('ComponentSchema', () => {
  it('applies defaults for identity, config and position', () => {
    const component = ComponentSchema.parse({ name: 'Entry', type: 'input' });

    expect(component.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(component).toMatchObject({
      name: 'Entry',
      type: 'input',
      input_type: 'text',
      config: {},
      position_x: 0,
      position_y: 0,
    });
  });

  it('requires plugin_type on plugin components', () => {
    const result = ComponentSchema.safeParse({ id: 'p', name: 'Search', type: 'plugin' });

    expect(result.success).toBe(false);
  });

  it('rejects unknown component types', () => {
    const result = ComponentSchema.safeParse({ id: 'x', name: 'Mystery', type: 'teleporter' });

    expect(result.success).toBe(false);
  });

  it('keeps agent settings', () => {
    const component = ComponentSchema.parse({
      id: 'a',
      name: 'Bot',
      type: 'agent',
      agent_id: 'bot1',
      system_prompt: 'Be brief.',
    });

    expect(component).toMatchObject({ id: 'a', type: 'agent', agent_id: 'bot1', system_prompt: 'Be brief.' });
  });
});

describe('WorkflowSchema', () => {
  it('parses a stored document with snake_case fields', () => {
    const workflow = WorkflowSchema.parse({
      id: 'wf-1',
      name: 'Greeting',
      components: [
        { id: 'I', name: 'In', type: 'input' },
        { id: 'O', name: 'Out', type: 'output' },
      ],
      connections: [{ id: 'c1', source_id: 'I', target_id: 'O' }],
      created_at: '2026-01-02T03:04:05.000Z',
      updated_at: '2026-01-02T03:04:05.000Z',
    });

    expect(workflow.components.map((component) => component.id)).toEqual(['I', 'O']);
    expect(workflow.connections[0]).toEqual({
      id: 'c1',
      source_id: 'I',
      target_id: 'O',
      type: 'data',
      config: {},
    });
    expect(workflow.config).toEqual({});
  });

  it('rejects connection types outside data, control and context', () => {
    const result = ConnectionSchema.safeParse({ source_id: 'a', target_id: 'b', type: 'magic' });

    expect(result.success).toBe(false);
  });
});

describe('WorkflowExecutionSchema', () => {
  it('accepts completed and failed log entries', () => {
    const execution = WorkflowExecutionSchema.parse({
      id: 'run-1',
      workflow_id: 'wf-1',
      status: 'failed',
      start_time: '2026-01-02T03:04:05.000Z',
      end_time: '2026-01-02T03:04:06.000Z',
      results: { I: { message: 'hi' } },
      errors: { A: { type: 'HttpError', message: 'Agent service failed with status 500' } },
      logs: [
        { component_id: 'I', timestamp: '2026-01-02T03:04:05.000Z', status: 'completed', result: { message: 'hi' } },
        {
          component_id: 'A',
          timestamp: '2026-01-02T03:04:06.000Z',
          status: 'failed',
          error: { type: 'HttpError', message: 'Agent service failed with status 500' },
        },
      ],
      unreached: { O: 'upstream_failed' },
    });

    expect(execution.logs).toHaveLength(2);
    expect(isTerminalStatus(execution.status)).toBe(true);
    expect(isTerminalStatus('running')).toBe(false);
  });
});
