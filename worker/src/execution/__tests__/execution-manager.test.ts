import { describe, expect, it, vi } from 'vitest';
import { HandlerRegistry } from '@flowgraph/component-sdk';
import { WorkflowSchema, type PluginComponent, type WorkflowExecution } from '@flowgraph/shared';

import { createDefaultComponentRegistry } from '../../components';
import { ExecutionStateError } from '../../errors';
import { WorkflowExecutionManager } from '../execution-manager';

const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

const searchWorkflow = (id: string) =>
  WorkflowSchema.parse({
    id,
    name: `Search ${id}`,
    components: [
      { id: 'I', name: 'Query', type: 'input' },
      { id: 'P', name: 'Search', type: 'plugin', plugin_type: 'web_search' },
    ],
    connections: [{ source_id: 'I', target_id: 'P' }],
  });

describe('WorkflowExecutionManager', () => {
  it('stores finished executions and returns copies', async () => {
    const manager = new WorkflowExecutionManager({ registry: createDefaultComponentRegistry(), logger });

    const execution = await manager.execute(searchWorkflow('wf-1'), { inputs: { query: 'owls' }, runId: 'exec-1' });
    const stored = manager.get('exec-1');

    expect(execution.status).toBe('completed');
    expect(stored).toEqual(execution);
    expect(stored).not.toBe(execution);
    expect(manager.get('missing')).toBeUndefined();
  });

  it('lets readers observe a running execution', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const observed: { execution?: WorkflowExecution } = {};
    const plugins = new HandlerRegistry<PluginComponent>('Plugin');
    const manager = new WorkflowExecutionManager({
      registry: createDefaultComponentRegistry({ plugins }),
      logger,
    });
    plugins.register('web_search', async () => {
      observed.execution = manager.get('exec-live');
      await gate;
      return { done: true };
    });

    const pending = manager.execute(searchWorkflow('wf-1'), { inputs: { query: 'owls' }, runId: 'exec-live' });
    await vi.waitFor(() => expect(observed.execution).toBeDefined());
    release();
    const finished = await pending;

    expect(observed.execution?.status).toBe('running');
    expect(observed.execution?.results).toEqual({ I: { query: 'owls' } });
    expect(finished.results.P).toEqual({ done: true });
  });

  it('lists executions in start order, optionally per workflow', async () => {
    const manager = new WorkflowExecutionManager({ registry: createDefaultComponentRegistry(), logger });

    await manager.execute(searchWorkflow('wf-1'), { inputs: { query: 'a' }, runId: 'e1' });
    await manager.execute(searchWorkflow('wf-2'), { inputs: { query: 'b' }, runId: 'e2' });
    await manager.execute(searchWorkflow('wf-1'), { inputs: { query: 'c' }, runId: 'e3' });

    expect(manager.list().map((execution) => execution.id)).toEqual(['e1', 'e2', 'e3']);
    expect(manager.list('wf-1').map((execution) => execution.id)).toEqual(['e1', 'e3']);
  });

  it('evicts the oldest finished executions beyond maxHistory', async () => {
    const manager = new WorkflowExecutionManager({
      registry: createDefaultComponentRegistry(),
      logger,
      maxHistory: 2,
    });

    for (const runId of ['e1', 'e2', 'e3']) {
      await manager.execute(searchWorkflow('wf-1'), { inputs: { query: runId }, runId });
    }

    expect(manager.list().map((execution) => execution.id)).toEqual(['e2', 'e3']);
    expect(manager.get('e1')).toBeUndefined();
  });

  it('records a failing component without rejecting', async () => {
    const manager = new WorkflowExecutionManager({ registry: createDefaultComponentRegistry(), logger });

    const execution = await manager.execute(searchWorkflow('wf-1'), { inputs: {} });

    expect(execution.status).toBe('failed');
    expect(execution.errors.P?.type).toBe('ValidationError');
    expect(execution.errors.P?.message).toBe('No query provided');
  });

  it('rejects a run id that is already in use and keeps the earlier record', async () => {
    const manager = new WorkflowExecutionManager({ registry: createDefaultComponentRegistry(), logger });
    const first = await manager.execute(searchWorkflow('wf-1'), { inputs: { query: 'a' }, runId: 'e1' });

    const second = manager.execute(searchWorkflow('wf-2'), { inputs: { query: 'b' }, runId: 'e1' });

    await expect(second).rejects.toBeInstanceOf(ExecutionStateError);
    await expect(second).rejects.toThrow('Execution e1 already exists');
    expect(manager.get('e1')).toEqual(first);
    expect(manager.list()).toHaveLength(1);
  });

  it('releases trace events of evicted executions', async () => {
    const trace = { record: vi.fn(), setRunMetadata: vi.fn(), finalizeRun: vi.fn() };
    const manager = new WorkflowExecutionManager({
      registry: createDefaultComponentRegistry(),
      trace,
      logger,
      maxHistory: 1,
    });

    await manager.execute(searchWorkflow('wf-x'), { inputs: { query: 'a' }, runId: 'e1' });
    expect(trace.finalizeRun).not.toHaveBeenCalled();
    await manager.execute(searchWorkflow('wf-x'), { inputs: { query: 'b' }, runId: 'e2' });

    expect(trace.setRunMetadata).toHaveBeenCalledWith('e1', { workflowId: 'wf-x' });
    expect(trace.finalizeRun).toHaveBeenCalledTimes(1);
    expect(trace.finalizeRun).toHaveBeenCalledWith('e1');
  });

  it('stays readable after a component returns an output that cannot be copied', async () => {
    const plugins = new HandlerRegistry<PluginComponent>('Plugin');
    plugins.register('web_search', async () => ({ format: (value: string) => value.toUpperCase() }));
    const manager = new WorkflowExecutionManager({ registry: createDefaultComponentRegistry({ plugins }), logger });

    const execution = await manager.execute(searchWorkflow('wf-1'), { inputs: { query: 'owls' }, runId: 'e1' });

    expect(execution.status).toBe('failed');
    expect(execution.errors.P?.type).toBe('InvalidOutput');
    expect(manager.list().map((listed) => listed.status)).toEqual(['failed']);
    expect(manager.get('e1')?.results).toEqual({ I: { query: 'owls' } });
  });
});
