import { describe, expect, it, vi } from 'vitest';
import { ComponentRegistry, HandlerRegistry, createHttpClient, type FetchLike } from '@flowgraph/component-sdk';
import { WorkflowSchema, type PluginComponent } from '@flowgraph/shared';

import { TraceAdapter } from '../../adapters/trace.adapter';
import { createDefaultComponentRegistry, inputExecutor, outputExecutor } from '../../components';
import { executeWorkflow } from '../workflow-runner';

const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

const pluginChain = WorkflowSchema.parse({
  id: 'wf-plugins',
  name: 'Plugins',
  components: [
    { id: 'P', name: 'Produce', type: 'plugin', plugin_type: 'produce' },
    { id: 'C', name: 'Consume', type: 'plugin', plugin_type: 'consume' },
  ],
  connections: [{ source_id: 'P', target_id: 'C' }],
});

const agentChain = (agentId: string) =>
  WorkflowSchema.parse({
    id: 'wf-chat',
    name: 'Chat',
    components: [
      { id: 'I', name: 'Question', type: 'input' },
      { id: 'A', name: 'Assistant', type: 'agent', agent_id: agentId },
      { id: 'O', name: 'Answer', type: 'output' },
    ],
    connections: [
      { id: 'c1', source_id: 'I', target_id: 'A' },
      { id: 'c2', source_id: 'A', target_id: 'O' },
    ],
  });

function agentService(handler: (agentId: string) => Response): FetchLike {
  return async (_url, init) => {
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : {};
    const agentId =
      typeof body === 'object' && body !== null && 'agent_id' in body && typeof body.agent_id === 'string'
        ? body.agent_id
        : '';
    return handler(agentId);
  };
}

describe('executeWorkflow', () => {
  it('passes the input through an agent to the output', async () => {
    const http = createHttpClient({
      fetchImpl: agentService(() => new Response(JSON.stringify({ message: 'hello' }))),
    });

    const execution = await executeWorkflow(
      agentChain('bot1'),
      { message: 'hi' },
      {},
      { registry: createDefaultComponentRegistry(), http, logger, runId: 'run-1' },
    );

    expect(execution.id).toBe('run-1');
    expect(execution.status).toBe('completed');
    expect(execution.results).toEqual({
      I: { message: 'hi' },
      A: { message: 'hello', agent_id: 'bot1' },
      O: { message: 'hello', agent_id: 'bot1' },
    });
    expect(execution.errors).toEqual({});
    expect(execution.logs.map((entry) => [entry.component_id, entry.status])).toEqual([
      ['I', 'completed'],
      ['A', 'completed'],
      ['O', 'completed'],
    ]);
    expect(execution.start_time).toBeDefined();
    expect(execution.end_time).toBeDefined();
  });

  it('records an agent HTTP failure and leaves its dependents unreached', async () => {
    const http = createHttpClient({
      fetchImpl: agentService(() => new Response('boom', { status: 500, statusText: 'Internal Server Error' })),
    });

    const execution = await executeWorkflow(
      agentChain('bot1'),
      { message: 'hi' },
      {},
      { registry: createDefaultComponentRegistry(), http, logger },
    );

    expect(execution.status).toBe('failed');
    expect(execution.results).toEqual({ I: { message: 'hi' } });
    expect(execution.errors).toEqual({
      A: {
        type: 'HttpError',
        message: 'Agent service failed with status 500 Internal Server Error',
        details: { status: 500, body: 'boom' },
      },
    });
    expect(execution.unreached).toEqual({ O: 'upstream_failed' });
  });

  it('keeps running independent chains when one of them fails', async () => {
    const workflow = WorkflowSchema.parse({
      id: 'wf-parallel',
      name: 'Two chains',
      components: [
        { id: 'I1', name: 'First question', type: 'input' },
        { id: 'A1', name: 'Broken', type: 'agent', agent_id: 'broken' },
        { id: 'O1', name: 'First answer', type: 'output' },
        { id: 'I2', name: 'Second question', type: 'input' },
        { id: 'A2', name: 'Working', type: 'agent', agent_id: 'bot2' },
        { id: 'O2', name: 'Second answer', type: 'output' },
      ],
      connections: [
        { source_id: 'I1', target_id: 'A1' },
        { source_id: 'A1', target_id: 'O1' },
        { source_id: 'I2', target_id: 'A2' },
        { source_id: 'A2', target_id: 'O2' },
      ],
    });
    const http = createHttpClient({
      fetchImpl: agentService((agentId) =>
        agentId === 'broken'
          ? new Response('unavailable', { status: 503 })
          : new Response(JSON.stringify({ message: 'second' })),
      ),
    });

    const execution = await executeWorkflow(
      workflow,
      { message: 'hi' },
      {},
      { registry: createDefaultComponentRegistry(), http, logger },
    );

    expect(execution.status).toBe('failed');
    expect(Object.keys(execution.errors)).toEqual(['A1']);
    expect(execution.errors.A1?.message).toBe('Agent service failed with status 503');
    expect(execution.results.O2).toEqual({ message: 'second', agent_id: 'bot2' });
    expect(Object.keys(execution.results).sort()).toEqual(['A2', 'I1', 'I2', 'O2']);
    expect(execution.unreached).toEqual({ O1: 'upstream_failed' });
  });

  it('records a missing executor as an executor fault', async () => {
    const registry = new ComponentRegistry();
    registry.register('input', inputExecutor);
    registry.register('output', outputExecutor);

    const execution = await executeWorkflow(agentChain('bot1'), { message: 'hi' }, {}, { registry, logger });

    expect(execution.errors).toEqual({
      A: { type: 'ExecutorFault', message: 'No executor registered for component type agent' },
    });
    expect(execution.unreached).toEqual({ O: 'upstream_failed' });
  });

  it('exposes the run context to executors read-only', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ message: 'ok' })));

    await executeWorkflow(
      agentChain('bot1'),
      { message: 'hi' },
      { agent_service_url: 'http://agents.internal' },
      { registry: createDefaultComponentRegistry(), http: createHttpClient({ fetchImpl }), logger },
    );

    expect(fetchImpl.mock.calls[0]?.[0]).toBe('http://agents.internal/chat');
  });

  it('emits trace events for every dispatched component', async () => {
    const trace = new TraceAdapter();
    const http = createHttpClient({
      fetchImpl: agentService(() => new Response(JSON.stringify({ message: 'hello' }))),
    });

    await executeWorkflow(
      agentChain('bot1'),
      { message: 'hi' },
      {},
      { registry: createDefaultComponentRegistry(), http, trace, logger, runId: 'run-traced' },
    );

    expect(trace.getEvents('run-traced').map((event) => [event.type, event.nodeRef])).toEqual([
      ['NODE_STARTED', 'A'],
      ['NODE_COMPLETED', 'A'],
      ['NODE_STARTED', 'O'],
      ['NODE_COMPLETED', 'O'],
    ]);
  });

  it('finishes as cancelled when aborted before anything is dispatched', async () => {
    const controller = new AbortController();
    controller.abort();

    const execution = await executeWorkflow(
      agentChain('bot1'),
      { message: 'hi' },
      {},
      { registry: createDefaultComponentRegistry(), logger, signal: controller.signal },
    );

    expect(execution.status).toBe('cancelled');
    expect(execution.results).toEqual({ I: { message: 'hi' } });
    expect(execution.unreached).toEqual({ A: 'cancelled', O: 'cancelled' });
  });

  it('keeps a completed result unchanged when a dependent mutates its inputs', async () => {
    const plugins = new HandlerRegistry<PluginComponent>('Plugin');
    plugins.register('produce', async () => ({ items: ['a'] }));
    plugins.register('consume', async (_component, inputs) => {
      const items = inputs.items;
      if (Array.isArray(items)) items.push('appended');
      return { count: Array.isArray(items) ? items.length : 0 };
    });

    const execution = await executeWorkflow(pluginChain, {}, {}, {
      registry: createDefaultComponentRegistry({ plugins }),
      logger,
    });

    expect(execution.status).toBe('completed');
    expect(execution.results).toEqual({ P: { items: ['a'] }, C: { count: 2 } });
    expect(execution.logs[0]).toMatchObject({ component_id: 'P', result: { items: ['a'] } });
  });

  it('fails a component whose output cannot be copied and still finishes the run', async () => {
    const plugins = new HandlerRegistry<PluginComponent>('Plugin');
    plugins.register('produce', async () => ({ format: (value: string) => value.toUpperCase() }));
    plugins.register('consume', async () => ({ consumed: true }));

    const execution = await executeWorkflow(pluginChain, {}, {}, {
      registry: createDefaultComponentRegistry({ plugins }),
      logger,
    });

    expect(execution.status).toBe('failed');
    expect(execution.errors.P?.type).toBe('InvalidOutput');
    expect(execution.errors.P?.message).toMatch(/^Component P returned an output that cannot be copied: /);
    expect(execution.results).toEqual({});
    expect(execution.unreached).toEqual({ C: 'upstream_failed' });
  });

  it('tells the trace service which workflow a run belongs to before any event', async () => {
    const calls: string[] = [];
    const trace = {
      record: vi.fn((event: { type: string }) => {
        calls.push(event.type);
      }),
      setRunMetadata: vi.fn(() => {
        calls.push('metadata');
      }),
    };
    const plugins = new HandlerRegistry<PluginComponent>('Plugin');
    plugins.register('produce', async () => ({ items: [] }));
    plugins.register('consume', async () => ({}));

    await executeWorkflow(pluginChain, {}, {}, {
      registry: createDefaultComponentRegistry({ plugins }),
      trace,
      logger,
      runId: 'run-meta',
    });

    expect(trace.setRunMetadata).toHaveBeenCalledWith('run-meta', { workflowId: 'wf-plugins' });
    expect(calls[0]).toBe('metadata');
    expect(calls).toHaveLength(5);
  });
});
