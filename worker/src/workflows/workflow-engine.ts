import type { Logger } from '@flowgraph/component-sdk';
import {
  ComponentSchema,
  ConnectionSchema,
  WorkflowSchema,
  type Component,
  type ComponentInput,
  type Connection,
  type ConnectionInput,
  type Workflow,
  type WorkflowExecution,
} from '@flowgraph/shared';
import type { z, ZodError, ZodTypeAny } from 'zod';

import type { WorkflowStore } from '../adapters/workflow-store';
import { ComponentNotFoundError, DefinitionError, WorkflowNotFoundError } from '../errors';
import type { ExecuteRequest, WorkflowExecutionManager } from '../execution/execution-manager';
import { validateWorkflowGraph, wouldCreateCycle } from './graph-validation';

export interface CreateWorkflowInput {
  id?: string;
  name: string;
  description?: string;
  config?: Record<string, unknown>;
}

export type WorkflowPatch = Partial<Pick<Workflow, 'name' | 'description' | 'config'>>;

/** Any component field except the identity ones. */
export type ComponentPatch = Record<string, unknown> & { id?: never; type?: never };

export interface WorkflowEngineOptions {
  logger?: Logger;
  now?: () => Date;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

function parseDefinition<S extends ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new DefinitionError(`Invalid ${label}: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Definition editing and execution entry point. Every edit loads the current
 * document, produces a new one, checks the graph invariants and saves it.
 */
export class WorkflowEngine {
  private readonly now: () => Date;

  constructor(
    private readonly store: WorkflowStore,
    private readonly executions: WorkflowExecutionManager,
    private readonly options: WorkflowEngineOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async createWorkflow(input: CreateWorkflowInput): Promise<Workflow> {
    const timestamp = this.timestamp();
    const workflow = parseDefinition(
      WorkflowSchema,
      { ...input, components: [], connections: [], created_at: timestamp, updated_at: timestamp },
      'workflow',
    );
    if (await this.store.load(workflow.id)) {
      throw new DefinitionError(`Workflow ${workflow.id} already exists`);
    }
    await this.store.save(workflow);
    this.options.logger?.info(`Created workflow ${workflow.id} (${workflow.name})`);
    return workflow;
  }

  /** Import a complete definition, replacing any stored workflow with the same id. */
  async saveWorkflow(document: unknown): Promise<Workflow> {
    const parsed = parseDefinition(WorkflowSchema, document, 'workflow');
    const workflow: Workflow = {
      ...parsed,
      created_at: parsed.created_at ?? this.timestamp(),
      updated_at: this.timestamp(),
    };
    this.assertValidGraph(workflow);
    await this.store.save(workflow);
    return workflow;
  }

  getWorkflow(workflowId: string): Promise<Workflow | undefined> {
    return this.store.load(workflowId);
  }

  listWorkflows(): Promise<Workflow[]> {
    return this.store.list();
  }

  async updateWorkflow(workflowId: string, patch: WorkflowPatch): Promise<Workflow> {
    const current = await this.requireWorkflow(workflowId);
    const next = parseDefinition(WorkflowSchema, { ...current, ...patch, id: current.id }, 'workflow');
    return this.commit(next);
  }

  deleteWorkflow(workflowId: string): Promise<boolean> {
    return this.store.delete(workflowId);
  }

  async addComponent(workflowId: string, input: ComponentInput): Promise<Component> {
    const workflow = await this.requireWorkflow(workflowId);
    const component = parseDefinition(ComponentSchema, input, 'component');
    if (workflow.components.some((existing) => existing.id === component.id)) {
      throw new DefinitionError(`Component ${component.id} already exists in workflow ${workflowId}`);
    }
    await this.commit({ ...workflow, components: [...workflow.components, component] });
    return component;
  }

  /** `id` and `type` cannot change; the merged component is re-validated. */
  async updateComponent(workflowId: string, componentId: string, patch: ComponentPatch): Promise<Component> {
    const workflow = await this.requireWorkflow(workflowId);
    const current = workflow.components.find((component) => component.id === componentId);
    if (!current) {
      throw new ComponentNotFoundError(workflowId, componentId);
    }
    const updated = parseDefinition(
      ComponentSchema,
      { ...current, ...patch, id: current.id, type: current.type },
      'component',
    );
    await this.commit({
      ...workflow,
      components: workflow.components.map((component) => (component.id === componentId ? updated : component)),
    });
    return updated;
  }

  /** Removes the component and every connection touching it. */
  async deleteComponent(workflowId: string, componentId: string): Promise<void> {
    const workflow = await this.requireWorkflow(workflowId);
    if (!workflow.components.some((component) => component.id === componentId)) {
      throw new ComponentNotFoundError(workflowId, componentId);
    }
    await this.commit({
      ...workflow,
      components: workflow.components.filter((component) => component.id !== componentId),
      connections: workflow.connections.filter(
        (connection) => connection.source_id !== componentId && connection.target_id !== componentId,
      ),
    });
  }

  async addConnection(workflowId: string, input: ConnectionInput): Promise<Connection> {
    const workflow = await this.requireWorkflow(workflowId);
    const connection = parseDefinition(ConnectionSchema, input, 'connection');
    const componentIds = new Set(workflow.components.map((component) => component.id));

    for (const endpoint of [connection.source_id, connection.target_id]) {
      if (!componentIds.has(endpoint)) {
        throw new DefinitionError(`Connection endpoint ${endpoint} does not exist in workflow ${workflowId}`);
      }
    }
    if (workflow.connections.some((existing) => existing.id === connection.id)) {
      throw new DefinitionError(`Connection ${connection.id} already exists in workflow ${workflowId}`);
    }
    if (wouldCreateCycle(workflow, connection.source_id, connection.target_id)) {
      throw new DefinitionError(
        `Connection ${connection.source_id} -> ${connection.target_id} would create a cycle`,
      );
    }

    await this.commit({ ...workflow, connections: [...workflow.connections, connection] });
    return connection;
  }

  async deleteConnection(workflowId: string, connectionId: string): Promise<boolean> {
    const workflow = await this.requireWorkflow(workflowId);
    const connections = workflow.connections.filter((connection) => connection.id !== connectionId);
    if (connections.length === workflow.connections.length) {
      return false;
    }
    await this.commit({ ...workflow, connections });
    return true;
  }

  async executeWorkflow(workflowId: string, request: ExecuteRequest = {}): Promise<WorkflowExecution> {
    const workflow = await this.requireWorkflow(workflowId);
    return this.executions.execute(workflow, request);
  }

  getExecution(executionId: string): WorkflowExecution | undefined {
    return this.executions.get(executionId);
  }

  listExecutions(workflowId?: string): WorkflowExecution[] {
    return this.executions.list(workflowId);
  }

  private async requireWorkflow(workflowId: string): Promise<Workflow> {
    const workflow = await this.store.load(workflowId);
    if (!workflow) {
      throw new WorkflowNotFoundError(workflowId);
    }
    return workflow;
  }

  private assertValidGraph(workflow: Workflow): void {
    const { valid, issues } = validateWorkflowGraph(workflow);
    if (!valid) {
      throw new DefinitionError(`Invalid workflow ${workflow.id}: ${issues.join('; ')}`, issues);
    }
  }

  private async commit(workflow: Workflow): Promise<Workflow> {
    const next: Workflow = { ...workflow, updated_at: this.timestamp() };
    this.assertValidGraph(next);
    await this.store.save(next);
    return next;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
