import type { Connection, Workflow } from '@flowgraph/shared';

export interface DependencyGraph {
  /** component id → ids whose output it consumes, in connection order */
  dependencies: Map<string, Set<string>>;
  /** component id → ids consuming its output, in connection order */
  dependents: Map<string, Set<string>>;
  /** components runnable before anything else has finished, in declaration order */
  initiallyReady: string[];
  /** connections left out of the graph because an endpoint does not exist */
  danglingConnections: Connection[];
}

/**
 * Derive dependency and dependent sets from a workflow's connections.
 *
 * Components without dependencies are ready from the start, and so is every
 * input component regardless of its connections. Cycles are not detected here.
 */
export function resolveDependencies(workflow: Workflow): DependencyGraph {
  const componentIds = new Set(workflow.components.map((component) => component.id));
  const dependencies = new Map<string, Set<string>>();
  const dependents = new Map<string, Set<string>>();
  const danglingConnections: Connection[] = [];

  for (const id of componentIds) {
    dependencies.set(id, new Set());
    dependents.set(id, new Set());
  }

  for (const connection of workflow.connections) {
    const upstream = dependents.get(connection.source_id);
    const downstream = dependencies.get(connection.target_id);
    if (!upstream || !downstream) {
      danglingConnections.push(connection);
      continue;
    }
    upstream.add(connection.target_id);
    downstream.add(connection.source_id);
  }

  const initiallyReady = workflow.components
    .filter((component) => component.type === 'input' || (dependencies.get(component.id)?.size ?? 0) === 0)
    .map((component) => component.id);

  return { dependencies, dependents, initiallyReady, danglingConnections };
}

/** Every component reachable upstream of `componentId`, excluding itself. */
export function collectUpstream(graph: DependencyGraph, componentId: string): Set<string> {
  const seen = new Set<string>();
  const stack = [...(graph.dependencies.get(componentId) ?? [])];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    stack.push(...(graph.dependencies.get(current) ?? []));
  }
  seen.delete(componentId);
  return seen;
}
