import type { Connection, Workflow } from '@flowgraph/shared';

export interface GraphValidationResult {
  valid: boolean;
  issues: string[];
}

export function findDanglingConnections(workflow: Workflow): Connection[] {
  const componentIds = new Set(workflow.components.map((component) => component.id));
  return workflow.connections.filter(
    (connection) => !componentIds.has(connection.source_id) || !componentIds.has(connection.target_id),
  );
}

// ─── Topological sort (Kahn's algorithm) ─────────────────────────────────────

export function topologicalOrder(workflow: Workflow): { order: string[]; hasCycle: boolean } {
  const inDegree = new Map<string, number>();
  const adjacency = new Map<string, string[]>();

  for (const component of workflow.components) {
    inDegree.set(component.id, 0);
    adjacency.set(component.id, []);
  }

  for (const connection of workflow.connections) {
    const targets = adjacency.get(connection.source_id);
    if (!targets || !inDegree.has(connection.target_id)) continue;
    targets.push(connection.target_id);
    inDegree.set(connection.target_id, (inDegree.get(connection.target_id) ?? 0) + 1);
  }

  const queue: string[] = [];
  for (const [id, degree] of inDegree) {
    if (degree === 0) queue.push(id);
  }

  const order: string[] = [];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    order.push(current);
    for (const neighbor of adjacency.get(current) ?? []) {
      const degree = (inDegree.get(neighbor) ?? 0) - 1;
      inDegree.set(neighbor, degree);
      if (degree === 0) queue.push(neighbor);
    }
  }

  return { order, hasCycle: order.length !== inDegree.size };
}

/** True when adding `sourceId → targetId` would close a cycle (self-loops included). */
export function wouldCreateCycle(workflow: Workflow, sourceId: string, targetId: string): boolean {
  if (sourceId === targetId) return true;

  // A cycle appears iff source is already reachable from target.
  const stack = [targetId];
  const seen = new Set<string>();
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) continue;
    if (current === sourceId) return true;
    seen.add(current);
    for (const connection of workflow.connections) {
      if (connection.source_id === current) stack.push(connection.target_id);
    }
  }
  return false;
}

function findDuplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}

/**
 * Structural checks a stored workflow must pass: unique ids, connection
 * endpoints that exist, and no cycles.
 */
export function validateWorkflowGraph(workflow: Workflow): GraphValidationResult {
  const issues: string[] = [];

  for (const id of findDuplicates(workflow.components.map((component) => component.id))) {
    issues.push(`Duplicate component id: ${id}`);
  }
  for (const id of findDuplicates(workflow.connections.map((connection) => connection.id))) {
    issues.push(`Duplicate connection id: ${id}`);
  }
  for (const connection of findDanglingConnections(workflow)) {
    issues.push(
      `Connection ${connection.id} references a missing component (${connection.source_id} -> ${connection.target_id})`,
    );
  }
  if (topologicalOrder(workflow).hasCycle) {
    issues.push('Workflow contains a cycle');
  }

  return { valid: issues.length === 0, issues };
}
