import { asc, eq } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { WorkflowSchema, type Workflow } from '@flowgraph/shared';

import { workflows } from './schema';
import type * as schema from './schema';
import type { WorkflowStore } from './workflow-store';

/**
 * PostgreSQL-backed store. The whole definition lives in a jsonb column and is
 * re-validated on the way out.
 */
export class DrizzleWorkflowStore implements WorkflowStore {
  constructor(private readonly db: NodePgDatabase<typeof schema>) {}

  async save(workflow: Workflow): Promise<void> {
    const updatedAt = new Date();
    await this.db
      .insert(workflows)
      .values({ id: workflow.id, name: workflow.name, document: workflow, updatedAt })
      .onConflictDoUpdate({
        target: workflows.id,
        set: { name: workflow.name, document: workflow, updatedAt },
      });
  }

  async load(workflowId: string): Promise<Workflow | undefined> {
    const rows = await this.db.select().from(workflows).where(eq(workflows.id, workflowId)).limit(1);
    const row = rows[0];
    return row ? WorkflowSchema.parse(row.document) : undefined;
  }

  async delete(workflowId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(workflows)
      .where(eq(workflows.id, workflowId))
      .returning({ id: workflows.id });
    return deleted.length > 0;
  }

  async list(): Promise<Workflow[]> {
    const rows = await this.db.select().from(workflows).orderBy(asc(workflows.name));
    return rows.map((row) => WorkflowSchema.parse(row.document));
  }
}
