import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '@flowgraph/component-sdk';
import { WorkflowSchema, type Workflow } from '@flowgraph/shared';

import { DefinitionError } from '../errors';
import type { WorkflowStore } from './workflow-store';

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores each workflow as pretty-printed JSON at `<dir>/workflows/<id>.json`.
 * Ids outside `[A-Za-z0-9_-]` are refused with a `DefinitionError`.
 */
export class FileWorkflowStore implements WorkflowStore {
  private readonly workflowsDir: string;

  constructor(
    storageDir: string,
    private readonly logger?: Logger,
  ) {
    this.workflowsDir = join(storageDir, 'workflows');
  }

  async save(workflow: Workflow): Promise<void> {
    await mkdir(this.workflowsDir, { recursive: true });
    await writeFile(this.pathFor(workflow.id), `${JSON.stringify(workflow, null, 2)}\n`, 'utf8');
  }

  async load(workflowId: string): Promise<Workflow | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(workflowId), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
    return WorkflowSchema.parse(JSON.parse(raw));
  }

  async delete(workflowId: string): Promise<boolean> {
    try {
      await rm(this.pathFor(workflowId));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  async list(): Promise<Workflow[]> {
    let entries: string[];
    try {
      entries = await readdir(this.workflowsDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const workflows: Workflow[] = [];
    for (const entry of entries.filter((name) => name.endsWith('.json')).sort()) {
      try {
        const raw = await readFile(join(this.workflowsDir, entry), 'utf8');
        workflows.push(WorkflowSchema.parse(JSON.parse(raw)));
      } catch (error) {
        this.logger?.error(`Skipping unreadable workflow file ${entry}`, error);
      }
    }
    return workflows;
  }

  private pathFor(workflowId: string): string {
    if (!SAFE_ID.test(workflowId)) {
      throw new DefinitionError(`Invalid workflow id for file storage: ${workflowId}`);
    }
    return join(this.workflowsDir, `${workflowId}.json`);
  }
}
