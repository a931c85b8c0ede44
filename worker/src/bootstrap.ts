import { Pool } from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import { createHttpClient, type ComponentRegistry, type FetchLike } from '@flowgraph/component-sdk';

import { DrizzleWorkflowStore } from './adapters/drizzle-workflow.store';
import { FileWorkflowStore } from './adapters/file-workflow.store';
import { MemoryWorkflowStore } from './adapters/memory-workflow.store';
import * as schema from './adapters/schema';
import { TraceAdapter } from './adapters/trace.adapter';
import type { WorkflowStore } from './adapters/workflow-store';
import { createDefaultComponentRegistry } from './components';
import type { WorkerConfig } from './config';
import { WorkflowExecutionManager } from './execution/execution-manager';
import { createLogger, type WorkerLogger } from './utils/logger';
import { WorkflowEngine } from './workflows/workflow-engine';

export interface WorkflowRuntime {
  engine: WorkflowEngine;
  executions: WorkflowExecutionManager;
  registry: ComponentRegistry;
  store: WorkflowStore;
  trace: TraceAdapter;
  logger: WorkerLogger;
  close(): Promise<void>;
}

export interface BootstrapOptions {
  logger?: WorkerLogger;
  fetchImpl?: FetchLike;
  registry?: ComponentRegistry;
}

/**
 * Wire the engine from configuration. Store selection: `DATABASE_URL` →
 * PostgreSQL, else `WORKFLOW_STORAGE_DIR` → JSON files, else in memory.
 */
export function createWorkflowEngineFromConfig(
  config: WorkerConfig,
  options: BootstrapOptions = {},
): WorkflowRuntime {
  const logger = options.logger ?? createLogger('flowgraph', { level: config.logLevel });

  let store: WorkflowStore;
  let trace: TraceAdapter;
  let pool: Pool | undefined;

  if (config.databaseUrl) {
    pool = new Pool({ connectionString: config.databaseUrl });
    const db = drizzle(pool, { schema });
    store = new DrizzleWorkflowStore(db);
    trace = new TraceAdapter(db, { logger: logger.child('trace') });
    logger.info('Using PostgreSQL workflow store');
  } else if (config.storageDir) {
    store = new FileWorkflowStore(config.storageDir, logger.child('store'));
    trace = new TraceAdapter(undefined, { logger: logger.child('trace') });
    logger.info(`Using file workflow store at ${config.storageDir}`);
  } else {
    store = new MemoryWorkflowStore();
    trace = new TraceAdapter(undefined, { logger: logger.child('trace') });
    logger.info('Using in-memory workflow store');
  }

  const registry = options.registry ?? createDefaultComponentRegistry({ agentServiceUrl: config.agentServiceUrl });
  const executions = new WorkflowExecutionManager({
    registry,
    http: createHttpClient({ timeoutMs: config.httpTimeoutMs, fetchImpl: options.fetchImpl }),
    trace,
    logger: logger.child('execution'),
    maxConcurrency: config.maxConcurrency,
    maxHistory: config.maxExecutionHistory,
  });
  const engine = new WorkflowEngine(store, executions, { logger: logger.child('engine') });

  return {
    engine,
    executions,
    registry,
    store,
    trace,
    logger,
    async close() {
      await pool?.end();
    },
  };
}
