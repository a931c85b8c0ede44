import type { ExecutionContext, Logger } from './types';
import type { ITraceService } from './interfaces';
import { createHttpClient, type HttpClient } from './http/client';

export interface CreateContextOptions {
  runId: string;
  workflowId: string;
  componentId: string;
  values?: Record<string, unknown>;
  logger?: Logger;
  http?: HttpClient;
  trace?: ITraceService;
}

const consoleLogger: Logger = {
  debug: (...args: unknown[]) => console.debug(...args),
  info: (...args: unknown[]) => console.log(...args),
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
};

export function prefixLogger(base: Logger, prefix: string): Logger {
  const tag = `[${prefix}]`;
  return {
    debug: (...args: unknown[]) => base.debug(tag, ...args),
    info: (...args: unknown[]) => base.info(tag, ...args),
    warn: (...args: unknown[]) => base.warn(tag, ...args),
    error: (...args: unknown[]) => base.error(tag, ...args),
  };
}

export function createExecutionContext(options: CreateContextOptions): ExecutionContext {
  const { runId, workflowId, componentId, trace } = options;

  const logger = prefixLogger(options.logger ?? consoleLogger, componentId);

  const emitProgress = (message: string) => {
    logger.debug(`progress: ${message}`);
    trace?.record({
      type: 'NODE_PROGRESS',
      runId,
      nodeRef: componentId,
      timestamp: new Date().toISOString(),
      level: 'info',
      message,
    });
  };

  return {
    runId,
    workflowId,
    componentId,
    logger,
    emitProgress,
    http: options.http ?? createHttpClient(),
    values: Object.freeze({ ...options.values }),
    trace,
  };
}
