import type { ComponentErrorPayload } from '@flowgraph/shared';

export type ComponentErrorDetails = Record<string, unknown>;

export interface ComponentErrorOptions {
  details?: ComponentErrorDetails;
  cause?: unknown;
}

/**
 * Base class for business failures raised by component executors.
 *
 * Thrown inside an executor, it is caught by `runComponent` and recorded as a
 * structured payload against the component; it never aborts the run.
 */
export class ComponentError extends Error {
  readonly type: string;
  readonly details?: ComponentErrorDetails;

  constructor(message: string, type = 'ComponentError', options: ComponentErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = type;
    this.type = type;
    this.details = options.details;
  }

  toPayload(): ComponentErrorPayload {
    return this.details === undefined
      ? { type: this.type, message: this.message }
      : { type: this.type, message: this.message, details: this.details };
  }
}

export class ConfigurationError extends ComponentError {
  constructor(message: string, options: { configKey?: string } & ComponentErrorOptions = {}) {
    const { configKey, ...rest } = options;
    super(message, 'ConfigurationError', {
      ...rest,
      details: configKey ? { ...rest.details, configKey } : rest.details,
    });
  }
}

export class ValidationError extends ComponentError {
  constructor(
    message: string,
    options: { fieldErrors?: Record<string, string[]> } & ComponentErrorOptions = {},
  ) {
    const { fieldErrors, ...rest } = options;
    super(message, 'ValidationError', {
      ...rest,
      details: fieldErrors ? { ...rest.details, fieldErrors } : rest.details,
    });
  }
}

export class NotFoundError extends ComponentError {
  constructor(
    message: string,
    options: { resourceType?: string; resourceId?: string } & ComponentErrorOptions = {},
  ) {
    const { resourceType, resourceId, ...rest } = options;
    const details: ComponentErrorDetails = { ...rest.details };
    if (resourceType) details.resourceType = resourceType;
    if (resourceId) details.resourceId = resourceId;
    super(message, 'NotFoundError', {
      ...rest,
      details: Object.keys(details).length > 0 ? details : undefined,
    });
  }
}

export class HttpError extends ComponentError {
  readonly status: number;

  constructor(message: string, options: { status: number; body?: string } & ComponentErrorOptions) {
    const { status, body, ...rest } = options;
    super(message, 'HttpError', {
      ...rest,
      details: { ...rest.details, status, ...(body !== undefined ? { body } : {}) },
    });
    this.status = status;
  }
}

export class TimeoutError extends ComponentError {
  constructor(message: string, options: { timeoutMs: number; url?: string } & ComponentErrorOptions) {
    const { timeoutMs, url, ...rest } = options;
    super(message, 'TimeoutError', {
      ...rest,
      details: { ...rest.details, timeoutMs, ...(url ? { url } : {}) },
    });
  }
}

export class NetworkError extends ComponentError {
  constructor(message: string, options: { url?: string } & ComponentErrorOptions = {}) {
    const { url, ...rest } = options;
    super(message, 'NetworkError', {
      ...rest,
      details: url ? { ...rest.details, url } : rest.details,
    });
  }
}

interface ResponseStatusLike {
  status: number;
  statusText?: string;
  url?: string;
}

/**
 * Map a non-2xx response to an `HttpError`, keeping the raw body text so the
 * execution record shows what the collaborator answered.
 */
export function fromHttpResponse(response: ResponseStatusLike, body: string, label = 'Request'): HttpError {
  const statusText = response.statusText ? ` ${response.statusText}` : '';
  return new HttpError(`${label} failed with status ${response.status}${statusText}`, {
    status: response.status,
    body,
    details: response.url ? { url: response.url } : undefined,
  });
}

export const EXECUTOR_FAULT = 'ExecutorFault';

/**
 * Convert anything thrown into a payload. Component errors keep their type;
 * anything else is an unexpected fault of the executor layer.
 */
export function toComponentErrorPayload(error: unknown): ComponentErrorPayload {
  if (error instanceof ComponentError) {
    return error.toPayload();
  }
  if (error instanceof Error) {
    return { type: EXECUTOR_FAULT, message: error.message };
  }
  return { type: EXECUTOR_FAULT, message: String(error) };
}
