import type { Component, ComponentErrorPayload } from '@flowgraph/shared';

import { toComponentErrorPayload } from './errors';
import type { ComponentExecutor, ComponentInputs, ComponentOutputs, ExecutionContext } from './types';

export type ComponentOutcome =
  | { status: 'completed'; output: ComponentOutputs }
  | { status: 'failed'; error: ComponentErrorPayload };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}

function copyOutput(output: Record<string, unknown>): ComponentOutputs | Error {
  try {
    return structuredClone(output);
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

/**
 * Run one executor and fold every thrown error into a failed outcome.
 * Never rejects. A completed outcome carries a private copy of the output,
 * so later mutation by the executor or a consumer does not reach it.
 */
export async function runComponent<C extends Component>(
  executor: ComponentExecutor<C>,
  component: C,
  inputs: ComponentInputs,
  context: ExecutionContext,
): Promise<ComponentOutcome> {
  try {
    const output: unknown = await executor.execute(component, inputs, context);
    if (!isRecord(output)) {
      return {
        status: 'failed',
        error: {
          type: 'InvalidOutput',
          message: `Component ${component.id} returned ${describeValue(output)} instead of an object`,
        },
      };
    }
    const copy = copyOutput(output);
    if (copy instanceof Error) {
      return {
        status: 'failed',
        error: {
          type: 'InvalidOutput',
          message: `Component ${component.id} returned an output that cannot be copied: ${copy.message}`,
        },
      };
    }
    return { status: 'completed', output: copy };
  } catch (error) {
    const payload = toComponentErrorPayload(error);
    context.logger.error(`${payload.type}: ${payload.message}`);
    return { status: 'failed', error: payload };
  }
}
