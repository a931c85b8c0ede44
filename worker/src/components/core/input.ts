import type { ComponentExecutor } from '@flowgraph/component-sdk';
import type { InputComponent } from '@flowgraph/shared';

/**
 * Entry point of a workflow. The scheduler seeds input components with the
 * caller's inputs directly; when dispatched anyway it hands its inputs on.
 */
export const inputExecutor: ComponentExecutor<InputComponent> = {
  async execute(_component, inputs) {
    return { ...inputs };
  },
};
