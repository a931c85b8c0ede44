import type { ComponentExecutor } from '@flowgraph/component-sdk';
import type { OutputComponent } from '@flowgraph/shared';

/** Collection point: callers read final values from `results[outputId]`. */
export const outputExecutor: ComponentExecutor<OutputComponent> = {
  async execute(component, inputs, context) {
    context.logger.debug(`collected ${Object.keys(inputs).length} value(s) for ${component.output_type} output`);
    return { ...inputs };
  },
};
