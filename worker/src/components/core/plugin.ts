import { NotFoundError, type ComponentExecutor, type HandlerRegistry } from '@flowgraph/component-sdk';
import type { PluginComponent } from '@flowgraph/shared';

export type PluginRegistry = HandlerRegistry<PluginComponent>;

export function createPluginExecutor(plugins: PluginRegistry): ComponentExecutor<PluginComponent> {
  return {
    async execute(component, inputs, context) {
      const handler = plugins.get(component.plugin_type);
      if (!handler) {
        throw new NotFoundError(`Unknown plugin type: ${component.plugin_type}`, {
          resourceType: 'plugin',
          resourceId: component.plugin_type,
        });
      }

      context.logger.info(`[Plugin] Running ${component.plugin_type}`);
      return handler(component, inputs, context);
    },
  };
}
