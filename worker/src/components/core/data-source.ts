import { NotFoundError, type ComponentExecutor, type HandlerRegistry } from '@flowgraph/component-sdk';
import type { DataSourceComponent } from '@flowgraph/shared';

export type DataSourceRegistry = HandlerRegistry<DataSourceComponent>;

export function createDataSourceExecutor(sources: DataSourceRegistry): ComponentExecutor<DataSourceComponent> {
  return {
    async execute(component, inputs, context) {
      const handler = sources.get(component.source_type);
      if (!handler) {
        throw new NotFoundError(`Unknown data source type: ${component.source_type}`, {
          resourceType: 'data_source',
          resourceId: component.source_type,
        });
      }

      context.logger.info(`[DataSource] Querying ${component.source_type}`);
      return handler(component, inputs, context);
    },
  };
}
