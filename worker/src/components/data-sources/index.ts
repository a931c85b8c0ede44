import { HandlerRegistry } from '@flowgraph/component-sdk';
import type { DataSourceComponent } from '@flowgraph/shared';

import type { DataSourceRegistry } from '../core/data-source';
import { documentDataSource } from './document';

export function createDefaultDataSourceRegistry(): DataSourceRegistry {
  const registry = new HandlerRegistry<DataSourceComponent>('Data source');
  registry.register('document', documentDataSource);
  return registry;
}
