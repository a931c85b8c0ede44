/**
 * Component Registration
 * Builds the executor registry and the named plugin / data-source handler
 * registries used by the scheduler.
 */
import { ComponentRegistry } from '@flowgraph/component-sdk';

import { createAgentExecutor } from './ai/agent';
import { inputExecutor } from './core/input';
import { outputExecutor } from './core/output';
import { createPluginExecutor, type PluginRegistry } from './core/plugin';
import { createDataSourceExecutor, type DataSourceRegistry } from './core/data-source';
import { createDefaultPluginRegistry } from './plugins';
import { createDefaultDataSourceRegistry } from './data-sources';

export interface DefaultComponentRegistryOptions {
  agentServiceUrl?: string;
  plugins?: PluginRegistry;
  dataSources?: DataSourceRegistry;
}

export function createDefaultComponentRegistry(options: DefaultComponentRegistryOptions = {}): ComponentRegistry {
  return ComponentRegistry.fromMap({
    agent: createAgentExecutor({ agentServiceUrl: options.agentServiceUrl }),
    plugin: createPluginExecutor(options.plugins ?? createDefaultPluginRegistry()),
    data_source: createDataSourceExecutor(options.dataSources ?? createDefaultDataSourceRegistry()),
    input: inputExecutor,
    output: outputExecutor,
  });
}

export { createAgentExecutor, resolveAgentSettings, buildChatMessages } from './ai/agent';
export { inputExecutor } from './core/input';
export { outputExecutor } from './core/output';
export { createPluginExecutor, type PluginRegistry } from './core/plugin';
export { createDataSourceExecutor, type DataSourceRegistry } from './core/data-source';
export { createDefaultPluginRegistry } from './plugins';
export { createDefaultDataSourceRegistry } from './data-sources';
export { webSearchPlugin } from './plugins/web-search';
export { documentDataSource } from './data-sources/document';
