import { HandlerRegistry } from '@flowgraph/component-sdk';
import type { PluginComponent } from '@flowgraph/shared';

import type { PluginRegistry } from '../core/plugin';
import { webSearchPlugin } from './web-search';

export function createDefaultPluginRegistry(): PluginRegistry {
  const registry = new HandlerRegistry<PluginComponent>('Plugin');
  registry.register('web_search', webSearchPlugin);
  return registry;
}
