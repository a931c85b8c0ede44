import {
  COMPONENT_TYPES,
  isComponentOfType,
  type Component,
  type ComponentOfType,
  type ComponentType,
} from '@flowgraph/shared';

import { ComponentError } from './errors';
import type { ComponentExecutor, ComponentExecutorMap, ComponentHandler } from './types';

/**
 * Dispatch table from a component's declared type to the executor that runs it.
 * Built once at start-up and handed to the scheduler.
 */
export class ComponentRegistry {
  private readonly executors = new Map<ComponentType, ComponentExecutor<Component>>();

  static fromMap(map: ComponentExecutorMap): ComponentRegistry {
    const registry = new ComponentRegistry();
    registry.register('agent', map.agent);
    registry.register('plugin', map.plugin);
    registry.register('data_source', map.data_source);
    registry.register('input', map.input);
    registry.register('output', map.output);
    return registry;
  }

  register<K extends ComponentType>(type: K, executor: ComponentExecutor<ComponentOfType<K>>): void {
    if (this.executors.has(type)) {
      throw new Error(`Executor for component type ${type} is already registered`);
    }
    this.executors.set(type, {
      execute: (component, inputs, context) => {
        if (!isComponentOfType(component, type)) {
          throw new ComponentError(
            `Executor for ${type} cannot run component of type ${component.type}`,
            'TypeMismatch',
          );
        }
        return executor.execute(component, inputs, context);
      },
    });
  }

  get(type: ComponentType): ComponentExecutor<Component> | undefined {
    return this.executors.get(type);
  }

  has(type: ComponentType): boolean {
    return this.executors.has(type);
  }

  types(): ComponentType[] {
    return COMPONENT_TYPES.filter((type) => this.executors.has(type));
  }
}

/**
 * Open, string-keyed registry of named handlers (plugin types, data-source
 * types). Separate from `ComponentRegistry` because the set of names is not
 * known at compile time.
 */
export class HandlerRegistry<C extends Component = Component> {
  private readonly handlers = new Map<string, ComponentHandler<C>>();

  constructor(private readonly kind: string) {}

  register(name: string, handler: ComponentHandler<C>): void {
    if (this.handlers.has(name)) {
      throw new Error(`${this.kind} handler ${name} is already registered`);
    }
    this.handlers.set(name, handler);
  }

  unregister(name: string): boolean {
    return this.handlers.delete(name);
  }

  get(name: string): ComponentHandler<C> | undefined {
    return this.handlers.get(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  list(): string[] {
    return Array.from(this.handlers.keys());
  }
}
