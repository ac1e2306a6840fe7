// Plugin and Filter decorators for declarative registration

import { getFilterPriority, type HookPriorityVariant } from '@/hooks/HookPriority';
import type { FilterMode } from '@/hooks/types';
import { HookDefinitionError } from '@/utils/errors';

/**
 * Plugin decorator options
 */
export interface PluginOptions {
  name: string;
}

/**
 * Filter decorator options
 */
export interface FilterOptions {
  mode: FilterMode;
  /** Host method to intercept. Defaults to the decorated method's own name. */
  hook?: string;
  priority?: number | HookPriorityVariant; // Default: NORMAL (10)
  /** Offset added to the priority */
  order?: number;
}

/**
 * Plugin metadata stored per class
 */
export interface PluginMetadata extends PluginOptions {
  pluginClass: object;
}

/**
 * Filter metadata stored per class prototype
 */
export interface FilterMetadata {
  hookName: string;
  mode: FilterMode;
  priority: number;
  methodName: string;
}

// Plugin metadata keyed by constructor
const pluginMetadata = new WeakMap<object, PluginMetadata>();

// Filter metadata keyed by the prototype that declared the method
const filterMetadata = new WeakMap<object, FilterMetadata[]>();

/**
 * Plugin decorator
 * Records the plugin's name, used in logs and by the `plugins.disabled` config.
 */
export function Plugin(options: PluginOptions) {
  return function <T extends abstract new () => object>(target: T): T {
    if (!options.name) {
      throw new HookDefinitionError(`@Plugin on ${target.name} needs a non-empty name`);
    }

    const metadata: PluginMetadata = { ...options, pluginClass: target };
    pluginMetadata.set(target, metadata);

    return target;
  };
}

/**
 * Filter decorator
 * Declares a plugin method as a stage in the filter chain of a host method.
 *
 * ```ts
 * @Filter({ mode: 'result', priority: 'LOW' })
 * getContext(context: ViewContext): ViewContext {
 *   return { ...context, sidebar: this.buildSidebar() };
 * }
 * ```
 */
export function Filter(options: FilterOptions) {
  return function (target: object, propertyKey: string, descriptor: PropertyDescriptor): PropertyDescriptor {
    if (typeof descriptor.value !== 'function') {
      throw new HookDefinitionError(`@Filter can only decorate methods, "${propertyKey}" is not one`);
    }

    const metadata: FilterMetadata = {
      hookName: options.hook ?? propertyKey,
      mode: options.mode,
      priority: getFilterPriority(options.priority, options.order),
      methodName: propertyKey,
    };

    const declared = filterMetadata.get(target);
    if (declared) {
      declared.push(metadata);
    } else {
      filterMetadata.set(target, [metadata]);
    }

    return descriptor;
  };
}

/**
 * Get plugin metadata from class
 */
export function getPluginMetadata(pluginClass: object): PluginMetadata | undefined {
  return pluginMetadata.get(pluginClass);
}

/**
 * Name of a plugin class: its `@Plugin` name, or the class name when undecorated
 */
export function getPluginClassName(pluginClass: abstract new () => object): string {
  return pluginMetadata.get(pluginClass)?.name ?? pluginClass.name;
}

/**
 * Name of a plugin instance
 */
export function getPluginName(plugin: object): string {
  return pluginMetadata.get(plugin.constructor)?.name ?? plugin.constructor.name;
}

/**
 * Filters declared by a plugin instance's class and its base classes.
 * A subclass redeclaring a method replaces the base class declaration for it.
 */
export function getPluginFilters(plugin: object): FilterMetadata[] {
  const prototypes: object[] = [];
  let current: object | null = Object.getPrototypeOf(plugin);
  while (current && current !== Object.prototype) {
    prototypes.unshift(current);
    current = Object.getPrototypeOf(current);
  }

  const byMethod = new Map<string, FilterMetadata[]>();
  for (const prototype of prototypes) {
    const declared = filterMetadata.get(prototype);
    if (!declared) {
      continue;
    }
    const redeclared = new Set<string>();
    for (const metadata of declared) {
      if (!redeclared.has(metadata.methodName)) {
        redeclared.add(metadata.methodName);
        byMethod.delete(metadata.methodName);
      }
      const list = byMethod.get(metadata.methodName) ?? [];
      list.push(metadata);
      byMethod.set(metadata.methodName, list);
    }
  }

  return Array.from(byMethod.values()).flat();
}
