// FilterHook decorator - makes a host method interceptable by plugins

import { HookDefinitionError } from '@/utils/errors';
import { collectFilters } from './FilterRegistry';
import { runFilterChain } from './FilterChain';
import type { Continuation, HookHost } from './types';

export interface FilterHookOptions {
  /** Hook name plugins target. Defaults to the method name. */
  name?: string;
}

/**
 * Marks a host method as a hook.
 *
 * On each call the host's active plugins are searched for filters on the hook
 * and the call runs through their chain. Without active plugins the method is
 * called directly. Every call is filtered, including `super` calls from an
 * override and recursive calls from the method itself.
 */
export function FilterHook(options: FilterHookOptions = {}) {
  return function <A extends unknown[], R>(
    _target: HookHost,
    propertyKey: string,
    descriptor: TypedPropertyDescriptor<(...args: A) => R>,
  ): TypedPropertyDescriptor<(...args: A) => R> {
    const original = descriptor.value;
    if (typeof original !== 'function') {
      throw new HookDefinitionError(`@FilterHook can only decorate methods, "${propertyKey}" is not one`);
    }

    const hookName = options.name ?? propertyKey;

    descriptor.value = function (this: HookHost, ...args: A): R {
      const base: Continuation<R> = () => original.apply(this, args);

      const plugins = this.plugins;
      if (plugins.length === 0) {
        return base();
      }

      return runFilterChain(collectFilters<R>(plugins, hookName), base, args);
    };

    return descriptor;
  };
}
