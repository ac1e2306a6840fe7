// Filter Registry - finds the plugin filters that apply to one hook call

import { getPluginFilters, getPluginName } from '@/plugins/decorators';
import { logger } from '@/utils/logger';
import type { FilterStage } from './types';

/**
 * Collect the stages for `hookName` from a host's active plugins.
 *
 * Plugins without a filter for the hook are skipped. The result is sorted by
 * priority; the sort is stable, so equal priorities keep plugin attachment order.
 */
export function collectFilters<R = unknown>(plugins: readonly object[], hookName: string): FilterStage<R>[] {
  const stages: FilterStage<R>[] = [];

  for (const plugin of plugins) {
    for (const filter of getPluginFilters(plugin)) {
      if (filter.hookName !== hookName) {
        continue;
      }

      const pluginName = getPluginName(plugin);
      const method: unknown = Reflect.get(plugin, filter.methodName);
      if (typeof method !== 'function') {
        logger.warn(`[FilterRegistry] Filter method ${filter.methodName} not found in plugin ${pluginName}`);
        continue;
      }

      const base = { hookName, priority: filter.priority, pluginName };
      switch (filter.mode) {
        case 'observer':
          stages.push({ ...base, mode: 'observer', invoke: () => Reflect.apply(method, plugin, []) });
          break;
        case 'continuation':
          stages.push({
            ...base,
            mode: 'continuation',
            invoke: (next, args) => Reflect.apply(method, plugin, [next, ...args]),
          });
          break;
        case 'result':
          stages.push({
            ...base,
            mode: 'result',
            invoke: (result, args) => Reflect.apply(method, plugin, [result, ...args]),
          });
          break;
      }
    }
  }

  return stages.sort((a, b) => a.priority - b.priority);
}
