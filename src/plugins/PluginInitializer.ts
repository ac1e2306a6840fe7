// Plugin Initializer - builds a view's active plugin list

import { logger } from '@/utils/logger';
import type { BaseView } from '@/views/BaseView';
import { getPluginClassName } from './decorators';
import type { PluginBase } from './PluginBase';
import type { PluginClass } from './types';

/**
 * Plugin Initializer
 * Instantiates the plugins configured for a view and keeps those that opt in
 */
export class PluginInitializer {
  /**
   * Instantiate each plugin class (attachment order), attach it to the view and
   * run its `initRequest`. A plugin is kept unless that returns `false`.
   *
   * Errors from a constructor or from `initRequest` are not caught; the view
   * gets no plugin list at all.
   *
   * @returns the view's active plugins, frozen
   */
  static initialize<V extends BaseView>(view: V, pluginClasses: readonly PluginClass<V>[]): readonly PluginBase<V>[] {
    const config = view.site.config;
    const viewName = view.constructor.name;
    const active: PluginBase<V>[] = [];

    for (const PluginClass of pluginClasses) {
      const pluginName = getPluginClassName(PluginClass);
      if (config.isPluginDisabled(pluginName)) {
        logger.debug(`[PluginInitializer] Skipping disabled plugin ${pluginName} for ${viewName}`);
        continue;
      }

      const plugin = new PluginClass();
      plugin.attach({ view, request: view.request, user: view.user, route: view.route });

      if (plugin.initRequest(view.route) === false) {
        logger.debug(`[PluginInitializer] Plugin ${pluginName} opted out of ${viewName}`);
        continue;
      }

      active.push(plugin);
    }

    if (active.length > 0) {
      logger.debug(
        `[PluginInitializer] ${viewName} active plugins: ${active.map((plugin) => plugin.name).join(', ')}`,
      );
    }

    return Object.freeze(active);
  }
}
