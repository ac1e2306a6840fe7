// Base class for plugins

import type { AdminSite } from '@/sites/AdminSite';
import type { AdminRequest, AdminUser, ModelDescriptor, RouteMatch } from '@/sites/types';
import { AdminObject } from '@/views/AdminObject';
import type { BaseView } from '@/views/BaseView';
import { ModelView } from '@/views/ModelView';
import { getPluginName } from './decorators';
import type { PluginContext } from './types';

/**
 * A plugin lives for one request, bound to exactly one view. Filters are
 * declared with `@Filter` on methods named after (or targeting) view hooks.
 */
export abstract class PluginBase<V extends BaseView = BaseView> extends AdminObject {
  private context?: PluginContext<V>;

  /**
   * Bind the plugin to its view. Called once by the plugin initializer,
   * right after construction.
   */
  attach(context: PluginContext<V>): void {
    if (this.context) {
      throw new Error(`Plugin ${this.name} is already attached to a view`);
    }
    this.context = context;
  }

  /**
   * Opt-in check, run once per request before any hook.
   * Returning `false` leaves the plugin out of the view's active plugins;
   * any other result keeps it.
   */
  initRequest(_route: RouteMatch): boolean | void {
    return undefined;
  }

  get name(): string {
    return getPluginName(this);
  }

  get isAttached(): boolean {
    return this.context !== undefined;
  }

  private requireContext(): PluginContext<V> {
    if (!this.context) {
      throw new Error('Plugin context not initialized');
    }
    return this.context;
  }

  get view(): V {
    return this.requireContext().view;
  }

  get site(): AdminSite {
    return this.requireContext().view.site;
  }

  get request(): AdminRequest {
    return this.requireContext().request;
  }

  get user(): AdminUser {
    return this.requireContext().user;
  }

  get route(): RouteMatch {
    return this.requireContext().route;
  }

  /**
   * Model of the view, when the view is a model view
   */
  get model(): ModelDescriptor | null {
    const view = this.view;
    return view instanceof ModelView ? view.model : null;
  }
}
