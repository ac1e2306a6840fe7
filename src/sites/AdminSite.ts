// Admin site - static configuration shared by every request

import { Config } from '@/core/Config';
import { getPluginClassName } from '@/plugins/decorators';
import type { PluginClass } from '@/plugins/types';
import { AdminError, AlreadyRegisteredError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import type { BaseView, ViewClass, ViewType } from '@/views/BaseView';
import type { ModelView } from '@/views/ModelView';
import {
  EMPTY_ROUTE,
  type AdminRequest,
  type AdminResponse,
  type MessageSink,
  type ModelAdminOptions,
  type ModelDescriptor,
  type RouteMatch,
  type TemplateRenderer,
  type UrlResolver,
} from './types';

export interface AdminSiteOptions {
  config?: Config;
  urls?: UrlResolver;
  renderer?: TemplateRenderer;
  messages?: MessageSink;
}

export type ViewHandler = (request: AdminRequest, route?: RouteMatch) => AdminResponse;

/**
 * Holds which plugins attach to which view classes and which models are
 * administered. Populated at startup; views only read it.
 */
export class AdminSite {
  readonly config: Config;
  readonly renderer?: TemplateRenderer;
  readonly messages?: MessageSink;
  private readonly urls?: UrlResolver;

  private readonly models = new Map<ModelDescriptor, ModelAdminOptions<unknown>>();
  private readonly pluginRegistrations = new Map<object, PluginClass[]>();

  constructor(options: AdminSiteOptions = {}) {
    this.config = options.config ?? new Config({});
    this.urls = options.urls;
    this.renderer = options.renderer;
    this.messages = options.messages;
  }

  get name(): string {
    return this.config.getSiteConfig().name;
  }

  get title(): string {
    return this.config.getSiteConfig().title;
  }

  registerModel<T>(model: ModelDescriptor, options: ModelAdminOptions<T> = {}): void {
    if (this.models.has(model)) {
      throw new AlreadyRegisteredError(`Model ${model.appLabel}.${model.modelName} is already registered`);
    }
    this.models.set(model, options);
    logger.debug(`[AdminSite] Registered model: ${model.appLabel}.${model.modelName}`);
  }

  isRegistered(model: ModelDescriptor): boolean {
    return this.models.has(model);
  }

  getModelAdmin(model: ModelDescriptor): ModelAdminOptions<unknown> | undefined {
    return this.models.get(model);
  }

  /**
   * Registered models, in registration order
   */
  getRegisteredModels(): ModelDescriptor[] {
    return Array.from(this.models.keys());
  }

  /**
   * Attach a plugin to a view class and, through inheritance, its subclasses.
   */
  registerPlugin<V extends BaseView>(pluginClass: PluginClass<V>, viewClass: ViewType<V>): void {
    const registered = this.pluginRegistrations.get(viewClass) ?? [];
    if (registered.includes(pluginClass)) {
      logger.warn(
        `[AdminSite] Plugin ${getPluginClassName(pluginClass)} already registered on ${viewClass.name}, skipping duplicate`,
      );
      return;
    }
    registered.push(pluginClass);
    this.pluginRegistrations.set(viewClass, registered);
    logger.debug(`[AdminSite] Registered plugin ${getPluginClassName(pluginClass)} on ${viewClass.name}`);
  }

  /**
   * Plugins for a view class: those of its base classes first, then its own,
   * each in registration order.
   */
  getPluginClasses(viewClass: object): PluginClass[] {
    const hierarchy: object[] = [];
    let current: object | null = viewClass;
    while (current && current !== Function.prototype) {
      hierarchy.unshift(current);
      current = Object.getPrototypeOf(current);
    }

    const pluginClasses: PluginClass[] = [];
    for (const cls of hierarchy) {
      for (const pluginClass of this.pluginRegistrations.get(cls) ?? []) {
        if (!pluginClasses.includes(pluginClass)) {
          pluginClasses.push(pluginClass);
        }
      }
    }
    return pluginClasses;
  }

  /**
   * Reverse a route name within this site's namespace (`<site>:<name>`).
   */
  reverse(name: string, ...args: string[]): string {
    if (!this.urls) {
      throw new AdminError(`Site "${this.name}" has no URL resolver`, 'NO_URL_RESOLVER');
    }
    return this.urls.reverse(`${this.name}:${name}`, args);
  }

  staticUrl(path: string): string {
    const prefix = this.config.getSiteConfig().staticPrefix.replace(/\/+$/, '');
    return `${prefix}/${path.replace(/^\/+/, '')}`;
  }

  /**
   * Construct a view for one request and run its plugin lifecycle.
   */
  createView<V extends BaseView>(viewClass: ViewClass<V>, request: AdminRequest, route: RouteMatch = EMPTY_ROUTE): V {
    return new viewClass(this, request, route).initialize();
  }

  /**
   * Construct a model view bound to a registered model, then initialize it.
   */
  createModelView<V extends ModelView>(
    viewClass: ViewClass<V>,
    model: ModelDescriptor,
    request: AdminRequest,
    route: RouteMatch = EMPTY_ROUTE,
  ): V {
    if (!this.models.has(model)) {
      throw new AdminError(`Model ${model.appLabel}.${model.modelName} is not registered`, 'NOT_REGISTERED');
    }
    return new viewClass(this, request, route).bindModel(model).initialize();
  }

  /**
   * Request handler that builds a fresh view per request and dispatches on
   * the HTTP method.
   */
  asView<V extends BaseView>(viewClass: ViewClass<V>): ViewHandler {
    return (request, route = EMPTY_ROUTE) => this.createView(viewClass, request, route).dispatch(route);
  }
}
