// Base admin view - the host object plugins attach to

import { FilterHook } from '@/hooks/FilterHook';
import { PluginInitializer } from '@/plugins/PluginInitializer';
import type { PluginBase } from '@/plugins/PluginBase';
import type { AdminSite } from '@/sites/AdminSite';
import { EMPTY_ROUTE, type AdminRequest, type AdminResponse, type AdminUser, type RouteMatch } from '@/sites/types';
import { MethodNotAllowedError, ViewLifecycleError } from '@/utils/errors';
import { AdminObject } from './AdminObject';
import { Media } from './Media';

export const HTTP_METHOD_NAMES = ['get', 'post', 'put', 'patch', 'delete', 'head', 'options', 'trace'] as const;

export type HttpMethodName = (typeof HTTP_METHOD_NAMES)[number];

export type RequestHandler = (route: RouteMatch) => AdminResponse;

export interface ViewContext {
  adminView: BaseView;
  media: Media;
  [key: string]: unknown;
}

/** Concrete view class, constructible by the site */
export type ViewClass<V extends BaseView = BaseView> = new (site: AdminSite, request: AdminRequest, route?: RouteMatch) => V;

/** Any view class, abstract ones included; used for plugin registration */
export type ViewType<V extends BaseView = BaseView> = abstract new (
  site: AdminSite,
  request: AdminRequest,
  route?: RouteMatch,
) => V;

/**
 * One instance per request. `initialize()` must run before any hook: it fixes
 * the active plugin list for the rest of the view's life.
 */
export class BaseView extends AdminObject {
  readonly requestMethod: string;
  private activePlugins?: readonly PluginBase[];

  get?(route: RouteMatch): AdminResponse;
  post?(route: RouteMatch): AdminResponse;
  put?(route: RouteMatch): AdminResponse;
  patch?(route: RouteMatch): AdminResponse;
  delete?(route: RouteMatch): AdminResponse;
  head?(route: RouteMatch): AdminResponse;
  options?(route: RouteMatch): AdminResponse;
  trace?(route: RouteMatch): AdminResponse;

  constructor(
    readonly site: AdminSite,
    readonly request: AdminRequest,
    readonly route: RouteMatch = EMPTY_ROUTE,
  ) {
    super();
    this.requestMethod = request.method.toLowerCase();
  }

  get user(): AdminUser {
    return this.request.user;
  }

  get args(): readonly string[] {
    return this.route.args;
  }

  get kwargs(): Readonly<Record<string, string>> {
    return this.route.kwargs;
  }

  get isInitialized(): boolean {
    return this.activePlugins !== undefined;
  }

  get plugins(): readonly PluginBase[] {
    if (!this.activePlugins) {
      throw new ViewLifecycleError(`${this.constructor.name} used before initialize()`);
    }
    return this.activePlugins;
  }

  /**
   * Instantiate and opt-in check the plugins registered for this view class,
   * then run the view's own `initRequest`.
   */
  initialize(): this {
    if (this.activePlugins) {
      throw new ViewLifecycleError(`${this.constructor.name} is already initialized`);
    }
    this.activePlugins = PluginInitializer.initialize<BaseView>(this, this.site.getPluginClasses(this.constructor));
    this.initRequest(this.route);
    return this;
  }

  protected initRequest(_route: RouteMatch): void {}

  /**
   * Handler for the request method. `head` falls back to `get`.
   */
  getHandler(method: string = this.requestMethod): RequestHandler | undefined {
    const name = HTTP_METHOD_NAMES.find((candidate) => candidate === method.toLowerCase());
    if (!name) {
      return undefined;
    }
    const handler = this[name] ?? (name === 'head' ? this.get : undefined);
    return handler?.bind(this);
  }

  get allowedMethods(): string[] {
    return HTTP_METHOD_NAMES.filter((name) => this.getHandler(name) !== undefined).map((name) => name.toUpperCase());
  }

  dispatch(route: RouteMatch = this.route): AdminResponse {
    const handler = this.getHandler();
    if (!handler) {
      throw new MethodNotAllowedError(
        `Method ${this.request.method.toUpperCase()} not allowed on ${this.constructor.name}`,
        this.request.method.toUpperCase(),
        this.allowedMethods,
      );
    }
    return handler(route);
  }

  @FilterHook()
  getContext(): ViewContext {
    return { adminView: this, media: this.media };
  }

  get media(): Media {
    return this.getMedia();
  }

  @FilterHook()
  getMedia(): Media {
    return new Media();
  }
}
