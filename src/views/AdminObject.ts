// Helpers shared by views and plugins

import type { AdminSite } from '@/sites/AdminSite';
import type { AdminRequest, AdminResponse, AdminUser, ModelDescriptor, RouteMatch } from '@/sites/types';
import { AdminError } from '@/utils/errors';
import { encodeJson } from '@/utils/json';
import type { BaseView, ViewClass } from './BaseView';
import type { ModelView } from './ModelView';

export type QueryParamValue = string | number | boolean | null | undefined;

export type ResponseType = 'json' | 'text';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export abstract class AdminObject {
  abstract readonly site: AdminSite;
  abstract readonly request: AdminRequest;
  abstract readonly user: AdminUser;

  /**
   * Another view for the current request, already initialized
   */
  getView<V extends BaseView>(viewClass: ViewClass<V>, route?: RouteMatch): V {
    return this.site.createView(viewClass, this.request, route);
  }

  /**
   * A model view for the current request, bound to `model`
   */
  getModelView<V extends ModelView>(viewClass: ViewClass<V>, model: ModelDescriptor, route?: RouteMatch): V {
    return this.site.createModelView(viewClass, model, this.request, route);
  }

  /**
   * URL of a named admin route, within the site's namespace
   */
  getAdminUrl(name: string, ...args: string[]): string {
    return this.site.reverse(name, ...args);
  }

  /**
   * URL of a model route, e.g. `getModelUrl(user, 'changelist')` reverses `auth_user_changelist`
   */
  getModelUrl(model: ModelDescriptor, name: string, ...args: string[]): string {
    return this.site.reverse(`${model.appLabel}_${model.modelName}_${name}`, ...args);
  }

  /**
   * Permission code for an action on a model, e.g. `auth.view_user`
   */
  getModelPerm(model: ModelDescriptor, name: string): string {
    return `${model.appLabel}.${name}_${model.modelName}`;
  }

  /**
   * Change permission implies view permission.
   */
  hasModelPerm(model: ModelDescriptor, name: string, user: AdminUser = this.user): boolean {
    return user.hasPerm(this.getModelPerm(model, name)) || (name === 'view' && this.hasModelPerm(model, 'change', user));
  }

  private mergeQueryParams(newParams: Record<string, QueryParamValue>, remove: readonly string[]): Map<string, string> {
    const params = new Map(Object.entries(this.request.query));
    for (const prefix of remove) {
      for (const key of Array.from(params.keys())) {
        if (key.startsWith(prefix)) {
          params.delete(key);
        }
      }
    }
    for (const [key, value] of Object.entries(newParams)) {
      if (value === null || value === undefined) {
        params.delete(key);
      } else {
        params.set(key, String(value));
      }
    }
    return params;
  }

  /**
   * Current query string with parameters added, replaced or removed.
   * @param remove - key prefixes to drop
   */
  getQueryString(newParams: Record<string, QueryParamValue> = {}, remove: readonly string[] = []): string {
    return `?${new URLSearchParams(Array.from(this.mergeQueryParams(newParams, remove))).toString()}`;
  }

  /**
   * Same parameters as {@link getQueryString}, as hidden form inputs. Empty values are left out.
   */
  getFormParams(newParams: Record<string, QueryParamValue> = {}, remove: readonly string[] = []): string {
    return Array.from(this.mergeQueryParams(newParams, remove))
      .filter(([, value]) => value !== '')
      .map(([key, value]) => `<input type="hidden" name="${escapeHtml(key)}" value="${escapeHtml(value)}"/>`)
      .join('');
  }

  renderResponse(content: unknown, responseType: ResponseType = 'json'): AdminResponse {
    if (responseType === 'json') {
      return {
        status: 200,
        headers: { 'Content-Type': 'application/json; charset=UTF-8' },
        body: encodeJson(content),
      };
    }
    return {
      status: 200,
      headers: { 'Content-Type': 'text/html; charset=utf-8' },
      body: String(content),
    };
  }

  templateResponse(templates: string | readonly string[], context: Readonly<Record<string, unknown>>): AdminResponse {
    const renderer = this.site.renderer;
    if (!renderer) {
      throw new AdminError(`Site "${this.site.name}" has no template renderer`, 'NO_TEMPLATE_RENDERER');
    }
    const candidates = typeof templates === 'string' ? [templates] : templates;
    return {
      status: 200,
      headers: { 'Content-Type': 'text/html; charset=utf-8' },
      body: renderer.render(candidates, context, this.request),
    };
  }

  static(path: string): string {
    return this.site.staticUrl(path);
  }
}
