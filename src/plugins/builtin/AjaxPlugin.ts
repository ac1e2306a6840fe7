// Ajax Plugin - marks the view context of XHR requests

import type { Continuation } from '@/hooks/types';
import type { AdminRequest } from '@/sites/types';
import type { ViewContext } from '@/views/BaseView';
import { Filter, Plugin } from '../decorators';
import { PluginBase } from '../PluginBase';

export function isAjaxRequest(request: AdminRequest): boolean {
  const requestedWith = request.headers['x-requested-with'] ?? request.headers['X-Requested-With'];
  return requestedWith === 'XMLHttpRequest' || Boolean(request.query._ajax);
}

/**
 * Only loaded for XHR requests (or `?_ajax`); templates read `isAjax` to skip
 * the page chrome.
 */
@Plugin({ name: 'ajax' })
export class AjaxPlugin extends PluginBase {
  initRequest(): boolean {
    return isAjaxRequest(this.request);
  }

  @Filter({ mode: 'continuation', priority: 'HIGH' })
  getContext(next: Continuation<ViewContext>): ViewContext {
    return { ...next(), isAjax: true };
  }
}
