// Plugin type definitions

import type { AdminRequest, AdminUser, RouteMatch } from '@/sites/types';
import type { BaseView } from '@/views/BaseView';
import type { PluginBase } from './PluginBase';

/**
 * Request-scoped references handed to a plugin when it is attached to a view
 */
export interface PluginContext<V extends BaseView = BaseView> {
  view: V;
  request: AdminRequest;
  user: AdminUser;
  route: RouteMatch;
}

export type PluginClass<V extends BaseView = BaseView> = new () => PluginBase<V>;
