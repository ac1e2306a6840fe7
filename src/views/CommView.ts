// Common admin view - navigation menu, site title, model icons, user messages

import { FilterHook } from '@/hooks/FilterHook';
import type { MessageLevel, ModelDescriptor } from '@/sites/types';
import { logger } from '@/utils/logger';
import { BaseView, type ViewContext } from './BaseView';
import {
  capfirst,
  collectMenuUrls,
  compareTitles,
  filterMenuForUser,
  markSelected,
  parseNavMenu,
  titleCase,
  type NavMenuItem,
} from './NavMenu';

export const NAV_MENU_SESSION_KEY = 'nav_menu';

export interface CommViewContext extends ViewContext {
  navMenu: NavMenuItem[];
  siteTitle: string;
}

export class CommView extends BaseView {
  siteTitle: string | null = null;
  globalModelIcons = new Map<ModelDescriptor, string>();

  /**
   * Hand-written menu entries placed before the generated model groups.
   */
  getSiteMenu(): NavMenuItem[] | null {
    return null;
  }

  /**
   * Site menu followed by one group per app, holding the registered models
   * the site menu does not already link to. Groups and their entries are
   * sorted by title.
   */
  @FilterHook()
  getNavMenu(): NavMenuItem[] {
    const siteMenu = [...(this.getSiteMenu() ?? [])];
    const linkedUrls = collectMenuUrls(siteMenu);

    const appGroups = new Map<string, NavMenuItem & { menus: NavMenuItem[] }>();
    for (const model of this.site.getRegisteredModels()) {
      const entry: NavMenuItem = {
        title: capfirst(model.verboseNamePlural),
        url: this.getModelUrl(model, 'changelist'),
        icon: this.getModelIcon(model),
        perm: this.getModelPerm(model, 'view'),
      };
      if (entry.url !== undefined && linkedUrls.has(entry.url)) {
        continue;
      }

      const appKey = `app:${model.appLabel}`;
      const group = appGroups.get(appKey);
      if (group) {
        group.menus.push(entry);
      } else {
        appGroups.set(appKey, { title: titleCase(model.appLabel), menus: [entry] });
      }
    }

    const groups = Array.from(appGroups.values());
    for (const group of groups) {
      group.menus.sort(compareTitles);
    }
    groups.sort(compareTitles);

    return [...siteMenu, ...groups];
  }

  private loadNavMenu(): NavMenuItem[] {
    const session = this.request.session;
    const useCache = !this.site.config.isDebug();

    if (useCache) {
      const cached = session.get(NAV_MENU_SESSION_KEY);
      if (cached !== undefined) {
        const menu = parseNavMenu(cached);
        if (menu) {
          return menu;
        }
        logger.warn(`[CommView] Discarding malformed cached navigation menu for ${this.user.username}`);
        session.delete(NAV_MENU_SESSION_KEY);
      }
    }

    const menu = filterMenuForUser(this.getNavMenu(), this.user);
    if (useCache) {
      session.set(NAV_MENU_SESSION_KEY, JSON.stringify(menu));
    }
    return menu;
  }

  /**
   * Adds the permission-filtered navigation menu, with entries matching the
   * request path flagged `selected`, and the site title.
   */
  @FilterHook()
  getContext(): CommViewContext {
    const context = super.getContext();

    const navMenu = this.loadNavMenu();
    for (const item of navMenu) {
      markSelected(item, this.request.path);
    }

    return {
      ...context,
      navMenu,
      siteTitle: this.siteTitle ?? this.site.title,
    };
  }

  @FilterHook()
  getModelIcon(model: ModelDescriptor): string | null {
    const icon = this.globalModelIcons.get(model);
    if (icon !== undefined) {
      return icon;
    }
    return this.site.getModelAdmin(model)?.icon ?? null;
  }

  /**
   * Queue a message for the user through the site's message sink.
   */
  @FilterHook()
  messageUser(message: string, level: MessageLevel = 'info'): void {
    const sink = this.site.messages;
    if (!sink) {
      logger.debug(`[CommView] No message sink configured, dropping ${level} message: ${message}`);
      return;
    }
    sink.add(this.request, level, message);
  }
}
