/**
 * Plugin and Filter decorator tests
 */

import { describe, expect, it } from 'vitest';
import {
  Filter,
  Plugin,
  getPluginClassName,
  getPluginFilters,
  getPluginMetadata,
  getPluginName,
} from '@/plugins/decorators';
import { HookDefinitionError } from '@/utils/errors';

@Plugin({ name: 'breadcrumbs' })
class BreadcrumbsPlugin {
  @Filter({ mode: 'result' })
  getContext(context: Record<string, unknown>): Record<string, unknown> {
    return context;
  }

  @Filter({ mode: 'observer', hook: 'getMedia', priority: 'LOW', order: 1 })
  trackMedia(): void {}
}

@Plugin({ name: 'breadcrumbs-extended' })
class ExtendedBreadcrumbsPlugin extends BreadcrumbsPlugin {
  @Filter({ mode: 'continuation', priority: 'HIGHEST' })
  getContext(context: Record<string, unknown>): Record<string, unknown> {
    return context;
  }

  @Filter({ mode: 'result', hook: 'getNavMenu' })
  extendMenu(menu: unknown[]): unknown[] {
    return menu;
  }
}

class UndecoratedPlugin {}

describe('@Plugin', () => {
  it('stores the plugin metadata on the class', () => {
    expect(getPluginMetadata(BreadcrumbsPlugin)).toEqual({ name: 'breadcrumbs', pluginClass: BreadcrumbsPlugin });
  });

  it('names instances and classes by the decorator name', () => {
    expect(getPluginName(new ExtendedBreadcrumbsPlugin())).toBe('breadcrumbs-extended');
    expect(getPluginClassName(BreadcrumbsPlugin)).toBe('breadcrumbs');
  });

  it('falls back to the class name for undecorated plugins', () => {
    expect(getPluginName(new UndecoratedPlugin())).toBe('UndecoratedPlugin');
    expect(getPluginMetadata(UndecoratedPlugin)).toBeUndefined();
  });

  it('rejects an empty name', () => {
    expect(() => {
      @Plugin({ name: '' })
      class Nameless {}
      return Nameless;
    }).toThrow(HookDefinitionError);
  });
});

describe('@Filter', () => {
  it('records hook, mode and priority per method', () => {
    expect(getPluginFilters(new BreadcrumbsPlugin())).toEqual([
      { hookName: 'getContext', mode: 'result', priority: 10, methodName: 'getContext' },
      { hookName: 'getMedia', mode: 'observer', priority: 16, methodName: 'trackMedia' },
    ]);
  });

  it('lets a subclass replace an inherited declaration', () => {
    expect(getPluginFilters(new ExtendedBreadcrumbsPlugin())).toEqual([
      { hookName: 'getMedia', mode: 'observer', priority: 16, methodName: 'trackMedia' },
      { hookName: 'getContext', mode: 'continuation', priority: 0, methodName: 'getContext' },
      { hookName: 'getNavMenu', mode: 'result', priority: 10, methodName: 'extendMenu' },
    ]);
  });

  it('has no filters on an undecorated plugin', () => {
    expect(getPluginFilters(new UndecoratedPlugin())).toEqual([]);
  });
});
