/**
 * BaseView hook tests
 *
 * Plugins registered on a site, attached to real views and run through the
 * `@FilterHook` methods.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Continuation } from '@/hooks/types';
import { FilterHook } from '@/hooks/FilterHook';
import { Filter, Plugin } from '@/plugins/decorators';
import { PluginBase } from '@/plugins/PluginBase';
import type { AdminSite } from '@/sites/AdminSite';
import type { AdminResponse } from '@/sites/types';
import { IncorrectPluginArgumentError, MethodNotAllowedError, ViewLifecycleError } from '@/utils/errors';
import { BaseView, type ViewContext } from '@/views/BaseView';
import { Media } from '@/views/Media';
import { createRequest, createSite } from '../helpers/fakes';

const calls: string[] = [];

@Plugin({ name: 'outer-x' })
class OuterXPlugin extends PluginBase {
  @Filter({ mode: 'continuation', priority: 5 })
  getContext(next: Continuation<ViewContext>): ViewContext {
    calls.push('outer-x');
    return { ...next(), x: 1 };
  }
}

@Plugin({ name: 'inner-y' })
class InnerYPlugin extends PluginBase {
  @Filter({ mode: 'result', priority: 20 })
  getContext(context: ViewContext): ViewContext {
    calls.push('inner-y');
    return { ...context, y: 2 };
  }
}

@Plugin({ name: 'tag-a' })
class TagAPlugin extends PluginBase {
  @Filter({ mode: 'result' })
  getContext(context: ViewContext): ViewContext {
    return { ...context, tags: [...tagsOf(context), 'a'] };
  }
}

@Plugin({ name: 'tag-b' })
class TagBPlugin extends PluginBase {
  @Filter({ mode: 'result' })
  getContext(context: ViewContext): ViewContext {
    return { ...context, tags: [...tagsOf(context), 'b'] };
  }
}

function tagsOf(context: ViewContext): string[] {
  const tags = context.tags;
  return Array.isArray(tags) ? tags.map(String) : [];
}

@Plugin({ name: 'query-gated' })
class QueryGatedPlugin extends PluginBase {
  initRequest(): boolean {
    return this.request.query.gated === '1';
  }

  @Filter({ mode: 'result' })
  getContext(context: ViewContext): ViewContext {
    return { ...context, gated: true };
  }
}

@Plugin({ name: 'failing-init' })
class FailingInitPlugin extends PluginBase {
  initRequest(): boolean {
    throw new Error('init failed');
  }
}

@Plugin({ name: 'misdeclared-observer' })
class MisdeclaredObserverPlugin extends PluginBase {
  @Filter({ mode: 'observer' })
  getContext(): ViewContext | undefined {
    return undefined;
  }
}

@Plugin({ name: 'extra-assets' })
class ExtraAssetsPlugin extends PluginBase {
  @Filter({ mode: 'result' })
  getMedia(media: Media): Media {
    return media.merge({ js: ['extra.js'] });
  }
}

@Plugin({ name: 'greeting' })
class GreetingPlugin extends PluginBase<GreetingView> {
  @Filter({ mode: 'result', hook: 'greet' })
  shout(greeting: string, name: string): string {
    return `${greeting.toUpperCase()} (${name} via ${this.view.constructor.name})`;
  }
}

class GreetingView extends BaseView {
  @FilterHook()
  greet(name: string): string {
    return `hello ${name}`;
  }

  get(): AdminResponse {
    return this.renderResponse({ greeting: this.greet('ann') });
  }
}

class OverridingView extends BaseView {
  @FilterHook()
  getContext(): ViewContext {
    return { ...super.getContext(), overridden: true };
  }
}

@Plugin({ name: 'exclaim' })
class ExclaimPlugin extends PluginBase {
  @Filter({ mode: 'result' })
  label(text: string): string {
    return `${text}!`;
  }
}

class TreeView extends BaseView {
  @FilterHook()
  label(depth: number): string {
    return depth === 0 ? 'leaf' : `(${this.label(depth - 1)})`;
  }
}

function build(site: AdminSite, query: Record<string, string> = {}): BaseView {
  return site.createView(BaseView, createRequest({ query }));
}

describe('BaseView hooks', () => {
  let site: AdminSite;

  beforeEach(() => {
    calls.length = 0;
    site = createSite();
  });

  it('returns the base context when no plugins are attached', () => {
    const view = build(site);

    const context = view.getContext();

    expect(Object.keys(context)).toEqual(['adminView', 'media']);
    expect(context.adminView).toBe(view);
    expect(context.media).toBeInstanceOf(Media);
    expect(context.media.isEmpty).toBe(true);
  });

  it('runs a high-priority continuation around a low-priority result filter', () => {
    site.registerPlugin(OuterXPlugin, BaseView);
    site.registerPlugin(InnerYPlugin, BaseView);

    const context = build(site).getContext();

    expect(context).toMatchObject({ x: 1, y: 2 });
    expect(Object.keys(context)).toEqual(['adminView', 'media', 'y', 'x']);
    expect(calls).toEqual(['outer-x', 'inner-y']);
  });

  it('orders by priority, not by registration order', () => {
    site.registerPlugin(InnerYPlugin, BaseView);
    site.registerPlugin(OuterXPlugin, BaseView);

    build(site).getContext();

    expect(calls).toEqual(['outer-x', 'inner-y']);
  });

  it('applies equal-priority result filters innermost-last in attachment order', () => {
    site.registerPlugin(TagAPlugin, BaseView);
    site.registerPlugin(TagBPlugin, BaseView);

    expect(build(site).getContext().tags).toEqual(['b', 'a']);
  });

  it('leaves an opted-out plugin out for the rest of the view', () => {
    site.registerPlugin(QueryGatedPlugin, BaseView);

    const skipped = build(site);
    const kept = build(site, { gated: '1' });

    expect(skipped.plugins).toEqual([]);
    expect(skipped.getContext()).not.toHaveProperty('gated');
    expect(kept.plugins).toHaveLength(1);
    expect(kept.getContext().gated).toBe(true);
  });

  it('rejects an observer filter whose inner chain returned a value', () => {
    site.registerPlugin(MisdeclaredObserverPlugin, BaseView);

    expect(() => build(site).getContext()).toThrow(IncorrectPluginArgumentError);
  });

  it('leaves hosts without plugins untouched by plugins registered elsewhere', () => {
    site.registerPlugin(OuterXPlugin, GreetingView);

    expect(build(site).getContext()).not.toHaveProperty('x');
  });

  it('passes hook arguments and the view to a renamed filter method', () => {
    site.registerPlugin(GreetingPlugin, GreetingView);
    const view = site.createView(GreetingView, createRequest());

    expect(view.greet('bob')).toBe('HELLO BOB (bob via GreetingView)');
  });

  it('filters media through its own hook', () => {
    site.registerPlugin(ExtraAssetsPlugin, BaseView);

    expect(build(site).getContext().media.js).toEqual(['extra.js']);
  });

  it('filters the super call of an overriding hook as well', () => {
    site.registerPlugin(TagAPlugin, BaseView);
    const view = site.createView(OverridingView, createRequest());

    const context = view.getContext();

    expect(context.tags).toEqual(['a', 'a']);
    expect(context.overridden).toBe(true);
  });

  it('filters every level of a recursive hook', () => {
    site.registerPlugin(ExclaimPlugin, TreeView);
    const view = site.createView(TreeView, createRequest());

    expect(view.label(2)).toBe('((leaf!)!)!');
  });

  it('runs each inherited plugin before the subclass plugins', () => {
    site.registerPlugin(TagAPlugin, BaseView);
    site.registerPlugin(TagBPlugin, OverridingView);

    expect(site.getPluginClasses(OverridingView)).toEqual([TagAPlugin, TagBPlugin]);
    expect(site.getPluginClasses(BaseView)).toEqual([TagAPlugin]);
  });

  it('skips plugins disabled in the config', () => {
    const disabledSite = createSite({ plugins: { disabled: ['outer-x'] } });
    disabledSite.registerPlugin(OuterXPlugin, BaseView);
    disabledSite.registerPlugin(InnerYPlugin, BaseView);

    const view = build(disabledSite);

    expect(view.plugins.map((plugin) => plugin.name)).toEqual(['inner-y']);
    expect(view.getContext()).not.toHaveProperty('x');
  });

  it('propagates errors thrown by a filter', () => {
    const failure = new Error('context failed');
    const spy = vi.spyOn(InnerYPlugin.prototype, 'getContext').mockImplementation(() => {
      throw failure;
    });
    site.registerPlugin(InnerYPlugin, BaseView);

    try {
      expect(() => build(site).getContext()).toThrow(failure);
    } finally {
      spy.mockRestore();
    }
  });
});

describe('BaseView lifecycle', () => {
  it('refuses hook calls before initialize()', () => {
    const view = new BaseView(createSite(), createRequest());

    expect(view.isInitialized).toBe(false);
    expect(() => view.getContext()).toThrow(ViewLifecycleError);
  });

  it('refuses a second initialize()', () => {
    const view = new BaseView(createSite(), createRequest()).initialize();

    expect(() => view.initialize()).toThrow(ViewLifecycleError);
  });

  it('freezes the active plugin list', () => {
    const site = createSite();
    site.registerPlugin(TagAPlugin, BaseView);
    const view = build(site);

    expect(Object.isFrozen(view.plugins)).toBe(true);
  });

  it('attaches each plugin to its view and request', () => {
    const site = createSite();
    site.registerPlugin(TagAPlugin, BaseView);
    const request = createRequest({ path: '/admin/auth/' });
    const view = site.createView(BaseView, request);

    const [plugin] = view.plugins;

    expect(plugin.view).toBe(view);
    expect(plugin.request).toBe(request);
    expect(plugin.user).toBe(request.user);
    expect(plugin.site).toBe(site);
  });

  it('propagates errors from a plugin opt-in check', () => {
    const site = createSite();
    site.registerPlugin(FailingInitPlugin, BaseView);
    const view = new BaseView(site, createRequest());

    expect(() => view.initialize()).toThrow('init failed');
    expect(view.isInitialized).toBe(false);
  });

  it('reports an unattached plugin', () => {
    const plugin = new TagAPlugin();

    expect(plugin.isAttached).toBe(false);
    expect(() => plugin.view).toThrow('Plugin context not initialized');
  });
});

describe('BaseView dispatch', () => {
  it('calls the handler for the request method', () => {
    const site = createSite();
    const view = site.createView(GreetingView, createRequest());

    expect(view.dispatch()).toEqual({
      status: 200,
      headers: { 'Content-Type': 'application/json; charset=UTF-8' },
      body: '{"greeting":"hello ann"}',
    });
  });

  it('answers HEAD with the GET handler', () => {
    const view = createSite().createView(GreetingView, createRequest({ method: 'HEAD' }));

    expect(view.dispatch().body).toBe('{"greeting":"hello ann"}');
    expect(view.allowedMethods).toEqual(['GET', 'HEAD']);
  });

  it('rejects methods without a handler', () => {
    const view = createSite().createView(GreetingView, createRequest({ method: 'POST' }));

    let caught: unknown;
    try {
      view.dispatch();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MethodNotAllowedError);
    expect(caught).toMatchObject({ method: 'POST', allowed: ['GET', 'HEAD'] });
  });

  it('builds a fresh view per request through asView', () => {
    const site = createSite();
    site.registerPlugin(GreetingPlugin, GreetingView);
    const handler = site.asView(GreetingView);

    expect(handler(createRequest()).body).toBe('{"greeting":"HELLO ANN (ann via GreetingView)"}');
  });
});
