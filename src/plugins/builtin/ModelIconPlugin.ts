// Model Icon Plugin - fallback icon for models that declare none

import type { CommView } from '@/views/CommView';
import { Filter, Plugin } from '../decorators';
import { PluginBase } from '../PluginBase';

/**
 * Supplies the configured `defaultModelIcon` to models without an icon.
 */
@Plugin({ name: 'model-icon' })
export class ModelIconPlugin extends PluginBase<CommView> {
  private fallbackIcon: string | null = null;

  initRequest(): boolean {
    this.fallbackIcon = this.site.config.getDefaultModelIcon();
    return this.fallbackIcon !== null;
  }

  @Filter({ mode: 'result', priority: 'LOW' })
  getModelIcon(icon: string | null): string | null {
    return icon ?? this.fallbackIcon;
  }
}
