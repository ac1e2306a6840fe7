// Model admin view - a view bound to one registered model

import { FilterHook } from '@/hooks/FilterHook';
import type { ModelDescriptor, ModelRepository } from '@/sites/types';
import { AdminError, ViewLifecycleError } from '@/utils/errors';
import { CommView } from './CommView';

export interface ModelPerms {
  view: boolean;
  add: boolean;
  change: boolean;
  delete: boolean;
}

/**
 * Subclasses dedicated to one model set `defaultModel`; generic ones are bound
 * per request with `bindModel` (see `AdminSite.createModelView`).
 */
export class ModelView extends CommView {
  protected readonly defaultModel?: ModelDescriptor;
  private boundModel?: ModelDescriptor;
  ordering: readonly string[] | null = null;

  get model(): ModelDescriptor {
    const model = this.boundModel ?? this.defaultModel;
    if (!model) {
      throw new ViewLifecycleError(`${this.constructor.name} is not bound to a model`);
    }
    return model;
  }

  bindModel(model: ModelDescriptor): this {
    if (this.isInitialized) {
      throw new ViewLifecycleError(`${this.constructor.name} must be bound to a model before initialize()`);
    }
    this.boundModel = model;
    return this;
  }

  get appLabel(): string {
    return this.model.appLabel;
  }

  get modelName(): string {
    return this.model.modelName;
  }

  /**
   * Repository registered for the model on the site
   */
  queryset(): ModelRepository<unknown> {
    const repository = this.site.getModelAdmin(this.model)?.repository;
    if (!repository) {
      throw new AdminError(`No repository registered for ${this.appLabel}.${this.modelName}`, 'NO_REPOSITORY');
    }
    return repository;
  }

  /**
   * Object with the given primary key, or `null` when there is none.
   */
  @FilterHook()
  getObject(objectId: string): unknown {
    return this.queryset().findById(objectId) ?? null;
  }

  /**
   * URL of one of the model's admin routes, e.g. `modelAdminUrlname('change', id)`
   */
  modelAdminUrlname(name: string, ...args: string[]): string {
    return this.getModelUrl(this.model, name, ...args);
  }

  getModelPerms(): ModelPerms {
    return {
      view: this.hasViewPermission(),
      add: this.hasAddPermission(),
      change: this.hasChangePermission(),
      delete: this.hasDeletePermission(),
    };
  }

  /**
   * Template names to try, most specific first.
   */
  getTemplateList(templateName: string): string[] {
    return [
      `admin/${this.appLabel}/${this.modelName}/${templateName}`,
      `admin/${this.appLabel}/${templateName}`,
      `admin/${templateName}`,
    ];
  }

  getOrdering(): readonly string[] {
    return this.ordering ?? this.site.getModelAdmin(this.model)?.ordering ?? [];
  }

  hasViewPermission(): boolean {
    return this.user.hasPerm(`${this.appLabel}.view_${this.modelName}`) || this.hasChangePermission();
  }

  hasAddPermission(): boolean {
    return this.user.hasPerm(`${this.appLabel}.add_${this.modelName}`);
  }

  hasChangePermission(): boolean {
    return this.user.hasPerm(`${this.appLabel}.change_${this.modelName}`);
  }

  hasDeletePermission(): boolean {
    return this.user.hasPerm(`${this.appLabel}.delete_${this.modelName}`);
  }
}
