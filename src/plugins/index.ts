// Plugin system exports

export { Filter, Plugin, getPluginFilters, getPluginMetadata, getPluginName } from './decorators';
export type { FilterMetadata, FilterOptions, PluginMetadata, PluginOptions } from './decorators';
export { PluginBase } from './PluginBase';
export { PluginInitializer } from './PluginInitializer';
export type { PluginClass, PluginContext } from './types';
export { AjaxPlugin, isAjaxRequest } from './builtin/AjaxPlugin';
export { ModelIconPlugin } from './builtin/ModelIconPlugin';
