// Filter hook exports

export { buildFilterChain, runFilterChain } from './FilterChain';
export { FilterHook, type FilterHookOptions } from './FilterHook';
export { collectFilters } from './FilterRegistry';
export { DEFAULT_FILTER_PRIORITY, HookPriority, getFilterPriority, type HookPriorityVariant } from './HookPriority';
export type {
  Continuation,
  ContinuationStage,
  FilterMode,
  FilterStage,
  HookHost,
  ObserverStage,
  ResultStage,
} from './types';
