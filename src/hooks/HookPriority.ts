// Filter priority constants
//
// Lower number = runs earlier, i.e. further out in the chain: the stage with
// the lowest number is invoked first and decides whether the rest runs.

import { HookDefinitionError } from '@/utils/errors';

export type HookPriorityVariant = 'HIGHEST' | 'HIGH' | 'NORMAL' | 'LOW' | 'LOWEST';

export const DEFAULT_FILTER_PRIORITY = 10;

export const HookPriority: Readonly<Record<HookPriorityVariant, number>> = {
  HIGHEST: 0,
  HIGH: 5,
  NORMAL: DEFAULT_FILTER_PRIORITY,
  LOW: 15,
  LOWEST: 20,
};

/**
 * Resolve a declared priority to its number.
 * @param order - offset added to a named variant, to order filters sharing one
 */
export function getFilterPriority(priority?: number | HookPriorityVariant, order: number = 0): number {
  if (priority === undefined) {
    return DEFAULT_FILTER_PRIORITY + order;
  }
  if (typeof priority === 'number') {
    if (!Number.isInteger(priority)) {
      throw new HookDefinitionError(`Filter priority must be an integer, got ${priority}`);
    }
    return priority + order;
  }
  return HookPriority[priority] + order;
}
