// Filter Chain - composes plugin stages around a base computation

import { IncorrectPluginArgumentError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import type { Continuation, FilterStage } from './types';

function hasValue(result: unknown): boolean {
  return result !== undefined && result !== null;
}

function wrapStage<R>(stage: FilterStage<R>, inner: Continuation<R>, args: readonly unknown[]): Continuation<R> {
  switch (stage.mode) {
    case 'continuation':
      return () => stage.invoke(inner, args);
    case 'result':
      return () => stage.invoke(inner(), args);
    case 'observer':
      return () => {
        const result = inner();
        if (hasValue(result)) {
          throw new IncorrectPluginArgumentError(
            `Filter ${stage.pluginName}.${stage.hookName} takes no argument but the chain inside it returned a value; ` +
              `declare it with mode 'result' or 'continuation' to receive it`,
            stage.hookName,
            stage.pluginName,
          );
        }
        return stage.invoke();
      };
  }
}

/**
 * Fold stages (already in priority order) into one continuation.
 * The first stage ends up outermost; the base is innermost. Nothing runs until
 * the returned continuation is called.
 */
export function buildFilterChain<R>(
  stages: readonly FilterStage<R>[],
  base: Continuation<R>,
  args: readonly unknown[] = [],
): Continuation<R> {
  return stages.reduceRight<Continuation<R>>((inner, stage) => wrapStage(stage, inner, args), base);
}

/**
 * Build and run the chain. With no stages this is a plain call to `base`.
 * Errors from any stage or from the base propagate unchanged.
 */
export function runFilterChain<R>(
  stages: readonly FilterStage<R>[],
  base: Continuation<R>,
  args: readonly unknown[] = [],
): R {
  if (stages.length === 0) {
    return base();
  }

  logger.debug(
    `[FilterChain] ${stages[0].hookName}: ${stages.map((s) => `${s.pluginName}:${s.priority}(${s.mode})`).join(' -> ')} -> base`,
  );

  return buildFilterChain(stages, base, args)();
}
