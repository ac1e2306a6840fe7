// Filter chain type definitions

/** The rest of the chain from one stage inwards. Built per hook call. */
export type Continuation<R = unknown> = () => R;

/**
 * How a plugin filter is called:
 * - `observer`: no arguments; the inner chain must not produce a value
 * - `continuation`: `(next, ...args)` with `next` not yet invoked
 * - `result`: `(result, ...args)` with the inner chain already evaluated
 */
export type FilterMode = 'observer' | 'continuation' | 'result';

interface FilterStageBase {
  hookName: string;
  priority: number;
  /** Name of the plugin that contributed the stage, for logs and errors */
  pluginName: string;
}

export interface ObserverStage<R = unknown> extends FilterStageBase {
  mode: 'observer';
  invoke: () => R;
}

export interface ContinuationStage<R = unknown> extends FilterStageBase {
  mode: 'continuation';
  invoke: (next: Continuation<R>, args: readonly unknown[]) => R;
}

export interface ResultStage<R = unknown> extends FilterStageBase {
  mode: 'result';
  invoke: (result: R, args: readonly unknown[]) => R;
}

export type FilterStage<R = unknown> = ObserverStage<R> | ContinuationStage<R> | ResultStage<R>;

/** Anything whose methods can be intercepted by plugins */
export interface HookHost {
  readonly plugins: readonly object[];
}
