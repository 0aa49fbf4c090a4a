/**
 * Maps an effect kind to the shape a value of type `A` takes under it.
 * `sync` is the identity; `async` is a promise.
 */
export interface EffectKinds<A> {
  sync: A;
  async: Promise<A>;
}

export type EffectKind = keyof EffectKinds<unknown>;

/**
 * A value of type `A` wrapped in the effect of kind `K`.
 */
export type Wrapped<K extends EffectKind, A> = EffectKinds<A>[K];

/**
 * Turns a computation into a result of a given effect kind.
 * Failures thrown by the computation become failures of the effect:
 * an immediate throw for `sync`, a rejected promise for `async`.
 * The thrown value is passed on as is.
 *
 * @template K - The effect kind produced by this wrapper
 */
export interface EffectWrapper<K extends EffectKind> {
  readonly kind: K;
  /**
   * Runs `produce` and wraps the value it returns, or the error it throws.
   */
  wrap<A>(produce: () => A): Wrapped<K, A>;
  /**
   * Like {@link EffectWrapper.wrap}, for a computation that already returns
   * a wrapped value.
   */
  flatten<A>(produce: () => Wrapped<K, A>): Wrapped<K, A>;
  /**
   * Runs a wrapped computation and exposes its outcome as a promise.
   */
  runToPromise<A>(produce: () => Wrapped<K, A>): Promise<A>;
}

/**
 * Identity wrapper: results are returned directly and failures are thrown
 * to the caller.
 */
export const syncEffect: EffectWrapper<"sync"> = {
  kind: "sync",
  wrap: (produce) => produce(),
  flatten: (produce) => produce(),
  runToPromise: (produce) => new Promise((resolve) => resolve(produce())),
};

/**
 * Deferred wrapper: the computation runs on a later microtask and the
 * returned promise settles exactly once, with its value or its failure.
 */
export const asyncEffect: EffectWrapper<"async"> = {
  kind: "async",
  wrap: (produce) => Promise.resolve().then(produce),
  flatten: (produce) => Promise.resolve().then(produce),
  runToPromise: (produce) => Promise.resolve().then(produce),
};
