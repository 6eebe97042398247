/**
 * Reducer composition: combine, pullback and reducer enhancers
 *
 * Reducers never mutate their input. A reducer that has nothing to do
 * returns the state it received, so callers can detect no-ops by identity.
 */

import type winston from 'winston';

export type Reducer<S, A> = (state: S, action: A) => S;

/**
 * Read/write focus on a part of a larger state
 */
export interface Lens<G, L> {
  get: (global: G) => L;
  set: (global: G, local: L) => G;
}

/**
 * Embed/extract pair for one variant of an action union
 */
export interface CasePath<G, L> {
  extract: (global: G) => L | undefined;
  embed: (local: L) => G;
}

export const identity = <S>(): Lens<S, S> => ({
  get: state => state,
  set: (_, local) => local,
});

export const prop = <G extends object, K extends keyof G>(
  key: K
): Lens<G, G[K]> => ({
  get: global => global[key],
  set: (global, local) => ({ ...global, [key]: local }),
});

// Runs every reducer in the given order; each one receives the state
// produced by the previous one
export const combine =
  <S, A>(...reducers: Reducer<S, A>[]): Reducer<S, A> =>
  (state, action) =>
    reducers.reduce((current, reducer) => reducer(current, action), state);

/**
 * Lift a feature reducer to the global state and action types
 *
 * Actions that the case path does not recognize leave the state untouched,
 * as do local reducers that return their input unchanged.
 */
export const pullback =
  <LS, LA, GS, GA>(
    reducer: Reducer<LS, LA>,
    lens: Lens<GS, LS>,
    casePath: CasePath<GA, LA>
  ): Reducer<GS, GA> =>
  (state, action) => {
    const localAction = casePath.extract(action);
    if (localAction === undefined) return state;
    const localState = lens.get(state);
    const nextLocal = reducer(localState, localAction);
    if (nextLocal === localState) return state;
    return lens.set(state, nextLocal);
  };

/**
 * Log every dispatched action and the state it produced
 */
export const logging =
  <S, A>(
    reducer: Reducer<S, A>,
    logger: winston.Logger,
    serialize: (state: S) => unknown = state => state
  ): Reducer<S, A> =>
  (state, action) => {
    const next = reducer(state, action);
    if (logger.isDebugEnabled()) {
      logger.debug(`Action: ${JSON.stringify(action)}`);
      logger.debug(`State: ${JSON.stringify(serialize(next))}`);
    }
    return next;
  };
