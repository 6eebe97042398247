/**
 * Mini Store implementation (Redux-like pattern without dependencies)
 */

import type { Reducer } from './combinators';

export type Listener<S> = (state: S) => void;

export class Store<S, A> {
  private state: S;
  private reducer: Reducer<S, A>;
  private listeners: Set<Listener<S>> = new Set();

  constructor(reducer: Reducer<S, A>, initialState: S) {
    this.reducer = reducer;
    this.state = initialState;
  }

  getState(): S {
    return this.state;
  }

  /**
   * Apply an action and notify every current listener before returning.
   * A dispatch from inside a listener is applied at once, and listeners
   * always receive the latest state.
   * If listeners throw, the round still completes and the first error is
   * rethrown afterwards.
   */
  dispatch(action: A): void {
    this.state = this.reducer(this.state, action);

    // Listeners added or removed during the round take effect next time
    let failure: { error: unknown } | undefined;
    for (const listener of [...this.listeners]) {
      try {
        listener(this.state);
      } catch (error) {
        if (!failure) failure = { error };
      }
    }
    if (failure) throw failure.error;
  }

  subscribe(listener: Listener<S>): () => void {
    this.listeners.add(listener);
    // Return unsubscribe function
    return () => {
      this.listeners.delete(listener);
    };
  }
}
