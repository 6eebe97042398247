/**
 * Reducers for the prime application
 */

import type {
  Activity,
  ActivityType,
  AppState,
  FavoritePrimesState,
  NthPrimeState,
} from '../types';

import {
  CounterActions,
  FavoritePrimesActions,
  NthPrimeActions,
  PrimeModalActions,
  counterCase,
  favoritePrimesCase,
  nthPrimeCase,
  primeModalCase,
  type AppAction,
  type CounterAction,
  type FavoritePrimesAction,
  type NthPrimeAction,
  type PrimeModalAction,
} from './actions';
import {
  combine,
  identity,
  prop,
  pullback,
  type Lens,
  type Reducer,
} from './combinators';

export const initialState: AppState = {
  count: 0,
  favoritePrimes: new Set(),
  loggedInUser: null,
  activityFeed: [],
  nthPrime: {
    isButtonDisabled: false,
    alert: null,
  },
};

const activity = (type: ActivityType): Activity => ({
  timestamp: new Date(),
  type,
});

export function counterReducer(state: number, action: CounterAction): number {
  switch (action.type) {
    case CounterActions.INCR_TAPPED:
      return state + 1;
    case CounterActions.DECR_TAPPED:
      return state - 1;
    default:
      return state;
  }
}

export function primeModalReducer(
  state: AppState,
  action: PrimeModalAction
): AppState {
  switch (action.type) {
    case PrimeModalActions.SAVE_FAVORITE_PRIME_TAPPED: {
      const favoritePrimes = new Set(state.favoritePrimes);
      favoritePrimes.add(state.count);
      return {
        ...state,
        favoritePrimes,
        activityFeed: [
          ...state.activityFeed,
          activity({ kind: 'addedFavoritePrime', prime: state.count }),
        ],
      };
    }

    case PrimeModalActions.REMOVE_FAVORITE_PRIME_TAPPED: {
      const favoritePrimes = new Set(state.favoritePrimes);
      favoritePrimes.delete(state.count);
      return {
        ...state,
        favoritePrimes,
        activityFeed: [
          ...state.activityFeed,
          activity({ kind: 'removedFavoritePrime', prime: state.count }),
        ],
      };
    }

    default:
      return state;
  }
}

export function favoritePrimesReducer(
  state: FavoritePrimesState,
  action: FavoritePrimesAction
): FavoritePrimesState {
  switch (action.type) {
    case FavoritePrimesActions.DELETE_FAVORITE_PRIMES: {
      // Indices point into the list as displayed: ascending order, taken
      // once before anything is removed
      const sorted = [...state.favoritePrimes].sort((a, b) => a - b);
      const indices = [...new Set(action.indices)]
        .filter(i => Number.isInteger(i) && i >= 0 && i < sorted.length)
        .sort((a, b) => a - b);
      if (indices.length === 0) return state;

      const favoritePrimes = new Set(state.favoritePrimes);
      const activityFeed = [...state.activityFeed];
      for (const prime of indices.map(i => sorted[i])) {
        favoritePrimes.delete(prime);
        activityFeed.push(activity({ kind: 'removedFavoritePrime', prime }));
      }
      return { favoritePrimes, activityFeed };
    }

    default:
      return state;
  }
}

export function nthPrimeReducer(
  state: NthPrimeState,
  action: NthPrimeAction
): NthPrimeState {
  switch (action.type) {
    case NthPrimeActions.BUTTON_TAPPED:
      if (state.isButtonDisabled) return state;
      return { ...state, isButtonDisabled: true };

    case NthPrimeActions.RESPONSE:
      return {
        ...state,
        isButtonDisabled: false,
        alert:
          action.prime === null ? null : { n: action.n, prime: action.prime },
      };

    case NthPrimeActions.ALERT_DISMISSED:
      if (state.alert === null) return state;
      return { ...state, alert: null };

    default:
      return state;
  }
}

/**
 * Focus on slices of AppState
 */

export const countLens: Lens<AppState, number> = prop<AppState, 'count'>(
  'count'
);

export const favoritePrimesLens: Lens<AppState, FavoritePrimesState> = {
  get: state => ({
    favoritePrimes: state.favoritePrimes,
    activityFeed: state.activityFeed,
  }),
  set: (state, local) => ({
    ...state,
    favoritePrimes: local.favoritePrimes,
    activityFeed: local.activityFeed,
  }),
};

export const nthPrimeLens: Lens<AppState, NthPrimeState> = prop<
  AppState,
  'nthPrime'
>('nthPrime');

export const appReducer: Reducer<AppState, AppAction> = combine(
  pullback(counterReducer, countLens, counterCase),
  pullback(primeModalReducer, identity<AppState>(), primeModalCase),
  pullback(favoritePrimesReducer, favoritePrimesLens, favoritePrimesCase),
  pullback(nthPrimeReducer, nthPrimeLens, nthPrimeCase)
);
