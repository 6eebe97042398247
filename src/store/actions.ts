/**
 * Action types and action creators
 */

import type { CasePath } from './combinators';

export const Actions = {
  COUNTER: 'counter',
  PRIME_MODAL: 'primeModal',
  FAVORITE_PRIMES: 'favoritePrimes',
  NTH_PRIME: 'nthPrime',
} as const;

export const CounterActions = {
  INCR_TAPPED: 'incrTapped',
  DECR_TAPPED: 'decrTapped',
} as const;

export const PrimeModalActions = {
  SAVE_FAVORITE_PRIME_TAPPED: 'saveFavoritePrimeTapped',
  REMOVE_FAVORITE_PRIME_TAPPED: 'removeFavoritePrimeTapped',
} as const;

export const FavoritePrimesActions = {
  DELETE_FAVORITE_PRIMES: 'deleteFavoritePrimes',
} as const;

export const NthPrimeActions = {
  BUTTON_TAPPED: 'nthPrimeButtonTapped',
  RESPONSE: 'nthPrimeResponse',
  ALERT_DISMISSED: 'alertDismissed',
} as const;

export type CounterAction =
  | { type: typeof CounterActions.INCR_TAPPED }
  | { type: typeof CounterActions.DECR_TAPPED };

export type PrimeModalAction =
  | { type: typeof PrimeModalActions.SAVE_FAVORITE_PRIME_TAPPED }
  | { type: typeof PrimeModalActions.REMOVE_FAVORITE_PRIME_TAPPED };

export type FavoritePrimesAction = {
  type: typeof FavoritePrimesActions.DELETE_FAVORITE_PRIMES;
  indices: readonly number[];
};

export type NthPrimeAction =
  | { type: typeof NthPrimeActions.BUTTON_TAPPED }
  | { type: typeof NthPrimeActions.RESPONSE; n: number; prime: number | null }
  | { type: typeof NthPrimeActions.ALERT_DISMISSED };

export type AppAction =
  | { type: typeof Actions.COUNTER; action: CounterAction }
  | { type: typeof Actions.PRIME_MODAL; action: PrimeModalAction }
  | { type: typeof Actions.FAVORITE_PRIMES; action: FavoritePrimesAction }
  | { type: typeof Actions.NTH_PRIME; action: NthPrimeAction };

/**
 * Feature actions
 */

export const incrTapped = (): CounterAction => ({
  type: CounterActions.INCR_TAPPED,
});

export const decrTapped = (): CounterAction => ({
  type: CounterActions.DECR_TAPPED,
});

export const saveFavoritePrimeTapped = (): PrimeModalAction => ({
  type: PrimeModalActions.SAVE_FAVORITE_PRIME_TAPPED,
});

export const removeFavoritePrimeTapped = (): PrimeModalAction => ({
  type: PrimeModalActions.REMOVE_FAVORITE_PRIME_TAPPED,
});

export const deleteFavoritePrimes = (
  indices: Iterable<number>
): FavoritePrimesAction => ({
  type: FavoritePrimesActions.DELETE_FAVORITE_PRIMES,
  indices: [...indices],
});

export const nthPrimeButtonTapped = (): NthPrimeAction => ({
  type: NthPrimeActions.BUTTON_TAPPED,
});

export const nthPrimeResponse = (
  n: number,
  prime: number | null
): NthPrimeAction => ({
  type: NthPrimeActions.RESPONSE,
  n,
  prime,
});

export const alertDismissed = (): NthPrimeAction => ({
  type: NthPrimeActions.ALERT_DISMISSED,
});

/**
 * App-level wrappers
 */

export const counter = (action: CounterAction): AppAction => ({
  type: Actions.COUNTER,
  action,
});

export const primeModal = (action: PrimeModalAction): AppAction => ({
  type: Actions.PRIME_MODAL,
  action,
});

export const favoritePrimes = (action: FavoritePrimesAction): AppAction => ({
  type: Actions.FAVORITE_PRIMES,
  action,
});

export const nthPrime = (action: NthPrimeAction): AppAction => ({
  type: Actions.NTH_PRIME,
  action,
});

/**
 * Case paths used to pull feature reducers back to AppAction
 */

export const counterCase: CasePath<AppAction, CounterAction> = {
  extract: action =>
    action.type === Actions.COUNTER ? action.action : undefined,
  embed: counter,
};

export const primeModalCase: CasePath<AppAction, PrimeModalAction> = {
  extract: action =>
    action.type === Actions.PRIME_MODAL ? action.action : undefined,
  embed: primeModal,
};

export const favoritePrimesCase: CasePath<AppAction, FavoritePrimesAction> =
  {
    extract: action =>
      action.type === Actions.FAVORITE_PRIMES ? action.action : undefined,
    embed: favoritePrimes,
  };

export const nthPrimeCase: CasePath<AppAction, NthPrimeAction> = {
  extract: action =>
    action.type === Actions.NTH_PRIME ? action.action : undefined,
  embed: nthPrime,
};
