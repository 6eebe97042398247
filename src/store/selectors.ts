/**
 * Derived values read by the screens
 */

import type { AppState } from '../types';
import { isPrime } from '../lib/math';
import { ordinal } from '../lib/utils';

// Favorites as listed on screen; deleteFavoritePrimes indices refer to this
export const selectSortedFavoritePrimes = (state: AppState): number[] =>
  [...state.favoritePrimes].sort((a, b) => a - b);

export const selectIsCountPrime = (state: AppState): boolean =>
  isPrime(state.count);

export const selectIsCountFavorite = (state: AppState): boolean =>
  state.favoritePrimes.has(state.count);

export const selectNthPrimeQuestion = (state: AppState): string =>
  `What is the ${ordinal(state.count)} prime?`;

export const selectNthPrimeAlertMessage = (state: AppState): string | null => {
  const { alert } = state.nthPrime;
  if (!alert) return null;
  return `The ${ordinal(alert.n)} prime is ${alert.prime}`;
};

/**
 * JSON-friendly view of the state, used for logging
 */
export const selectSnapshot = (state: AppState): Record<string, unknown> => ({
  count: state.count,
  favoritePrimes: selectSortedFavoritePrimes(state),
  loggedInUser: state.loggedInUser,
  activityFeed: state.activityFeed.map(({ timestamp, type }) => ({
    timestamp: timestamp.toISOString(),
    ...type,
  })),
  nthPrime: state.nthPrime,
});
