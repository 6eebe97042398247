/**
 * State tree of the prime application
 */

export interface User {
  id: number;
  name: string;
  bio: string;
}

export type ActivityType =
  | { kind: 'addedFavoritePrime'; prime: number }
  | { kind: 'removedFavoritePrime'; prime: number };

export interface Activity {
  readonly timestamp: Date;
  readonly type: ActivityType;
}

export interface NthPrimeAlert {
  n: number;
  prime: number;
}

export interface NthPrimeState {
  isButtonDisabled: boolean;
  alert: NthPrimeAlert | null;
}

export interface AppState {
  count: number;
  favoritePrimes: ReadonlySet<number>;
  loggedInUser: User | null;
  activityFeed: readonly Activity[];
  nthPrime: NthPrimeState;
}

// Slice handled by the favorite primes screen
export type FavoritePrimesState = Pick<
  AppState,
  'favoritePrimes' | 'activityFeed'
>;

// Only this part of the state survives a restart
export interface PersistedState {
  count: number;
}
