import { expect } from 'chai';

import {
  alertDismissed,
  counter,
  decrTapped,
  deleteFavoritePrimes,
  favoritePrimes,
  incrTapped,
  nthPrime,
  nthPrimeButtonTapped,
  nthPrimeResponse,
  primeModal,
  removeFavoritePrimeTapped,
  saveFavoritePrimeTapped,
  favoritePrimesCase,
  counterCase,
} from '../../src/store/actions';
import { pullback } from '../../src/store/combinators';
import {
  appReducer,
  counterReducer,
  favoritePrimesLens,
  favoritePrimesReducer,
  initialState,
  nthPrimeReducer,
  primeModalReducer,
} from '../../src/store/reducers';
import type { AppState, ActivityType } from '../../src/types';

const kinds = (state: Pick<AppState, 'activityFeed'>): ActivityType[] =>
  state.activityFeed.map(activity => activity.type);

const withFavorites = (primes: number[]): AppState => ({
  ...initialState,
  favoritePrimes: new Set(primes),
});

describe('Reducers', () => {
  describe('counterReducer', () => {
    it('should increment and decrement', () => {
      expect(counterReducer(0, incrTapped())).to.equal(1);
      expect(counterReducer(0, decrTapped())).to.equal(-1);
    });

    it('should restore the count after increment then decrement', () => {
      for (const start of [-3, 0, 7, 1000]) {
        const up = counterReducer(start, incrTapped());
        expect(counterReducer(up, decrTapped())).to.equal(start);
        const down = counterReducer(start, decrTapped());
        expect(counterReducer(down, incrTapped())).to.equal(start);
      }
    });
  });

  describe('primeModalReducer', () => {
    it('should save the current count and log it', () => {
      const next = primeModalReducer(
        { ...initialState, count: 7 },
        saveFavoritePrimeTapped()
      );
      expect([...next.favoritePrimes]).to.deep.equal([7]);
      expect(kinds(next)).to.deep.equal([
        { kind: 'addedFavoritePrime', prime: 7 },
      ]);
      expect(next.activityFeed[0].timestamp).to.be.instanceOf(Date);
    });

    it('should remove the current count and log it', () => {
      const saved = primeModalReducer(
        { ...initialState, count: 5 },
        saveFavoritePrimeTapped()
      );
      const next = primeModalReducer(saved, removeFavoritePrimeTapped());
      expect(next.favoritePrimes.has(5)).to.be.false;
      expect(kinds(next)).to.deep.equal([
        { kind: 'addedFavoritePrime', prime: 5 },
        { kind: 'removedFavoritePrime', prime: 5 },
      ]);
    });

    it('should not mutate the previous state', () => {
      const state = { ...initialState, count: 3 };
      primeModalReducer(state, saveFavoritePrimeTapped());
      expect(state.favoritePrimes.size).to.equal(0);
      expect(state.activityFeed).to.have.length(0);
    });
  });

  describe('favoritePrimesReducer', () => {
    it('should resolve indices against the sorted favorites', () => {
      const state = withFavorites([7, 3, 5, 2]);
      const next = favoritePrimesReducer(
        state,
        deleteFavoritePrimes([0, 2])
      );
      expect([...next.favoritePrimes].sort((a, b) => a - b)).to.deep.equal([
        3, 7,
      ]);
      expect(kinds(next)).to.deep.equal([
        { kind: 'removedFavoritePrime', prime: 2 },
        { kind: 'removedFavoritePrime', prime: 5 },
      ]);
    });

    it('should log removals in index order whatever the order given', () => {
      const next = favoritePrimesReducer(
        withFavorites([2, 3, 5, 7]),
        deleteFavoritePrimes(new Set([3, 1]))
      );
      expect(kinds(next)).to.deep.equal([
        { kind: 'removedFavoritePrime', prime: 3 },
        { kind: 'removedFavoritePrime', prime: 7 },
      ]);
    });

    it('should remove a value once for duplicate indices', () => {
      const next = favoritePrimesReducer(
        withFavorites([2, 3]),
        deleteFavoritePrimes([1, 1])
      );
      expect([...next.favoritePrimes]).to.deep.equal([2]);
      expect(next.activityFeed).to.have.length(1);
    });

    it('should ignore out of range indices', () => {
      const state = withFavorites([2, 3]);
      const slice = favoritePrimesLens.get(state);
      const next = favoritePrimesReducer(slice, deleteFavoritePrimes([5, -1]));
      expect(next).to.equal(slice);
    });

    it('should return the state unchanged when nothing is removed', () => {
      const slice = favoritePrimesLens.get(initialState);
      const next = favoritePrimesReducer(slice, deleteFavoritePrimes([0]));
      expect(next).to.equal(slice);
    });
  });

  describe('nthPrimeReducer', () => {
    it('should disable the button while a lookup runs', () => {
      const next = nthPrimeReducer(
        initialState.nthPrime,
        nthPrimeButtonTapped()
      );
      expect(next).to.deep.equal({ isButtonDisabled: true, alert: null });
    });

    it('should show an alert when a prime comes back', () => {
      const running = { isButtonDisabled: true, alert: null };
      expect(nthPrimeReducer(running, nthPrimeResponse(5, 11))).to.deep.equal({
        isButtonDisabled: false,
        alert: { n: 5, prime: 11 },
      });
    });

    it('should only re-enable the button when the lookup found nothing', () => {
      const running = { isButtonDisabled: true, alert: null };
      const next = nthPrimeReducer(running, nthPrimeResponse(5, null));
      expect(next).to.deep.equal({ isButtonDisabled: false, alert: null });
    });

    it('should clear the alert when dismissed', () => {
      const shown = { isButtonDisabled: false, alert: { n: 1, prime: 2 } };
      expect(nthPrimeReducer(shown, alertDismissed()).alert).to.equal(null);
      const hidden = initialState.nthPrime;
      expect(nthPrimeReducer(hidden, alertDismissed())).to.equal(hidden);
    });
  });

  describe('appReducer', () => {
    it('should route counter actions to the count', () => {
      const next = appReducer(initialState, counter(incrTapped()));
      expect(next.count).to.equal(1);
      expect(next.favoritePrimes).to.equal(initialState.favoritePrimes);
    });

    it('should save a prime count and log exactly one entry', () => {
      const state = { ...initialState, count: 11 };
      const next = appReducer(state, primeModal(saveFavoritePrimeTapped()));
      expect(next.favoritePrimes.has(11)).to.be.true;
      expect(kinds(next)).to.deep.equal([
        { kind: 'addedFavoritePrime', prime: 11 },
      ]);
    });

    it('should remove a previously saved prime', () => {
      let state: AppState = { ...initialState, count: 13 };
      state = appReducer(state, primeModal(saveFavoritePrimeTapped()));
      state = appReducer(state, primeModal(removeFavoritePrimeTapped()));
      expect(state.favoritePrimes.has(13)).to.be.false;
      expect(kinds(state).at(-1)).to.deep.equal({
        kind: 'removedFavoritePrime',
        prime: 13,
      });
      expect(state.activityFeed).to.have.length(2);
    });

    it('should delete favorites by displayed index', () => {
      const next = appReducer(
        withFavorites([2, 3, 5, 7]),
        favoritePrimes(deleteFavoritePrimes([0, 2]))
      );
      expect([...next.favoritePrimes].sort((a, b) => a - b)).to.deep.equal([
        3, 7,
      ]);
      expect(kinds(next)).to.deep.equal([
        { kind: 'removedFavoritePrime', prime: 2 },
        { kind: 'removedFavoritePrime', prime: 5 },
      ]);
      expect(next.count).to.equal(0);
    });

    it('should track the nth prime lookup', () => {
      let state = appReducer(initialState, nthPrime(nthPrimeButtonTapped()));
      expect(state.nthPrime.isButtonDisabled).to.be.true;
      state = appReducer(state, nthPrime(nthPrimeResponse(0, 2)));
      expect(state.nthPrime).to.deep.equal({
        isButtonDisabled: false,
        alert: { n: 0, prime: 2 },
      });
    });

    it('should keep the identical state for no-op actions', () => {
      expect(appReducer(initialState, nthPrime(alertDismissed()))).to.equal(
        initialState
      );
    });
  });

  describe('pullback with feature case paths', () => {
    it('should ignore counter actions when focused on favorite primes', () => {
      const reducer = pullback(
        favoritePrimesReducer,
        favoritePrimesLens,
        favoritePrimesCase
      );
      const state = withFavorites([2, 3]);
      expect(reducer(state, counter(incrTapped()))).to.equal(state);
    });

    it('should embed and extract feature actions', () => {
      const action = incrTapped();
      expect(counterCase.extract(counterCase.embed(action))).to.equal(action);
      expect(counterCase.extract(primeModal(saveFavoritePrimeTapped()))).to.be
        .undefined;
    });
  });
});
