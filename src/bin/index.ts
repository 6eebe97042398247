/**
 * @packageDocumentation prime-store
 *
 * Application shell
 * It parses configuration, builds the logger and the store, restores the
 * saved counter and runs the nth prime lookup
 *
 * @example
 * const app = new PrimeApp();
 *
 * await app.ready;
 * app.send(counter(incrTapped()));
 * await app.requestNthPrime();
 * await app.stop();
 */
import type winston from 'winston';

import { parseConfig } from '../lib/parseConfig';
import configArgs, { type Config } from '../config/args';
import { buildLogger } from '../logger/winston';
import { WolframApiClient } from '../api/WolframApiClient';
import { PrimeStoreError } from '../lib/errors';
import { errorMessage } from '../lib/utils';
import { loadState, saveState } from '../lib/persistence';
import { Store } from '../store/Store';
import { logging } from '../store/combinators';
import { appReducer, initialState } from '../store/reducers';
import {
  nthPrime,
  nthPrimeButtonTapped,
  nthPrimeResponse,
  type AppAction,
} from '../store/actions';
import {
  selectNthPrimeAlertMessage,
  selectSnapshot,
} from '../store/selectors';
import type { AppState } from '../types';

export type { Config };

export interface NthPrimeLookup {
  nthPrime(n: number): Promise<number | null>;
}

export interface PrimeAppOptions {
  argv?: string[];
  lookup?: NthPrimeLookup;
}

/**
 * @class PrimeApp
 */
export class PrimeApp {
  config: Config;
  logger: winston.Logger;
  lookup: NthPrimeLookup;
  ready: Promise<void>;
  private _store?: Store<AppState, AppAction>;
  private unsubscribe?: () => void;
  private saving: Promise<void> = Promise.resolve();

  constructor(options: PrimeAppOptions = {}) {
    this.config = parseConfig(configArgs, options.argv);
    this.logger = buildLogger(this.config);
    this.lookup =
      options.lookup ??
      new WolframApiClient({
        baseUrl: this.config.wolfram_url,
        appId: this.config.wolfram_app_id,
        timeout: this.config.wolfram_timeout,
        cacheMax: this.config.nth_prime_cache_max,
        logger: this.logger,
      });
    this.ready = this.restore();
  }

  get store(): Store<AppState, AppAction> {
    if (!this._store) {
      throw new PrimeStoreError('PrimeApp used before ready', 'NOT_READY');
    }
    return this._store;
  }

  getState(): AppState {
    return this.store.getState();
  }

  send(action: AppAction): void {
    this.store.dispatch(action);
  }

  /**
   * Look up the prime whose rank is the current count
   *
   * The answer comes back through the store as an nthPrimeResponse action.
   * While a lookup is outstanding further requests are ignored.
   */
  async requestNthPrime(): Promise<number | null> {
    const { count, nthPrime: lookupState } = this.getState();
    if (lookupState.isButtonDisabled) {
      this.logger.debug(`Nth prime lookup already running, ignoring ${count}`);
      return null;
    }
    this.send(nthPrime(nthPrimeButtonTapped()));

    let prime: number | null = null;
    try {
      prime = await this.lookup.nthPrime(count);
    } catch (err) {
      this.logger.error(
        `Nth prime lookup failed for n=${count}: ${errorMessage(err)}`
      );
    }
    this.send(nthPrime(nthPrimeResponse(count, prime)));

    const message = selectNthPrimeAlertMessage(this.getState());
    if (message) this.logger.info(message);
    return prime;
  }

  async save(): Promise<void> {
    if (!this.config.state_file) {
      this.logger.debug('No state file configured, nothing saved');
      return;
    }
    await saveState(this.config.state_file, this.getState());
    this.logger.debug(`State saved to ${this.config.state_file}`);
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    await this.saving;
    if (this._store) await this.save();
    this.logger.debug('PrimeApp stopped');
  }

  private async restore(): Promise<void> {
    let state = initialState;
    if (this.config.state_file) {
      state = await loadState(this.config.state_file);
      this.logger.notice(
        `Restored count ${state.count} from ${this.config.state_file}`
      );
    }
    this._store = new Store(
      logging(appReducer, this.logger, selectSnapshot),
      state
    );

    if (this.config.autosave && this.config.state_file) {
      let lastCount = state.count;
      this.unsubscribe = this._store.subscribe(next => {
        if (next.count === lastCount) return;
        lastCount = next.count;
        this.saving = this.saving
          .then(() => this.save())
          .catch((err: unknown) => {
            this.logger.error(`Autosave failed: ${errorMessage(err)}`);
          });
      });
    }
  }
}
