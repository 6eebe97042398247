export { PrimeApp } from './bin';
export type { Config, NthPrimeLookup, PrimeAppOptions } from './bin';
export { Store } from './store/Store';
export type { Listener } from './store/Store';
export * from './store/actions';
export * from './store/combinators';
export * from './store/reducers';
export * from './store/selectors';
export { isPrime } from './lib/math';
export { ordinal } from './lib/utils';
export {
  encodeState,
  decodeState,
  loadState,
  saveState,
} from './lib/persistence';
export { WolframApiClient } from './api/WolframApiClient';
export {
  PrimeStoreError,
  ConfigError,
  StateDecodeError,
  LookupError,
} from './lib/errors';
export type * from './types';
