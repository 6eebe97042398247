/**
 * Error classes
 *
 * Reducers never fail: errors only come from configuration, persisted
 * state and the nth prime lookup.
 */

/**
 * Base error class with a machine readable code
 */
export class PrimeStoreError extends Error {
  constructor(
    message: string,
    public code: string = 'PRIME_STORE_ERROR'
  ) {
    super(message);
    this.name = 'PrimeStoreError';
  }
}

export class ConfigError extends PrimeStoreError {
  constructor(message = 'Invalid configuration') {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class StateDecodeError extends PrimeStoreError {
  constructor(message = 'Unable to decode saved state') {
    super(message, 'STATE_DECODE_ERROR');
    this.name = 'StateDecodeError';
  }
}

/**
 * Raised inside the lookup client; callers only ever see `null`
 */
export class LookupError extends PrimeStoreError {
  constructor(
    message = 'Lookup failed',
    public statusCode?: number
  ) {
    super(message, 'LOOKUP_ERROR');
    this.name = 'LookupError';
  }
}
