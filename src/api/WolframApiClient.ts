/**
 * Computational knowledge API client used to find the nth prime
 *
 * Every failure (network, HTTP status, undecodable body, missing pod,
 * non-numeric answer) ends up as a `null` result. Failures are logged,
 * never thrown to the caller.
 */
import fetch from 'node-fetch';
import { LRUCache } from 'lru-cache';
import type winston from 'winston';

import { LookupError } from '../lib/errors';
import { errorMessage } from '../lib/utils';

export interface WolframSubpod {
  plaintext?: string;
}

export interface WolframPod {
  primary?: boolean;
  subpods: WolframSubpod[];
}

export interface WolframQueryResult {
  queryresult: {
    pods: WolframPod[];
  };
}

export interface WolframApiClientOptions {
  baseUrl: string;
  appId: string;
  logger: winston.Logger;
  timeout?: number; // ms
  cacheMax?: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const decodeSubpod = (value: unknown): WolframSubpod | null => {
  if (!isRecord(value)) return null;
  return typeof value.plaintext === 'string'
    ? { plaintext: value.plaintext }
    : {};
};

const decodePod = (value: unknown): WolframPod | null => {
  if (!isRecord(value) || !Array.isArray(value.subpods)) return null;
  const rawSubpods: unknown[] = value.subpods;
  const subpods: WolframSubpod[] = [];
  for (const rawSubpod of rawSubpods) {
    const subpod = decodeSubpod(rawSubpod);
    if (!subpod) return null;
    subpods.push(subpod);
  }
  return typeof value.primary === 'boolean'
    ? { primary: value.primary, subpods }
    : { subpods };
};

export const decodeQueryResult = (data: unknown): WolframQueryResult | null => {
  if (!isRecord(data) || !isRecord(data.queryresult)) return null;
  if (!Array.isArray(data.queryresult.pods)) return null;
  const rawPods: unknown[] = data.queryresult.pods;
  const pods: WolframPod[] = [];
  for (const rawPod of rawPods) {
    const pod = decodePod(rawPod);
    if (!pod) return null;
    pods.push(pod);
  }
  return { queryresult: { pods } };
};

// Whole-string integer, optional sign; anything else is not an answer
export const parseInteger = (text: string): number | null => {
  if (!/^[+-]?\d+$/.test(text)) return null;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
};

// Plain text of the first subpod of the first primary pod
export const primaryPlaintext = (
  result: WolframQueryResult
): string | undefined =>
  result.queryresult.pods.find(pod => pod.primary === true)?.subpods[0]
    ?.plaintext;

export class WolframApiClient {
  private baseUrl: string;
  private appId: string;
  private timeout: number;
  private logger: winston.Logger;
  private cache: LRUCache<number, number>;

  constructor(options: WolframApiClientOptions) {
    this.baseUrl = options.baseUrl;
    this.appId = options.appId;
    this.timeout = options.timeout ?? 10000;
    this.logger = options.logger;
    this.cache = new LRUCache<number, number>({
      max: Math.max(1, options.cacheMax ?? 1000),
    });
  }

  /**
   * Send a free-form query and decode the JSON answer
   */
  async query(input: string): Promise<WolframQueryResult> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('input', input);
    url.searchParams.set('format', 'plaintext');
    url.searchParams.set('output', 'JSON');
    url.searchParams.set('appid', this.appId);

    this.logger.debug(`Querying Wolfram API: ${input}`);
    const response = await fetch(url.toString(), {
      signal: AbortSignal.timeout(this.timeout),
    });

    if (!response.ok) {
      throw new LookupError(
        `Wolfram API returned status ${response.status}: ${response.statusText}`,
        response.status
      );
    }

    const result = decodeQueryResult(await response.json());
    if (!result) {
      throw new LookupError('Unexpected Wolfram API response');
    }
    return result;
  }

  async nthPrime(n: number): Promise<number | null> {
    const cached = this.cache.get(n);
    if (cached !== undefined) {
      this.logger.debug(`Nth prime cache hit for ${n}: ${cached}`);
      return cached;
    }

    try {
      const text = primaryPlaintext(await this.query(`prime ${n}`));
      const prime = text === undefined ? null : parseInteger(text);
      if (prime === null) {
        this.logger.warn(
          `No prime found in Wolfram API answer for n=${n}: ${text ?? 'no primary pod'}`
        );
        return null;
      }
      this.cache.set(n, prime);
      return prime;
    } catch (err) {
      this.logger.error(
        `Nth prime lookup failed for n=${n}: ${errorMessage(err)}`
      );
      return null;
    }
  }
}
