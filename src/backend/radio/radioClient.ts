import logger from '../../utils/logger';
import { RateLimitedError, UpstreamFormatError, UpstreamUnavailableError, describeError } from '../../core/errors';
import type { RadioConfig } from '../../config/config';
import { QueryCache } from './queryCache';
import { TokenBucket } from './rateLimiter';
import { SharedRequests } from './sharedRequests';
import { RadioUpstream } from './radioUpstream';
import { RadioQuery, RadioQueryKey, RadioQueryResults } from './types';

export type RadioClientOptions = Pick<
  RadioConfig,
  'rateCapacity' | 'rateRefillPerSecond' | 'rateMaxWaitMs' | 'retries' | 'retryDelayMs' | 'spotsTtlMs' | 'solarTtlMs'
> & {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export interface RadioClientStats {
  cacheHits: number;
  cacheMisses: number;
  upstreamCalls: number;
}

type Fetchers = { [K in RadioQueryKey]: () => Promise<RadioQueryResults[K]> };

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Cached, throttled access to the radio data services.
 *
 * Fresh cache entries are served without spending a rate-limit token. Concurrent misses for
 * the same key share one upstream request. Transport failures are retried a bounded number
 * of times; once exhausted the caller gets UpstreamUnavailableError.
 */
export class RadioClient implements RadioQuery {
  private readonly cache: QueryCache<RadioQueryResults>;
  private readonly limiter: TokenBucket;
  private readonly inFlight = new SharedRequests<RadioQueryResults>();
  private readonly fetchers: Fetchers;
  private readonly ttls: { [K in RadioQueryKey]: number };
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly counters: RadioClientStats = { cacheHits: 0, cacheMisses: 0, upstreamCalls: 0 };

  constructor(
    upstream: RadioUpstream,
    private readonly options: RadioClientOptions,
  ) {
    const now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.cache = new QueryCache<RadioQueryResults>(now);
    this.limiter = new TokenBucket({
      capacity: options.rateCapacity,
      refillPerSecond: options.rateRefillPerSecond,
      now,
      sleep: this.sleep,
    });
    this.fetchers = {
      solar: () => upstream.fetchSolar(),
      spots: () => upstream.fetchSpots(),
    };
    this.ttls = { solar: options.solarTtlMs, spots: options.spotsTtlMs };
  }

  async query<K extends RadioQueryKey>(key: K): Promise<RadioQueryResults[K]> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.counters.cacheHits += 1;
      return cached;
    }

    if (!this.inFlight.isRunning(key)) this.counters.cacheMisses += 1;
    return this.inFlight.run(key, () => this.load(key));
  }

  stats(): RadioClientStats {
    return { ...this.counters };
  }

  private async load<K extends RadioQueryKey>(key: K): Promise<RadioQueryResults[K]> {
    const attempts = this.options.retries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      // Each upstream request spends a token, retries included.
      await this.limiter.acquire(this.options.rateMaxWaitMs);
      this.counters.upstreamCalls += 1;

      try {
        const value = await this.fetchers[key]();
        this.cache.set(key, value, this.ttls[key]);
        return value;
      } catch (error) {
        if (error instanceof RateLimitedError) throw error;
        if (error instanceof UpstreamFormatError) {
          logger.warn(`[RadioClient] Unusable ${key} payload: ${error.message}`);
          throw new UpstreamUnavailableError(`${key} data could not be read`, error);
        }
        lastError = error;
        logger.warn(`[RadioClient] Fetching ${key} failed (attempt ${attempt}/${attempts}): ${describeError(error)}`);
      }

      if (attempt < attempts) await this.sleep(this.options.retryDelayMs);
    }

    throw new UpstreamUnavailableError(`${key} data unavailable after ${attempts} attempt(s)`, lastError);
  }
}

export default RadioClient;
