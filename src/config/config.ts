import { ConfigurationError } from '../core/errors';

/**
 * Runtime configuration. Everything is read from the environment once at startup;
 * tuning values fall back to defaults when missing or unparsable.
 */

export interface CoreConfig {
  url: string;
  token: string;
}

export interface SupervisorConfig {
  backoffBaseMs: number;
  backoffCapMs: number;
  heartbeatIntervalMs: number;
  livenessTimeoutMs: number;
}

export interface RouterConfig {
  maxInFlight: number;
  handlerTimeoutMs: number;
}

export interface RadioConfig {
  rateCapacity: number;
  rateRefillPerSecond: number;
  rateMaxWaitMs: number;
  retries: number;
  retryDelayMs: number;
  httpTimeoutMs: number;
  spotsTtlMs: number;
  solarTtlMs: number;
  solarUrl: string;
  spotsUrl: string;
}

export interface AppConfig {
  core: CoreConfig;
  logLevel: string;
  supervisor: SupervisorConfig;
  router: RouterConfig;
  radio: RadioConfig;
}

export const DEFAULT_CORE_URL = 'https://api.seabird.chat';
export const DEFAULT_SOLAR_URL = 'https://www.hamqsl.com/solarxml.php';
export const DEFAULT_SPOTS_URL = 'https://api.pota.app/v1/spots';

type Env = Record<string, string | undefined>;

/**
 * Parse a numeric environment value, falling back to the provided default.
 * Values below `min` are treated as invalid.
 */
export function readNumber(env: Env, key: string, defaultValue: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min) return defaultValue;
  return parsed;
}

function readString(env: Env, key: string, defaultValue: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : defaultValue;
}

/**
 * Builds the full configuration from an environment map.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    core: {
      url: readString(env, 'SEABIRD_URL', DEFAULT_CORE_URL),
      token: env.SEABIRD_TOKEN?.trim() ?? '',
    },
    logLevel: readString(env, 'LOG_LEVEL', 'info'),
    supervisor: {
      backoffBaseMs: readNumber(env, 'SEABIRD_BACKOFF_BASE_MS', 1_000, 1),
      backoffCapMs: readNumber(env, 'SEABIRD_BACKOFF_CAP_MS', 60_000, 1),
      heartbeatIntervalMs: readNumber(env, 'SEABIRD_HEARTBEAT_MS', 30_000, 100),
      livenessTimeoutMs: readNumber(env, 'SEABIRD_LIVENESS_TIMEOUT_MS', 90_000, 100),
    },
    router: {
      maxInFlight: Math.floor(readNumber(env, 'RADIO_MAX_IN_FLIGHT', 8, 1)),
      handlerTimeoutMs: readNumber(env, 'RADIO_COMMAND_TIMEOUT_MS', 10_000, 1),
    },
    radio: {
      rateCapacity: readNumber(env, 'RADIO_RATE_CAPACITY', 5, 1),
      rateRefillPerSecond: readNumber(env, 'RADIO_RATE_REFILL_PER_SEC', 0.5),
      rateMaxWaitMs: readNumber(env, 'RADIO_RATE_MAX_WAIT_MS', 2_000),
      retries: Math.floor(readNumber(env, 'RADIO_RETRIES', 2)),
      retryDelayMs: readNumber(env, 'RADIO_RETRY_DELAY_MS', 500),
      httpTimeoutMs: readNumber(env, 'RADIO_HTTP_TIMEOUT_MS', 8_000, 1),
      spotsTtlMs: readNumber(env, 'RADIO_SPOTS_TTL_MS', 60_000),
      solarTtlMs: readNumber(env, 'RADIO_SOLAR_TTL_MS', 300_000),
      solarUrl: readString(env, 'RADIO_SOLAR_URL', DEFAULT_SOLAR_URL),
      spotsUrl: readString(env, 'RADIO_SPOTS_URL', DEFAULT_SPOTS_URL),
    },
  };
}

/**
 * Rejects configurations the plugin cannot start with.
 * @throws ConfigurationError listing every missing or inconsistent value.
 */
export function validateConfig(config: AppConfig): void {
  const problems: string[] = [];

  if (!config.core.token) problems.push('SEABIRD_TOKEN is not set');

  try {
    const parsed = new URL(config.core.url);
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      problems.push(`SEABIRD_URL must use http or https (got ${parsed.protocol})`);
    }
  } catch {
    problems.push(`SEABIRD_URL is not a valid URL: ${config.core.url}`);
  }

  if (config.supervisor.backoffCapMs < config.supervisor.backoffBaseMs) {
    problems.push('SEABIRD_BACKOFF_CAP_MS must not be lower than SEABIRD_BACKOFF_BASE_MS');
  }
  if (config.supervisor.livenessTimeoutMs <= config.supervisor.heartbeatIntervalMs) {
    problems.push('SEABIRD_LIVENESS_TIMEOUT_MS must be greater than SEABIRD_HEARTBEAT_MS');
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join(', ')}`);
  }
}
