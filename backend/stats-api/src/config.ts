import type { CircuitBreakerOptions } from './lib/circuitBreaker';

export const DEFAULT_GRAPHQL_URL = 'https://leetcode.com/graphql/';

export interface RateLimitConfig {
  points: number;
  duration: number;
  blockDuration: number;
}

export interface AppConfig {
  port: number;
  host: string;
  graphqlUrl: string;
  requestTimeoutMs: number;
  corsOrigin: string;
  rateLimit: RateLimitConfig;
  circuitBreaker: CircuitBreakerOptions;
}

type Env = Record<string, string | undefined>;

export function parseIntOr(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

function resolveGraphqlUrl(raw: string | undefined): string {
  const url = raw || DEFAULT_GRAPHQL_URL;
  try {
    new URL(url);
  } catch {
    throw new Error(`LEETCODE_GRAPHQL_URL is not a valid URL: ${url}`);
  }
  return url;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parseIntOr(env.PORT, 8000),
    host: env.HOST || '0.0.0.0',
    graphqlUrl: resolveGraphqlUrl(env.LEETCODE_GRAPHQL_URL),
    requestTimeoutMs: parseIntOr(env.LEETCODE_TIMEOUT_MS, 10000),
    corsOrigin: env.CORS_ORIGIN || '*',
    rateLimit: {
      points: parseIntOr(env.RATE_LIMIT_POINTS, 30),
      duration: parseIntOr(env.RATE_LIMIT_DURATION_S, 10),
      blockDuration: parseIntOr(env.RATE_LIMIT_BLOCK_S, 60),
    },
    circuitBreaker: {
      failureThreshold: parseIntOr(env.CIRCUIT_FAILURE_THRESHOLD, 5),
      successThreshold: parseIntOr(env.CIRCUIT_SUCCESS_THRESHOLD, 2),
      timeout: parseIntOr(env.CIRCUIT_OPEN_MS, 60000),
      resetTimeout: parseIntOr(env.CIRCUIT_RESET_MS, 30000),
    },
  };
}
