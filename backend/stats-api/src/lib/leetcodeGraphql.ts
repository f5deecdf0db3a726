import type { StatsQuery } from '../types/stats';
import { DEFAULT_GRAPHQL_URL } from '../config';

const USER_PROFILE_QUERY = `query getUserProfile($username: String!) {
  allQuestionsCount { difficulty count }
  matchedUser(username: $username) {
    contributions { points }
    profile { reputation ranking }
    submissionCalendar
    submitStats {
      acSubmissionNum { difficulty count submissions }
      totalSubmissionNum { difficulty count submissions }
    }
  }
}`;

/**
 * Build the profile statistics query for a user.
 * The username goes through as a GraphQL variable, untouched.
 */
export function buildStatsQuery(username: string): StatsQuery {
  return Object.freeze({
    query: USER_PROFILE_QUERY,
    variables: Object.freeze({ username }),
  });
}

/** Connection error, timeout or non-2xx status from the upstream. */
export class UpstreamRequestError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'UpstreamRequestError';
  }
}

/** The upstream answered, but not with JSON. */
export class UpstreamDecodeError extends Error {
  constructor(message = 'Failed to decode JSON response') {
    super(message);
    this.name = 'UpstreamDecodeError';
  }
}

/** undici reports "fetch failed" and keeps the socket error in `cause`. */
function describeFetchError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause instanceof Error && error.cause.message) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}

export interface LeetCodeClientOptions {
  url?: string;
  timeoutMs?: number;
}

export interface StatsClient {
  fetchStats(query: StatsQuery): Promise<unknown>;
}

export class LeetCodeGraphqlClient implements StatsClient {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: LeetCodeClientOptions = {}) {
    this.url = options.url ?? DEFAULT_GRAPHQL_URL;
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async fetchStats(query: StatsQuery): Promise<unknown> {
    let body: string;
    try {
      const res = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Referer': 'https://leetcode.com',
        },
        body: JSON.stringify({ query: query.query, variables: query.variables }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        throw new UpstreamRequestError(`${res.status} ${res.statusText} for url: ${this.url}`, res.status);
      }
      body = await res.text();
    } catch (error) {
      if (error instanceof UpstreamRequestError) {
        throw error;
      }
      throw new UpstreamRequestError(describeFetchError(error));
    }

    try {
      return JSON.parse(body);
    } catch {
      throw new UpstreamDecodeError();
    }
  }
}
