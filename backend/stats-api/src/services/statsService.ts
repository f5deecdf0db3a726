import { statsError, type StatsResult } from '../types/stats';
import {
  buildStatsQuery,
  UpstreamDecodeError,
  UpstreamRequestError,
  type StatsClient,
} from '../lib/leetcodeGraphql';
import { CircuitBreaker, CircuitOpenError } from '../lib/circuitBreaker';
import { translateStats } from '../helpers/statsHelpers';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fetch and summarise a user's LeetCode statistics.
 * Never rejects: every failure comes back as the error variant.
 */
export class StatsService {
  constructor(
    private readonly client: StatsClient,
    private readonly breaker: CircuitBreaker = new CircuitBreaker(
      undefined,
      (error) => error instanceof UpstreamRequestError
    )
  ) {}

  async getStats(username: string): Promise<StatsResult> {
    const query = buildStatsQuery(username);

    let payload: unknown;
    try {
      payload = await this.breaker.execute(() => this.client.fetchStats(query));
    } catch (error) {
      if (error instanceof UpstreamRequestError || error instanceof CircuitOpenError) {
        console.warn(`[stats] Upstream request failed for ${username}: ${error.message}`);
        return statsError(`Request failed: ${error.message}`);
      }
      if (error instanceof UpstreamDecodeError) {
        console.warn(`[stats] Undecodable upstream response for ${username}`);
        return statsError(error.message);
      }
      console.error(`[stats] Unexpected error fetching ${username}:`, error);
      return statsError(`An unexpected error occurred: ${errorMessage(error)}`);
    }

    try {
      const result = translateStats(payload);
      if (result.status === 'error') {
        console.warn(`[stats] Could not translate response for ${username}: ${result.message}`);
      }
      return result;
    } catch (error) {
      console.error(`[stats] Unexpected error translating ${username}:`, error);
      return statsError(`An unexpected error occurred: ${errorMessage(error)}`);
    }
  }

  getCircuitStats() {
    return this.breaker.getStats();
  }
}
