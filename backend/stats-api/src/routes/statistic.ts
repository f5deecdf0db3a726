/**
 * Statistic Routes
 * LeetCode profile statistics by username
 */

import Router from 'koa-router';
import type { RateLimiterMemory } from 'rate-limiter-flexible';
import type { StatsService } from '../services/statsService';
import { rateLimitMiddleware } from '../lib/rateLimiter';
import { stringifyStatsSuccess } from '../helpers/statsHelpers';

export const STATISTIC_PREFIX = '/api/v1/statistic';

export function registerStatisticRoutes(router: Router, statsService: StatsService, limiter: RateLimiterMemory) {

  /**
   * GET /api/v1/statistic/:username
   * The username is optional in the pattern so that an empty one reaches
   * the handler and gets a 400 instead of the generic 404.
   */
  router.get(`${STATISTIC_PREFIX}/:username?`, rateLimitMiddleware(limiter), async (ctx) => {
    const username: string | undefined = ctx.params.username;
    if (!username) {
      ctx.status = 400;
      ctx.body = { detail: 'Username parameter is required' };
      return;
    }

    const stats = await statsService.getStats(username);
    if (stats.status === 'error') {
      ctx.status = 500;
      ctx.body = { detail: stats.message };
      return;
    }

    ctx.type = 'application/json';
    ctx.body = stringifyStatsSuccess(stats.message, stats.data);
  });

}
