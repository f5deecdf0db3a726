import { RateLimiterMemory, RateLimiterRes } from 'rate-limiter-flexible';
import type { Context, Next } from 'koa';
import type { RateLimitConfig } from '../config';

export function createStatsLimiter(config: RateLimitConfig): RateLimiterMemory {
  return new RateLimiterMemory({
    keyPrefix: 'rl:stats',
    points: config.points,
    duration: config.duration,
    blockDuration: config.blockDuration,
  });
}

/**
 * Client identifier for rate limiting.
 * Proxy headers first, then the socket address.
 */
export function getClientIdentifier(ctx: Context): string {
  const forwardedFor = ctx.get('x-forwarded-for');
  const realIp = ctx.get('x-real-ip');
  const cfConnectingIp = ctx.get('cf-connecting-ip');

  if (forwardedFor) {
    return forwardedFor.split(',')[0].trim();
  }
  if (realIp) {
    return realIp;
  }
  if (cfConnectingIp) {
    return cfConnectingIp;
  }
  return ctx.ip;
}

function setLimitHeaders(ctx: Context, limit: number, remaining: number, msBeforeNext: number) {
  ctx.set('X-RateLimit-Limit', limit.toString());
  ctx.set('X-RateLimit-Remaining', remaining.toString());
  ctx.set('X-RateLimit-Reset', new Date(Date.now() + msBeforeNext).toISOString());
}

/**
 * Koa middleware factory for rate limiting
 * Usage:
 * router.get('/api/v1/statistic/:username', rateLimitMiddleware(limiter), handler);
 */
export function rateLimitMiddleware(limiter: RateLimiterMemory) {
  return async (ctx: Context, next: Next) => {
    const identifier = getClientIdentifier(ctx);

    let consumed: RateLimiterRes;
    try {
      consumed = await limiter.consume(identifier, 1);
    } catch (rejRes: unknown) {
      if (!(rejRes instanceof RateLimiterRes)) {
        throw rejRes;
      }
      const msBeforeNext = rejRes.msBeforeNext || 60000;
      const retryAfterSeconds = Math.ceil(msBeforeNext / 1000);

      setLimitHeaders(ctx, limiter.points, 0, msBeforeNext);
      ctx.set('Retry-After', retryAfterSeconds.toString());

      console.warn(`[http] Rate limit exceeded for ${identifier}`);
      ctx.status = 429;
      ctx.body = {
        error: 'rate_limit_exceeded',
        message: `Too many requests. Please try again in ${retryAfterSeconds} seconds.`,
        retryAfter: retryAfterSeconds,
      };
      return;
    }

    setLimitHeaders(ctx, limiter.points, consumed.remainingPoints, consumed.msBeforeNext);
    await next();
  };
}
