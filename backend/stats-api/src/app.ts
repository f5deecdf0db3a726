import Koa from 'koa';
import Router from 'koa-router';
import cors from '@koa/cors';
import type { AppConfig } from './config';
import type { StatsService } from './services/statsService';
import { createStatsLimiter } from './lib/rateLimiter';
import { registerStatisticRoutes } from './routes/statistic';

export interface AppDeps {
  config: Pick<AppConfig, 'corsOrigin' | 'rateLimit'>;
  statsService: StatsService;
}

export function createApp({ config, statsService }: AppDeps): Koa {
  const app = new Koa();
  const router = new Router();

  // Anything thrown past a route handler becomes the generic 500 body.
  app.use(async (ctx, next) => {
    try {
      await next();
    } catch (error) {
      console.error(`[http] Unhandled error on ${ctx.method} ${ctx.path}:`, error);
      ctx.status = 500;
      ctx.body = { message: 'Internal server error' };
    }
  });

  app.use(cors({
    origin: config.corsOrigin,
    allowMethods: ['GET', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  }));

  app.use(async (ctx, next) => {
    await next();
    if (ctx.status === 404 && ctx.body == null) {
      ctx.status = 404;
      ctx.body = { message: 'Resource not found' };
    }
  });

  // Health check (registered before the router so it never hits the limiter)
  app.use(async (ctx, next) => {
    if (ctx.path === '/health' && ctx.method === 'GET') {
      ctx.status = 200;
      ctx.body = { status: 'ok' };
      return;
    }
    await next();
  });

  router.get('/', async (ctx) => {
    ctx.body = { message: 'Welcome to the API' };
  });

  router.get('/health/upstream', async (ctx) => {
    ctx.body = { status: 'ok', circuit: statsService.getCircuitStats() };
  });

  registerStatisticRoutes(router, statsService, createStatsLimiter(config.rateLimit));

  app.use(router.routes());
  app.use(router.allowedMethods());

  return app;
}
