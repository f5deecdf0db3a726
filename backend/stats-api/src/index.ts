// Stats API entry point
import { createServer } from 'http';
import { loadConfig } from './config';
import { createApp } from './app';
import { CircuitBreaker } from './lib/circuitBreaker';
import { LeetCodeGraphqlClient, UpstreamRequestError } from './lib/leetcodeGraphql';
import { StatsService } from './services/statsService';

const config = loadConfig();

const client = new LeetCodeGraphqlClient({
  url: config.graphqlUrl,
  timeoutMs: config.requestTimeoutMs,
});
const breaker = new CircuitBreaker(
  config.circuitBreaker,
  (error) => error instanceof UpstreamRequestError,
  'LeetCodeCircuit'
);
const statsService = new StatsService(client, breaker);

const app = createApp({ config, statsService });
const httpServer = createServer(app.callback());

httpServer.listen(config.port, config.host, () => {
  console.log(`[server] Stats API listening on ${config.host}:${config.port}`);
  console.log(`[server] Upstream ${config.graphqlUrl} (timeout ${config.requestTimeoutMs}ms)`);
});

function shutdown(signal: string) {
  console.log(`[server] ${signal} received, closing HTTP server`);
  httpServer.close((err) => {
    if (err) {
      console.error('[server] Error during shutdown:', err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
