import { describe, test, expect, vi, beforeEach } from 'vitest';
import { StatsService } from '../src/services/statsService';
import { CircuitBreaker, CircuitState } from '../src/lib/circuitBreaker';
import {
  UpstreamDecodeError,
  UpstreamRequestError,
  type StatsClient,
} from '../src/lib/leetcodeGraphql';
import type { StatsQuery } from '../src/types/stats';
import { expectSuccess, makeProfilePayload } from './helpers';

function makeClient(impl: (query: StatsQuery) => Promise<unknown>) {
  const fetchStats = vi.fn(impl);
  const client: StatsClient = { fetchStats };
  return { client, fetchStats };
}

function transportBreaker(failureThreshold = 5) {
  return new CircuitBreaker(
    { failureThreshold, timeout: 60000 },
    (error) => error instanceof UpstreamRequestError
  );
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('StatsService.getStats', () => {

  test('translates a successful upstream payload', async () => {
    const { client, fetchStats } = makeClient(async () => makeProfilePayload());
    const service = new StatsService(client);

    const data = expectSuccess(await service.getStats('alice'));

    expect(data.total_solved).toBe(90);
    expect(fetchStats).toHaveBeenCalledTimes(1);
    expect(fetchStats.mock.calls[0][0].variables).toEqual({ username: 'alice' });
  });

  test('transport failures are prefixed "Request failed:"', async () => {
    const { client } = makeClient(async () => {
      throw new UpstreamRequestError('The operation was aborted due to timeout');
    });

    const result = await new StatsService(client).getStats('alice');

    expect(result).toEqual({
      status: 'error',
      message: 'Request failed: The operation was aborted due to timeout',
    });
  });

  test('decode failures keep their own message', async () => {
    const { client } = makeClient(async () => {
      throw new UpstreamDecodeError();
    });

    const result = await new StatsService(client).getStats('alice');

    expect(result).toEqual({ status: 'error', message: 'Failed to decode JSON response' });
  });

  test('anything else is an unexpected error', async () => {
    const { client } = makeClient(async () => {
      throw new RangeError('boom');
    });

    const result = await new StatsService(client).getStats('alice');

    expect(result).toEqual({ status: 'error', message: 'An unexpected error occurred: boom' });
  });

  test('translation errors pass through', async () => {
    const { client } = makeClient(async () => ({ data: { matchedUser: null } }));

    const result = await new StatsService(client).getStats('ghost');

    expect(result).toEqual({ status: 'error', message: 'Missing key in response: data.matchedUser' });
  });

  test('opens the circuit after repeated transport failures', async () => {
    const { client, fetchStats } = makeClient(async () => {
      throw new UpstreamRequestError('fetch failed');
    });
    const breaker = transportBreaker(2);
    const service = new StatsService(client, breaker);

    await service.getStats('alice');
    await service.getStats('alice');
    const result = await service.getStats('alice');

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(fetchStats).toHaveBeenCalledTimes(2);
    expect(result).toEqual({
      status: 'error',
      message: 'Request failed: Circuit breaker is OPEN: service unavailable',
    });
  });

  test('decode failures do not trip the circuit', async () => {
    const { client } = makeClient(async () => {
      throw new UpstreamDecodeError();
    });
    const breaker = transportBreaker(1);
    const service = new StatsService(client, breaker);

    await service.getStats('alice');
    await service.getStats('alice');

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(service.getCircuitStats().totalFailures).toBe(0);
  });
});
