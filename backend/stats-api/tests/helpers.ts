/**
 * Test helpers: fetch stubs and LeetCode payload factories.
 */
import { vi } from 'vitest';
import type { StatsData, StatsResult } from '../src/types/stats';

// ─── Payload factories ──────────────────────────────────────────────

export function makeProfilePayload(matchedUser: Record<string, unknown> = {}, allQuestionsCount?: unknown) {
  return {
    data: {
      allQuestionsCount: allQuestionsCount ?? [
        { difficulty: 'All', count: 2400 },
        { difficulty: 'Easy', count: 600 },
        { difficulty: 'Medium', count: 1300 },
        { difficulty: 'Hard', count: 500 },
      ],
      matchedUser: {
        contributions: { points: 115 },
        profile: { reputation: 7, ranking: 250000 },
        submissionCalendar: '{"1700006400": 3, "1699920000": 1}',
        submitStats: {
          acSubmissionNum: [
            { difficulty: 'All', count: 90, submissions: 140 },
            { difficulty: 'Easy', count: 50, submissions: 70 },
            { difficulty: 'Medium', count: 30, submissions: 50 },
            { difficulty: 'Hard', count: 10, submissions: 20 },
          ],
          totalSubmissionNum: [
            { difficulty: 'All', count: 95, submissions: 300 },
            { difficulty: 'Easy', count: 52, submissions: 112 },
            { difficulty: 'Medium', count: 32, submissions: 130 },
            { difficulty: 'Hard', count: 11, submissions: 58 },
          ],
        },
        ...matchedUser,
      },
    },
  };
}

export function expectSuccess(result: StatsResult): StatsData {
  if (result.status !== 'success') {
    throw new Error(`expected success, got error: ${result.message}`);
  }
  return result.data;
}

// ─── Fetch stubs ────────────────────────────────────────────────────

export interface RecordedRequest {
  url: string;
  init: RequestInit | undefined;
}

/**
 * Replace globalThis.fetch with a stub answering every call with `respond`.
 * Returns the list of requests seen so tests can inspect them.
 */
export function installFetchMock(respond: (req: RecordedRequest) => Response | Promise<Response>): RecordedRequest[] {
  const calls: RecordedRequest[] = [];
  vi.stubGlobal('fetch', vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const req = { url: String(input), init };
    calls.push(req);
    return respond(req);
  }));
  return calls;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}
