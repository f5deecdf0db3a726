/**
 * Stats Helper Functions
 * Reshape a decoded LeetCode profile payload into the flat StatsData summary.
 */

import {
  DIFFICULTIES,
  statsError,
  statsSuccess,
  type Difficulty,
  type QuestionCount,
  type RawMatchedUser,
  type RawStatsPayload,
  type StatsData,
  type StatsResult,
  type SubmissionCalendar,
  type SubmissionCount,
} from '../types/stats';

/** A container the payload should have is explicitly null. */
export class MissingKeyError extends Error {
  constructor(readonly path: string) {
    super(path);
    this.name = 'MissingKeyError';
  }
}

/** A value is present but has the wrong shape. */
export class DataShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataShapeError';
  }
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readObject(value: unknown, path: string): JsonObject {
  if (value === undefined) {
    return {};
  }
  if (value === null) {
    throw new MissingKeyError(path);
  }
  if (!isJsonObject(value)) {
    throw new DataShapeError(`${path} is not an object`);
  }
  return value;
}

function readList(value: unknown, path: string): JsonObject[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new DataShapeError(`${path} is not a list`);
  }
  return value.map((entry, i) => {
    if (!isJsonObject(entry)) {
      throw new DataShapeError(`${path}[${i}] is not an object`);
    }
    return entry;
  });
}

function readNumber(value: unknown, path: string): number {
  if (value === undefined || value === null) {
    return 0;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DataShapeError(`${path} is not a number`);
  }
  return value;
}

function readDifficulty(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toQuestionCounts(value: unknown, path: string): QuestionCount[] {
  return readList(value, path).map((entry, i) => ({
    difficulty: readDifficulty(entry.difficulty),
    count: readNumber(entry.count, `${path}[${i}].count`),
  }));
}

function toSubmissionCounts(value: unknown, path: string): SubmissionCount[] {
  return readList(value, path).map((entry, i) => ({
    difficulty: readDifficulty(entry.difficulty),
    count: readNumber(entry.count, `${path}[${i}].count`),
    submissions: readNumber(entry.submissions, `${path}[${i}].submissions`),
  }));
}

function toMatchedUser(value: unknown): RawMatchedUser {
  const user = readObject(value, 'data.matchedUser');
  const contributions = readObject(user.contributions, 'data.matchedUser.contributions');
  const profile = readObject(user.profile, 'data.matchedUser.profile');
  const submitStats = readObject(user.submitStats, 'data.matchedUser.submitStats');

  return {
    contributions: {
      points: readNumber(contributions.points, 'data.matchedUser.contributions.points'),
    },
    profile: {
      reputation: readNumber(profile.reputation, 'data.matchedUser.profile.reputation'),
      ranking: readNumber(profile.ranking, 'data.matchedUser.profile.ranking'),
    },
    submissionCalendar: typeof user.submissionCalendar === 'string' ? user.submissionCalendar : undefined,
    submitStats: {
      acSubmissionNum: toSubmissionCounts(submitStats.acSubmissionNum, 'data.matchedUser.submitStats.acSubmissionNum'),
      totalSubmissionNum: toSubmissionCounts(submitStats.totalSubmissionNum, 'data.matchedUser.submitStats.totalSubmissionNum'),
    },
  };
}

/**
 * Validate the decoded response into the typed payload tree.
 * Throws MissingKeyError or DataShapeError.
 */
export function normalizePayload(payload: unknown): RawStatsPayload {
  const root = readObject(payload, 'response');
  const data = readObject(root.data, 'data');
  return {
    data: {
      allQuestionsCount: toQuestionCounts(data.allQuestionsCount, 'data.allQuestionsCount'),
      matchedUser: toMatchedUser(data.matchedUser),
    },
  };
}

/**
 * Index entries by difficulty label. The first entry for a label wins;
 * later duplicates are ignored.
 */
export function indexByDifficulty<T extends { difficulty?: string }>(
  entries: readonly T[]
): Partial<Record<Difficulty, T>> {
  const index: Partial<Record<Difficulty, T>> = {};
  for (const entry of entries) {
    const label = DIFFICULTIES.find((d) => d === entry.difficulty);
    if (label && index[label] === undefined) {
      index[label] = entry;
    }
  }
  return index;
}

export function sumCounts(entries: readonly { count?: number }[]): number {
  return entries.reduce((total, entry) => total + (entry.count ?? 0), 0);
}

/** Round half to even, so exact ties go to the even neighbour. */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
}

export function calculateAcceptanceRate(accepted: number, total: number): number {
  return total !== 0 ? roundTo((accepted / total) * 100, 2) : 0;
}

/**
 * Decode the nested calendar string and order it by key.
 * Anything that does not decode to an object yields an empty calendar.
 */
export function parseSubmissionCalendar(raw: string | undefined): SubmissionCalendar {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw ?? '{}');
  } catch {
    return {};
  }
  if (!isJsonObject(parsed)) {
    return {};
  }

  const calendar: SubmissionCalendar = {};
  for (const key of Object.keys(parsed).sort()) {
    const count = parsed[key];
    if (typeof count === 'number') {
      calendar[key] = count;
    }
  }
  return calendar;
}

/**
 * JSON for a calendar with keys in string order. A plain object would put
 * integer-like keys first in numeric order.
 */
export function stringifyCalendar(calendar: SubmissionCalendar): string {
  const entries = Object.keys(calendar)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${JSON.stringify(calendar[key])}`);
  return `{${entries.join(',')}}`;
}

/** Response body for a successful lookup, calendar last and in key order. */
export function stringifyStatsSuccess(message: string, data: StatsData): string {
  const { submission_calendar, ...summary } = data;
  const head = JSON.stringify({ status: 'success', message, data: summary });
  // head ends with the closing braces of `data` and of the envelope
  return `${head.slice(0, -2)},"submission_calendar":${stringifyCalendar(submission_calendar)}}}`;
}

/**
 * Translate a decoded GraphQL response into a StatsResult.
 * Shape problems come back as the error variant; the calendar never fails
 * the whole result.
 */
export function translateStats(payload: unknown): StatsResult {
  try {
    const { data } = normalizePayload(payload);
    const allQuestions = data?.allQuestionsCount ?? [];
    const user: RawMatchedUser = data?.matchedUser ?? {};

    const questionsByDifficulty = indexByDifficulty(allQuestions);
    const accepted = indexByDifficulty(user.submitStats?.acSubmissionNum ?? []);
    const submitted = indexByDifficulty(user.submitStats?.totalSubmissionNum ?? []);

    const easySolved = accepted.Easy?.count ?? 0;
    const mediumSolved = accepted.Medium?.count ?? 0;
    const hardSolved = accepted.Hard?.count ?? 0;

    // Only the Easy bucket carries the submission totals used here.
    const acceptanceRate = calculateAcceptanceRate(
      accepted.Easy?.submissions ?? 0,
      submitted.Easy?.submissions ?? 0
    );

    const stats: StatsData = {
      total_solved: easySolved + mediumSolved + hardSolved,
      total_questions: sumCounts(allQuestions),
      easy_solved: easySolved,
      total_easy: questionsByDifficulty.Easy?.count ?? 0,
      medium_solved: mediumSolved,
      total_medium: questionsByDifficulty.Medium?.count ?? 0,
      hard_solved: hardSolved,
      total_hard: questionsByDifficulty.Hard?.count ?? 0,
      acceptance_rate: acceptanceRate,
      ranking: user.profile?.ranking ?? 0,
      contribution_points: user.contributions?.points ?? 0,
      reputation: user.profile?.reputation ?? 0,
      submission_calendar: parseSubmissionCalendar(user.submissionCalendar),
    };

    return statsSuccess('retrieved', stats);
  } catch (error) {
    if (error instanceof MissingKeyError) {
      return statsError(`Missing key in response: ${error.path}`);
    }
    if (error instanceof DataShapeError) {
      return statsError(`Data processing error: ${error.message}`);
    }
    throw error;
  }
}
