export const DIFFICULTIES = ['Easy', 'Medium', 'Hard'] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];

export interface StatsQuery {
  readonly query: string;
  readonly variables: { readonly username: string };
}

// Raw upstream shapes. Everything is optional: LeetCode omits fields freely.

export interface QuestionCount {
  difficulty?: string;
  count?: number;
}

export interface SubmissionCount {
  difficulty?: string;
  count?: number;
  submissions?: number;
}

export interface RawMatchedUser {
  contributions?: { points?: number };
  profile?: { reputation?: number; ranking?: number };
  /** JSON-encoded `{ [unixSeconds]: count }` */
  submissionCalendar?: string;
  submitStats?: {
    acSubmissionNum?: SubmissionCount[];
    totalSubmissionNum?: SubmissionCount[];
  };
}

export interface RawStatsPayload {
  data?: {
    allQuestionsCount?: QuestionCount[];
    matchedUser?: RawMatchedUser;
  };
}

export type SubmissionCalendar = Record<string, number>;

export interface StatsData {
  total_solved: number;
  total_questions: number;
  easy_solved: number;
  total_easy: number;
  medium_solved: number;
  total_medium: number;
  hard_solved: number;
  total_hard: number;
  acceptance_rate: number;
  ranking: number;
  contribution_points: number;
  reputation: number;
  submission_calendar: SubmissionCalendar;
}

export type StatsResult =
  | { status: 'success'; message: string; data: StatsData }
  | { status: 'error'; message: string };

export function statsSuccess(message: string, data: StatsData): StatsResult {
  return { status: 'success', message, data };
}

export function statsError(message: string): StatsResult {
  return { status: 'error', message };
}
