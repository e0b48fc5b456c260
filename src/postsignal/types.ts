/**
 * postsignal - Core Type Definitions
 *
 * Posts flow in, a PatternContext is computed once per run, and ranked
 * Signals flow out. Everything produced by a run is read-only.
 */

import { z } from 'zod';

// ============================================================================
// POST TYPES
// ============================================================================

/** A single post as delivered by the fetch layer */
export interface Post {
  readonly id: string;
  readonly author: string;
  readonly createdAt: Date;
  readonly text: string;
  readonly isRetweet: boolean;
  readonly isReply: boolean;
  readonly likeCount: number;
  readonly retweetCount: number;
  readonly replyCount: number;
}

/** ISO string, epoch milliseconds or Date; null and booleans are rejected */
const TimestampSchema = z.union([z.string(), z.number(), z.date()]).pipe(z.coerce.date());

/**
 * Post record as found in JSON post files.
 * Accepts both camelCase and the snake_case keys of the upstream API.
 */
export const PostRecordSchema = z
  .object({
    id: z.union([z.string().min(1), z.number().int()]).transform(value => String(value)),
    author: z.string().default('unknown'),
    createdAt: TimestampSchema.optional(),
    created_at: TimestampSchema.optional(),
    text: z.string(),
    isRetweet: z.boolean().optional(),
    is_retweet: z.boolean().optional(),
    isReply: z.boolean().optional(),
    is_reply: z.boolean().optional(),
    likeCount: z.number().int().min(0).optional(),
    like_count: z.number().int().min(0).optional(),
    retweetCount: z.number().int().min(0).optional(),
    retweet_count: z.number().int().min(0).optional(),
    replyCount: z.number().int().min(0).optional(),
    reply_count: z.number().int().min(0).optional(),
  })
  .transform((raw, ctx): Post => {
    const createdAt = raw.createdAt ?? raw.created_at;
    if (!createdAt || Number.isNaN(createdAt.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'createdAt is required' });
      return z.NEVER;
    }
    return {
      id: raw.id,
      author: raw.author,
      createdAt,
      text: raw.text,
      isRetweet: raw.isRetweet ?? raw.is_retweet ?? false,
      isReply: raw.isReply ?? raw.is_reply ?? false,
      likeCount: raw.likeCount ?? raw.like_count ?? 0,
      retweetCount: raw.retweetCount ?? raw.retweet_count ?? 0,
      replyCount: raw.replyCount ?? raw.reply_count ?? 0,
    };
  });

export type PostRecord = z.input<typeof PostRecordSchema>;

// ============================================================================
// SCORING TYPES
// ============================================================================

export interface SentimentScore {
  polarity: number; // -1 to +1
  subjectivity: number; // 0 to 1
}

export interface KeywordMatch {
  cryptoKeywords: readonly string[];
  stockKeywords: readonly string[];
}

/** Scorer output for one post */
export interface PostScore {
  sentiment: SentimentScore;
  keywords: KeywordMatch;
}

// ============================================================================
// PATTERN TYPES
// ============================================================================

export interface WindowCount {
  start: Date;
  count: number;
}

/** Hours between consecutive posts */
export interface IntervalStats {
  mean: number;
  median: number;
  min: number;
  max: number;
  stdDev: number;
}

export interface FrequencyStats {
  windowMs: number;
  windowCount: number;
  meanPerWindow: number;
  stdDevPerWindow: number;
  windows: WindowCount[];
  intervals: IntervalStats | null;
}

/** Contiguous high-volume interval; `end` is exclusive */
export interface BurstWindow {
  start: Date;
  end: Date;
  postCount: number;
  windowCount: number;
}

export interface TrendPoint {
  postId: string;
  timestamp: Date;
  rollingSentiment: number;
}

export type ShiftDirection = 'POSITIVE' | 'NEGATIVE';

export interface SentimentShift {
  postId: string;
  timestamp: Date;
  previousSentiment: number;
  currentSentiment: number;
  change: number;
  direction: ShiftDirection;
}

export interface HourBucket {
  hour: number; // 0-23 UTC
  postCount: number;
  meanEngagement: number;
  meanPolarity: number;
}

export interface TimingCorrelation {
  buckets: HourBucket[];
  engagementThreshold: number;
  bestEngagementHours: number[];
  worstEngagementHours: number[];
  mostPositiveHours: number[];
  mostNegativeHours: number[];
  bestEngagementDays: number[]; // 0 = Sunday
}

export interface ThemeCount {
  theme: string;
  count: number;
}

export interface ContentStats {
  averageLength: number;
  medianLength: number;
  averagePolarity: number;
  sentimentVolatility: number;
}

export interface ActivityProfile {
  mostActiveHour: number | null;
  mostActiveDay: number | null;
  averagePostsPerDay: number;
  hourlyDistribution: Record<number, number>;
  dailyDistribution: Record<number, number>;
}

/** Aggregate statistics shared read-only by every signal of a run */
export interface PatternContext {
  readonly totalPosts: number;
  readonly postingFrequency: FrequencyStats;
  readonly burstWindows: readonly BurstWindow[];
  readonly sentimentTrend: readonly TrendPoint[];
  readonly sentimentShifts: readonly SentimentShift[];
  readonly highEngagementHours: readonly number[];
  readonly timing: TimingCorrelation;
  readonly contentThemes: readonly ThemeCount[];
  readonly content: ContentStats;
  readonly activity: ActivityProfile;
  readonly engagementCeiling: number;
}

// ============================================================================
// SIGNAL TYPES
// ============================================================================

export type SignalType = 'BULLISH' | 'BEARISH' | 'NEUTRAL';

export type Urgency = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export type ContextFlag = 'IN_BURST' | 'HIGH_ENGAGEMENT_HOUR';

/** Ranked, actionable recommendation derived from one post */
export interface Signal {
  readonly postId: string;
  readonly timestamp: Date;
  readonly type: SignalType;
  readonly polarity: number;
  readonly subjectivity: number;
  readonly keywordMatch: KeywordMatch;
  readonly engagementScore: number;
  readonly confidence: number;
  readonly urgency: Urgency;
  readonly action: string;
  readonly contextFlags: readonly ContextFlag[];
}

/** Generator output, before the ranker scores it */
export type SignalCandidate = Omit<Signal, 'confidence' | 'urgency'>;

/** Result of one pipeline run */
export interface AnalysisResult {
  targetHandle: string;
  postsAnalyzed: number;
  context: PatternContext;
  candidateCount: number;
  signals: Signal[];
}
