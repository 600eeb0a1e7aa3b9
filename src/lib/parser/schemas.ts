import { z } from "zod";
import { toNumber } from "../table/table";

/**
 * Zod schemas for tabular analytics exports.
 * Field names match the exported CSV headers exactly.
 */

/** Numeric metric cell: numbers or numeric text; blanks and junk become null. */
const metric = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((val) => toNumber(val ?? null));

/** Identifier cell; numeric-looking ids arrive as numbers from the CSV parser. */
const identifier = z
  .union([z.string(), z.number()])
  .transform((val) => String(val).trim())
  .refine((val) => val.length > 0, "must not be blank");

const optText = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((val) => (val === null || val === undefined ? null : String(val)));

/**
 * Per-day video statistics export: one row per video per day.
 */
export const DailyVideoStatsSchema = z.object({
  ytVideoID: identifier,
  ytChannelID: optText,
  ytVideoTitle: optText,
  ytVideoPublishedDate: z.union([z.string(), z.number()]).transform((val) => String(val)),
  ytVideoPublishedTime: optText,
  Date: z.union([z.string(), z.number()]).transform((val) => String(val)),
  views: metric,
  estimatedMinutesWatched: metric,
  comments: metric,
  likes: metric,
  dislikes: metric,
  shares: metric,
  subscribersGained: metric,
  subscribersLost: metric,
});

export type DailyVideoStats = z.infer<typeof DailyVideoStatsSchema>;

export const DAILY_STATS_METRICS = [
  "views",
  "subscribersGained",
  "subscribersLost",
  "estimatedMinutesWatched",
  "comments",
  "likes",
  "dislikes",
  "shares",
] as const;

/**
 * Audience-retention archive members. Only the join column is required;
 * every other column is carried through as exported.
 */
export const RETENTION_POSITION_COLUMN = "Video position (%)";

export const RETENTION_MEMBERS = {
  organic: "Organic.csv",
  detailed: "Detailed activity.csv",
  subscribers: "Subscribers and non-subscribers.csv",
  newReturning: "New and returning viewers.csv",
} as const;

export const SubscriberRetentionRowSchema = z.object({
  [RETENTION_POSITION_COLUMN]: z.union([z.number(), z.string()]),
  "Subscription status": z.string(),
  "Absolute audience retention (%)": z.union([z.number(), z.string(), z.null()]),
});

export const NewReturningRetentionRowSchema = z.object({
  [RETENTION_POSITION_COLUMN]: z.union([z.number(), z.string()]),
  "New and Returning Viewers": z.string(),
  "Absolute audience retention (%)": z.union([z.number(), z.string(), z.null()]),
});

export type SubscriberRetentionRow = z.infer<typeof SubscriberRetentionRowSchema>;
export type NewReturningRetentionRow = z.infer<typeof NewReturningRetentionRowSchema>;

export const CHART_DATA_KEY_COLUMNS = [
  "Date",
  "Content",
  "Video title",
  "Video publish time",
  "Duration",
] as const;
