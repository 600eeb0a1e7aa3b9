/**
 * Path templates for the known export document families.
 */

import type { ColumnTemplate, MetricSlot } from "./column-resolver";

// ── Channel metrics (top entities chart, one row per video per day) ──

export const TOP_ENTITIES_QUERY_KEY = "2__TOP_ENTITIES_CHARTS_QUERY_KEY";

export const CHANNEL_KNOWN_METRICS = [
  "SHORTS_FEED_IMPRESSIONS",
  "SHORTS_FEED_IMPRESSIONS_VTR",
  "RATINGS_LIKES",
  "SUBSCRIBERS_NET_CHANGE",
  "VIEWS",
  "WATCH_TIME",
  "VIDEO_THUMBNAIL_IMPRESSIONS",
  "VIDEO_THUMBNAIL_IMPRESSIONS_VTR",
  "COMMENTS",
  "SHARINGS",
] as const;

/** Paths are relative to the located `resultTable`. */
export const CHANNEL_METRICS_TEMPLATE: ColumnTemplate = {
  family: "channel-metrics",
  basePath: "",
  idPath: "dimensionColumns[1].strings.values",
  datePath: "dimensionColumns[0].dateIds.values",
  metrics: {
    arrayPath: "metricColumns",
    valueKinds: ["counts", "percentages", "milliseconds"],
    namePath: "metric.type",
    fallbackNames: CHANNEL_KNOWN_METRICS,
  },
};

// ── First days (scatterplot card, lag windows per video) ────

export const FIRST_DAYS_CARD_PATH = "results[0].value.getCards.cards[0]";
export const FIRST_DAYS_BASE_PATH = `${FIRST_DAYS_CARD_PATH}.scatterplotData.resultTable`;
export const FIRST_DAYS_ENTITIES_PATH = `${FIRST_DAYS_CARD_PATH}.sideEntities.videos`;
export const FIRST_DAYS_TIME_PERIOD_PATH = `${FIRST_DAYS_CARD_PATH}.config.scatterplotDataConfig.timePeriod`;

export const FIRST_DAYS_PERIODS = ["24h", "7d", "28d"] as const;

/** `timePeriod.count` → period label. */
export const PERIOD_BY_DAY_COUNT: Readonly<Record<number, string>> = {
  1: "24h",
  7: "7d",
  28: "28d",
};

function slot(index: number, kind: string, fallbackName: string): MetricSlot {
  return {
    fallbackName,
    valuePaths: [`metricColumns[${index}].${kind}.values`],
    namePath: `metricColumns[${index}].metric.type`,
  };
}

export const FIRST_DAYS_TEMPLATE: ColumnTemplate = {
  family: "first-days",
  basePath: FIRST_DAYS_BASE_PATH,
  idPath: "dimensionColumns[0].strings.values",
  metrics: [
    slot(0, "counts", "VIEWS"),
    slot(1, "counts", "VIDEO_THUMBNAIL_IMPRESSIONS"),
    slot(2, "percentages", "VIDEO_THUMBNAIL_IMPRESSIONS_VTR"),
    slot(3, "percentages", "AVERAGE_WATCH_PERCENTAGE"),
    slot(4, "milliseconds", "AVERAGE_WATCH_TIME"),
    slot(5, "milliseconds", "WATCH_TIME"),
    slot(6, "counts", "RATINGS_LIKES"),
    slot(7, "counts", "RATINGS_DISLIKES"),
    slot(8, "counts", "NEW_VIEWERS"),
    slot(9, "counts", "RETURNING_NEW_VIEWERS"),
  ],
};
