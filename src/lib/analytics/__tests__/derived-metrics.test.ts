import { resolveColumns, type ColumnTemplate } from "../../json/column-resolver";
import { assembleRows } from "../../table/row-assembler";
import { createTable, getColumn } from "../../table/table";
import {
  addEngagementRates,
  addReverseRunningTotal,
  addRunningTotals,
  conversionFor,
  convertUnits,
  convertValue,
  orderMetricColumns,
  roundTo,
  safeRatio,
} from "../derived-metrics";

describe("conversionFor", () => {
  it.each([
    ["VIDEO_THUMBNAIL_IMPRESSIONS_VTR", "percentage"],
    ["AVERAGE_WATCH_PERCENTAGE", "percentage"],
    ["WATCH_TIME", "hours"],
    ["AVERAGE_WATCH_TIME", "minutes"],
    ["SESSION_TIME_MILLIS", "seconds"],
    ["VIEWS", "count"],
  ])("%s → %s", (column, expected) => {
    expect(conversionFor(column)).toBe(expected);
  });
});

describe("roundTo", () => {
  it("rounds exact halves to the even neighbour", () => {
    expect(roundTo(0.125, 2)).toBe(0.12);
    expect(roundTo(0.375, 2)).toBe(0.38);
    expect(roundTo(2.5, 0)).toBe(2);
    expect(roundTo(-0.125, 2)).toBe(-0.12);
  });

  it("rounds everything else to the nearest value", () => {
    expect(roundTo(4.567, 2)).toBe(4.57);
    expect(roundTo(1.04, 1)).toBe(1);
  });

  it("applies to converted percentages and seconds", () => {
    expect(convertValue(0.125, "percentage")).toBe(0.12);
    expect(convertValue(250, "seconds")).toBe(0.2);
    expect(convertValue(750, "seconds")).toBe(0.8);
  });
});

describe("convertUnits", () => {
  const table = createTable(
    ["id", "VTR", "WATCH_TIME", "AVERAGE_WATCH_TIME", "TIME_MILLIS", "VIEWS"],
    [
      { id: "v1", VTR: 4.567, WATCH_TIME: 5_400_000, AVERAGE_WATCH_TIME: 90_000, TIME_MILLIS: 1_250, VIEWS: "12.9" },
      { id: "v2", VTR: null, WATCH_TIME: null, AVERAGE_WATCH_TIME: "bad", TIME_MILLIS: null, VIEWS: null },
    ]
  );
  const metrics = ["VTR", "WATCH_TIME", "AVERAGE_WATCH_TIME", "TIME_MILLIS", "VIEWS"];

  it("converts each column by its name", () => {
    const converted = convertUnits(table, metrics);
    expect(converted.rows).toEqual([
      { id: "v1", VTR: 4.57, WATCH_TIME: 1.5, AVERAGE_WATCH_TIME: 1.5, TIME_MILLIS: 1.2, VIEWS: 12 },
      { id: "v2", VTR: null, WATCH_TIME: null, AVERAGE_WATCH_TIME: null, TIME_MILLIS: null, VIEWS: 0 },
    ]);
  });

  it("changes values again when applied twice, so it must run once", () => {
    const once = convertUnits(table, metrics);
    const twice = convertUnits(once, metrics);
    expect(getColumn(twice, "WATCH_TIME")[0]).toBe(0);
  });

  it("leaves columns it was not given untouched", () => {
    expect(convertUnits(table, ["VIEWS"]).rows[0].WATCH_TIME).toBe(5_400_000);
  });
});

describe("addRunningTotals", () => {
  it("is the prefix sum within each group in row order", () => {
    const table = createTable(
      ["id", "VIEWS"],
      [
        { id: "a", VIEWS: 1 },
        { id: "b", VIEWS: 10 },
        { id: "a", VIEWS: 2 },
        { id: "a", VIEWS: null },
        { id: "a", VIEWS: 4 },
        { id: "b", VIEWS: 5 },
      ]
    );
    const result = addRunningTotals(table, { groupBy: "id", metrics: ["VIEWS"] });
    expect(result.columns).toEqual(["id", "VIEWS", "VIEWS_RUNNING_TOTAL"]);
    expect(getColumn(result, "VIEWS_RUNNING_TOTAL")).toEqual([1, 10, 3, null, 7, 15]);
  });

  it("skips columns that are already running totals and honours a custom namer", () => {
    const table = createTable(["id", "x", "x_RUNNING_TOTAL"], [{ id: "a", x: 1, x_RUNNING_TOTAL: 1 }]);
    const result = addRunningTotals(table, {
      groupBy: "id",
      metrics: ["x", "x_RUNNING_TOTAL"],
      name: (m) => `RunningTotal_${m}`,
    });
    expect(result.columns).toEqual(["id", "x", "x_RUNNING_TOTAL", "RunningTotal_x"]);
  });
});

describe("addReverseRunningTotal", () => {
  it("sums from each row to the end of its group", () => {
    const table = createTable(
      ["g", "stopped"],
      [
        { g: "a", stopped: 1 },
        { g: "a", stopped: 2 },
        { g: "a", stopped: 3 },
        { g: "b", stopped: 5 },
      ]
    );
    const result = addReverseRunningTotal(table, { groupBy: "g", source: "stopped", target: "remaining" });
    expect(getColumn(result, "remaining")).toEqual([6, 5, 3, 5]);
  });
});

describe("ratios", () => {
  it("safeRatio falls back on null or zero denominators", () => {
    expect(safeRatio(6, 3)).toBe(2);
    expect(safeRatio(6, 0)).toBe(0);
    expect(safeRatio(6, null)).toBe(0);
    expect(safeRatio(null, 2)).toBe(0);
  });

  it("adds per-day, engagement and retention rates", () => {
    const table = createTable(
      ["views", "days", "comments", "likes", "shares", "minutes"],
      [
        { views: 200, days: 4, comments: 2, likes: 6, shares: 2, minutes: 50 },
        { views: 30, days: 0, comments: 1, likes: 1, shares: 1, minutes: 15 },
        { views: 0, days: 2, comments: 1, likes: null, shares: 0, minutes: 5 },
      ]
    );
    const result = addEngagementRates(table, {
      views: "views",
      daysSincePublish: "days",
      comments: "comments",
      likes: "likes",
      shares: "shares",
      minutesWatched: "minutes",
    });

    expect(getColumn(result, "ViewsPerDay")).toEqual([50, 30, 0]);
    expect(getColumn(result, "EngagementRate")).toEqual([5, 10, 0]);
    expect(getColumn(result, "RetentionRate")).toEqual([0.25, 0.5, 0]);
  });
});

describe("orderMetricColumns", () => {
  it("puts known metrics first, then extras, then their running totals", () => {
    const columns = [
      "Dates",
      "Video IDs",
      "EXTRA_B",
      "VIEWS",
      "EXTRA_A",
      "RATINGS_LIKES",
      "VIEWS_RUNNING_TOTAL",
      "EXTRA_B_RUNNING_TOTAL",
      "RATINGS_LIKES_RUNNING_TOTAL",
      "EXTRA_A_RUNNING_TOTAL",
    ];
    expect(
      orderMetricColumns(columns, {
        leading: ["Video IDs", "Dates"],
        known: ["RATINGS_LIKES", "VIEWS", "COMMENTS"],
      })
    ).toEqual([
      "Video IDs",
      "Dates",
      "RATINGS_LIKES",
      "VIEWS",
      "EXTRA_B",
      "EXTRA_A",
      "RATINGS_LIKES_RUNNING_TOTAL",
      "VIEWS_RUNNING_TOTAL",
      "EXTRA_B_RUNNING_TOTAL",
      "EXTRA_A_RUNNING_TOTAL",
    ]);
  });
});

describe("resolved document to running totals", () => {
  const template: ColumnTemplate = {
    family: "test",
    basePath: "",
    idPath: "ids",
    metrics: [{ fallbackName: "VIEWS", valuePaths: ["metrics[0].values"], namePath: "metrics[0].name" }],
  };

  it("accumulates a fallback-named metric separately for each video", () => {
    const resolution = resolveColumns({ ids: ["v1", "v2"], metrics: [{ values: [10, 20] }] }, template);
    if (!resolution.ok) throw new Error(resolution.reason);

    const rows = assembleRows(resolution.columns, { idColumn: "Video IDs" });
    const table = addRunningTotals(rows, { groupBy: "Video IDs", metrics: ["VIEWS"] });

    expect(table.rows).toHaveLength(2);
    expect(getColumn(table, "VIEWS")).toEqual([10, 20]);
    expect(getColumn(table, "VIEWS_RUNNING_TOTAL")).toEqual([10, 20]);
  });
});
