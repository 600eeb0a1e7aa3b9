import { ReportError } from "../../errors/report-error";
import { getColumn } from "../../table/table";
import { buildChannelMetricsReport, extractChannelMetrics } from "../channel-metrics";
import { InputLedger } from "../input-ledger";
import { channelDocument, creatorVideosResult, loaded, silenceConsole, thrown } from "./fixtures";

describe("buildChannelMetricsReport", () => {
  silenceConsole();

  it("keeps running totals separate per video", () => {
    const doc = channelDocument({
      ids: ["v1", "v2"],
      dates: [20240101, 20240101],
      metrics: [{ type: "VIEWS", values: [10, 20] }],
    });

    const { table, summary } = buildChannelMetricsReport([loaded("a.json", doc)]);

    expect(table.columns).toEqual(["Video IDs", "Dates", "VIEWS", "VIEWS_RUNNING_TOTAL"]);
    expect(table.rows).toEqual([
      { "Video IDs": "v1", Dates: "2024-01-01", VIEWS: 10, VIEWS_RUNNING_TOTAL: 10 },
      { "Video IDs": "v2", Dates: "2024-01-01", VIEWS: 20, VIEWS_RUNNING_TOTAL: 20 },
    ]);
    expect(summary.processed).toBe(1);
  });

  it("fills gaps from later files without overwriting earlier values", () => {
    const first = channelDocument({
      ids: ["v1"],
      dates: [20240101],
      metrics: [
        { type: "VIEWS", values: [null] },
        { type: "COMMENTS", values: [3] },
      ],
    });
    const second = channelDocument({
      ids: ["v1"],
      dates: [20240101],
      metrics: [
        { type: "VIEWS", values: [5] },
        { type: "COMMENTS", values: [9] },
      ],
    });

    const { table } = buildChannelMetricsReport([loaded("a.json", first), loaded("b.json", second)]);

    expect(table.columns).toEqual([
      "Video IDs",
      "Dates",
      "VIEWS",
      "COMMENTS",
      "VIEWS_RUNNING_TOTAL",
      "COMMENTS_RUNNING_TOTAL",
    ]);
    expect(table.rows).toEqual([
      {
        "Video IDs": "v1",
        Dates: "2024-01-01",
        VIEWS: 5,
        COMMENTS: 3,
        VIEWS_RUNNING_TOTAL: 5,
        COMMENTS_RUNNING_TOTAL: 3,
      },
    ]);
  });

  it("converts units before accumulating and sorts by date", () => {
    const doc = channelDocument({
      ids: ["v1", "v1"],
      dates: [20240102, 20240101],
      metrics: [{ type: "WATCH_TIME", kind: "milliseconds", values: [3_600_000, 7_200_000] }],
    });

    const { table } = buildChannelMetricsReport([loaded("a.json", doc)]);

    expect(getColumn(table, "Dates")).toEqual(["2024-01-01", "2024-01-02"]);
    expect(getColumn(table, "WATCH_TIME")).toEqual([2, 1]);
    expect(getColumn(table, "WATCH_TIME_RUNNING_TOTAL")).toEqual([2, 3]);
  });

  it("joins creator video metadata after the key columns", () => {
    const doc = channelDocument({
      ids: ["v1", "v2"],
      dates: [20240101, 20240101],
      metrics: [{ type: "VIEWS", values: [1, 2] }],
      videos: [{ videoId: "v1", title: "First", timePublishedSeconds: "1700000000", lengthSeconds: 61 }],
    });

    const { table } = buildChannelMetricsReport([loaded("a.json", doc)]);

    expect(table.columns).toEqual([
      "Video IDs",
      "Dates",
      "Title",
      "Published Date",
      "Length (seconds)",
      "VIEWS",
      "VIEWS_RUNNING_TOTAL",
    ]);
    expect(table.rows[0]).toMatchObject({
      Title: "First",
      "Published Date": "2023-11-14 22:13:20",
      "Length (seconds)": 61,
    });
    expect(table.rows[1]).toMatchObject({ Title: null, "Published Date": null, "Length (seconds)": null });
  });

  it("skips documents without a result table and reports why", () => {
    const good = channelDocument({
      ids: ["v1"],
      dates: [20240101],
      metrics: [{ type: "VIEWS", values: [4] }],
    });
    const ledger = new InputLedger("test");

    const { summary } = buildChannelMetricsReport(
      [loaded("bad.json", { results: [] }), loaded("good.json", good)],
      ledger
    );

    expect(summary.processed).toBe(1);
    expect(summary.skipped).toEqual([
      { source: "bad.json", reason: "no 2__TOP_ENTITIES_CHARTS_QUERY_KEY result table" },
    ]);
  });

  it("returns the metadata table when no file carries metrics", () => {
    const doc = {
      results: [creatorVideosResult([{ videoId: "v9", title: "Solo", timePublishedSeconds: 0 }])],
    };

    const { table, summary } = buildChannelMetricsReport([loaded("meta.json", doc)]);

    expect(table.columns).toEqual(["Video IDs", "Title", "Published Date", "Length (seconds)"]);
    expect(table.rows).toEqual([
      {
        "Video IDs": "v9",
        Title: "Solo",
        "Published Date": "1970-01-01 00:00:00",
        "Length (seconds)": null,
      },
    ]);
    expect(summary.processed).toBe(1);
  });

  it("fails with NO_DATA when nothing usable was found", () => {
    expect(thrown(() => buildChannelMetricsReport([loaded("empty.json", {})]))).toMatchObject({
      code: "NO_DATA",
    });
    expect(() => buildChannelMetricsReport([])).toThrow(ReportError);
  });
});

describe("extractChannelMetrics", () => {
  it("reports missing metric values", () => {
    const doc = channelDocument({ ids: ["v1"], dates: [20240101], metrics: [] });
    expect(extractChannelMetrics(doc)).toEqual({ ok: false, reason: "No metric values found in JSON" });
  });
});
