import type { JsonValue } from "../../../types/analytics-json";
import type { LoadedDocument } from "../../input/json-loader";
import { createTable, type CellValue, type Table } from "../../table/table";
import { TOP_ENTITIES_QUERY_KEY } from "../../json/report-templates";

export interface MetricFixture {
  type?: string;
  kind?: "counts" | "percentages" | "milliseconds";
  values: JsonValue[];
}

export function metricColumn({ type, kind = "counts", values }: MetricFixture): JsonValue {
  return type === undefined
    ? { [kind]: { values } }
    : { metric: { type }, [kind]: { values } };
}

export function creatorVideosResult(videos: JsonValue[]): JsonValue {
  return { key: "0__CREATOR_VIDEOS", value: { getCreatorVideos: { videos } } };
}

export function channelDocument(options: {
  ids: string[];
  dates: JsonValue[];
  metrics: MetricFixture[];
  videos?: JsonValue[];
}): JsonValue {
  const results: JsonValue[] = [
    {
      key: TOP_ENTITIES_QUERY_KEY,
      value: {
        resultTable: {
          dimensionColumns: [{ dateIds: { values: options.dates } }, { strings: { values: options.ids } }],
          metricColumns: options.metrics.map(metricColumn),
        },
      },
    },
  ];
  if (options.videos) results.push(creatorVideosResult(options.videos));
  return { results };
}

export function firstDaysDocument(options: {
  ids: string[];
  metrics: MetricFixture[];
  entities?: JsonValue[];
  periodCount?: number;
}): JsonValue {
  const card: Record<string, JsonValue> = {
    scatterplotData: {
      resultTable: {
        dimensionColumns: [{ strings: { values: options.ids } }],
        metricColumns: options.metrics.map(metricColumn),
      },
    },
    sideEntities: { videos: options.entities ?? [] },
  };
  if (options.periodCount !== undefined) {
    card.config = { scatterplotDataConfig: { timePeriod: { count: options.periodCount } } };
  }
  return { results: [{ value: { getCards: { cards: [card] } } }] };
}

export function loaded(source: string, document: JsonValue): LoadedDocument {
  return { source, document, encoding: "utf-8" };
}

export function silenceConsole(): void {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });
  afterEach(() => {
    jest.restoreAllMocks();
  });
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

/** Table from a header and positional rows. */
export function table(columns: string[], values: CellValue[][]): Table {
  return createTable(
    columns,
    values.map((cells) => Object.fromEntries(columns.map((c, i) => [c, cells[i] ?? null])))
  );
}
