import { z } from "zod";
import { REPORT_KINDS, type ReportKind } from "../../types/pipeline";
import { parseDayKey } from "../analytics/date-utils";
import { ReportError } from "../errors/report-error";
import { getEnv, type Env } from "./env";

/**
 * Settings for one report invocation. Built by the caller (CLI or tests)
 * and passed explicitly into the pipeline.
 */
const reportConfigSchema = z.object({
  input: z.string().min(1, "input path is required"),
  outputDir: z.string().min(1),
  outputFile: z
    .string()
    .min(1)
    .optional()
    .transform((name) => (name && !name.toLowerCase().endsWith(".csv") ? `${name}.csv` : name)),
  csvName: z.string().min(1),
  filterDate: z
    .string()
    .refine((value) => parseDayKey(value) !== null, "filter date must be YYYY-MM-DD")
    .optional(),
  periodMode: z.enum(["lag-window", "configured"]).default("lag-window"),
  tmpRoot: z.string().min(1).optional(),
});

export type ReportConfig = z.infer<typeof reportConfigSchema>;

export type ReportConfigInput = {
  input: string;
  outputDir?: string;
  outputFile?: string;
  csvName?: string;
  filterDate?: string;
  periodMode?: string;
  tmpRoot?: string;
};

export function isReportKind(value: string): value is ReportKind {
  return REPORT_KINDS.some((kind) => kind === value);
}

/** Validate invocation settings, filling gaps from the environment. */
export function buildReportConfig(input: ReportConfigInput, env: Env = getEnv()): ReportConfig {
  const result = reportConfigSchema.safeParse({
    ...input,
    outputDir: input.outputDir ?? env.REPORT_OUTPUT_DIR,
    csvName: input.csvName ?? env.CHART_DATA_CSV,
    tmpRoot: input.tmpRoot ?? env.REPORT_TMP_DIR,
  });

  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ReportError("INVALID_CONFIG", `Invalid report configuration: ${detail}`);
  }
  return result.data;
}
