import dotenv from "dotenv";
import { z } from "zod";

const envSchema = z.object({
  REPORT_OUTPUT_DIR: z.string().min(1).default("output"),
  REPORT_TMP_DIR: z.string().min(1).optional(),
  CHART_DATA_CSV: z.string().min(1).default("Chart data.csv"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/** Load `.env` (if any) once and validate the environment. */
export function getEnv(): Env {
  if (_env) return _env;
  dotenv.config();
  _env = envSchema.parse(process.env);
  return _env;
}

export function resetEnvForTests(): void {
  _env = null;
}
