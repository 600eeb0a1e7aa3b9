/**
 * Reads exported JSON documents from disk.
 *
 * Files are decoded as UTF-8, falling back to latin1 when the bytes are not
 * valid UTF-8. Blank and unparseable files are reported, not thrown.
 */

import { readFileSync, readdirSync, statSync } from "fs";
import { basename, extname, join } from "path";
import { z } from "zod";
import type { JsonValue } from "../../types/analytics-json";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export type TextEncoding = "utf-8" | "latin1";

export interface LoadedDocument {
  source: string;
  document: JsonValue;
  encoding: TextEncoding;
}

export type DocumentLoad =
  | { ok: true; loaded: LoadedDocument }
  | { ok: false; source: string; reason: string };

export function decodeText(bytes: Uint8Array): { text: string; encoding: TextEncoding } {
  try {
    return { text: new TextDecoder("utf-8", { fatal: true }).decode(bytes), encoding: "utf-8" };
  } catch {
    console.warn("[json-loader] Unicode decode error, trying with latin1 encoding");
    // one code point per byte (TextDecoder's latin1 is windows-1252)
    return { text: Buffer.from(bytes).toString("latin1"), encoding: "latin1" };
  }
}

export function parseJsonDocument(text: string, source: string): DocumentLoad {
  const trimmed = text.replace(/^\uFEFF/, "").trim();
  if (!trimmed) {
    return { ok: false, source, reason: "empty file" };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch (err) {
    return {
      ok: false,
      source,
      reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const parsed = jsonValueSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, source, reason: "document is not a JSON value tree" };
  }
  return { ok: true, loaded: { source, document: parsed.data, encoding: "utf-8" } };
}

export function loadJsonDocument(filePath: string): DocumentLoad {
  const source = basename(filePath);
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (err) {
    return {
      ok: false,
      source,
      reason: `could not read file: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const { text, encoding } = decodeText(bytes);
  const result = parseJsonDocument(text, source);
  return result.ok ? { ok: true, loaded: { ...result.loaded, encoding } } : result;
}

/**
 * Input files with the given extension. A directory is scanned (sorted by
 * name, not recursive); a single matching file is returned as-is.
 */
export function listInputFiles(inputPath: string, extension: string): string[] {
  const ext = extension.toLowerCase();
  if (statSync(inputPath).isFile()) {
    return extname(inputPath).toLowerCase() === ext ? [inputPath] : [];
  }
  return readdirSync(inputPath)
    .filter((name) => extname(name).toLowerCase() === ext)
    .sort()
    .map((name) => join(inputPath, name));
}
