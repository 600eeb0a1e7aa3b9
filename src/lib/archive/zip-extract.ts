/**
 * Extract CSV members from exported .zip archives.
 *
 * Members are written to a scratch directory owned by one call; the
 * directory is removed when the callback returns or throws.
 */

import AdmZip from "adm-zip";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { basename, join } from "path";

export interface ExtractedFile {
  /** Member name inside the zip, without directories */
  originalName: string;
  /** Path where the extracted file was saved */
  filePath: string;
  /** File size in bytes */
  size: number;
}

export interface ExtractOptions {
  /** Member names to extract. Omit to extract every CSV. */
  members?: readonly string[];
  /** Parent of the scratch directory. Defaults to the OS temp dir. */
  tmpRoot?: string;
}

/**
 * Extract CSVs from `zipPath` into a fresh scratch directory and hand them
 * to `use`, keyed by member name.
 */
export function withExtractedCsvs<T>(
  zipPath: string,
  options: ExtractOptions,
  use: (files: Map<string, ExtractedFile>) => T
): T {
  const zip = new AdmZip(zipPath);
  const scratchDir = mkdtempSync(join(options.tmpRoot ?? tmpdir(), "video-reports-"));

  try {
    const extracted = new Map<string, ExtractedFile>();

    for (const entry of zip.getEntries()) {
      if (entry.isDirectory) continue;
      const safeName = basename(entry.entryName); // strip any directory path inside zip

      if (options.members ? !options.members.includes(safeName) : !safeName.toLowerCase().endsWith(".csv")) {
        continue;
      }
      if (extracted.has(safeName)) continue;

      const data = entry.getData();
      const savePath = join(scratchDir, safeName);
      writeFileSync(savePath, data);
      extracted.set(safeName, { originalName: safeName, filePath: savePath, size: data.length });
    }

    console.log(
      `[zip-extract] Extracted ${extracted.size} CSV(s) from ${basename(zipPath)}` +
        (extracted.size > 0 ? `: ${[...extracted.keys()].join(", ")}` : "")
    );

    return use(extracted);
  } finally {
    rmSync(scratchDir, { recursive: true, force: true });
  }
}
