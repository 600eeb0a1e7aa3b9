import type { InputSummary, SkippedInput } from "../../types/pipeline";

/**
 * Per-run record of which inputs contributed, which were skipped and why,
 * and any warnings raised along the way.
 */
export class InputLedger {
  private processedCount = 0;
  private readonly skippedInputs: SkippedInput[] = [];
  private readonly warningList: string[] = [];

  constructor(private readonly tag: string) {}

  processed(source: string): void {
    this.processedCount++;
    console.log(`[${this.tag}] Processed ${source}`);
  }

  skip(source: string, reason: string): void {
    this.skippedInputs.push({ source, reason });
    console.warn(`[${this.tag}] Skipping ${source}: ${reason}`);
  }

  warn(message: string): void {
    this.warningList.push(message);
    console.warn(`[${this.tag}] ${message}`);
  }

  get processedTotal(): number {
    return this.processedCount;
  }

  summary(): InputSummary {
    return {
      processed: this.processedCount,
      skipped: [...this.skippedInputs],
      warnings: [...this.warningList],
    };
  }
}
