import { z } from "zod";
import { readJsonIfExists, writeJsonAtomic } from "../core/files";
import type { Logger } from "../observability";
import { FetchOutcome, ManifestSummary } from "../types";

const FetchOutcomeSchema = z.object({
  uri: z.string(),
  status: z.enum(["success", "skipped", "dry-run", "error"]),
  timestamp: z.string(),
  writtenFiles: z.array(z.string()).default([]),
  errorMessage: z.string().optional(),
});

const ManifestFileSchema = z.object({
  entries: z.array(FetchOutcomeSchema).default([]),
});

export function summarizeOutcomes(entries: readonly FetchOutcome[]): ManifestSummary {
  const summary: ManifestSummary = { total: entries.length, success: 0, skipped: 0, error: 0 };
  for (const entry of entries) {
    if (entry.status === "success") {
      summary.success += 1;
    } else if (entry.status === "skipped") {
      summary.skipped += 1;
    } else if (entry.status === "error") {
      summary.error += 1;
    }
  }
  return summary;
}

/**
 * Audit log of every fetch outcome for an output root. History from earlier
 * runs is loaded when readable; resume decisions never depend on it.
 */
export class Manifest {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly outcomes: FetchOutcome[] = [];

  constructor(filePath: string, logger: Logger, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.logger = logger;
    this.now = now;
    this.load();
  }

  add(outcome: FetchOutcome): void {
    this.outcomes.push(outcome);
    this.save();
  }

  entries(): readonly FetchOutcome[] {
    return this.outcomes;
  }

  /** Dry-run outcomes count toward `total` only. */
  summary(): ManifestSummary {
    return summarizeOutcomes(this.outcomes);
  }

  private load(): void {
    let raw: unknown;
    try {
      raw = readJsonIfExists(this.filePath);
    } catch (error) {
      this.logger.warn("manifest_load_failed", {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    if (raw === undefined) {
      return;
    }

    const parsed = ManifestFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn("manifest_invalid", { path: this.filePath, error: parsed.error.message });
      return;
    }

    for (const entry of parsed.data.entries) {
      this.outcomes.push(Object.freeze({ ...entry, writtenFiles: Object.freeze([...entry.writtenFiles]) }));
    }
    this.logger.info("manifest_loaded", { path: this.filePath, entries: this.outcomes.length });
  }

  private save(): void {
    const summary = this.summary();
    try {
      writeJsonAtomic(this.filePath, {
        updatedAt: this.now().toISOString(),
        totalEntries: summary.total,
        successCount: summary.success,
        skippedCount: summary.skipped,
        errorCount: summary.error,
        entries: this.outcomes,
      });
    } catch (error) {
      this.logger.error("manifest_save_failed", {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
