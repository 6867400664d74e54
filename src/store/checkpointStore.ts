import fs from "node:fs";
import { z } from "zod";
import { readJsonIfExists, writeJsonAtomic } from "../core/files";
import type { Logger } from "../observability";
import { PipelineCheckpoint } from "../types";

const CheckpointFileSchema = z.object({
  activeCategory: z.string().nullish(),
  activeDocumentType: z.string().nullish(),
  currentPage: z.number().int().min(1).default(1),
  lastUri: z.string().nullish(),
  completedUris: z.array(z.string()).default([]),
  startedAt: z.string().nullish(),
  updatedAt: z.string().nullish(),
});

export type CheckpointFile = z.infer<typeof CheckpointFileSchema>;

function emptyCheckpoint(): PipelineCheckpoint {
  return { currentPage: 1, completedUris: new Set<string>() };
}

function fromFile(data: CheckpointFile): PipelineCheckpoint {
  return {
    activeCategory: data.activeCategory ?? undefined,
    activeDocumentType: data.activeDocumentType ?? undefined,
    currentPage: data.currentPage,
    lastUri: data.lastUri ?? undefined,
    completedUris: new Set(data.completedUris),
    startedAt: data.startedAt ?? undefined,
    updatedAt: data.updatedAt ?? undefined,
  };
}

function toFile(state: PipelineCheckpoint): CheckpointFile {
  return {
    activeCategory: state.activeCategory,
    activeDocumentType: state.activeDocumentType,
    currentPage: state.currentPage,
    lastUri: state.lastUri,
    completedUris: [...state.completedUris].sort(),
    startedAt: state.startedAt,
    updatedAt: state.updatedAt,
  };
}

/**
 * Resume state for a harvest. Every mutating call writes the whole file
 * before returning, so an interrupted run leaves exactly the finished work
 * recorded. Write failures are logged and the run carries on in memory.
 */
export class CheckpointStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private state: PipelineCheckpoint = emptyCheckpoint();

  constructor(filePath: string, logger: Logger, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.logger = logger;
    this.now = now;
  }

  get path(): string {
    return this.filePath;
  }

  /** Returns whether a previous checkpoint was found and loaded. */
  load(): boolean {
    let raw: unknown;
    try {
      raw = readJsonIfExists(this.filePath);
    } catch (error) {
      this.logger.warn("checkpoint_load_failed", {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      this.state = emptyCheckpoint();
      return false;
    }

    if (raw === undefined) {
      this.logger.info("checkpoint_not_found", { path: this.filePath });
      this.state = emptyCheckpoint();
      return false;
    }

    const parsed = CheckpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn("checkpoint_invalid", { path: this.filePath, error: parsed.error.message });
      this.state = emptyCheckpoint();
      return false;
    }

    this.state = fromFile(parsed.data);
    this.logger.info("checkpoint_loaded", {
      path: this.filePath,
      page: this.state.currentPage,
      completed: this.state.completedUris.size,
    });
    return true;
  }

  save(): void {
    this.state.updatedAt = this.now().toISOString();
    try {
      writeJsonAtomic(this.filePath, toFile(this.state));
      this.logger.debug("checkpoint_saved", { path: this.filePath });
    } catch (error) {
      this.logger.error("checkpoint_save_failed", {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  startSession(category: string, documentType: string): void {
    if (this.state.startedAt === undefined) {
      this.state.startedAt = this.now().toISOString();
    }
    this.state.activeCategory = category;
    this.state.activeDocumentType = documentType;
    this.save();
  }

  markCompleted(uri: string): void {
    this.state.completedUris.add(uri);
    this.state.lastUri = uri;
    this.save();
  }

  isCompleted(uri: string): boolean {
    return this.state.completedUris.has(uri);
  }

  setPage(page: number): void {
    this.state.currentPage = page;
    this.save();
  }

  /** Stored page only when both category and document type match; 1 otherwise. */
  resumePageFor(category: string, documentType: string): number {
    if (this.state.activeCategory === category && this.state.activeDocumentType === documentType) {
      return this.state.currentPage;
    }
    return 1;
  }

  reset(): void {
    this.state = emptyCheckpoint();
    try {
      if (fs.existsSync(this.filePath)) {
        fs.unlinkSync(this.filePath);
      }
      this.logger.info("checkpoint_reset", { path: this.filePath });
    } catch (error) {
      this.logger.error("checkpoint_reset_failed", {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  snapshot(): Readonly<Omit<PipelineCheckpoint, "completedUris">> & { completedUris: ReadonlySet<string> } {
    return { ...this.state, completedUris: new Set(this.state.completedUris) };
  }
}
