import path from "node:path";
import type { Logger } from "../observability";
import { CheckpointStore } from "./checkpointStore";
import { Manifest } from "./manifestStore";

export const CHECKPOINT_FILE_NAME = ".state.json";
export const MANIFEST_FILE_NAME = "manifest.json";

export interface RunStores {
  checkpoint: CheckpointStore;
  manifest: Manifest;
}

/** One checkpoint and one manifest per output root. */
export function createStores(outputDir: string, logger: Logger): RunStores {
  const root = path.resolve(outputDir);
  return {
    checkpoint: new CheckpointStore(path.join(root, CHECKPOINT_FILE_NAME), logger.child("checkpoint")),
    manifest: new Manifest(path.join(root, MANIFEST_FILE_NAME), logger.child("manifest")),
  };
}

export * from "./checkpointStore";
export * from "./manifestStore";
