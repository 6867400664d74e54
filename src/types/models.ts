export type DocumentCategory = "act" | "judgment" | "doc";

export const AUTHORITY_REGULATION = "authority-regulation";

export interface DocumentCoordinates {
  category: DocumentCategory;
  documentType: string;
  year: string;
  number: string;
  langAndVersion: string;
  /** Issuing authority; only set for authority regulations. */
  authority?: string;
}

export type ChangeStatus = "NEW" | "MODIFIED" | "unknown";

export interface ListedIdentifier {
  uri: string;
  changeStatus: ChangeStatus;
  /** Listing page the identifier was read from. */
  page: number;
}

export type FetchStatus = "success" | "skipped" | "dry-run" | "error";

export interface FetchOutcome {
  readonly uri: string;
  readonly status: FetchStatus;
  readonly timestamp: string;
  readonly writtenFiles: readonly string[];
  readonly errorMessage?: string;
}

export interface PipelineCheckpoint {
  activeCategory?: string;
  activeDocumentType?: string;
  currentPage: number;
  lastUri?: string;
  completedUris: Set<string>;
  startedAt?: string;
  updatedAt?: string;
}

export interface ManifestSummary {
  total: number;
  success: number;
  skipped: number;
  error: number;
}
