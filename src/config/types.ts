import type { DocumentCategory } from "../types";
import type { LogLevel } from "../observability";

/** Values accepted by `--types`; authority regulations can be selected on their own. */
export type SelectableType = DocumentCategory | "authority-regulation";

export type YearOverrides = Partial<Record<SelectableType, number>>;

export interface CompanionToggles {
  pdf: boolean;
  zip: boolean;
  media: boolean;
}

export interface AppConfig {
  baseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  outputDir: string;
  sleepSeconds: number;
  maxRetries: number;
  backoffMs: number;
  requestTimeoutMs: number;
  langAndVersion: string;
  pageLimit: number;
  maxPages?: number;
  types: SelectableType[];
  years: number;
  yearOverrides: YearOverrides;
  companions: CompanionToggles;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "companions" | "yearOverrides">> & {
  companions?: Partial<CompanionToggles>;
  yearOverrides?: YearOverrides;
};
