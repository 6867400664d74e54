export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogFields {
  uri?: string;
  url?: string;
  path?: string;
  page?: number;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_listed"
  | "docs_listed"
  | "docs_already_completed"
  | "fetch_success"
  | "fetch_skipped"
  | "fetch_dry_run"
  | "fetch_error"
  | "companions_fetched"
  | "http_requests"
  | "http_retries";

export type MetricTimerName = "page_fetch_ms" | "document_fetch_ms";
