import { z } from "zod";
import { ACCEPT, Transport, TransportResponse } from "../core/transport";
import { toListPath } from "../core/uri";
import { Logger, MetricsRegistry } from "../observability";
import { ChangeStatus, DocumentCategory, ListedIdentifier } from "../types";

export const MAX_PAGE_SIZE = 10;

export interface ListConfig {
  category: DocumentCategory;
  documentType: string;
  langAndVersion?: string;
  startYear?: number;
  endYear?: number;
  limit?: number;
  maxPages?: number;
  /** First page to request; taken from the checkpoint when resuming. */
  startPage?: number;
}

interface ListDependencies {
  transport: Transport;
  logger: Logger;
  metrics?: MetricsRegistry;
}

export type ListTermination = "page-limit-reached" | "request-failed" | "malformed-body" | "end-of-data" | "short-page";

const ListPageSchema = z.array(z.record(z.unknown()));

function toChangeStatus(value: unknown): ChangeStatus {
  return value === "NEW" || value === "MODIFIED" ? value : "unknown";
}

export function clampPageSize(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return MAX_PAGE_SIZE;
  }
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_PAGE_SIZE);
}

function parsePage(body: Buffer): Array<Record<string, unknown>> | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body.toString("utf-8"));
  } catch {
    return undefined;
  }
  const parsed = ListPageSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Lazily pages through the list endpoint for one (category, document type).
 * A page is requested only when the consumer pulls past the previous one, so
 * breaking out of the loop stops all further requests. The generator's return
 * value says why listing ended; none of the endings throw.
 */
export async function* listDocuments(
  config: ListConfig,
  deps: ListDependencies,
): AsyncGenerator<ListedIdentifier, ListTermination, undefined> {
  const { transport, logger, metrics } = deps;
  const listPath = toListPath(config.category, config.documentType);
  const limit = clampPageSize(config.limit);
  const langAndVersion = config.langAndVersion ?? "fin@";
  let page = Math.max(1, config.startPage ?? 1);

  while (true) {
    if (config.maxPages !== undefined && page > config.maxPages) {
      logger.info("list_max_pages_reached", { maxPages: config.maxPages, page });
      return "page-limit-reached";
    }

    logger.info("list_page_start", { category: config.category, documentType: config.documentType, page });
    const stopTimer = metrics?.startTimer("page_fetch_ms");

    let response: TransportResponse;
    try {
      response = await transport.get(listPath, ACCEPT.json, {
        format: "json",
        page,
        limit,
        langAndVersion,
        startYear: config.startYear,
        endYear: config.endYear,
      });
    } catch (error) {
      stopTimer?.();
      logger.error("list_request_failed", {
        page,
        error: error instanceof Error ? error.message : String(error),
      });
      return "request-failed";
    }
    const durationMs = stopTimer?.();
    const { status, body } = response;

    if (status !== 200) {
      logger.error("list_request_failed", { page, statusCode: status });
      return "request-failed";
    }

    const items = parsePage(body);
    if (!items) {
      logger.warn("list_page_malformed", { page, bytes: body.length });
      return "malformed-body";
    }

    if (items.length === 0) {
      logger.info("list_end_of_data", { page, durationMs });
      return "end-of-data";
    }

    metrics?.incrementCounter("pages_listed", 1);
    logger.debug("list_page_complete", { page, itemsOnPage: items.length, durationMs });

    for (const item of items) {
      const uri = item.akn_uri;
      if (typeof uri !== "string" || uri.length === 0) {
        logger.warn("list_item_without_uri", { page });
        continue;
      }
      metrics?.incrementCounter("docs_listed", 1);
      yield { uri, changeStatus: toChangeStatus(item.status), page };
    }

    if (items.length < limit) {
      logger.info("list_last_page", { page, itemsOnPage: items.length });
      return "short-page";
    }

    page += 1;
  }
}
