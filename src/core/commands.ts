import path from "node:path";
import { AppConfig, planTargets } from "../config";
import { listDocuments } from "../crawl/lister";
import { fetchDocument, FetchOptions } from "../download/fetcher";
import { Logger, MetricsRegistry } from "../observability";
import { RunStores, summarizeOutcomes } from "../store";
import { FetchOutcome } from "../types";
import { Transport } from "./transport";

export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  transport: Transport;
  stores: RunStores;
}

export interface DownloadCommandOptions {
  force: boolean;
  dryRun: boolean;
  resume: boolean;
  reset: boolean;
  signal?: AbortSignal;
  now?: () => Date;
}

export const EXIT_OK = 0;
export const EXIT_ERRORS = 1;
export const EXIT_INTERRUPTED = 130;

function recordOutcomeMetric(metrics: MetricsRegistry, outcome: FetchOutcome): void {
  switch (outcome.status) {
    case "success":
      metrics.incrementCounter("fetch_success", 1);
      break;
    case "skipped":
      metrics.incrementCounter("fetch_skipped", 1);
      break;
    case "dry-run":
      metrics.incrementCounter("fetch_dry_run", 1);
      break;
    case "error":
      metrics.incrementCounter("fetch_error", 1);
      break;
  }
}

/**
 * Harvests every configured (category, document type) pair in order, one
 * document at a time. Returns the process exit code.
 */
export async function runDownload(ctx: CommandContext, options: DownloadCommandOptions): Promise<number> {
  const { config, logger, metrics, transport } = ctx;
  const { checkpoint, manifest } = ctx.stores;
  const signal = options.signal;

  if (options.reset) {
    checkpoint.reset();
  }
  if (options.resume) {
    checkpoint.load();
  }

  const fetchOptions: FetchOptions = {
    outputRoot: path.resolve(config.outputDir),
    fetchPdf: config.companions.pdf,
    fetchZip: config.companions.zip,
    fetchMedia: config.companions.media,
    force: options.force,
    dryRun: options.dryRun,
  };

  const targets = planTargets(config, options.now?.());
  logger.info("download_start", {
    outputDir: fetchOptions.outputRoot,
    types: config.types,
    langAndVersion: config.langAndVersion,
    targets: targets.length,
    dryRun: options.dryRun,
    force: options.force,
    resume: options.resume,
  });

  const fetcherLogger = logger.child("fetcher");
  const listerLogger = logger.child("lister");
  const runOutcomes: FetchOutcome[] = [];
  let interrupted = false;

  targetLoop: for (const target of targets) {
    if (signal?.aborted) {
      interrupted = true;
      break;
    }

    const resumePage = options.resume ? checkpoint.resumePageFor(target.category, target.documentType) : 1;
    logger.info("download_target_start", {
      category: target.category,
      documentType: target.documentType,
      startYear: target.startYear,
      endYear: target.endYear,
      resumePage,
    });
    checkpoint.startSession(target.category, target.documentType);
    // The stored page belongs to the previous pair until the first item here lands.
    checkpoint.setPage(resumePage);

    const listing = listDocuments(
      {
        category: target.category,
        documentType: target.documentType,
        langAndVersion: config.langAndVersion,
        startYear: target.startYear,
        endYear: target.endYear,
        limit: config.pageLimit,
        maxPages: config.maxPages,
        startPage: resumePage,
      },
      { transport, logger: listerLogger, metrics },
    );

    for await (const item of listing) {
      if (signal?.aborted) {
        interrupted = true;
        break targetLoop;
      }

      if (checkpoint.isCompleted(item.uri)) {
        metrics.incrementCounter("docs_already_completed", 1);
        logger.debug("download_already_completed", { uri: item.uri });
        continue;
      }

      const outcome = await fetchDocument(item.uri, fetchOptions, {
        transport,
        logger: fetcherLogger,
        metrics,
        now: options.now,
      });
      recordOutcomeMetric(metrics, outcome);
      runOutcomes.push(outcome);
      manifest.add(outcome);

      if (outcome.status === "success" || outcome.status === "skipped") {
        checkpoint.markCompleted(item.uri);
      }
      checkpoint.setPage(item.page);
      // Checked before the next pull so an abort never triggers another list request.
      if (signal?.aborted) {
        interrupted = true;
        break targetLoop;
      }
    }

    logger.info("download_target_complete", { category: target.category, documentType: target.documentType });
  }

  const summary = summarizeOutcomes(runOutcomes);
  const manifestTotals = manifest.summary();
  if (interrupted) {
    logger.warn("download_interrupted", { ...summary, manifestTotals });
    return EXIT_INTERRUPTED;
  }

  logger.info("download_complete", { ...summary, manifestTotals });
  return summary.error === 0 ? EXIT_OK : EXIT_ERRORS;
}

/** Reports manifest counts and checkpoint progress without touching the network. */
export async function runStatus(ctx: CommandContext): Promise<number> {
  const { checkpoint, manifest } = ctx.stores;
  const found = checkpoint.load();
  const state = checkpoint.snapshot();

  ctx.logger.info("status_complete", {
    outputDir: path.resolve(ctx.config.outputDir),
    manifest: manifest.summary(),
    checkpoint: found
      ? {
          path: checkpoint.path,
          activeCategory: state.activeCategory,
          activeDocumentType: state.activeDocumentType,
          currentPage: state.currentPage,
          lastUri: state.lastUri,
          completed: state.completedUris.size,
          startedAt: state.startedAt,
          updatedAt: state.updatedAt,
        }
      : null,
  });
  return EXIT_OK;
}
