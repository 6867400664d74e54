import fs from "node:fs";
import path from "node:path";
import { writeFileAtomic } from "../core/files";
import { ACCEPT, Transport } from "../core/transport";
import { resolveUri, toApiPath, toStoragePath } from "../core/uri";
import { extractMediaLinks } from "../crawl/mediaParser";
import { Logger, MetricsRegistry } from "../observability";
import { FetchOutcome, FetchStatus } from "../types";

export interface FetchOptions {
  outputRoot: string;
  fetchPdf: boolean;
  fetchZip: boolean;
  fetchMedia: boolean;
  force: boolean;
  dryRun: boolean;
}

interface FetcherDeps {
  transport: Transport;
  logger: Logger;
  metrics?: MetricsRegistry;
  now?: () => Date;
}

interface Companion {
  kind: "pdf" | "zip";
  remoteName: string;
  localName: string;
  accept: string;
}

const COMPANIONS: readonly Companion[] = [
  { kind: "pdf", remoteName: "main.pdf", localName: "main.pdf", accept: ACCEPT.pdf },
  { kind: "zip", remoteName: "main.akn", localName: "main.zip", accept: ACCEPT.zip },
];

export const PRIMARY_FILE_NAME = "main.xml";
export const MEDIA_DIR_NAME = "media";

function createOutcome(
  uri: string,
  status: FetchStatus,
  timestamp: string,
  writtenFiles: string[],
  errorMessage?: string,
): FetchOutcome {
  return Object.freeze({
    uri,
    status,
    timestamp,
    writtenFiles: Object.freeze([...writtenFiles]),
    ...(errorMessage !== undefined ? { errorMessage } : {}),
  });
}

function isUsableMediaName(name: string): boolean {
  return name.length > 0 && name !== "." && name !== "..";
}

/**
 * Fetches one document and the requested companions into
 * `<outputRoot>/<category>/<type>/[<authority>/]<year>/<number>/<lang>/`.
 * Only a failure of the primary XML makes the outcome an error; companions
 * and media are best effort.
 */
export async function fetchDocument(uri: string, options: FetchOptions, deps: FetcherDeps): Promise<FetchOutcome> {
  const { transport, logger, metrics } = deps;
  const timestamp = (deps.now ?? (() => new Date()))().toISOString();

  const coords = resolveUri(uri);
  if (!coords) {
    logger.error("fetch_unparseable_uri", { uri });
    return createOutcome(uri, "error", timestamp, [], `unparseable uri: ${uri}`);
  }

  const docDir = path.join(options.outputRoot, toStoragePath(coords));
  const primaryPath = path.join(docDir, PRIMARY_FILE_NAME);

  if (!options.force && fs.existsSync(primaryPath)) {
    logger.info("fetch_skip_existing", { uri, path: primaryPath });
    return createOutcome(uri, "skipped", timestamp, [primaryPath]);
  }

  if (options.dryRun) {
    logger.info("fetch_dry_run", { uri, path: docDir });
    return createOutcome(uri, "dry-run", timestamp, []);
  }

  const apiPath = toApiPath(coords);
  const writtenFiles: string[] = [];
  const stopTimer = metrics?.startTimer("document_fetch_ms");
  let primaryBody: Buffer;

  try {
    fs.mkdirSync(docDir, { recursive: true });
    const response = await transport.get(apiPath, ACCEPT.xml);
    if (response.status !== 200) {
      stopTimer?.();
      const message = `HTTP ${response.status} fetching XML`;
      logger.error("fetch_document_failed", { uri, statusCode: response.status });
      return createOutcome(uri, "error", timestamp, [], message);
    }
    primaryBody = response.body;
    writeFileAtomic(primaryPath, primaryBody);
    writtenFiles.push(primaryPath);
  } catch (error) {
    stopTimer?.();
    const message = `failed to fetch XML: ${error instanceof Error ? error.message : String(error)}`;
    logger.error("fetch_document_failed", { uri, error: message });
    return createOutcome(uri, "error", timestamp, [], message);
  }

  logger.info("fetch_document_ok", { uri, path: primaryPath, bytes: primaryBody.length });

  for (const companion of COMPANIONS) {
    const requested = companion.kind === "pdf" ? options.fetchPdf : options.fetchZip;
    if (!requested) {
      continue;
    }
    const written = await fetchOptional(
      transport,
      `${apiPath}/${companion.remoteName}`,
      companion.accept,
      path.join(docDir, companion.localName),
      { uri, kind: companion.kind },
      deps,
    );
    if (written) {
      writtenFiles.push(written);
    }
  }

  if (options.fetchMedia) {
    const links = extractMediaLinks(primaryBody, logger);
    if (links.length > 0) {
      const mediaDir = path.join(docDir, MEDIA_DIR_NAME);
      let mediaReady = true;
      try {
        fs.mkdirSync(mediaDir, { recursive: true });
      } catch (error) {
        mediaReady = false;
        logger.warn("fetch_media_dir_failed", {
          uri,
          path: mediaDir,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      for (const link of mediaReady ? links : []) {
        const fileName = path.posix.basename(link);
        if (!isUsableMediaName(fileName)) {
          logger.warn("fetch_media_bad_name", { uri, link });
          continue;
        }
        const written = await fetchOptional(
          transport,
          `${apiPath}/${link}`,
          ACCEPT.any,
          path.join(mediaDir, fileName),
          { uri, kind: "media", link },
          deps,
        );
        if (written) {
          writtenFiles.push(written);
        }
      }
    }
  }

  const durationMs = stopTimer?.();
  logger.info("fetch_complete", { uri, files: writtenFiles.length, durationMs });
  return createOutcome(uri, "success", timestamp, writtenFiles);
}

async function fetchOptional(
  transport: Transport,
  remotePath: string,
  accept: string,
  targetPath: string,
  fields: { uri: string; kind: string; link?: string },
  deps: FetcherDeps,
): Promise<string | undefined> {
  const { logger, metrics } = deps;
  try {
    const response = await transport.get(remotePath, accept);
    if (response.status === 200) {
      writeFileAtomic(targetPath, response.body);
      metrics?.incrementCounter("companions_fetched", 1);
      logger.info("fetch_companion_ok", { ...fields, path: targetPath });
      return targetPath;
    }
    if (response.status !== 404) {
      logger.warn("fetch_companion_http_error", { ...fields, statusCode: response.status });
    }
  } catch (error) {
    logger.warn("fetch_companion_error", {
      ...fields,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return undefined;
}
