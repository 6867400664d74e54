import { Agent, fetch as undiciFetch } from "undici";
import { Logger, MetricsRegistry } from "../observability";

export const ACCEPT = {
  json: "application/json",
  xml: "application/xml",
  pdf: "application/pdf",
  zip: "application/zip",
  any: "*/*",
} as const;

export type QueryParams = Record<string, string | number | undefined>;

export interface TransportResponse {
  status: number;
  body: Buffer;
}

/** Paced, retried GET against the document API. Paths are relative to the API base. */
export interface Transport {
  get(path: string, accept: string, query?: QueryParams): Promise<TransportResponse>;
}

interface HttpResponseLike {
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (
  url: string,
  init: { method: "GET"; headers: Record<string, string>; signal: AbortSignal },
) => Promise<HttpResponseLike>;

export interface ApiClientOptions {
  baseUrl: string;
  userAgent: string;
  sleepSeconds: number;
  maxRetries: number;
  backoffMs: number;
  requestTimeoutMs: number;
  ignoreHttpsErrors: boolean;
  logger: Logger;
  metrics?: MetricsRegistry;
  fetchFn?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);
const MAX_BACKOFF_MS = 30_000;

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

function defaultFetch(ignoreHttpsErrors: boolean): FetchLike {
  const dispatcher = ignoreHttpsErrors ? getInsecureAgent() : undefined;
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

/** Percent-encodes each path segment; `/` separators and `@` stay literal. */
function encodePath(path: string): string {
  return path
    .split("/")
    .map((segment) => encodeURIComponent(segment).replace(/%40/g, "@"))
    .join("/");
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ApiClient implements Transport {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly minIntervalMs: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics?: MetricsRegistry;
  private readonly fetchFn: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastRequestAt?: number;

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.userAgent = options.userAgent;
    this.minIntervalMs = Math.max(0, options.sleepSeconds * 1000);
    this.maxRetries = Math.max(0, options.maxRetries);
    this.backoffMs = options.backoffMs;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.fetchFn = options.fetchFn ?? defaultFetch(options.ignoreHttpsErrors);
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  buildUrl(path: string, query?: QueryParams): string {
    const normalizedPath = path.startsWith("/") ? path : `/${path}`;
    const url = `${this.baseUrl}${encodePath(normalizedPath)}`;
    if (!query) {
      return url;
    }

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.set(key, String(value));
      }
    }
    const search = params.toString();
    return search ? `${url}?${search}` : url;
  }

  /**
   * Issues a GET once the pacing gate allows it. 429/5xx responses and network
   * errors are retried with exponential backoff; once retries run out the last
   * response is returned, or the last network error thrown.
   */
  async get(path: string, accept: string, query?: QueryParams): Promise<TransportResponse> {
    const url = this.buildUrl(path, query);

    for (let attempt = 1; ; attempt += 1) {
      await this.waitForPacingGate();
      this.logger.debug("http_get", { url, accept, attempt });
      this.metrics?.incrementCounter("http_requests", 1);

      let response: TransportResponse;
      try {
        response = await this.request(url, accept);
      } catch (error) {
        this.lastRequestAt = this.now();
        const message = error instanceof Error ? error.message : String(error);
        if (attempt > this.maxRetries) {
          this.logger.error("http_request_failed", { url, attempt, error: message });
          throw error;
        }
        this.logger.warn("http_retry_error", { url, attempt, error: message });
        await this.backoff(attempt);
        continue;
      }

      this.lastRequestAt = this.now();

      if (RETRYABLE_STATUSES.has(response.status) && attempt <= this.maxRetries) {
        this.logger.warn("http_retry_status", { url, attempt, statusCode: response.status });
        await this.backoff(attempt);
        continue;
      }

      if (response.status >= 400) {
        this.logger.warn("http_error_status", { url, attempt, statusCode: response.status });
      } else {
        this.logger.debug("http_ok", { url, statusCode: response.status, bytes: response.body.length });
      }
      return response;
    }
  }

  private async request(url: string, accept: string): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.userAgent,
          "accept-encoding": "gzip",
          accept,
        },
        signal: controller.signal,
      });
      const body = Buffer.from(await response.arrayBuffer());
      return { status: response.status, body };
    } finally {
      clearTimeout(timeout);
    }
  }

  private async waitForPacingGate(): Promise<void> {
    if (this.lastRequestAt === undefined) {
      return;
    }

    const elapsed = this.now() - this.lastRequestAt;
    if (elapsed < this.minIntervalMs) {
      const waitMs = this.minIntervalMs - elapsed;
      this.logger.debug("http_pacing_wait", { waitMs });
      await this.sleep(waitMs);
    }
  }

  private async backoff(attempt: number): Promise<void> {
    this.metrics?.incrementCounter("http_retries", 1);
    await this.sleep(Math.min(this.backoffMs * 2 ** (attempt - 1), MAX_BACKOFF_MS));
  }
}
