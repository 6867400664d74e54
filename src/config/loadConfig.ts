import fs from "node:fs";
import path from "node:path";
import { ConfigFileSchema } from "./schema";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://opendata.finlex.fi/finlex/avoindata/v1",
  userAgent: "akn-harvester/0.1.0",
  ignoreHttpsErrors: false,
  outputDir: "./akn-data",
  sleepSeconds: 5,
  maxRetries: 5,
  backoffMs: 1_000,
  requestTimeoutMs: 30_000,
  langAndVersion: "fin@",
  pageLimit: 10,
  maxPages: undefined,
  types: ["act"],
  years: 1,
  yearOverrides: {},
  companions: {
    pdf: false,
    zip: false,
    media: false,
  },
  logLevel: "info",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = ConfigFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new Error(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toFloat(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

/**
 * Builds the effective configuration: defaults, then the optional JSON file,
 * then `AKN_*` environment variables. CLI flags are applied on top by the caller.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    yearOverrides: {
      ...DEFAULT_CONFIG.yearOverrides,
      ...(fileConfig.yearOverrides ?? {}),
    },
    companions: {
      ...DEFAULT_CONFIG.companions,
      ...(fileConfig.companions ?? {}),
    },
  };

  return {
    ...merged,
    baseUrl: env.AKN_BASE_URL ?? merged.baseUrl,
    userAgent: env.AKN_USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.AKN_IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    outputDir: env.AKN_OUTPUT_DIR ?? merged.outputDir,
    sleepSeconds: toFloat(env.AKN_SLEEP_SECONDS, merged.sleepSeconds),
    maxRetries: toInt(env.AKN_MAX_RETRIES, merged.maxRetries),
    requestTimeoutMs: toInt(env.AKN_REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    langAndVersion: env.AKN_LANG ?? merged.langAndVersion,
  };
}

export { DEFAULT_CONFIG };
