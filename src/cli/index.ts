import { AppConfig, loadConfig, SelectableType, YearOverrides } from "../config";
import { CommandContext, EXIT_ERRORS, runDownload, runStatus } from "../core/commands";
import { ApiClient } from "../core/transport";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createStores } from "../store";

export type CommandName = "download" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  outputDir?: string;
  types?: SelectableType[];
  years?: number;
  yearOverrides: YearOverrides;
  langAndVersion?: string;
  limit?: number;
  maxPages?: number;
  sleepSeconds?: number;
  pdf: boolean;
  zip: boolean;
  media: boolean;
  force: boolean;
  dryRun: boolean;
  resume: boolean;
  reset: boolean;
  verbose: boolean;
  ignoreHttpsErrors: boolean;
}

export class CliUsageError extends Error {}

const HELP_TEXT = `
Usage:
  akn-harvester <command> [options]

Commands:
  download   List and fetch documents into the output directory
  status     Show manifest counts and checkpoint progress

Options:
  -o, --output <dir>        Output directory (default: ./akn-data)
  --types <type...>         act, judgment, doc, authority-regulation (default: act)
  --years <n>               Number of years back, current year included (default: 1)
  --years-act <n>           Override --years for act
  --years-judgment <n>      Override --years for judgment
  --years-doc <n>           Override --years for doc
  --years-authority-regulation <n>  Override --years for authority-regulation
  --lang <marker>           Language and version marker (default: fin@)
  --limit <n>               Page size for list requests (max 10)
  --max-pages <n>           Maximum pages per document type
  --sleep <seconds>         Minimum seconds between requests (default: 5)
  --pdf                     Also fetch PDF renderings
  --zip                     Also fetch packaged documents
  --media                   Also fetch media files referenced by the XML
  --force                   Re-fetch documents that already exist on disk
  --dry-run                 Report what would be fetched without writing
  --resume                  Resume from the last checkpoint
  --reset                   Delete the checkpoint before starting
  --config <path>           Optional path to JSON config file
  --ignore-https-errors     Ignore TLS certificate errors (use only when required)
  -v, --verbose             Debug logging
  -h, --help                Show this help
`;

const SELECTABLE_TYPES: readonly SelectableType[] = ["act", "judgment", "doc", "authority-regulation"];

const YEAR_OVERRIDE_FLAGS: Record<string, SelectableType> = {
  "--years-act": "act",
  "--years-judgment": "judgment",
  "--years-doc": "doc",
  "--years-authority-regulation": "authority-regulation",
};

function isSelectableType(value: string): value is SelectableType {
  return SELECTABLE_TYPES.some((type) => type === value);
}

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "download" || raw === "status") {
    return raw;
  }
  return undefined;
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
}

function parsePositiveInt(raw: string, flag: string): number {
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 1 || String(parsed) !== raw.trim()) {
    throw new CliUsageError(`${flag} expects a positive integer, got "${raw}"`);
  }
  return parsed;
}

function parseSeconds(raw: string, flag: string): number {
  const parsed = Number.parseFloat(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new CliUsageError(`${flag} expects a non-negative number, got "${raw}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const parsed: ParsedCliArgs = {
    command,
    yearOverrides: {},
    pdf: false,
    zip: false,
    media: false,
    force: false,
    dryRun: false,
    resume: false,
    reset: false,
    verbose: false,
    ignoreHttpsErrors: false,
  };

  for (let index = 1; index < argv.length; index += 1) {
    const arg = argv[index];
    switch (arg) {
      case "-o":
      case "--output":
        parsed.outputDir = requireValue(argv, index, arg);
        index += 1;
        break;
      case "--config":
        parsed.configPath = requireValue(argv, index, arg);
        index += 1;
        break;
      case "--types": {
        const types: SelectableType[] = [];
        while (argv[index + 1] !== undefined && !argv[index + 1].startsWith("-")) {
          const value = argv[index + 1];
          if (!isSelectableType(value)) {
            throw new CliUsageError(`Unknown type "${value}" (expected one of ${SELECTABLE_TYPES.join(", ")})`);
          }
          types.push(value);
          index += 1;
        }
        if (types.length === 0) {
          throw new CliUsageError("Missing value for --types");
        }
        parsed.types = types;
        break;
      }
      case "--years":
        parsed.years = parsePositiveInt(requireValue(argv, index, arg), arg);
        index += 1;
        break;
      case "--years-act":
      case "--years-judgment":
      case "--years-doc":
      case "--years-authority-regulation":
        parsed.yearOverrides[YEAR_OVERRIDE_FLAGS[arg]] = parsePositiveInt(requireValue(argv, index, arg), arg);
        index += 1;
        break;
      case "--lang":
        parsed.langAndVersion = requireValue(argv, index, arg);
        index += 1;
        break;
      case "--limit":
        parsed.limit = parsePositiveInt(requireValue(argv, index, arg), arg);
        index += 1;
        break;
      case "--max-pages":
        parsed.maxPages = parsePositiveInt(requireValue(argv, index, arg), arg);
        index += 1;
        break;
      case "--sleep":
        parsed.sleepSeconds = parseSeconds(requireValue(argv, index, arg), arg);
        index += 1;
        break;
      case "--pdf":
        parsed.pdf = true;
        break;
      case "--zip":
        parsed.zip = true;
        break;
      case "--media":
        parsed.media = true;
        break;
      case "--force":
        parsed.force = true;
        break;
      case "--dry-run":
        parsed.dryRun = true;
        break;
      case "--resume":
        parsed.resume = true;
        break;
      case "--reset":
        parsed.reset = true;
        break;
      case "-v":
      case "--verbose":
        parsed.verbose = true;
        break;
      case "--ignore-https-errors":
        parsed.ignoreHttpsErrors = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return parsed;
}

/** Applies CLI flags on top of the loaded configuration. */
export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    outputDir: parsed.outputDir ?? config.outputDir,
    types: parsed.types ?? config.types,
    years: parsed.years ?? config.years,
    yearOverrides: { ...config.yearOverrides, ...parsed.yearOverrides },
    langAndVersion: parsed.langAndVersion ?? config.langAndVersion,
    pageLimit: parsed.limit ?? config.pageLimit,
    maxPages: parsed.maxPages ?? config.maxPages,
    sleepSeconds: parsed.sleepSeconds ?? config.sleepSeconds,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    companions: {
      pdf: parsed.pdf || config.companions.pdf,
      zip: parsed.zip || config.companions.zip,
      media: parsed.media || config.companions.media,
    },
    logLevel: parsed.verbose ? "debug" : config.logLevel,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${HELP_TEXT.trim()}`);
      return 2;
    }
    throw error;
  }

  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const transport = new ApiClient({
    baseUrl: config.baseUrl,
    userAgent: config.userAgent,
    sleepSeconds: config.sleepSeconds,
    maxRetries: config.maxRetries,
    backoffMs: config.backoffMs,
    requestTimeoutMs: config.requestTimeoutMs,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    logger: logger.child("http"),
    metrics,
  });
  const stores = createStores(config.outputDir, logger);
  const context: CommandContext = { config, logger, metrics, transport, stores };

  logger.info("command_start", {
    command: parsed.command,
    dryRun: parsed.dryRun,
    force: parsed.force,
    resume: parsed.resume,
    reset: parsed.reset,
    outputDir: config.outputDir,
  });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn("interrupt_received", { signal });
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    let exitCode: number;
    switch (parsed.command) {
      case "download":
        exitCode = await runDownload(
          { ...context, logger: logger.child("download") },
          {
            force: parsed.force,
            dryRun: parsed.dryRun,
            resume: parsed.resume,
            reset: parsed.reset,
            signal: controller.signal,
          },
        );
        break;
      case "status":
        exitCode = await runStatus({ ...context, logger: logger.child("status") });
        break;
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return EXIT_ERRORS;
    }

    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    metrics.printSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
