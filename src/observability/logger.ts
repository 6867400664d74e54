import { LOG_LEVEL_ORDER, LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogLevel;
}

export type LogWriter = (level: LogLevel, line: string) => void;

function consoleWriter(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly writer: LogWriter;

  constructor(context: LoggerContext, writer: LogWriter = consoleWriter) {
    this.context = context;
    this.writer = writer;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component }, this.writer);
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.context.minLevel ?? "info"]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.writer(level, JSON.stringify(payload));
  }
}

/** Logger that drops everything; handy for library callers and tests. */
export function createSilentLogger(): Logger {
  return new Logger({ component: "silent", runId: "none" }, () => undefined);
}
