// ============================================
// Structured JSON logging
// Always includes: timestamp, level, logger, message, requestId (when available)
// One JSON object per line; routed to general, error and api sinks
// ============================================

import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "critical";

export type Stage =
  | "startup"
  | "shutdown"
  | "ratelimit"
  | "validation"
  | "handler"
  | "pipeline"
  | "api"
  | "security"
  | "prediction"
  | "recommendation"
  | "housekeeping";

/** Which sinks a record is routed to, besides the general one */
export type LogCategory = "general" | "api";

/** Context fields attached to a record; values should be scalars */
export interface LogFields {
  stage?: Stage;
  [key: string]: unknown;
}

export interface LogContext extends LogFields {
  requestId?: string;
}

export interface LogEvent {
  timestamp: string;
  level: LogLevel;
  logger: string;
  message: string;
  category: LogCategory;
  requestId?: string;
  stage?: Stage;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

// ============================================
// Sinks
// ============================================

export interface LogSink {
  readonly name: string;
  write(line: string, event: LogEvent): void;
  close(): Promise<void>;
}

/**
 * Append-only file sink. Writes are queued on the stream buffer and
 * never block the caller; one write per record. While the buffer is over
 * its high-water mark, records are dropped and counted until it drains.
 */
export class FileSink implements LogSink {
  readonly name: string;
  private readonly stream: fs.WriteStream;
  private failed = false;
  private droppedTotal = 0;
  private droppedSinceDrain = 0;

  constructor(
    readonly filePath: string,
    options: { highWaterMark?: number } = {}
  ) {
    this.name = path.basename(filePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.stream = fs.createWriteStream(filePath, {
      flags: "a",
      encoding: "utf8",
      highWaterMark: options.highWaterMark,
    });
    this.stream.on("error", (err) => this.reportFailure(err));
    this.stream.on("drain", () => this.reportDrops());
  }

  /** Records dropped because the stream had not drained */
  get dropped(): number {
    return this.droppedTotal;
  }

  write(line: string): void {
    if (this.failed) return;
    if (this.stream.writableNeedDrain) {
      this.droppedTotal++;
      this.droppedSinceDrain++;
      return;
    }
    this.stream.write(line + "\n");
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.stream.closed || this.stream.destroyed) {
        resolve();
        return;
      }
      this.stream.end(() => resolve());
    });
  }

  private reportDrops(): void {
    if (this.droppedSinceDrain === 0) return;
    process.stderr.write(`log sink ${this.filePath} dropped ${this.droppedSinceDrain} records while draining\n`);
    this.droppedSinceDrain = 0;
  }

  private reportFailure(err: Error): void {
    if (this.failed) return;
    this.failed = true;
    process.stderr.write(`log sink ${this.filePath} failed: ${err.message}\n`);
  }
}

/** Console sink: warn and above go to stderr */
export class ConsoleSink implements LogSink {
  readonly name = "console";

  write(line: string, event: LogEvent): void {
    if (LEVEL_ORDER[event.level] >= LEVEL_ORDER.warn) {
      process.stderr.write(line + "\n");
    } else {
      process.stdout.write(line + "\n");
    }
  }

  async close(): Promise<void> {}
}

/** Keeps records in memory */
export class MemorySink implements LogSink {
  readonly lines: string[] = [];
  readonly events: LogEvent[] = [];

  constructor(readonly name = "memory") {}

  write(line: string, event: LogEvent): void {
    this.lines.push(line);
    this.events.push(event);
  }

  clear(): void {
    this.lines.length = 0;
    this.events.length = 0;
  }

  async close(): Promise<void> {}
}

// ============================================
// Logger
// ============================================

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Receives every record */
  general?: LogSink[];
  /** Receives error and critical records */
  error?: LogSink[];
  /** Receives request-lifecycle records */
  api?: LogSink[];
  clock?: () => Date;
}

export interface PredictionEntry {
  disease?: string;
  symptomsCount?: number;
  probability: number;
  durationMs: number;
}

export interface LogFilePaths {
  directory: string;
  general: string;
  error: string;
  api: string;
}

function flattenError(error: unknown): Record<string, string | undefined> {
  if (error instanceof Error) {
    return { errorName: error.name, errorMessage: error.message, errorStack: error.stack };
  }
  if (error === undefined || error === null) {
    return {};
  }
  return { errorMessage: String(error) };
}

export class StructuredLogger {
  readonly name: string;
  private level: LogLevel;
  private readonly general: LogSink[];
  private readonly errorSinks: LogSink[];
  private readonly apiSinks: LogSink[];
  private readonly clock: () => Date;
  private closed = false;

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? "bayes-gate";
    this.level = options.level ?? "info";
    this.general = options.general ?? [];
    this.errorSinks = options.error ?? [];
    this.apiSinks = options.api ?? [];
    this.clock = options.clock ?? (() => new Date());
  }

  /** Logger writing to <directory>/<file> for each category, plus the console when asked */
  static toFiles(
    files: LogFilePaths,
    options: { name?: string; level?: LogLevel; console?: boolean } = {}
  ): StructuredLogger {
    const general: LogSink[] = [new FileSink(path.join(files.directory, files.general))];
    if (options.console) {
      general.push(new ConsoleSink());
    }
    return new StructuredLogger({
      name: options.name,
      level: options.level,
      general,
      error: [new FileSink(path.join(files.directory, files.error))],
      api: [new FileSink(path.join(files.directory, files.api))],
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  /**
   * Emit one record. Never throws: a failing sink is reported on stderr
   * and the remaining sinks still receive the record.
   */
  log(level: LogLevel, message: string, context: LogContext = {}, category: LogCategory = "general"): void {
    if (this.closed || !this.isEnabled(level)) return;

    let line: string;
    let event: LogEvent;
    try {
      event = {
        ...context,
        timestamp: this.clock().toISOString(),
        level,
        logger: this.name,
        message,
        category,
      };
      line = JSON.stringify(event);
    } catch (err) {
      process.stderr.write(`failed to serialize log record "${message}": ${String(err)}\n`);
      return;
    }

    const targets = [...this.general];
    if (LEVEL_ORDER[level] >= LEVEL_ORDER.error) targets.push(...this.errorSinks);
    if (category === "api") targets.push(...this.apiSinks);

    for (const sink of targets) {
      try {
        sink.write(line, event);
      } catch (err) {
        process.stderr.write(`log sink ${sink.name} threw: ${String(err)}\n`);
      }
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext & { error?: unknown }): void {
    const { error, ...rest } = context ?? {};
    this.log("error", message, { ...rest, ...flattenError(error) });
  }

  critical(message: string, context?: LogContext & { error?: unknown }): void {
    const { error, ...rest } = context ?? {};
    this.log("critical", message, { ...rest, ...flattenError(error) });
  }

  /** Request-lifecycle record, routed to the api sink */
  logApiRequest(
    entry: { method: string; endpoint: string; statusCode: number; durationMs: number },
    context: LogContext = {}
  ): void {
    this.log(
      "info",
      `API Request: ${entry.method} ${entry.endpoint}`,
      {
        stage: "api",
        ...context,
        endpoint: entry.endpoint,
        method: entry.method,
        statusCode: entry.statusCode,
        durationMs: Math.round(entry.durationMs * 100) / 100,
      },
      "api"
    );
  }

  logPrediction(entry: PredictionEntry, context: LogContext = {}): void {
    this.log("info", `Prediction: ${entry.disease ?? "custom"}`, {
      stage: "prediction",
      ...context,
      eventType: "prediction",
      disease: entry.disease ?? "custom",
      symptomsCount: entry.symptomsCount ?? 0,
      probability: Math.round(entry.probability * 10000) / 10000,
      durationMs: Math.round(entry.durationMs * 100) / 100,
    });
  }

  logSecurityEvent(
    securityEvent: string,
    message: string,
    context: LogContext = {},
    severity: LogLevel = "warn"
  ): void {
    this.log(severity, `Security: ${securityEvent}`, {
      stage: "security",
      ...context,
      eventType: "security",
      securityEvent,
      severity: severity === "warn" ? "warning" : severity,
      detail: message,
    });
  }

  logError(errorType: string, message: string, context: LogContext & { error?: unknown } = {}): void {
    const { error, ...rest } = context;
    this.log("error", `Error: ${errorType}`, {
      ...rest,
      ...flattenError(error),
      errorType,
      errorMessage: message,
    });
  }

  /** Flush and close every sink. Later records are dropped. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const sinks = new Set([...this.general, ...this.errorSinks, ...this.apiSinks]);
    await Promise.all([...sinks].map((sink) => sink.close()));
  }
}

/** Create a logger bound to a specific request */
export function createRequestLogger(base: StructuredLogger, requestId: string, stage?: Stage) {
  const bind = (context?: LogFields): LogContext => ({ ...context, requestId, stage: context?.stage ?? stage });

  return {
    requestId,

    debug(message: string, context?: LogFields): void {
      base.debug(message, bind(context));
    },

    info(message: string, context?: LogFields): void {
      base.info(message, bind(context));
    },

    warn(message: string, context?: LogFields): void {
      base.warn(message, bind(context));
    },

    error(message: string, context?: LogFields & { error?: unknown }): void {
      const { error, ...rest } = context ?? {};
      base.error(message, { ...bind(rest), error });
    },

    logApiRequest(
      entry: { method: string; endpoint: string; statusCode: number; durationMs: number },
      context?: LogFields
    ): void {
      base.logApiRequest(entry, { ...context, requestId });
    },

    logPrediction(entry: PredictionEntry, context?: LogFields): void {
      base.logPrediction(entry, { ...context, requestId });
    },

    logSecurityEvent(securityEvent: string, message: string, context?: LogFields): void {
      base.logSecurityEvent(securityEvent, message, { ...context, requestId });
    },

    logError(
      errorType: string,
      message: string,
      context?: LogFields & { error?: unknown }
    ): void {
      const { error, ...rest } = context ?? {};
      base.logError(errorType, message, { ...bind(rest), error });
    },

    /** Create a child logger for a different stage */
    withStage(newStage: Stage) {
      return createRequestLogger(base, requestId, newStage);
    },
  };
}

export type RequestLogger = ReturnType<typeof createRequestLogger>;
