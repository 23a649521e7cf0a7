// ============================================
// Structured Logger Tests
// ============================================

import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect, vi, afterEach } from "vitest";
import {
  FileSink,
  MemorySink,
  StructuredLogger,
  createRequestLogger,
  isLogLevel,
  type LogSink,
} from "../src/lib/logger.js";
import { memoryLogger } from "./helpers.js";

const FIXED_TIME = new Date("2026-01-02T03:04:05.000Z");

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================
// Records
// ============================================

describe("StructuredLogger records", () => {
  it("writes one JSON object per line with the standard fields", () => {
    const general = new MemorySink();
    const logger = new StructuredLogger({ name: "test", general: [general], clock: () => FIXED_TIME });

    logger.info("hello", { requestId: "r1", stage: "api", count: 2 });

    const expected = {
      requestId: "r1",
      stage: "api",
      count: 2,
      timestamp: "2026-01-02T03:04:05.000Z",
      level: "info",
      logger: "test",
      message: "hello",
      category: "general",
    };
    expect(general.events).toEqual([expected]);
    expect(general.lines[0]).not.toContain("\n");
    expect(JSON.parse(general.lines[0] ?? "")).toEqual(expected);
  });

  it("cannot overwrite the standard fields from context", () => {
    const general = new MemorySink();
    const logger = new StructuredLogger({ name: "test", general: [general], clock: () => FIXED_TIME });

    logger.warn("real", { message: "spoofed", level: "debug" });

    expect(general.events[0]).toMatchObject({ message: "real", level: "warn" });
  });

  it("drops records below the configured level", () => {
    const { logger, general } = memoryLogger("warn");

    logger.debug("d");
    logger.info("i");
    logger.warn("w");

    expect(general.events.map((e) => e.message)).toEqual(["w"]);

    logger.setLevel("debug");
    logger.debug("d2");
    expect(general.events).toHaveLength(2);
  });

  it("flattens errors into name, message and stack", () => {
    const { logger, error } = memoryLogger();

    logger.error("Startup failed", { stage: "startup", error: new TypeError("bad port") });

    expect(error.events[0]).toMatchObject({
      message: "Startup failed",
      stage: "startup",
      errorName: "TypeError",
      errorMessage: "bad port",
    });
    expect(error.events[0]?.errorStack).toContain("TypeError: bad port");
    expect(error.events[0]).not.toHaveProperty("error");
  });
});

// ============================================
// Routing
// ============================================

describe("StructuredLogger routing", () => {
  it("sends ordinary records to the general sink only", () => {
    const { logger, general, error, api } = memoryLogger();

    logger.info("hello");

    expect([general.lines.length, error.lines.length, api.lines.length]).toEqual([1, 0, 0]);
  });

  it("also sends error and critical records to the error sink", () => {
    const { logger, general, error, api } = memoryLogger();

    logger.error("boom");
    logger.critical("worse");

    expect(general.lines).toHaveLength(2);
    expect(error.events.map((e) => e.level)).toEqual(["error", "critical"]);
    expect(api.lines).toHaveLength(0);
  });

  it("also sends request records to the api sink", () => {
    const { logger, general, error, api } = memoryLogger();

    logger.logApiRequest(
      { method: "POST", endpoint: "/api/v1/posterior", statusCode: 200, durationMs: 12.3456 },
      { requestId: "r1" }
    );

    expect(general.lines).toHaveLength(1);
    expect(error.lines).toHaveLength(0);
    expect(api.events[0]).toMatchObject({
      message: "API Request: POST /api/v1/posterior",
      category: "api",
      stage: "api",
      requestId: "r1",
      method: "POST",
      endpoint: "/api/v1/posterior",
      statusCode: 200,
      durationMs: 12.35,
    });
  });
});

// ============================================
// Domain records
// ============================================

describe("StructuredLogger domain records", () => {
  it("records predictions", () => {
    const { logger, general } = memoryLogger();

    logger.logPrediction({ probability: 0.123456, durationMs: 1.004 });

    expect(general.events[0]).toMatchObject({
      message: "Prediction: custom",
      eventType: "prediction",
      disease: "custom",
      symptomsCount: 0,
      probability: 0.1235,
      durationMs: 1,
      stage: "prediction",
    });
  });

  it("records how many symptoms a prediction used", () => {
    const { logger, general } = memoryLogger();

    logger.logPrediction({ disease: "Flu", symptomsCount: 3, probability: 0.5, durationMs: 2 });

    expect(general.events[0]).toMatchObject({ message: "Prediction: Flu", disease: "Flu", symptomsCount: 3 });
  });

  it("records security events as warnings", () => {
    const { logger, general, error } = memoryLogger();

    logger.logSecurityEvent("xss", "Potential XSS attack detected in disease", { requestId: "r9" });

    expect(general.events[0]).toMatchObject({
      level: "warn",
      message: "Security: xss",
      eventType: "security",
      securityEvent: "xss",
      severity: "warning",
      detail: "Potential XSS attack detected in disease",
      stage: "security",
      requestId: "r9",
    });
    expect(error.lines).toHaveLength(0);
  });

  it("records typed errors", () => {
    const { logger, error } = memoryLogger();

    logger.logError("PredictionError", "Recommendation service is not configured");

    expect(error.events[0]).toMatchObject({
      level: "error",
      message: "Error: PredictionError",
      errorType: "PredictionError",
      errorMessage: "Recommendation service is not configured",
    });
  });
});

// ============================================
// Failure isolation
// ============================================

describe("StructuredLogger failure isolation", () => {
  it("keeps writing to healthy sinks when one throws", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const broken: LogSink = {
      name: "broken",
      write: () => {
        throw new Error("disk full");
      },
      close: async () => {},
    };
    const healthy = new MemorySink();
    const logger = new StructuredLogger({ general: [broken, healthy] });

    expect(() => logger.info("still here")).not.toThrow();

    expect(healthy.lines).toHaveLength(1);
    expect(stderr).toHaveBeenCalledWith("log sink broken threw: Error: disk full\n");
  });

  it("drops a record it cannot serialize", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const { logger, general } = memoryLogger();
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(() => logger.info("loop", { data: circular })).not.toThrow();

    expect(general.lines).toHaveLength(0);
    expect(stderr).toHaveBeenCalledTimes(1);
  });

  it("drops records after close", async () => {
    const { logger, general } = memoryLogger();

    await logger.close();
    await logger.close();
    logger.error("late");

    expect(general.lines).toHaveLength(0);
  });
});

// ============================================
// Request-bound loggers
// ============================================

describe("createRequestLogger", () => {
  it("binds the request id and stage to every record", () => {
    const { logger, general, api } = memoryLogger();
    const log = createRequestLogger(logger, "req-9", "validation");

    log.info("checked");
    log.withStage("handler").warn("slow", { latencyMs: 900 });
    log.logApiRequest({ method: "GET", endpoint: "/api/v1/health", statusCode: 200, durationMs: 1 });

    expect(general.events[0]).toMatchObject({ requestId: "req-9", stage: "validation", message: "checked" });
    expect(general.events[1]).toMatchObject({ requestId: "req-9", stage: "handler", latencyMs: 900 });
    expect(api.events[0]).toMatchObject({ requestId: "req-9", stage: "api" });
    expect(log.requestId).toBe("req-9");
  });

  it("lets a record override the bound stage", () => {
    const { logger, general } = memoryLogger();

    createRequestLogger(logger, "req-1", "pipeline").debug("started", { stage: "api" });

    expect(general.events[0]?.stage).toBe("api");
  });
});

describe("isLogLevel", () => {
  it("accepts only known levels", () => {
    expect(isLogLevel("critical")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});

// ============================================
// File sinks
// ============================================

describe("StructuredLogger.toFiles", () => {
  it("appends records to the general, error and api files", async () => {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), "bayes-gate-logs-"));
    const logger = StructuredLogger.toFiles(
      { directory, general: "app.log", error: "error.log", api: "api.log" },
      { name: "file-test" }
    );

    logger.info("started");
    logger.error("failed");
    logger.logApiRequest({ method: "GET", endpoint: "/api/v1/health", statusCode: 200, durationMs: 2 });
    await logger.close();

    const read = (file: string) =>
      fs.readFileSync(path.join(directory, file), "utf8").trim().split("\n").map((line) => JSON.parse(line));

    expect(read("app.log").map((r) => r.message)).toEqual([
      "started",
      "failed",
      "API Request: GET /api/v1/health",
    ]);
    expect(read("error.log").map((r) => r.message)).toEqual(["failed"]);
    expect(read("api.log").map((r) => r.message)).toEqual(["API Request: GET /api/v1/health"]);

    fs.rmSync(directory, { recursive: true, force: true });
  });
});

describe("FileSink", () => {
  it("drops records while the stream has not drained", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), "bayes-gate-drain-"));
    const filePath = path.join(directory, "app.log");
    const sink = new FileSink(filePath, { highWaterMark: 16 });

    sink.write("a record longer than the mark");
    sink.write("second");
    sink.write("third");
    await sink.close();

    expect(sink.dropped).toBe(2);
    expect(fs.readFileSync(filePath, "utf8")).toBe("a record longer than the mark\n");

    fs.rmSync(directory, { recursive: true, force: true });
  });
});
