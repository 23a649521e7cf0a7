// ============================================
// Test Helpers
// ============================================

import type { Clock } from "../src/lib/clock.js";
import { MemorySink, StructuredLogger, createRequestLogger, type LogLevel } from "../src/lib/logger.js";
import type { PipelineRequest, RequestContext } from "../src/pipeline/types.js";

export interface ManualClock extends Clock {
  advance(ms: number): void;
  set(ms: number): void;
}

export function manualClock(start = 0): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    set: (ms) => {
      current = ms;
    },
  };
}

export function memoryLogger(level: LogLevel = "debug") {
  const general = new MemorySink("general");
  const error = new MemorySink("error");
  const api = new MemorySink("api");
  const logger = new StructuredLogger({
    name: "test",
    level,
    general: [general],
    error: [error],
    api: [api],
  });
  return { logger, general, error, api };
}

export function postRequest(path: string, body: unknown, overrides: Partial<PipelineRequest> = {}): PipelineRequest {
  return {
    method: "POST",
    path,
    remoteAddr: "10.0.0.7",
    userAgent: "vitest",
    headers: { "content-type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
    ...overrides,
  };
}

export function getRequest(path: string, overrides: Partial<PipelineRequest> = {}): PipelineRequest {
  return {
    method: "GET",
    path,
    remoteAddr: "10.0.0.7",
    userAgent: "vitest",
    headers: {},
    ...overrides,
  };
}

export function makeContext(logger: StructuredLogger, overrides: Partial<PipelineRequest> = {}): RequestContext {
  return {
    request: postRequest("/api/v1/posterior", {}, overrides),
    requestId: "req-1",
    clientKey: "10.0.0.7",
    endpointClass: "prediction",
    log: createRequestLogger(logger, "req-1", "pipeline"),
    payload: {},
  };
}
