// ============================================
// ErrorHandler: failures to envelopes, exactly one log record each
// ============================================

import { classifyError, toEnvelope, type ApiError } from "../lib/errors.js";
import type { PipelineResponse, RequestContext } from "./types.js";

export class ErrorHandler {
  /**
   * Convert a known failure into its response and log it once at error level.
   * InternalError keeps its detail in the log and out of the envelope.
   */
  respond(error: ApiError, ctx: RequestContext): PipelineResponse {
    const { record } = error;

    ctx.log.logError(record.kind, error.detail ?? record.message, {
      stage: "handler",
      statusCode: record.httpStatus,
      field: record.field,
      endpoint: ctx.request.path,
      method: ctx.request.method,
      remoteAddr: ctx.request.remoteAddr,
      error: error.cause,
    });

    const headers: Record<string, string> = {};
    if (record.retryAfter !== undefined) {
      headers["Retry-After"] = String(record.retryAfter);
    }

    return { status: record.httpStatus, headers, body: toEnvelope(record) };
  }

  /** Classify anything thrown, then respond */
  handle(error: unknown, ctx: RequestContext): PipelineResponse {
    return this.respond(classifyError(error), ctx);
  }

  /** Run a unit of work; its result passes through unchanged, a failure becomes an envelope */
  async wrap(work: () => Promise<PipelineResponse> | PipelineResponse, ctx: RequestContext): Promise<PipelineResponse> {
    try {
      return await work();
    } catch (error) {
      return this.handle(error, ctx);
    }
  }
}
