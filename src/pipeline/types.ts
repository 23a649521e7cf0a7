// ============================================
// Pipeline types: framework-neutral request/response
// ============================================

import type { RequestLogger } from "../lib/logger.js";
import type { EndpointClass } from "../ratelimit/types.js";
import type { Payload, ValidationSchema } from "../validation/validator.js";

export interface PipelineRequest {
  method: string;
  path: string;
  remoteAddr?: string;
  userAgent?: string;
  headers: Record<string, string | undefined>;
  /** Raw body: a JSON string, a Buffer, or an already parsed value */
  body?: unknown;
  /** Aborted when the caller goes away */
  signal?: AbortSignal;
}

export interface PipelineResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

export interface RequestContext {
  readonly request: PipelineRequest;
  readonly requestId: string;
  readonly clientKey: string;
  readonly endpointClass: EndpointClass;
  readonly log: RequestLogger;
  /** Sanitized body, filled by the validation stage */
  payload: Payload;
}

export type Next = () => Promise<PipelineResponse>;

/** One unit of the ordered pipeline */
export type Middleware = (ctx: RequestContext, next: Next) => Promise<PipelineResponse>;

export type Handler = (ctx: RequestContext) => Promise<PipelineResponse> | PipelineResponse;

export interface EndpointDefinition {
  method: "GET" | "POST" | "ALL";
  path: string;
  endpointClass: EndpointClass;
  schema?: ValidationSchema;
  handler: Handler;
}

export type RequestPipeline = (request: PipelineRequest) => Promise<PipelineResponse>;

export function json(body: unknown, status = 200, headers: Record<string, string> = {}): PipelineResponse {
  return { status, headers, body };
}
