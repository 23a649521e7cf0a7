// ============================================
// Express application: one pipeline per endpoint
// ============================================

import express, { type ErrorRequestHandler, type Request, type RequestHandler, type Response } from "express";
import { malformedRequest, notFoundError } from "../lib/errors.js";
import { createPipeline, type PipelineServices } from "../pipeline/pipeline.js";
import { ErrorHandler } from "../pipeline/errorHandler.js";
import { createRequestIdGenerator } from "../pipeline/requestId.js";
import type { EndpointDefinition, PipelineRequest, PipelineResponse, RequestPipeline } from "../pipeline/types.js";
import { createEndpoints, type HandlerDependencies } from "./handler.js";
import { corsMiddleware } from "./middleware.js";

export const BODY_LIMIT = "100kb";
export const BODY_TYPES = ["application/json", "text/plain"];

export interface AppOptions extends PipelineServices, HandlerDependencies {
  allowedOrigins?: string[];
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value.join(", ") : value;
}

function toPipelineRequest(req: Request, signal?: AbortSignal): PipelineRequest {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name] = headerValue(value);
  }

  return {
    method: req.method,
    path: req.path,
    remoteAddr: req.ip ?? req.socket.remoteAddress,
    userAgent: headerValue(req.headers["user-agent"]),
    headers,
    body: req.body,
    signal,
  };
}

function send(res: Response, response: PipelineResponse): void {
  if (res.headersSent || res.destroyed) return;
  res.status(response.status).set(response.headers);
  if (response.body === null || response.body === undefined) {
    res.end();
  } else {
    res.json(response.body);
  }
}

/** Bind a pipeline to an express route, aborting it when the client goes away */
export function mountPipeline(pipeline: RequestPipeline): RequestHandler {
  return (req, res, next) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    pipeline(toPipelineRequest(req, controller.signal))
      .then((response) => send(res, response))
      .catch(next);
  };
}

/** Bodies of other types would reach the validator empty */
function requireSupportedBody(): RequestHandler {
  return (req, _res, next) => {
    if (req.is(BODY_TYPES) === false) {
      req.resume();
      next(malformedRequest(`Unsupported content type: ${req.headers["content-type"] ?? "none"}`));
      return;
    }
    next();
  };
}

function isBodyParserError(err: unknown): err is Error & { type: string } {
  return err instanceof Error && "type" in err && typeof err.type === "string";
}

export function createApp(options: AppOptions): express.Express {
  const services: PipelineServices = {
    ...options,
    errorHandler: options.errorHandler ?? new ErrorHandler(),
    requestIds: options.requestIds ?? createRequestIdGenerator(),
  };

  const app = express();
  app.disable("x-powered-by");
  app.use("/api", corsMiddleware(options.allowedOrigins ?? []));

  // Bodies stay raw text so malformed JSON reaches the validator
  app.use(requireSupportedBody());
  app.use(express.text({ type: BODY_TYPES, limit: BODY_LIMIT }));

  for (const endpoint of createEndpoints(options)) {
    const handler = mountPipeline(createPipeline(endpoint, services));
    if (endpoint.method === "GET") {
      app.get(endpoint.path, handler);
    } else if (endpoint.method === "POST") {
      app.post(endpoint.path, handler);
    } else {
      app.all(endpoint.path, handler);
    }
  }

  const notFound: EndpointDefinition = {
    method: "ALL",
    path: "*",
    endpointClass: "default",
    handler: (ctx) => {
      throw notFoundError("Route", `${ctx.request.method} ${ctx.request.path}`);
    },
  };
  app.use(mountPipeline(createPipeline(notFound, services)));

  // Body read failures and anything a pipeline could not convert
  const fallback: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    const failure = isBodyParserError(err)
      ? malformedRequest(
          err.type === "entity.too.large" ? `Request body exceeds ${BODY_LIMIT}` : "Request body could not be read",
          err
        )
      : err;

    const pipeline = createPipeline(
      {
        method: "ALL",
        path: req.path,
        endpointClass: "default",
        handler: () => {
          throw failure;
        },
      },
      services
    );

    pipeline(toPipelineRequest(req))
      .then((response) => send(res, response))
      .catch((sendError: unknown) => {
        options.logger.critical("Failed to send error response", { stage: "api", error: sendError });
        if (!res.headersSent) res.status(500).end();
      });
  };
  app.use(fallback);

  return app;
}
