/**
 * Request logging middleware with request ID correlation.
 *
 * A well-formed incoming X-Request-Id (from an MCP gateway or proxy) is
 * reused; otherwise a UUID is generated. Either way it is set on
 * `req.requestId` and echoed back in the X-Request-Id header.
 *
 * On finish, one line is logged with the JSON-RPC method (and tool name for
 * `tools/call`) when the body is an MCP message, at warn level for 5xx.
 */

import crypto from "crypto";
import type { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { monitoringService } from "../services/monitoringService";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/** Reuse the caller's X-Request-Id when it is safe to echo, else mint one. */
function resolveRequestId(req: Request): string {
  const incoming = req.get("X-Request-Id");
  return incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : crypto.randomUUID();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON-RPC method and tool name of a single MCP message body, if any. */
function describeRpcCall(body: unknown): { rpcMethod?: string; tool?: string } {
  if (!isRecord(body) || typeof body.method !== "string") return {};

  const tool =
    body.method === "tools/call" && isRecord(body.params) && typeof body.params.name === "string"
      ? body.params.name
      : undefined;

  return { rpcMethod: body.method, ...(tool ? { tool } : {}) };
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req);
  const start = Date.now();

  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);

  res.on("finish", () => {
    const durationMs = Date.now() - start;
    monitoringService.recordRequest(durationMs);

    const log = res.statusCode >= 500 ? logger.warn : logger.info;
    log("http", `${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      statusCode: res.statusCode,
      durationMs,
      ...describeRpcCall(req.body),
    });
  });

  next();
}

export { requestLogger, describeRpcCall };
