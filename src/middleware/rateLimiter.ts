/**
 * Rate limiting middleware using express-rate-limit.
 *
 * Two tiers:
 *   - generalLimiter:    configurable via RATE_LIMIT_MAX / RATE_LIMIT_WINDOW_MS
 *   - generationLimiter: 20 requests per 1 minute on POST /mcp, where every
 *                      tools/call can spend provider credit
 *
 * Both use the default in-memory store, which is sufficient for a
 * single-process server.
 */

import rateLimit, { ipKeyGenerator } from "express-rate-limit";
import type { Request } from "express";
import { env } from "../config/env";

const isTest = env.NODE_ENV === "test";

/** In test mode, set limits high enough to avoid interfering with test suites. */
const testMax = 10000;

/**
 * General rate limiter, applied to every route.
 * Keyed per client IP; with TRUST_PROXY=true req.ip comes from X-Forwarded-For.
 */
export const generalLimiter = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  max: isTest ? testMax : env.RATE_LIMIT_MAX,
  standardHeaders: true, // Return rate limit info in RateLimit-* headers
  legacyHeaders: false, // Disable X-RateLimit-* headers
  // ipKeyGenerator collapses IPv6 addresses to /56 subnets to prevent bypass.
  keyGenerator: (req: Request) => ipKeyGenerator(req.ip || "unknown"),
  message: {
    error: {
      message: "Too many requests, please try again later.",
      code: "RATE_LIMIT_EXCEEDED",
    },
  },
});

/**
 * MCP endpoint rate limiter.
 * 20 requests per 1 minute per IP.
 */
export const generationLimiter = rateLimit({
  windowMs: 1 * 60 * 1000,
  max: isTest ? testMax : 20,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req: Request) => ipKeyGenerator(req.ip || "unknown"),
  message: {
    error: {
      message: "Too many MCP requests, please try again later.",
      code: "MCP_RATE_LIMIT_EXCEEDED",
    },
  },
});
