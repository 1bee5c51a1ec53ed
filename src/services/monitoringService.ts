/**
 * In-memory monitoring service.
 *
 * Tracks basic application metrics that accumulate in memory and reset on
 * restart. Called from the HTTP middleware (requestLogger, errorHandler) and
 * from the image request handler without adding external dependencies.
 *
 * Exposed counters:
 *   - requestCount: total HTTP requests handled
 *   - errorCount: total errors processed by the error handler
 *   - totalResponseTimeMs: cumulative response time for average calculation
 *   - generationCount / failedGenerationCount: generate_image outcomes
 *   - lastGenerationTime: timestamp of the most recent successful generation
 */

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------

let requestCount = 0;
let errorCount = 0;
let totalResponseTimeMs = 0;
let generationCount = 0;
let failedGenerationCount = 0;
let lastGenerationTime: Date | null = null;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Record a completed request with its response time.
 */
function recordRequest(durationMs: number): void {
  requestCount++;
  totalResponseTimeMs += durationMs;
}

/**
 * Record an error processed by the error handler.
 */
function recordError(): void {
  errorCount++;
}

/**
 * Record the outcome of one generate_image invocation.
 */
function recordGeneration(succeeded: boolean): void {
  if (succeeded) {
    generationCount++;
    lastGenerationTime = new Date();
  } else {
    failedGenerationCount++;
  }
}

/**
 * Get a snapshot of all current metrics.
 */
function getMetrics(): {
  requestCount: number;
  errorCount: number;
  avgResponseTimeMs: number;
  generationCount: number;
  failedGenerationCount: number;
  uptime: number;
  lastGenerationTime: string | null;
} {
  const avgResponseTimeMs =
    requestCount > 0
      ? Math.round((totalResponseTimeMs / requestCount) * 100) / 100
      : 0;

  return {
    requestCount,
    errorCount,
    avgResponseTimeMs,
    generationCount,
    failedGenerationCount,
    uptime: process.uptime(),
    lastGenerationTime: lastGenerationTime?.toISOString() ?? null,
  };
}

/**
 * Reset all metrics to initial values (useful for testing).
 */
function resetMetrics(): void {
  requestCount = 0;
  errorCount = 0;
  totalResponseTimeMs = 0;
  generationCount = 0;
  failedGenerationCount = 0;
  lastGenerationTime = null;
}

export const monitoringService = {
  recordRequest,
  recordError,
  recordGeneration,
  getMetrics,
  resetMetrics,
};
