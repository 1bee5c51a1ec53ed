import type { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { monitoringService } from "../services/monitoringService";

interface AppError extends Error {
  statusCode?: number;
  /** Set by body-parser on malformed JSON and oversized bodies */
  status?: number;
  code?: string;
}

function errorHandler(
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = err.statusCode || err.status || 500;
  const message = statusCode === 500 ? "Internal server error" : err.message;
  const requestId = req.requestId;

  monitoringService.recordError();

  if (statusCode === 500) {
    logger.error("server", "Unhandled error", {
      requestId,
      statusCode,
      error: err.message,
      ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
    });
  } else {
    logger.warn("server", `${statusCode} - ${err.message}`, {
      requestId,
      statusCode,
      code: err.code,
    });
  }

  if (res.headersSent) {
    res.end();
    return;
  }

  res.status(statusCode).json({
    error: {
      message,
      code: err.code || (statusCode === 500 ? "INTERNAL_ERROR" : "REQUEST_ERROR"),
      requestId,
      ...(process.env.NODE_ENV === "development" && {
        stack: err.stack,
      }),
    },
  });
}

export { errorHandler };
export type { AppError };
