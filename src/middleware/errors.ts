import { type NextFunction, type Request, type Response } from "express";
import { logError, logWarn } from "../observability/logger";
import { trackException } from "../observability/appInsights";

export class AppError extends Error {
  status: number;
  code: string;
  details?: Record<string, unknown>;

  constructor(code: string, message: string, status = 400, details?: Record<string, unknown>) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export function notFoundError(message = "Not found."): AppError {
  return new AppError("not_found", message, 404);
}

export function validationError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError("validation_error", message, 400, details);
}

type BodyParserError = Error & { type?: string; status?: number };

function isBodyParserError(err: Error): err is BodyParserError {
  return (
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export function notFoundHandler(_req: Request, res: Response): void {
  const requestId = res.locals.requestId ?? "unknown";
  res.status(404).json({
    code: "not_found",
    message: "Not found",
    requestId,
  });
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = res.locals.requestId ?? "unknown";
  const logBase = {
    requestId,
    method: req.method,
    route: req.originalUrl,
  };

  if (err instanceof AppError) {
    logWarn("request_error", {
      ...logBase,
      status: err.status,
      code: err.code,
      message: err.message,
    });
    trackException({
      exception: err,
      properties: {
        requestId,
        route: req.originalUrl,
        status: err.status,
        code: err.code,
        failure_reason: "request_error",
      },
    });
    res.status(err.status).json({
      code: err.code,
      message: err.message,
      ...(err.details ?? {}),
      requestId,
    });
    return;
  }

  if (isBodyParserError(err)) {
    const status = err.status ?? 400;
    const code = status === 413 ? "payload_too_large" : "invalid_json";
    logWarn("request_error", { ...logBase, status, code, message: err.message });
    res.status(status).json({
      code,
      message: status === 413 ? "Request body too large." : "Invalid JSON body.",
      requestId,
    });
    return;
  }

  logError("request_failed", {
    ...logBase,
    status: 500,
    code: "internal_error",
    message: err.message,
  });
  trackException({
    exception: err,
    properties: {
      requestId,
      route: req.originalUrl,
      status: 500,
      code: "internal_error",
      failure_reason: "server_error",
    },
  });

  res.status(500).json({
    code: "internal_error",
    message: "Unexpected error",
    requestId,
  });
}
