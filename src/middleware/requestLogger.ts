import { type NextFunction, type Request, type Response } from "express";
import { logInfo } from "../observability/logger";
import { trackRequest } from "../observability/appInsights";

const QUIET_ROUTES = new Set(["/health", "/queue"]);

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const requestId = res.locals.requestId ?? "unknown";
  const path = req.originalUrl.split("?")[0] ?? req.originalUrl;
  const quiet = QUIET_ROUTES.has(path);

  if (!quiet) {
    logInfo("request_started", {
      requestId,
      method: req.method,
      route: req.originalUrl,
      userAgent: req.get("user-agent"),
      ip: req.ip ?? "unknown",
    });
  }

  res.on("finish", () => {
    const durationMs = Date.now() - start;
    const outcome = res.statusCode >= 400 ? "failure" : "success";

    if (!quiet || res.statusCode >= 400) {
      logInfo("request_completed", {
        requestId,
        route: req.originalUrl,
        method: req.method,
        status: res.statusCode,
        durationMs,
        outcome,
      });
    }

    trackRequest({
      name: `${req.method} ${req.route?.path ?? path}`,
      url: `${req.protocol}://${req.get("host") ?? "unknown"}${req.originalUrl}`,
      duration: durationMs,
      resultCode: res.statusCode,
      success: res.statusCode < 500,
      properties: {
        requestId,
        route: req.originalUrl,
        method: req.method,
        outcome,
      },
    });
  });

  next();
}
