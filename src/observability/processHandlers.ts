import { logError } from "./logger";
import { trackException } from "./appInsights";

let handlersInstalled = false;

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

export function installProcessHandlers(): void {
  if (handlersInstalled) {
    return;
  }
  handlersInstalled = true;

  process.on("unhandledRejection", (reason) => {
    const error = toError(reason);
    logError("unhandled_rejection", { error: error.message });
    trackException({ exception: error, properties: { event: "unhandled_rejection" } });
  });

  process.on("uncaughtException", (err) => {
    logError("uncaught_exception", { error: err.message });
    trackException({ exception: err, properties: { event: "uncaught_exception" } });
  });
}
