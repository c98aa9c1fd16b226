import { getTestLoggingEnabled, isTestEnvironment } from "../config";
import { getRequestId, getRequestRoute } from "../middleware/requestContext";

type LogLevel = "info" | "warn" | "error";

type LogFields = {
  requestId?: string;
  route?: string;
  jobId?: string;
  durationMs?: number | null;
  [key: string]: unknown;
};

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

function buildPayload(level: LogLevel, event: string, fields: LogFields = {}): Record<string, unknown> {
  const requestId = fields.requestId ?? getRequestId() ?? "unknown";
  const route = fields.route ?? getRequestRoute() ?? "unknown";
  const durationMs = fields.durationMs ?? 0;
  const { requestId: _req, route: _route, durationMs: _duration, ...rest } = fields;

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(rest)) {
    extra[key] = serializeValue(value);
  }

  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    requestId,
    route,
    durationMs,
    ...extra,
  };
}

function writeLog(level: LogLevel, event: string, fields?: LogFields): void {
  if (isTestEnvironment() && !getTestLoggingEnabled()) {
    return;
  }
  try {
    const output = JSON.stringify(buildPayload(level, event, fields));
    if (level === "error") {
      process.stderr.write(`${output}\n`);
    } else {
      process.stdout.write(`${output}\n`);
    }
  } catch {
    process.stderr.write(`${JSON.stringify({ level, event, logError: "unserializable_fields" })}\n`);
  }
}

export function logInfo(event: string, fields?: LogFields): void {
  writeLog("info", event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  writeLog("warn", event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  writeLog("error", event, fields);
}
