import os from "os";
import path from "path";

export type QueueConfig = {
  maxConcurrentJobs: number;
  maxQueueDepth: number;
  retentionMs: number;
  sweepIntervalMs: number;
  watchdogIntervalMs: number;
  syncWaitTimeoutMs: number;
};

export function isTestEnvironment(): boolean {
  return process.env.NODE_ENV === "test";
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

function parseIntervalMs(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed) || parsed < 1) {
    return fallback;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return fallback;
  }
  return parsed;
}

export function getPort(): number {
  return parsePositiveInt(process.env.PORT, 8000);
}

export function getMaxConcurrentJobs(): number {
  return parsePositiveInt(process.env.MAX_CONCURRENT_JOBS, 1);
}

export function getMaxQueueSize(): number {
  return parsePositiveInt(process.env.MAX_QUEUE_SIZE, 10);
}

export function getJobRetentionMs(): number {
  return parseIntervalMs(process.env.JOB_RETENTION_MS, 60 * 60 * 1000);
}

export function getCleanupIntervalMs(): number {
  return parseIntervalMs(process.env.CLEANUP_INTERVAL_MS, 5 * 60 * 1000);
}

export function getWatchdogIntervalMs(): number {
  return parseIntervalMs(process.env.WATCHDOG_INTERVAL_MS, 30_000);
}

export function getSyncWaitTimeoutMs(): number {
  return parseIntervalMs(process.env.SYNC_WAIT_TIMEOUT_MS, 10 * 60 * 1000);
}

export function getArtifactDir(): string {
  const value = process.env.ARTIFACT_DIR?.trim();
  return value ? value : path.join(os.tmpdir(), "mesh-artifacts");
}

export function getInferenceUrl(): string {
  const value = process.env.INFERENCE_URL?.trim();
  return (value ? value : "http://127.0.0.1:8001").replace(/\/$/, "");
}

export function getInferenceTimeoutMs(): number {
  return parseIntervalMs(process.env.INFERENCE_TIMEOUT_MS, 15 * 60 * 1000);
}

export function getImageFetchTimeoutMs(): number {
  return parseIntervalMs(process.env.IMAGE_FETCH_TIMEOUT_MS, 30_000);
}

export function getImageMaxBytes(): number {
  return parsePositiveInt(process.env.IMAGE_MAX_BYTES, 20 * 1024 * 1024);
}

export function getRequestBodyLimit(): string {
  return process.env.REQUEST_BODY_LIMIT?.trim() || "50mb";
}

export function getCorsOrigins(): string[] | "*" {
  const raw = process.env.CORS_ORIGINS;
  if (!raw || raw.trim() === "*") {
    return "*";
  }
  const values = raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return values.length > 0 ? values : "*";
}

export function getTestLoggingEnabled(): boolean {
  return parseBoolean(process.env.TEST_LOGGING, false);
}

export function getQueueConfig(): QueueConfig {
  return {
    maxConcurrentJobs: getMaxConcurrentJobs(),
    maxQueueDepth: getMaxQueueSize(),
    retentionMs: getJobRetentionMs(),
    sweepIntervalMs: getCleanupIntervalMs(),
    watchdogIntervalMs: getWatchdogIntervalMs(),
    syncWaitTimeoutMs: getSyncWaitTimeoutMs(),
  };
}
