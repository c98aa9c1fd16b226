import type { QueueConfig } from "../../config";
import { AppError, notFoundError } from "../../middleware/errors";
import { logInfo, logWarn } from "../../observability/logger";
import { TimeoutError, withTimeout } from "../../utils/withTimeout";
import { isArtifactMissing, type ArtifactStore } from "../generation/artifact.storage";
import type { GenerationEngine } from "../generation/generation.engine";
import { contentTypeFor, type OutputFormat } from "../generation/generation.types";
import type { ImagePreparer } from "../generation/image.preparer";
import { AdmissionController } from "./admission.service";
import { JobQueue } from "./jobs.queue";
import { JobStore } from "./jobs.store";
import { isTerminal, type FailureCause, type JobRecord, type JobStatus } from "./jobs.types";
import { RetentionSweeper } from "./retention.sweeper";
import { WorkerSupervisor } from "./worker.supervisor";

export type GenerationContextOptions = {
  config: QueueConfig;
  engine: GenerationEngine;
  preparer: ImagePreparer;
  artifacts: ArtifactStore;
  now?: () => Date;
  generateId?: () => string;
};

export type GenerationContext = {
  config: QueueConfig;
  store: JobStore;
  queue: JobQueue<string>;
  admission: AdmissionController;
  supervisor: WorkerSupervisor;
  sweeper: RetentionSweeper;
  engine: GenerationEngine;
  artifacts: ArtifactStore;
  start: () => void;
  stop: () => Promise<void>;
};

export type JobStatusView = {
  job_id: string;
  status: JobStatus;
  position: number;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  message?: string;
  download_url?: string;
  processing_time?: number;
  format?: OutputFormat;
  vertices?: number;
  faces?: number;
  error?: string;
  failure_cause?: FailureCause;
};

export type JobArtifact = {
  jobId: string;
  data: Buffer;
  format: OutputFormat;
  contentType: string;
  filename: string;
  vertices?: number;
  faces?: number;
};

export type QueueStatsView = {
  queued: number;
  processing: number;
  max_queue_size: number;
  max_concurrent: number;
};

export type HealthView = {
  status: "healthy" | "degraded";
  model_loaded: boolean;
  worker_alive: boolean;
  worker_restarts: number;
};

export function createGenerationContext(options: GenerationContextOptions): GenerationContext {
  const { config, engine, preparer, artifacts, now, generateId } = options;
  const store = new JobStore();
  const queue = new JobQueue<string>(config.maxQueueDepth);
  const admission = new AdmissionController({
    store,
    queue,
    maxQueueDepth: config.maxQueueDepth,
    now,
    generateId,
  });
  const supervisor = new WorkerSupervisor({
    store,
    queue,
    engine,
    preparer,
    artifacts,
    watchdogIntervalMs: config.watchdogIntervalMs,
    maxConcurrentJobs: config.maxConcurrentJobs,
    now,
  });
  const sweeper = new RetentionSweeper({
    store,
    artifacts,
    retentionMs: config.retentionMs,
    intervalMs: config.sweepIntervalMs,
    now,
  });

  return {
    config,
    store,
    queue,
    admission,
    supervisor,
    sweeper,
    engine,
    artifacts,
    start() {
      // Warm the model in the background; jobs load it on demand otherwise.
      void engine.load().then(
        () => logInfo("generation_engine_ready"),
        (err: unknown) =>
          logWarn("generation_engine_load_failed", {
            message: err instanceof Error ? err.message : String(err),
          })
      );
      supervisor.start();
      sweeper.start();
      logInfo("generation_context_started", {
        maxQueueDepth: config.maxQueueDepth,
        retentionMs: config.retentionMs,
      });
    },
    async stop() {
      sweeper.stop();
      await supervisor.stop();
    },
  };
}

export function statusUrl(jobId: string): string {
  return `/status/${jobId}`;
}

export function downloadUrl(jobId: string): string {
  return `/download/${jobId}`;
}

function toSeconds(start: Date, end: Date): number {
  return Math.round((end.getTime() - start.getTime()) / 100) / 10;
}

export function processingTimeOf(record: JobRecord): number | undefined {
  if (!record.startedAt || !record.completedAt) {
    return undefined;
  }
  return toSeconds(record.startedAt, record.completedAt);
}

export function toStatusView(record: JobRecord, position: number): JobStatusView {
  const view: JobStatusView = {
    job_id: record.id,
    status: record.status,
    position,
    created_at: record.createdAt.toISOString(),
    started_at: record.startedAt ? record.startedAt.toISOString() : null,
    completed_at: record.completedAt ? record.completedAt.toISOString() : null,
  };

  switch (record.status) {
    case "queued":
      view.message =
        position === 0 ? "Job is next in line" : `Job is queued with ${position} job(s) ahead`;
      break;
    case "processing":
      view.message = "Job is being processed";
      break;
    case "completed":
      view.download_url = downloadUrl(record.id);
      view.processing_time = processingTimeOf(record);
      if (record.result) {
        view.format = record.result.format;
        if (record.result.vertices !== undefined) {
          view.vertices = record.result.vertices;
        }
        if (record.result.faces !== undefined) {
          view.faces = record.result.faces;
        }
      }
      break;
    case "failed":
      view.error = record.error ?? "Unknown error";
      if (record.failureCause) {
        view.failure_cause = record.failureCause;
      }
      break;
  }
  return view;
}

/**
 * Terminal jobs report position 0 so that repeated polls of a finished job
 * return identical bodies.
 */
export function getJobStatus(ctx: GenerationContext, jobId: string): JobStatusView {
  const record = ctx.store.require(jobId);
  const position = isTerminal(record.status) ? 0 : ctx.store.positionOf(jobId);
  return toStatusView(record, position);
}

export function jobNotReadyError(record: JobRecord): AppError {
  return new AppError(
    "job_not_ready",
    record.status === "failed"
      ? `Job ${record.id} failed and has no artifact.`
      : `Job ${record.id} is not completed yet.`,
    409,
    { status: record.status }
  );
}

export async function getJobArtifact(ctx: GenerationContext, jobId: string): Promise<JobArtifact> {
  const record = ctx.store.require(jobId);
  if (record.status !== "completed" || !record.result) {
    throw jobNotReadyError(record);
  }

  const ref = record.result;
  let data: Buffer;
  try {
    data = await ctx.artifacts.read(ref);
  } catch (err) {
    if (isArtifactMissing(err)) {
      throw notFoundError(`Artifact for job ${jobId} no longer exists.`);
    }
    throw err;
  }

  return {
    jobId,
    data,
    format: ref.format,
    contentType: contentTypeFor(ref.format),
    filename: `model.${ref.format}`,
    vertices: ref.vertices,
    faces: ref.faces,
  };
}

/**
 * Waits for a job to reach a terminal state. Timing out leaves the job
 * untouched; it keeps running and stays pollable.
 */
export async function waitForJob(
  ctx: GenerationContext,
  jobId: string,
  timeoutMs: number
): Promise<JobRecord> {
  try {
    return await withTimeout(ctx.store.whenSettled(jobId), timeoutMs);
  } catch (err) {
    if (err instanceof TimeoutError) {
      logWarn("sync_wait_timeout", { jobId, timeoutMs });
      throw new AppError("timeout", `Job ${jobId} did not finish within ${timeoutMs}ms.`, 504, {
        job_id: jobId,
        status_url: statusUrl(jobId),
      });
    }
    throw err;
  }
}

export function getQueueStats(ctx: GenerationContext): QueueStatsView {
  const { queuedCount, processingCount } = ctx.store.stats();
  return {
    queued: queuedCount,
    processing: processingCount,
    max_queue_size: ctx.config.maxQueueDepth,
    // Only one job ever runs at a time, whatever was configured.
    max_concurrent: 1,
  };
}

export function getHealth(ctx: GenerationContext): HealthView {
  const modelLoaded = ctx.engine.isLoaded();
  const workerAlive = ctx.supervisor.isAlive();
  return {
    status: modelLoaded && workerAlive ? "healthy" : "degraded",
    model_loaded: modelLoaded,
    worker_alive: workerAlive,
    worker_restarts: ctx.supervisor.restarts,
  };
}
