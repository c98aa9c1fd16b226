import { runWithRequestContext } from "../../middleware/requestContext";
import { trackEvent } from "../../observability/appInsights";
import { logError, logInfo, logWarn } from "../../observability/logger";
import type { ArtifactStore } from "../generation/artifact.storage";
import type { GenerationEngine } from "../generation/generation.engine";
import type { ArtifactRef, GeneratedModel } from "../generation/generation.types";
import type { ImagePreparer } from "../generation/image.preparer";
import { QueueTakeAbortedError, type JobQueue } from "./jobs.queue";
import type { JobStore } from "./jobs.store";
import type { JobRecord } from "./jobs.types";

export type WorkerSupervisorOptions = {
  store: JobStore;
  queue: JobQueue<string>;
  engine: GenerationEngine;
  preparer: ImagePreparer;
  artifacts: ArtifactStore;
  watchdogIntervalMs: number;
  maxConcurrentJobs?: number;
  now?: () => Date;
};

type ExecutorRun = {
  controller: AbortController;
  inFlightJobId: string | null;
  done: Promise<void>;
};

type JobOutcome =
  | { ok: true; result: ArtifactRef }
  | { ok: false; error: string };

export const WORKER_CRASHED_PREFIX = "Worker crashed while processing job";

function describeError(err: unknown): string {
  if (err instanceof Error && err.message) {
    return err.message;
  }
  return String(err);
}

/**
 * Runs queued jobs one at a time.
 *
 * The executor is a single async loop. Its promise is monitored: when it
 * settles with an error the in-flight job is failed as `worker_crashed` and
 * the executor is marked dead. The watchdog timer starts a replacement on its
 * next tick. At most one loop exists at a time: a `start()` issued while a
 * stopped loop is still finishing its job resumes on that loop's exit.
 */
export class WorkerSupervisor {
  private readonly now: () => Date;
  private executor: ExecutorRun | null = null;
  private watchdog: NodeJS.Timeout | null = null;
  private stopped = true;
  private restartCount = 0;

  constructor(private readonly options: WorkerSupervisorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get restarts(): number {
    return this.restartCount;
  }

  isAlive(): boolean {
    return this.executor !== null;
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  currentJobId(): string | null {
    return this.executor?.inFlightJobId ?? null;
  }

  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;

    const requested = this.options.maxConcurrentJobs ?? 1;
    if (requested > 1) {
      logWarn("max_concurrent_unsupported", { requested, effective: 1 });
    }

    if (this.executor === null) {
      this.spawnExecutor("startup");
    }
    this.watchdog = setInterval(() => this.checkExecutor(), this.options.watchdogIntervalMs);
    this.watchdog.unref();
  }

  /**
   * Stops taking new jobs. A job already running is allowed to finish.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    if (this.watchdog) {
      clearInterval(this.watchdog);
      this.watchdog = null;
    }
    const running = this.executor;
    if (running) {
      running.controller.abort();
      await running.done;
    }
    logInfo("worker_stopped");
  }

  /** Watchdog tick: starts a fresh executor when the previous one died. */
  checkExecutor(): void {
    if (this.stopped || this.executor !== null) {
      return;
    }
    this.restartCount += 1;
    logWarn("worker_restarted", { restarts: this.restartCount });
    trackEvent({ name: "worker_restarted", properties: { restarts: this.restartCount } });
    this.spawnExecutor("watchdog");
  }

  private spawnExecutor(reason: "startup" | "watchdog"): void {
    logInfo("worker_executor_started", { reason });
    const run: ExecutorRun = {
      controller: new AbortController(),
      inFlightJobId: null,
      done: Promise.resolve(),
    };
    this.executor = run;
    run.done = this.runLoop(run).then(
      () => this.handleExecutorExit(run),
      (err: unknown) => this.handleExecutorCrash(run, err)
    );
  }

  private async runLoop(run: ExecutorRun): Promise<void> {
    const { signal } = run.controller;
    while (!signal.aborted) {
      let jobId: string;
      try {
        jobId = await this.options.queue.take(signal);
      } catch (err) {
        if (err instanceof QueueTakeAbortedError) {
          return;
        }
        throw err;
      }

      run.inFlightJobId = jobId;
      await runWithRequestContext({ requestId: jobId, route: "worker" }, () =>
        this.executeJob(jobId)
      );
      run.inFlightJobId = null;
    }
  }

  private async executeJob(jobId: string): Promise<void> {
    const { store, engine, artifacts } = this.options;
    const record = store.get(jobId);
    if (!record) {
      logWarn("job_missing_from_store", { jobId });
      return;
    }

    const startedAt = this.now();
    store.transition(jobId, { type: "start", at: startedAt });
    logInfo("job_started", {
      jobId,
      waitedMs: startedAt.getTime() - record.createdAt.getTime(),
      seed: record.input.params.seed,
      outputFormat: record.input.params.outputFormat,
    });

    let model: GeneratedModel | null = null;
    let outcome: JobOutcome | null = null;
    try {
      model = await this.generate(record);
    } catch (err) {
      outcome = { ok: false, error: describeError(err) };
    }

    // Not guarded: a device that cannot be cleaned up kills the executor.
    await engine.releaseResources();

    if (model) {
      try {
        outcome = { ok: true, result: await artifacts.save(jobId, model) };
      } catch (err) {
        outcome = { ok: false, error: `artifact_save_failed:${describeError(err)}` };
      }
    }

    const completedAt = this.now();
    const durationMs = completedAt.getTime() - startedAt.getTime();
    if (outcome?.ok) {
      store.transition(jobId, { type: "complete", at: completedAt, result: outcome.result });
      logInfo("job_completed", {
        jobId,
        durationMs,
        format: outcome.result.format,
        sizeBytes: outcome.result.sizeBytes,
      });
      return;
    }

    const error = outcome ? outcome.error : "generation_produced_no_output";
    store.transition(jobId, { type: "fail", at: completedAt, error, cause: "execution" });
    logWarn("job_failed", { jobId, durationMs, error });
    trackEvent({ name: "job_failed", properties: { jobId, error } });
  }

  private async generate(record: JobRecord): Promise<GeneratedModel> {
    const { engine, preparer } = this.options;
    if (!engine.isLoaded()) {
      await engine.load();
    }
    const image = await preparer.prepare(record.input.image);
    return engine.generate(image, record.input.params);
  }

  private handleExecutorExit(run: ExecutorRun): void {
    run.inFlightJobId = null;
    if (this.executor !== run) {
      return;
    }
    this.executor = null;
    logInfo("worker_executor_stopped");
    // A loop only exits cleanly after stop(); start() may have come since.
    if (!this.stopped) {
      this.spawnExecutor("startup");
    }
  }

  private handleExecutorCrash(run: ExecutorRun, err: unknown): void {
    const jobId = run.inFlightJobId;
    run.inFlightJobId = null;
    if (this.executor === run) {
      this.executor = null;
    }
    const reason = describeError(err);

    logError("worker_executor_crashed", { jobId: jobId ?? undefined, error: reason });
    trackEvent({
      name: "worker_executor_crashed",
      properties: { jobId, error: reason },
    });

    if (jobId) {
      this.failCrashedJob(jobId, reason);
    }
  }

  private failCrashedJob(jobId: string, reason: string): void {
    const { store } = this.options;
    if (store.get(jobId)?.status !== "processing") {
      return;
    }
    const error = `${WORKER_CRASHED_PREFIX}: ${reason}`;
    store.transition(jobId, { type: "fail", at: this.now(), error, cause: "worker_crashed" });
    logWarn("job_failed", { jobId, error, cause: "worker_crashed" });
  }
}
