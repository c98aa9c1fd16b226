import { randomUUID } from "crypto";
import { AppError } from "../../middleware/errors";
import { logInfo, logWarn } from "../../observability/logger";
import { parseGenerationRequest } from "./jobs.schema";
import type { JobQueue } from "./jobs.queue";
import type { JobStore } from "./jobs.store";
import type { GenerationInput } from "./jobs.types";

export type AdmissionResult = {
  jobId: string;
  position: number;
};

export type AdmissionControllerOptions = {
  store: JobStore;
  queue: JobQueue<string>;
  maxQueueDepth: number;
  now?: () => Date;
  generateId?: () => string;
};

function queueFullError(queueLength: number, maxQueueSize: number): AppError {
  return new AppError(
    "queue_full",
    "Queue is full. Please try again later.",
    503,
    { queue_length: queueLength, max_queue_size: maxQueueSize }
  );
}

export class AdmissionController {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly options: AdmissionControllerOptions) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  get maxQueueDepth(): number {
    return this.options.maxQueueDepth;
  }

  /**
   * Validates a raw submission body, then admits it.
   */
  submit(body: unknown): AdmissionResult {
    return this.admit(parseGenerationRequest(body));
  }

  admit(input: GenerationInput): AdmissionResult {
    const { store, queue, maxQueueDepth } = this.options;
    const { queuedCount } = store.stats();
    if (queuedCount >= maxQueueDepth) {
      logWarn("job_rejected_queue_full", { queuedCount, maxQueueDepth });
      throw queueFullError(queuedCount, maxQueueDepth);
    }

    const id = this.generateId();
    store.insert({
      id,
      input,
      status: "queued",
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
      result: null,
      error: null,
      failureCause: null,
    });

    if (!queue.offer(id)) {
      store.remove(id);
      logWarn("job_rejected_queue_full", { jobId: id, queuedCount, queueSize: queue.size });
      throw queueFullError(queuedCount, maxQueueDepth);
    }

    const position = store.positionOf(id);
    logInfo("job_queued", {
      jobId: id,
      position,
      seed: input.params.seed,
      outputFormat: input.params.outputFormat,
      imageSource: input.image.kind,
    });
    return { jobId: id, position };
  }
}
