import { randomUUID } from "crypto";
import { runWithRequestContext } from "../../middleware/requestContext";
import { logError, logInfo } from "../../observability/logger";
import type { ArtifactStore } from "../generation/artifact.storage";
import type { JobStore } from "./jobs.store";
import { isTerminal } from "./jobs.types";

export type RetentionSweeperOptions = {
  store: JobStore;
  artifacts: ArtifactStore;
  retentionMs: number;
  intervalMs: number;
  now?: () => Date;
};

export class RetentionSweeper {
  private readonly now: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(private readonly options: RetentionSweeperOptions) {
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      if (this.running) {
        return;
      }
      this.sweepOnce().catch((error: unknown) => {
        logError("retention_sweep_failed", {
          message: error instanceof Error ? error.message : String(error),
        });
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Evicts terminal jobs whose `completedAt` is older than the retention
   * window and deletes their artifacts. Returns the evicted ids.
   */
  async sweepOnce(now: Date = this.now()): Promise<string[]> {
    this.running = true;
    try {
      return await runWithRequestContext({ requestId: randomUUID(), route: "retention" }, () =>
        this.evictExpired(now)
      );
    } finally {
      this.running = false;
    }
  }

  private async evictExpired(now: Date): Promise<string[]> {
    const { store, artifacts, retentionMs } = this.options;
    const cutoff = now.getTime() - retentionMs;
    const evicted: string[] = [];

    const expired = store
      .list()
      .filter(
        (record) =>
          isTerminal(record.status) &&
          record.completedAt !== null &&
          record.completedAt.getTime() < cutoff
      );

    for (const record of expired) {
      store.remove(record.id);
      evicted.push(record.id);
      if (!record.result) {
        continue;
      }
      try {
        await artifacts.remove(record.result);
      } catch (error) {
        logError("artifact_delete_failed", {
          jobId: record.id,
          path: record.result.path,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (evicted.length > 0) {
      logInfo("retention_sweep_completed", { evicted: evicted.length, remaining: store.size });
    }
    return evicted;
  }
}
