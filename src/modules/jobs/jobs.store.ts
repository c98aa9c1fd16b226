import { AppError, notFoundError } from "../../middleware/errors";
import {
  ACTIVE_STATUSES,
  isTerminal,
  type JobRecord,
  type JobStatus,
  type JobTransition,
  type QueueStats,
} from "./jobs.types";

type SettledListener = (record: JobRecord) => void;

const ALLOWED_FROM: Record<JobTransition["type"], JobStatus> = {
  start: "queued",
  complete: "processing",
  fail: "processing",
};

function freezeRecord(record: JobRecord): JobRecord {
  return Object.freeze({ ...record });
}

function applyTransition(record: JobRecord, transition: JobTransition): JobRecord {
  switch (transition.type) {
    case "start":
      return { ...record, status: "processing", startedAt: transition.at };
    case "complete":
      return {
        ...record,
        status: "completed",
        completedAt: laterOf(record.startedAt, transition.at),
        result: transition.result,
        error: null,
        failureCause: null,
      };
    case "fail":
      return {
        ...record,
        status: "failed",
        completedAt: laterOf(record.startedAt, transition.at),
        result: null,
        error: transition.error,
        failureCause: transition.cause,
      };
  }
}

function laterOf(startedAt: Date | null, at: Date): Date {
  return startedAt && startedAt.getTime() > at.getTime() ? startedAt : at;
}

/**
 * Insertion-ordered registry of every job the process knows about.
 *
 * Every method runs to completion without yielding, so on the single event
 * loop each call is atomic with respect to all others. Records are frozen and
 * replaced wholesale on update; a reference handed out is a stable snapshot.
 */
export class JobStore {
  private readonly records = new Map<string, JobRecord>();
  private readonly settledListeners = new Map<string, SettledListener[]>();

  get size(): number {
    return this.records.size;
  }

  insert(record: JobRecord): JobRecord {
    if (this.records.has(record.id)) {
      throw new AppError("duplicate_job", `Job ${record.id} already exists.`, 409);
    }
    if (record.status !== "queued") {
      throw new AppError("illegal_transition", "New jobs must start queued.", 409);
    }
    const frozen = freezeRecord(record);
    this.records.set(record.id, frozen);
    return frozen;
  }

  get(id: string): JobRecord | undefined {
    return this.records.get(id);
  }

  require(id: string): JobRecord {
    const record = this.records.get(id);
    if (!record) {
      throw notFoundError(`Job ${id} not found.`);
    }
    return record;
  }

  transition(id: string, transition: JobTransition): JobRecord {
    const current = this.require(id);
    const expected = ALLOWED_FROM[transition.type];
    if (current.status !== expected) {
      throw new AppError(
        "illegal_transition",
        `Cannot ${transition.type} job ${id} while ${current.status}.`,
        409
      );
    }
    const next = freezeRecord(applyTransition(current, transition));
    this.records.set(id, next);
    if (isTerminal(next.status)) {
      this.notifySettled(next);
    }
    return next;
  }

  /**
   * Number of queued or processing jobs inserted before `id`.
   */
  positionOf(id: string): number {
    if (!this.records.has(id)) {
      throw notFoundError(`Job ${id} not found.`);
    }
    let ahead = 0;
    for (const [key, record] of this.records) {
      if (key === id) {
        break;
      }
      if (ACTIVE_STATUSES.has(record.status)) {
        ahead += 1;
      }
    }
    return ahead;
  }

  stats(): QueueStats {
    let queuedCount = 0;
    let processingCount = 0;
    for (const record of this.records.values()) {
      if (record.status === "queued") {
        queuedCount += 1;
      } else if (record.status === "processing") {
        processingCount += 1;
      }
    }
    return { queuedCount, processingCount };
  }

  list(): JobRecord[] {
    return Array.from(this.records.values());
  }

  remove(id: string): JobRecord {
    const record = this.require(id);
    this.records.delete(id);
    this.settledListeners.delete(id);
    return record;
  }

  /**
   * One-shot completion signal. Resolves with the terminal record, at once if
   * the job has already finished.
   */
  whenSettled(id: string): Promise<JobRecord> {
    const record = this.records.get(id);
    if (!record) {
      return Promise.reject(notFoundError(`Job ${id} not found.`));
    }
    if (isTerminal(record.status)) {
      return Promise.resolve(record);
    }
    return new Promise<JobRecord>((resolve) => {
      const listeners = this.settledListeners.get(id) ?? [];
      listeners.push(resolve);
      this.settledListeners.set(id, listeners);
    });
  }

  private notifySettled(record: JobRecord): void {
    const listeners = this.settledListeners.get(record.id);
    if (!listeners) {
      return;
    }
    this.settledListeners.delete(record.id);
    listeners.forEach((listener) => listener(record));
  }
}
