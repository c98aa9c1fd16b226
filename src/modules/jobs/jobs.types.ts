import type {
  ArtifactRef,
  GenerationParams,
  ImageSource,
} from "../generation/generation.types";

export type JobStatus = "queued" | "processing" | "completed" | "failed";

export const ACTIVE_STATUSES: ReadonlySet<JobStatus> = new Set(["queued", "processing"]);

export type FailureCause = "execution" | "worker_crashed";

export type GenerationInput = Readonly<{
  image: Readonly<ImageSource>;
  params: Readonly<GenerationParams>;
}>;

export type JobRecord = Readonly<{
  id: string;
  input: GenerationInput;
  status: JobStatus;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  result: ArtifactRef | null;
  error: string | null;
  failureCause: FailureCause | null;
}>;

export type JobTransition =
  | { type: "start"; at: Date }
  | { type: "complete"; at: Date; result: ArtifactRef }
  | { type: "fail"; at: Date; error: string; cause: FailureCause };

export type QueueStats = {
  queuedCount: number;
  processingCount: number;
};

export function isTerminal(status: JobStatus): boolean {
  return status === "completed" || status === "failed";
}
