import { z } from "zod";
import { logError } from "../observability/logger";

const positiveInt = z.coerce.number().int().positive();
const optionalUrl = z.string().url().optional();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
  PORT: positiveInt.optional(),
  MAX_CONCURRENT_JOBS: positiveInt.optional(),
  MAX_QUEUE_SIZE: positiveInt.optional(),
  JOB_RETENTION_MS: positiveInt.optional(),
  CLEANUP_INTERVAL_MS: positiveInt.optional(),
  WATCHDOG_INTERVAL_MS: positiveInt.optional(),
  SYNC_WAIT_TIMEOUT_MS: positiveInt.optional(),
  INFERENCE_URL: optionalUrl,
  INFERENCE_TIMEOUT_MS: positiveInt.optional(),
  IMAGE_FETCH_TIMEOUT_MS: positiveInt.optional(),
  IMAGE_MAX_BYTES: positiveInt.optional(),
});

export type ServiceEnv = z.infer<typeof envSchema>;

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = value && value.trim().length > 0 ? value.trim() : undefined;
  }
  return out;
}

export function validateServiceEnv(env: NodeJS.ProcessEnv = process.env): ServiceEnv {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "root"}: ${issue.message}`
    );
    issues.forEach((issue) => logError("invalid_env", { issue }));
    throw new Error(`Invalid service environment configuration: ${issues.join("; ")}`);
  }

  return parsed.data;
}
