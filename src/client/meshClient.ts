import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

export class MeshApiError extends Error {
  readonly status: number;
  readonly code?: string;
  readonly data?: unknown;

  constructor(message: string, status: number, code?: string, data?: unknown) {
    super(message);
    this.name = "MeshApiError";
    this.status = status;
    this.code = code;
    this.data = data;
  }
}

const outputFormatSchema = z.enum(["glb", "ply"]);

const submitResponseSchema = z.object({
  job_id: z.string(),
  status: z.literal("queued"),
  position: z.number(),
  status_url: z.string(),
});

const statusResponseSchema = z.object({
  job_id: z.string(),
  status: z.enum(["queued", "processing", "completed", "failed"]),
  position: z.number(),
  created_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  message: z.string().optional(),
  download_url: z.string().optional(),
  processing_time: z.number().optional(),
  format: outputFormatSchema.optional(),
  vertices: z.number().optional(),
  faces: z.number().optional(),
  error: z.string().optional(),
  failure_cause: z.enum(["execution", "worker_crashed"]).optional(),
});

const healthResponseSchema = z.object({
  status: z.enum(["healthy", "degraded"]),
  model_loaded: z.boolean(),
  worker_alive: z.boolean(),
  worker_restarts: z.number(),
});

const errorBodySchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  error: z.string().optional(),
});

export type SubmitResponse = z.infer<typeof submitResponseSchema>;
export type JobStatusResponse = z.infer<typeof statusResponseSchema>;
export type HealthResponse = z.infer<typeof healthResponseSchema>;

export type GenerateRequest = {
  image?: string;
  image_url?: string;
  seed?: number;
  output_format?: "glb" | "ply";
  with_texture?: boolean;
  texture_size?: number;
  simplify?: number;
  inference_steps?: number;
  nviews?: number;
};

export type WaitOptions = {
  pollIntervalMs?: number;
  timeoutMs?: number;
};

export type DownloadedModel = {
  data: Buffer;
  contentType: string;
};

export type MeshClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
  http?: AxiosInstance;
};

export type MeshClient = {
  health: () => Promise<HealthResponse>;
  submit: (request: GenerateRequest) => Promise<SubmitResponse>;
  status: (jobId: string) => Promise<JobStatusResponse>;
  waitForCompletion: (jobId: string, options?: WaitOptions) => Promise<JobStatusResponse>;
  download: (jobId: string) => Promise<DownloadedModel>;
  generate: (request: GenerateRequest, options?: WaitOptions) => Promise<DownloadedModel>;
};

// Binary downloads come back as bytes even when the server answered with JSON.
function decodeBody(data: unknown): unknown {
  let text: string | null = null;
  if (Buffer.isBuffer(data)) {
    text = data.toString("utf8");
  } else if (data instanceof ArrayBuffer) {
    text = Buffer.from(data).toString("utf8");
  }
  if (text === null) {
    return data;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function toMeshApiError(error: unknown): MeshApiError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status ?? 0;
    const data = decodeBody(error.response?.data);
    const parsed = errorBodySchema.safeParse(data);
    const body: z.infer<typeof errorBodySchema> = parsed.success ? parsed.data : {};
    const message = body.message ?? body.error ?? error.message ?? "Request failed";
    return new MeshApiError(message, status, body.code, data);
  }
  return new MeshApiError(error instanceof Error ? error.message : "Unknown error", 0);
}

function parseBody<T>(schema: z.ZodType<T>, data: unknown, what: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new MeshApiError(`Unexpected ${what} response`, 0, "invalid_response", data);
  }
  return parsed.data;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function createMeshClient(options: MeshClientOptions): MeshClient {
  const http =
    options.http ??
    axios.create({
      baseURL: options.baseUrl.replace(/\/$/, ""),
      timeout: options.timeoutMs ?? 30_000,
      headers: { Accept: "application/json" },
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    });

  async function getJson<T>(url: string, schema: z.ZodType<T>, what: string): Promise<T> {
    try {
      const response = await http.get<unknown>(url);
      return parseBody(schema, response.data, what);
    } catch (error) {
      if (error instanceof MeshApiError) {
        throw error;
      }
      throw toMeshApiError(error);
    }
  }

  const client: MeshClient = {
    health: () => getJson("/health", healthResponseSchema, "health"),

    async submit(request) {
      try {
        const response = await http.post<unknown>("/generate/async", request);
        return parseBody(submitResponseSchema, response.data, "submit");
      } catch (error) {
        if (error instanceof MeshApiError) {
          throw error;
        }
        throw toMeshApiError(error);
      }
    },

    status: (jobId) =>
      getJson(`/status/${encodeURIComponent(jobId)}`, statusResponseSchema, "status"),

    async waitForCompletion(jobId, waitOptions = {}) {
      const pollIntervalMs = waitOptions.pollIntervalMs ?? 2000;
      const deadline = Date.now() + (waitOptions.timeoutMs ?? 10 * 60 * 1000);
      for (;;) {
        const current = await client.status(jobId);
        if (current.status === "completed" || current.status === "failed") {
          return current;
        }
        if (Date.now() + pollIntervalMs > deadline) {
          throw new MeshApiError(`Job ${jobId} did not finish in time`, 0, "timeout");
        }
        await sleep(pollIntervalMs);
      }
    },

    async download(jobId) {
      try {
        const response = await http.get<ArrayBuffer>(`/download/${encodeURIComponent(jobId)}`, {
          responseType: "arraybuffer",
        });
        const contentType = response.headers["content-type"];
        return {
          data: Buffer.from(response.data),
          contentType: typeof contentType === "string" ? contentType : "application/octet-stream",
        };
      } catch (error) {
        throw toMeshApiError(error);
      }
    },

    async generate(request, waitOptions) {
      const { job_id: jobId } = await client.submit(request);
      const finished = await client.waitForCompletion(jobId, waitOptions);
      if (finished.status === "failed") {
        throw new MeshApiError(finished.error ?? "Generation failed", 500, "job_failed", finished);
      }
      return client.download(jobId);
    },
  };

  return client;
}
