import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { logInfo } from "../../observability/logger";
import {
  type GeneratedModel,
  type GenerationParams,
  type PreparedImage,
} from "./generation.types";

/**
 * The compute side of a job. Implementations own the accelerator for the
 * duration of one `generate` call; `releaseResources` must leave it clean
 * for the next job.
 */
export type GenerationEngine = {
  isLoaded: () => boolean;
  load: () => Promise<void>;
  generate: (image: PreparedImage, params: GenerationParams) => Promise<GeneratedModel>;
  releaseResources: () => Promise<void>;
};

export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenerationError";
  }
}

export type RemoteGenerationEngineOptions = {
  baseUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
};

const healthSchema = z.object({
  model_loaded: z.boolean(),
});

const generateResponseSchema = z.union([
  z.object({
    model: z.string().min(1),
    format: z.enum(["glb", "ply"]),
    vertices: z.number().int().nonnegative().optional(),
    faces: z.number().int().nonnegative().optional(),
    processing_time: z.number().optional(),
  }),
  z.object({
    error: z.string(),
  }),
]);

function describeRemoteError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const body: unknown = err.response?.data;
    if (body && typeof body === "object" && "error" in body) {
      const message = body.error;
      if (typeof message === "string" && message.length > 0) {
        return message;
      }
    }
    if (err.response) {
      return `inference_worker_http_${err.response.status}`;
    }
    return err.code ? `inference_worker_unreachable:${err.code}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

export function toInferencePayload(
  image: PreparedImage,
  params: GenerationParams
): Record<string, unknown> {
  return {
    image: image.data.toString("base64"),
    output_format: params.outputFormat,
    with_texture: params.withTexture,
    texture_size: params.textureSize,
    simplify: params.simplify,
    inference_steps: params.inferenceSteps,
    nviews: params.viewCount,
    seed: params.seed,
  };
}

/**
 * Client for the GPU inference worker. The worker runs the image-to-3D
 * pipeline and answers with the exported asset as base64.
 */
export function createRemoteGenerationEngine(
  options: RemoteGenerationEngineOptions
): GenerationEngine {
  const http =
    options.http ??
    axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: { "Content-Type": "application/json" },
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    });
  let loaded = false;

  return {
    isLoaded: () => loaded,

    async load() {
      let body: unknown;
      try {
        const response = await http.get<unknown>("/health", { timeout: 10_000 });
        body = response.data;
      } catch (err) {
        throw new GenerationError(describeRemoteError(err));
      }
      const parsed = healthSchema.safeParse(body);
      if (!parsed.success || !parsed.data.model_loaded) {
        throw new GenerationError("model_not_loaded");
      }
      if (!loaded) {
        logInfo("generation_model_loaded", { baseUrl: options.baseUrl });
      }
      loaded = true;
    },

    async generate(image, params) {
      let body: unknown;
      try {
        const response = await http.post<unknown>("/generate", toInferencePayload(image, params));
        body = response.data;
      } catch (err) {
        throw new GenerationError(describeRemoteError(err));
      }

      const parsed = generateResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new GenerationError("invalid_inference_response");
      }
      if ("error" in parsed.data) {
        throw new GenerationError(parsed.data.error);
      }
      const { model, format, vertices, faces } = parsed.data;
      if (format !== params.outputFormat) {
        throw new GenerationError(`unexpected_output_format:${format}`);
      }
      return {
        data: Buffer.from(model, "base64"),
        format,
        vertices,
        faces,
      };
    },

    async releaseResources() {
      try {
        await http.post("/release", {}, { timeout: 30_000 });
      } catch (err) {
        throw new GenerationError(`resource_release_failed:${describeRemoteError(err)}`);
      }
    },
  };
}
