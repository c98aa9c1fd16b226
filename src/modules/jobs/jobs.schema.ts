import { z } from "zod";
import { validationError } from "../../middleware/errors";
import type { ImageSource } from "../generation/generation.types";
import type { GenerationInput } from "./jobs.types";

const base64Pattern = /^[A-Za-z0-9+/\r\n]*={0,2}$/;

function stripDataUrlPrefix(value: string): string {
  const match = /^data:[^;,]+;base64,/.exec(value);
  return match ? value.slice(match[0].length) : value;
}

const generationRequestSchema = z
  .object({
    image: z
      .string()
      .min(1, "image must not be empty")
      .transform(stripDataUrlPrefix)
      .refine((value) => base64Pattern.test(value), "image must be base64 encoded")
      .optional(),
    image_url: z.string().url("image_url must be a valid URL").optional(),
    seed: z.number().int("seed must be an integer").default(42),
    output_format: z.enum(["glb", "ply"]).default("glb"),
    with_texture: z.boolean().default(true),
    texture_size: z.number().int().min(256).max(4096).default(2048),
    simplify: z.number().min(0).max(1).optional(),
    inference_steps: z.number().int().min(1).max(200).default(50),
    nviews: z.number().int().min(1).max(1000).default(200),
  })
  .refine((body) => body.image !== undefined || body.image_url !== undefined, {
    message: "Need image or image_url",
    path: ["image"],
  });

/**
 * Validates a submission body and fills in the documented defaults. Inline
 * bytes win when both `image` and `image_url` are present.
 */
export function parseGenerationRequest(body: unknown): GenerationInput {
  const parsed = generationRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    const first = parsed.error.issues[0]?.message ?? "Invalid request.";
    throw validationError(first, { details: fieldErrors });
  }

  const data = parsed.data;
  let image: ImageSource;
  if (data.image !== undefined) {
    image = { kind: "inline", data: Buffer.from(data.image, "base64") };
  } else if (data.image_url !== undefined) {
    image = { kind: "url", url: data.image_url };
  } else {
    throw validationError("Need image or image_url");
  }

  return Object.freeze({
    image: Object.freeze(image),
    params: Object.freeze({
      seed: data.seed,
      outputFormat: data.output_format,
      withTexture: data.with_texture,
      textureSize: data.texture_size,
      simplify: data.simplify ?? (data.with_texture ? 0.3 : 0.0),
      inferenceSteps: data.inference_steps,
      viewCount: data.nviews,
    }),
  });
}
