export type OutputFormat = "glb" | "ply";

export type ImageSource =
  | { kind: "inline"; data: Buffer }
  | { kind: "url"; url: string };

export type GenerationParams = {
  seed: number;
  outputFormat: OutputFormat;
  withTexture: boolean;
  textureSize: number;
  simplify: number;
  inferenceSteps: number;
  viewCount: number;
};

export type PreparedImage = {
  data: Buffer;
  mimeType: string;
};

export type GeneratedModel = {
  data: Buffer;
  format: OutputFormat;
  vertices?: number;
  faces?: number;
};

export type ArtifactRef = {
  path: string;
  format: OutputFormat;
  sizeBytes: number;
  vertices?: number;
  faces?: number;
};

export function contentTypeFor(format: OutputFormat): string {
  return format === "glb" ? "model/gltf-binary" : "application/octet-stream";
}
