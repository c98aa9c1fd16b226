import fs from "fs/promises";
import path from "path";
import type { ArtifactRef, GeneratedModel } from "./generation.types";

export type ArtifactStore = {
  save: (jobId: string, model: GeneratedModel) => Promise<ArtifactRef>;
  read: (ref: ArtifactRef) => Promise<Buffer>;
  /** Missing files are not an error. */
  remove: (ref: ArtifactRef) => Promise<void>;
};

export function isArtifactMissing(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

export async function createFileArtifactStore(directory: string): Promise<ArtifactStore> {
  const root = path.resolve(directory);
  await fs.mkdir(root, { recursive: true });

  return {
    async save(jobId, model) {
      const filePath = path.join(root, `${jobId}.${model.format}`);
      await fs.writeFile(filePath, model.data);
      return {
        path: filePath,
        format: model.format,
        sizeBytes: model.data.length,
        ...(model.vertices !== undefined ? { vertices: model.vertices } : {}),
        ...(model.faces !== undefined ? { faces: model.faces } : {}),
      };
    },

    async read(ref) {
      return fs.readFile(ref.path);
    },

    async remove(ref) {
      try {
        await fs.unlink(ref.path);
      } catch (err) {
        if (isArtifactMissing(err)) {
          return;
        }
        throw err;
      }
    },
  };
}
