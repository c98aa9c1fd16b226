import axios, { type AxiosInstance } from "axios";
import type { ImageSource, PreparedImage } from "./generation.types";

export type ImagePreparer = {
  prepare: (source: ImageSource) => Promise<PreparedImage>;
};

export class ImagePreparationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImagePreparationError";
  }
}

export type ImagePreparerOptions = {
  fetchTimeoutMs: number;
  maxBytes: number;
  http?: AxiosInstance;
};

function startsWith(data: Buffer, signature: number[], offset = 0): boolean {
  if (data.length < offset + signature.length) {
    return false;
  }
  return signature.every((byte, index) => data[offset + index] === byte);
}

export function detectImageMimeType(data: Buffer): string | null {
  if (startsWith(data, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return "image/png";
  }
  if (startsWith(data, [0xff, 0xd8, 0xff])) {
    return "image/jpeg";
  }
  if (startsWith(data, [0x47, 0x49, 0x46, 0x38])) {
    return "image/gif";
  }
  if (startsWith(data, [0x52, 0x49, 0x46, 0x46]) && startsWith(data, [0x57, 0x45, 0x42, 0x50], 8)) {
    return "image/webp";
  }
  if (startsWith(data, [0x42, 0x4d])) {
    return "image/bmp";
  }
  return null;
}

function isAllowedImageUrl(value: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return false;
  }
  return parsed.protocol === "https:" || parsed.protocol === "http:";
}

export function createImagePreparer(options: ImagePreparerOptions): ImagePreparer {
  const http = options.http ?? axios.create();

  async function download(url: string): Promise<Buffer> {
    if (!isAllowedImageUrl(url)) {
      throw new ImagePreparationError("invalid_image_url");
    }
    try {
      const response = await http.get<ArrayBuffer>(url, {
        responseType: "arraybuffer",
        timeout: options.fetchTimeoutMs,
        maxContentLength: options.maxBytes,
      });
      return Buffer.from(response.data);
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        throw new ImagePreparationError(`image_fetch_failed:${err.response.status}`);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ImagePreparationError(`image_fetch_failed:${reason}`);
    }
  }

  return {
    async prepare(source) {
      const data = source.kind === "inline" ? source.data : await download(source.url);
      if (data.length === 0) {
        throw new ImagePreparationError("empty_image");
      }
      if (data.length > options.maxBytes) {
        throw new ImagePreparationError("image_too_large");
      }
      const mimeType = detectImageMimeType(data);
      if (!mimeType) {
        throw new ImagePreparationError("unsupported_image_format");
      }
      return { data, mimeType };
    },
  };
}
