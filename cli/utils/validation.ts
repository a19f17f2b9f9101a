import path from "node:path";
import { z } from "zod";

// hamster.is refuses anything above roughly 7.6MB
export const DEFAULT_MAX_UPLOAD_BYTES = 7_600_000;

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".bmp",
  ".gif",
  ".jpg",
  ".jpeg",
  ".png",
  ".webp",
]);

const MIME_TYPES: Record<string, string> = {
  ".bmp": "image/bmp",
  ".gif": "image/gif",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".webp": "image/webp",
};

export const widthSchema = z.coerce
  .number({ invalid_type_error: "Width must be a number" })
  .int("Width must be a whole number of pixels")
  .positive("Width must be greater than 0");

export function isImagePath(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getMimeType(filePath: string): string {
  return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

export function getFileExtension(mime: string): string {
  const extensions: Record<string, string> = {
    "image/png": "png",
    "image/jpeg": "jpg",
    "image/jpg": "jpg",
    "image/webp": "webp",
    "image/gif": "gif",
    "image/bmp": "bmp",
  };
  return extensions[mime] || "jpg";
}

export function formatFileSize(bytes: number): string {
  if (bytes === 0) return "0 B";

  const k = 1024;
  const sizes = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}
