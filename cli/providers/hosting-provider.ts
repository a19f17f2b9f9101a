import type { HostedImage } from "../../shared/schema.js";

export type UploadInput =
  | { file: Buffer; filename: string; mime: string }
  | { url: string };

export interface HostingProvider {
  /** Bytes the provider adds to each file upload; preflight keeps room for them. */
  readonly uploadOverhead?: number;

  /** Performs exactly one upload call. Never retries. */
  uploadImage(input: UploadInput): Promise<HostedImage>;
}
