import { z } from "zod";

export const FORMAT_NAMES = [
  "plain",
  "bbcode",
  "bbthumbs",
  "imgnm",
  "medium",
  "thumbs",
  "medium-thumbs",
] as const;

export const formatNameSchema = z.enum(FORMAT_NAMES);
export type FormatName = z.infer<typeof formatNameSchema>;

export const configSchema = z.object({
  apiKey: z.string().default(""),
  txtDir: z.string().min(1),
  maxUploadBytes: z.number().int().positive(),
  endpoint: z.string().url(),
  uniqueTail: z.boolean().default(true),
});

export type Config = z.infer<typeof configSchema>;

// Upload response (Chevereto v1 API)
const variantSchema = z.object({ url: z.string().url().nullish() });

export const hostingResponseSchema = z.object({
  status_code: z.number().optional(),
  image: z.object({
    url: z.string().url(),
    url_viewer: z.string().url().optional(),
    id_encoded: z.string().optional(),
    width: z.coerce.number().optional(),
    height: z.coerce.number().optional(),
    size: z.coerce.number().optional(),
    medium: variantSchema.nullish(),
    thumb: variantSchema.nullish(),
  }),
});

export const hostingErrorSchema = z.object({
  status_code: z.number().optional(),
  error: z
    .object({
      message: z.string().optional(),
      code: z.number().optional(),
    })
    .optional(),
});

export interface HostedImage {
  url: string;
  viewerUrl?: string;
  mediumUrl?: string;
  thumbUrl?: string;
  imageId?: string;
  width?: number;
  height?: number;
}

export type UploadItem =
  | {
      kind: "file";
      path: string;
      size?: number;
      width?: number;
      height?: number;
    }
  | {
      kind: "url";
      url: string;
    };

export type FailureReason = "transport" | "rejected" | "resize" | "unreadable" | "auth";

export type UploadResult =
  | ({ ok: true; source: string } & HostedImage)
  | { ok: false; source: string; reason: FailureReason; error: string };

export type SuccessfulUpload = Extract<UploadResult, { ok: true }>;

export interface OutputSinks {
  clipboard: boolean;
  file: boolean;
  stdout: boolean;
}
