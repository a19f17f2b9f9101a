import fs from "node:fs/promises";
import path from "node:path";
import type { FailureReason, SuccessfulUpload, UploadItem, UploadResult } from "../shared/schema.js";
import {
  AuthFailureError,
  ImageTooLargeError,
  ResizeError,
  ServiceRejectionError,
  SourceReadError,
  TransportError,
  errorMessage,
} from "./errors.js";
import { formatLinks, joinLinks, type FormatSpec } from "./formatter.js";
import type { Prompter } from "./prompt.js";
import type { HostingProvider, UploadInput } from "./providers/hosting-provider.js";
import { ensureWithinLimit, resizeImage, suggestWidth, type Resize } from "./resizer.js";
import type { OutputSink } from "./sinks.js";
import { describeItem, enumerateItems } from "./sources.js";
import { generateImageId } from "./utils/id-generator.js";
import { getImageDimensions } from "./utils/image-dimensions.js";
import { Logger } from "./utils/logger.js";
import { formatFileSize, getFileExtension, getMimeType, isImagePath } from "./utils/validation.js";

const MAX_RESIZE_ATTEMPTS = 3;

// Some image hosts refuse clients without a browser user agent
export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36";

export interface PipelineOptions {
  format: FormatSpec;
  single: boolean;
  /** Width oversized images are scaled to without asking. */
  width?: number;
  maxUploadBytes: number;
}

export interface PipelineDeps {
  provider: HostingProvider;
  prompter: Prompter;
  sinks: OutputSink[];
  resize?: Resize;
  readFile?: (filePath: string) => Promise<Buffer>;
  download?: (url: string) => Promise<DownloadedImage>;
}

export interface DownloadedImage {
  data: Buffer;
  contentType?: string;
}

export interface PipelineReport {
  enumerated: number;
  results: UploadResult[];
  succeeded: number;
  failed: number;
  aborted: boolean;
  /** Joined links, or undefined when nothing was emitted. */
  output?: string;
}

interface LoadedImage {
  data: Buffer;
  filename: string;
  mime: string;
  width?: number;
}

export async function downloadImage(url: string): Promise<DownloadedImage> {
  let response: Response;
  try {
    response = await fetch(url, { headers: { "User-Agent": BROWSER_USER_AGENT } });
  } catch (error) {
    throw new TransportError(`Network error while downloading ${url}: ${errorMessage(error)}`);
  }

  if (!response.ok) {
    throw new SourceReadError(`Download failed with status ${response.status}`);
  }

  return {
    data: Buffer.from(await response.arrayBuffer()),
    contentType: response.headers.get("content-type") ?? undefined,
  };
}

function failureReason(error: unknown): FailureReason {
  if (error instanceof AuthFailureError) return "auth";
  if (error instanceof TransportError) return "transport";
  if (error instanceof ResizeError) return "resize";
  if (error instanceof SourceReadError) return "unreadable";
  return "rejected";
}

function withExtension(filename: string, format: string): string {
  const ext = format === "jpeg" ? "jpg" : format;
  return `${path.parse(filename).name}.${ext}`;
}

class ItemProcessor {
  private readonly resize: Resize;
  private readonly readFile: (filePath: string) => Promise<Buffer>;
  private readonly download: (url: string) => Promise<DownloadedImage>;

  constructor(
    private readonly options: PipelineOptions,
    private readonly deps: PipelineDeps,
  ) {
    this.resize = deps.resize ?? resizeImage;
    this.readFile = deps.readFile ?? ((filePath) => fs.readFile(filePath));
    this.download = deps.download ?? downloadImage;
  }

  async process(item: UploadItem): Promise<SuccessfulUpload> {
    const source = describeItem(item);
    const input = await this.prepare(item);
    const hosted = await this.deps.provider.uploadImage(input);
    return { ok: true, source, ...hosted };
  }

  private async prepare(item: UploadItem): Promise<UploadInput> {
    if (item.kind === "url") {
      // The host fetches URLs itself unless we may need to shrink the image first
      if (this.options.width === undefined) {
        return { url: item.url };
      }
      const image = await this.shrink(item.url, await this.loadUrl(item.url));
      return { file: image.data, filename: image.filename, mime: image.mime };
    }

    const image = await this.loadFile(item);
    const fitted = await this.shrink(item.path, image);
    return { file: fitted.data, filename: fitted.filename, mime: fitted.mime };
  }

  private async loadFile(item: Extract<UploadItem, { kind: "file" }>): Promise<LoadedImage> {
    if (!isImagePath(item.path)) {
      throw new ServiceRejectionError(`Unsupported file type: ${path.extname(item.path) || "no extension"}`);
    }

    let data: Buffer;
    try {
      data = await this.readFile(item.path);
    } catch (error) {
      throw new SourceReadError(`Cannot read file: ${errorMessage(error)}`);
    }

    const dimensions = getImageDimensions(data);
    item.size = data.length;
    item.width = dimensions?.width;
    item.height = dimensions?.height;

    return {
      data,
      filename: path.basename(item.path),
      mime: getMimeType(item.path),
      width: dimensions?.width,
    };
  }

  private async loadUrl(url: string): Promise<LoadedImage> {
    const { data, contentType } = await this.download(url);
    const name = path.posix.basename(new URL(url).pathname);
    const mime = contentType?.split(";")[0].trim() || getMimeType(name);
    const filename = isImagePath(name) ? name : `${generateImageId()}.${getFileExtension(mime)}`;

    return { data, filename, mime, width: getImageDimensions(data)?.width };
  }

  /** Brings the image under the upload limit, asking the prompter when no width was given. */
  private async shrink(source: string, original: LoadedImage): Promise<LoadedImage> {
    const limit = this.options.maxUploadBytes - (this.deps.provider.uploadOverhead ?? 0);
    let image = original;
    let width = this.options.width;
    let prompts = 0;

    for (;;) {
      const wouldNotShrink = width !== undefined && image.width !== undefined && width >= image.width;
      if (wouldNotShrink && image.data.length > limit) {
        Logger.warn(`${source} is ${image.width}px wide, resizing to ${width}px would not shrink it`);
        width = undefined;
      }

      try {
        const resized = await ensureWithinLimit(image.data, limit, width, {
          currentWidth: image.width,
          resize: this.resize,
        });
        if (!resized) {
          return image;
        }

        Logger.info(`Resized ${source} to ${resized.width}x${resized.height} (${formatFileSize(resized.data.length)})`);
        image = {
          data: resized.data,
          filename: withExtension(image.filename, resized.format),
          mime: `image/${resized.format}`,
          width: resized.width,
        };
        width = undefined;
      } catch (error) {
        if (!(error instanceof ImageTooLargeError) || prompts >= MAX_RESIZE_ATTEMPTS) {
          throw error;
        }
        prompts++;
        width = await this.askForWidth(source, error);
      }
    }
  }

  private async askForWidth(source: string, tooLarge: ImageTooLargeError): Promise<number> {
    Logger.warn(
      `${source} is too large: ${formatFileSize(tooLarge.size)} (limit ${formatFileSize(tooLarge.limit)})`,
    );

    const resize = await this.deps.prompter.confirm(`Resize ${source}?`);
    if (!resize) {
      throw tooLarge;
    }

    const suggested =
      tooLarge.width !== undefined ? suggestWidth(tooLarge.width, tooLarge.size, tooLarge.limit) : undefined;
    const width = await this.deps.prompter.chooseWidth(tooLarge.width, suggested);
    if (width === undefined) {
      throw tooLarge;
    }
    return width;
  }
}

export function summarize(report: Pick<PipelineReport, "succeeded" | "failed" | "aborted">): string {
  const summary = `${report.succeeded} uploaded, ${report.failed} failed`;
  return report.aborted ? `${summary}, aborted` : summary;
}

/**
 * Uploads every item strictly one after another, in argument order, then
 * writes the formatted links to each sink. An auth failure stops the queue and
 * suppresses sink output.
 */
export async function runPipeline(
  args: readonly string[],
  options: PipelineOptions,
  deps: PipelineDeps,
): Promise<PipelineReport> {
  const processor = new ItemProcessor(options, deps);
  const results: UploadResult[] = [];
  let enumerated = 0;
  let aborted = false;

  for await (const item of enumerateItems(args)) {
    enumerated++;
    const source = describeItem(item);

    try {
      const result = await processor.process(item);
      results.push(result);
      Logger.info(`Uploaded ${source}`);
    } catch (error) {
      results.push({ ok: false, source, reason: failureReason(error), error: errorMessage(error) });
      Logger.error(`${source}: ${errorMessage(error)}`);

      if (error instanceof AuthFailureError) {
        aborted = true;
        break;
      }
    }
  }

  const successes = results.filter((result): result is SuccessfulUpload => result.ok);
  const report: PipelineReport = {
    enumerated,
    results,
    succeeded: successes.length,
    failed: results.length - successes.length,
    aborted,
  };

  if (!aborted && successes.length > 0) {
    report.output = joinLinks(formatLinks(successes, options.format), options.single);

    for (const sink of deps.sinks) {
      try {
        await sink.write(report.output);
      } catch (error) {
        Logger.error(`Could not write links to ${sink.name}: ${errorMessage(error)}`);
      }
    }
  }

  if (enumerated > 0 && (report.failed > 0 || aborted)) {
    Logger.warn(summarize(report));
  } else if (enumerated > 0) {
    Logger.info(summarize(report));
  }

  return report;
}
