import bmp, { type BmpImage } from "bmp-js";
import sharp from "sharp";
import { ImageTooLargeError, ResizeError, errorMessage } from "./errors.js";
import { getBmpDimensions } from "./utils/image-dimensions.js";

export type OutputFormat = "jpeg" | "png" | "webp" | "gif" | "avif" | "tiff";

export interface ResizedImage {
  data: Buffer;
  width: number;
  height: number;
  format: OutputFormat;
}

const KEEP_FORMATS: ReadonlySet<string> = new Set(["jpeg", "png", "webp", "gif", "avif", "tiff"]);

function isOutputFormat(format: string | undefined): format is OutputFormat {
  return format !== undefined && KEEP_FORMATS.has(format);
}

interface DecodedImage {
  width: number;
  height: number;
  format: OutputFormat;
  open: () => sharp.Sharp;
}

/**
 * Downscales `input` so its width equals `width`, keeping the aspect ratio.
 * Animated GIF/WebP keep every frame. The source format is kept where sharp
 * can write it; anything else (BMP) comes out as PNG.
 */
export async function resizeImage(input: Buffer, width: number): Promise<ResizedImage> {
  if (!Number.isInteger(width) || width < 1) {
    throw new ResizeError(`Invalid target width: ${width}`);
  }

  const source = getBmpDimensions(input) ? decodeBitmap(input) : await inspect(input);

  if (width >= source.width) {
    throw new ResizeError(
      `Target width ${width} must be smaller than the current width ${source.width}`,
    );
  }

  const height = Math.max(1, Math.round((width * source.height) / source.width));

  try {
    const pipeline = source.open().resize({ width, height, fit: "fill" });
    const data = await encode(pipeline, source.format).toBuffer();
    return { data, width, height, format: source.format };
  } catch (error) {
    throw new ResizeError(`Resize failed: ${errorMessage(error)}`);
  }
}

async function inspect(input: Buffer): Promise<DecodedImage> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(input, { animated: true }).metadata();
  } catch (error) {
    throw new ResizeError(`Unreadable image: ${errorMessage(error)}`);
  }

  const width = metadata.width;
  const height = metadata.pageHeight ?? metadata.height;
  if (!width || !height) {
    throw new ResizeError("Unreadable image: missing dimensions");
  }

  return {
    width,
    height,
    format: isOutputFormat(metadata.format) ? metadata.format : "png",
    open: () => sharp(input, { animated: true }),
  };
}

// sharp's prebuilt libvips has no BMP loader, so bitmaps go in as raw pixels
function decodeBitmap(input: Buffer): DecodedImage {
  let bitmap: BmpImage;
  try {
    bitmap = bmp.decode(input);
  } catch (error) {
    throw new ResizeError(`Unreadable image: ${errorMessage(error)}`);
  }

  const { width, height } = bitmap;
  if (width < 1 || height < 1) {
    throw new ResizeError("Unreadable image: missing dimensions");
  }

  // bmp-js hands back ABGR
  const pixels = Buffer.alloc(width * height * 3);
  for (let i = 0, o = 0; o < pixels.length; i += 4, o += 3) {
    pixels[o] = bitmap.data[i + 3];
    pixels[o + 1] = bitmap.data[i + 2];
    pixels[o + 2] = bitmap.data[i + 1];
  }

  return {
    width,
    height,
    format: "png",
    open: () => sharp(pixels, { raw: { width, height, channels: 3 } }),
  };
}

function encode(pipeline: sharp.Sharp, format: OutputFormat): sharp.Sharp {
  switch (format) {
    case "jpeg":
      return pipeline.jpeg({ quality: 90, mozjpeg: true });
    case "png":
      return pipeline.png({ compressionLevel: 9, palette: false });
    case "webp":
      return pipeline.webp({ quality: 90 });
    case "gif":
      return pipeline.gif({ colours: 256, dither: 1 });
    default:
      return pipeline.toFormat(format);
  }
}

export type Resize = (input: Buffer, width: number) => Promise<ResizedImage>;

/**
 * Resolves to undefined for images within `limit`; those never reach sharp.
 * Over the limit, resizes to `width` when one is given and otherwise throws
 * ImageTooLargeError so the caller can decide.
 */
export async function ensureWithinLimit(
  input: Buffer,
  limit: number,
  width?: number,
  options: { currentWidth?: number; resize?: Resize } = {},
): Promise<ResizedImage | undefined> {
  if (input.length <= limit) {
    return undefined;
  }

  if (width === undefined) {
    throw new ImageTooLargeError(input.length, limit, options.currentWidth);
  }

  const resize = options.resize ?? resizeImage;
  return resize(input, width);
}

/** Width expected to bring `size` bytes under `limit`, assuming size scales with area. */
export function suggestWidth(currentWidth: number, size: number, limit: number): number {
  if (size <= limit) return currentWidth;
  return Math.max(1, Math.floor(currentWidth * Math.sqrt(limit / size) * 0.9));
}
