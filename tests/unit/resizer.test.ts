import sharp from "sharp";
import { describe, expect, it, vi } from "vitest";
import { ImageTooLargeError, ResizeError } from "../../cli/errors.js";
import { ensureWithinLimit, resizeImage, suggestWidth, type ResizedImage } from "../../cli/resizer.js";
import { bitmap } from "../helpers.js";

// GIF whose LZW stream restarts before every pixel, so codes never grow past 3 bits
function animatedGif(width: number, height: number, frames: number): Buffer {
  const header = Buffer.alloc(13);
  header.write("GIF89a", 0, "ascii");
  header.writeUInt16LE(width, 6);
  header.writeUInt16LE(height, 8);
  header[10] = 0x80;
  const palette = Buffer.from([255, 0, 0, 0, 0, 255]);
  const loop = Buffer.from([0x21, 0xff, 0x0b, ...Buffer.from("NETSCAPE2.0"), 0x03, 0x01, 0x00, 0x00, 0x00]);

  const parts = [header, palette, loop];
  for (let frame = 0; frame < frames; frame++) {
    const control = Buffer.from([0x21, 0xf9, 0x04, 0x00, 10, 0, 0x00, 0x00]);
    const descriptor = Buffer.alloc(10);
    descriptor[0] = 0x2c;
    descriptor.writeUInt16LE(width, 5);
    descriptor.writeUInt16LE(height, 7);

    const codes: number[] = [];
    for (let i = 0; i < width * height; i++) codes.push(4, frame % 2);
    codes.push(5);

    const bytes: number[] = [];
    let acc = 0;
    let bits = 0;
    for (const code of codes) {
      acc |= code << bits;
      bits += 3;
      while (bits >= 8) {
        bytes.push(acc & 0xff);
        acc >>= 8;
        bits -= 8;
      }
    }
    if (bits > 0) bytes.push(acc & 0xff);

    const blocks: number[] = [0x02];
    for (let i = 0; i < bytes.length; i += 255) {
      const chunk = bytes.slice(i, i + 255);
      blocks.push(chunk.length, ...chunk);
    }
    blocks.push(0x00);

    parts.push(control, descriptor, Buffer.from(blocks));
  }
  parts.push(Buffer.from([0x3b]));
  return Buffer.concat(parts);
}

function solid(width: number, height: number) {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } },
  });
}

describe("resizeImage", () => {
  it("scales to the target width and keeps the aspect ratio", async () => {
    const input = await solid(200, 100).png().toBuffer();

    const resized = await resizeImage(input, 50);

    expect(resized.width).toBe(50);
    expect(resized.height).toBe(25);
    expect(resized.format).toBe("png");
    const metadata = await sharp(resized.data).metadata();
    expect(metadata.width).toBe(50);
    expect(metadata.height).toBe(25);
  });

  it("keeps JPEG as JPEG", async () => {
    const input = await solid(300, 200).jpeg().toBuffer();

    const resized = await resizeImage(input, 150);

    expect(resized.format).toBe("jpeg");
    expect(resized.height).toBe(100);
    expect((await sharp(resized.data).metadata()).format).toBe("jpeg");
  });

  it("rounds the height", async () => {
    const input = await solid(300, 100).png().toBuffer();

    const resized = await resizeImage(input, 100);

    expect(resized.height).toBe(33);
  });

  it("keeps every frame of an animated GIF", async () => {
    const input = animatedGif(40, 20, 3);
    expect((await sharp(input, { animated: true }).metadata()).pages).toBe(3);

    const resized = await resizeImage(input, 20);

    expect(resized).toMatchObject({ width: 20, height: 10, format: "gif" });
    const metadata = await sharp(resized.data, { animated: true }).metadata();
    expect(metadata.pages).toBe(3);
    expect(metadata.width).toBe(20);
  });

  it("decodes BMP and writes PNG", async () => {
    const input = bitmap(200, 100, [200, 40, 10]);

    const resized = await resizeImage(input, 50);

    expect(resized).toMatchObject({ width: 50, height: 25, format: "png" });
    const { data, info } = await sharp(resized.data).raw().toBuffer({ resolveWithObject: true });
    expect([info.width, info.height, info.channels]).toEqual([50, 25, 3]);
    expect([...data.subarray(0, 3)]).toEqual([200, 40, 10]);
  });

  it("refuses to upscale a BMP", async () => {
    await expect(resizeImage(bitmap(20, 10, [0, 0, 0]), 20)).rejects.toBeInstanceOf(ResizeError);
  });

  it("refuses to upscale", async () => {
    const input = await solid(100, 100).png().toBuffer();

    await expect(resizeImage(input, 100)).rejects.toBeInstanceOf(ResizeError);
    await expect(resizeImage(input, 400)).rejects.toBeInstanceOf(ResizeError);
  });

  it("rejects invalid widths", async () => {
    const input = await solid(100, 100).png().toBuffer();

    await expect(resizeImage(input, 0)).rejects.toBeInstanceOf(ResizeError);
  });

  it("reports corrupt input as a resize failure", async () => {
    await expect(resizeImage(Buffer.from("definitely not pixels"), 10)).rejects.toBeInstanceOf(ResizeError);
  });
});

describe("ensureWithinLimit", () => {
  const fakeResult: ResizedImage = { data: Buffer.from("small"), width: 800, height: 600, format: "png" };

  it("never resizes images under the limit", async () => {
    const resize = vi.fn(async () => fakeResult);

    const result = await ensureWithinLimit(Buffer.alloc(100), 100, 800, { resize });

    expect(result).toBeUndefined();
    expect(resize).not.toHaveBeenCalled();
  });

  it("signals an oversized image when no width is given", async () => {
    const resize = vi.fn(async () => fakeResult);

    const error = await ensureWithinLimit(Buffer.alloc(101), 100, undefined, { currentWidth: 4000, resize }).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(ImageTooLargeError);
    if (!(error instanceof ImageTooLargeError)) return;
    expect([error.size, error.limit, error.width]).toEqual([101, 100, 4000]);
    expect(resize).not.toHaveBeenCalled();
  });

  it("resizes oversized images to the given width", async () => {
    const input = Buffer.alloc(101);
    const resize = vi.fn(async () => fakeResult);

    const result = await ensureWithinLimit(input, 100, 800, { resize });

    expect(resize).toHaveBeenCalledWith(input, 800);
    expect(result).toBe(fakeResult);
  });
});

describe("suggestWidth", () => {
  it("shrinks by the square root of the size ratio with some headroom", () => {
    expect(suggestWidth(4000, 400, 100)).toBe(1800);
  });

  it("keeps the width when already under the limit", () => {
    expect(suggestWidth(4000, 50, 100)).toBe(4000);
  });
});
