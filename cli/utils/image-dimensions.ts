export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Reads pixel dimensions straight from the file header, without decoding the
 * image. Returns null for formats it does not recognise or truncated headers.
 */
export function getImageDimensions(buffer: Buffer): Dimensions | null {
  try {
    return (
      getPngDimensions(buffer) ??
      getJpegDimensions(buffer) ??
      getGifDimensions(buffer) ??
      getWebpDimensions(buffer) ??
      getBmpDimensions(buffer)
    );
  } catch {
    // RangeError from a header that lies about its own length
    return null;
  }
}

export function getPngDimensions(buffer: Buffer): Dimensions | null {
  if (buffer.length < 24) return null;

  // PNG signature check
  if (buffer.readUInt32BE(0) !== 0x89504e47 || buffer.readUInt32BE(4) !== 0x0d0a1a0a) {
    return null;
  }

  const width = buffer.readUInt32BE(16);
  const height = buffer.readUInt32BE(20);

  return { width, height };
}

export function getJpegDimensions(buffer: Buffer): Dimensions | null {
  if (buffer.length < 4 || buffer[0] !== 0xff || buffer[1] !== 0xd8) return null;

  let offset = 2; // Skip initial 0xFFD8

  while (offset + 9 <= buffer.length) {
    if (buffer[offset] !== 0xff) break;

    const marker = buffer[offset + 1];

    // SOF (Start of Frame) markers
    if ((marker >= 0xc0 && marker <= 0xc3) || (marker >= 0xc5 && marker <= 0xc7) ||
        (marker >= 0xc9 && marker <= 0xcb) || (marker >= 0xcd && marker <= 0xcf)) {
      const height = buffer.readUInt16BE(offset + 5);
      const width = buffer.readUInt16BE(offset + 7);
      return { width, height };
    }

    // Skip this segment
    const segmentLength = buffer.readUInt16BE(offset + 2);
    offset += segmentLength + 2;
  }

  return null;
}

export function getGifDimensions(buffer: Buffer): Dimensions | null {
  if (buffer.length < 10) return null;

  const signature = buffer.toString("ascii", 0, 6);
  if (signature !== "GIF87a" && signature !== "GIF89a") return null;

  return {
    width: buffer.readUInt16LE(6),
    height: buffer.readUInt16LE(8),
  };
}

export function getWebpDimensions(buffer: Buffer): Dimensions | null {
  if (buffer.length < 30) return null;
  if (buffer.toString("ascii", 0, 4) !== "RIFF" || buffer.toString("ascii", 8, 12) !== "WEBP") {
    return null;
  }

  const chunk = buffer.toString("ascii", 12, 16);

  if (chunk === "VP8 ") {
    // lossy: 14-bit sizes after the frame start code
    return {
      width: buffer.readUInt16LE(26) & 0x3fff,
      height: buffer.readUInt16LE(28) & 0x3fff,
    };
  }

  if (chunk === "VP8L") {
    const bits = buffer.readUInt32LE(21);
    return {
      width: (bits & 0x3fff) + 1,
      height: ((bits >> 14) & 0x3fff) + 1,
    };
  }

  if (chunk === "VP8X") {
    return {
      width: buffer.readUIntLE(24, 3) + 1,
      height: buffer.readUIntLE(27, 3) + 1,
    };
  }

  return null;
}

export function getBmpDimensions(buffer: Buffer): Dimensions | null {
  if (buffer.length < 26 || buffer.toString("ascii", 0, 2) !== "BM") return null;

  // negative height marks a top-down bitmap
  const width = buffer.readInt32LE(18);
  const height = Math.abs(buffer.readInt32LE(22));
  if (width <= 0 || height === 0) return null;

  return { width, height };
}
