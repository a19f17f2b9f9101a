import { Writable } from "node:stream";
import type { HostedImage } from "../shared/schema.js";
import type { Prompter } from "../cli/prompt.js";
import type { HostingProvider, UploadInput } from "../cli/providers/hosting-provider.js";
import type { Clipboard } from "../cli/sinks.js";

export function captureStream() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

export class FakeClipboard implements Clipboard {
  writes: string[] = [];

  async write(text: string): Promise<void> {
    this.writes.push(text);
  }
}

/** Answers uploads from a queue of outcomes and records every call. */
export class FakeProvider implements HostingProvider {
  readonly calls: UploadInput[] = [];
  uploadOverhead = 0;

  constructor(private readonly outcomes: Array<HostedImage | Error | ((input: UploadInput) => HostedImage)>) {}

  async uploadImage(input: UploadInput): Promise<HostedImage> {
    this.calls.push(input);
    const outcome = this.outcomes[this.calls.length - 1];
    if (outcome === undefined) {
      throw new Error(`Unexpected upload #${this.calls.length}`);
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    return typeof outcome === "function" ? outcome(input) : outcome;
  }
}

export function hosted(name: string): HostedImage {
  return {
    url: `https://hamster.is/images/${name}`,
    viewerUrl: `https://hamster.is/image/${name}`,
  };
}

export function scriptedPrompter(answers: { confirm: boolean; width?: number }): Prompter & {
  questions: string[];
} {
  const questions: string[] = [];
  return {
    questions,
    async confirm(question) {
      questions.push(question);
      return answers.confirm;
    },
    async chooseWidth() {
      return answers.width;
    },
  };
}

/** Uncompressed 24-bit bitmap filled with one colour. */
export function bitmap(width: number, height: number, [r, g, b]: [number, number, number]): Buffer {
  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const pixelBytes = rowSize * height;
  const data = Buffer.alloc(54 + pixelBytes);

  data.write("BM", 0, "ascii");
  data.writeUInt32LE(data.length, 2);
  data.writeUInt32LE(54, 10);
  data.writeUInt32LE(40, 14);
  data.writeInt32LE(width, 18);
  data.writeInt32LE(height, 22);
  data.writeUInt16LE(1, 26);
  data.writeUInt16LE(24, 28);
  data.writeUInt32LE(pixelBytes, 34);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const offset = 54 + y * rowSize + x * 3;
      data[offset] = b;
      data[offset + 1] = g;
      data[offset + 2] = r;
    }
  }
  return data;
}
