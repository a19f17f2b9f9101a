import fs from "node:fs/promises";
import path from "node:path";
import clipboardy from "clipboardy";
import type { OutputSinks } from "../shared/schema.js";
import { Logger } from "./utils/logger.js";

export interface Clipboard {
  write(text: string): Promise<void>;
}

export interface OutputSink {
  readonly name: string;
  write(text: string): Promise<void>;
}

export class ClipboardSink implements OutputSink {
  readonly name = "clipboard";

  constructor(private readonly clipboard: Clipboard = clipboardy) {}

  async write(text: string): Promise<void> {
    await this.clipboard.write(text);
    Logger.info("Links copied to clipboard");
  }
}

export class FileSink implements OutputSink {
  readonly name = "file";

  constructor(readonly filePath: string) {}

  async write(text: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${text}\n`, "utf8");
    Logger.info(`Links saved in: ${this.filePath}`);
  }
}

export class StdoutSink implements OutputSink {
  readonly name = "stdout";

  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  async write(text: string): Promise<void> {
    this.out.write(`${text}\n`);
  }
}

export function linksFileName(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const stamp = [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join("-");
  return `links-${stamp}.txt`;
}

export interface SinkOptions {
  txtDir: string;
  clipboard?: Clipboard;
  stdout?: NodeJS.WritableStream;
  now?: Date;
}

export function createSinks(selected: OutputSinks, options: SinkOptions): OutputSink[] {
  const sinks: OutputSink[] = [];

  if (selected.stdout) {
    sinks.push(new StdoutSink(options.stdout));
  }
  if (selected.clipboard) {
    sinks.push(new ClipboardSink(options.clipboard));
  }
  if (selected.file) {
    sinks.push(new FileSink(path.join(options.txtDir, linksFileName(options.now))));
  }

  return sinks;
}

/** Stdout is used when nothing else was asked for. */
export function selectSinks(flags: { clip?: boolean; txt?: boolean; print?: boolean }): OutputSinks {
  const clipboard = flags.clip === true;
  const file = flags.txt === true;
  return {
    clipboard,
    file,
    stdout: flags.print === true || (!clipboard && !file),
  };
}
