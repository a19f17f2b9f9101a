import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { UploadItem } from "../shared/schema.js";
import { errorMessage } from "./errors.js";
import { Logger } from "./utils/logger.js";
import { isImagePath } from "./utils/validation.js";

export type SourceKind = "url" | "folder" | "file";

export function isUrl(value: string): boolean {
  if (!URL.canParse(value)) return false;
  const url = new URL(value);
  return (url.protocol === "http:" || url.protocol === "https:") && url.hostname !== "";
}

export async function classifySource(arg: string): Promise<SourceKind> {
  if (isUrl(arg)) return "url";

  const stats = await fs.stat(arg).catch(() => null);
  return stats?.isDirectory() ? "folder" : "file";
}

/**
 * Image files under `root`, depth first, each directory's entries in name
 * order. Every iteration walks the tree again; nothing is collected up front.
 */
export function walkImages(root: string): AsyncIterable<string> {
  return {
    [Symbol.asyncIterator]: () => walk(root),
  };
}

async function* walk(dir: string): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    Logger.warn(`Skipping folder ${dir}: ${errorMessage(error)}`);
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walk(fullPath);
    } else if (entry.isFile() && isImagePath(fullPath)) {
      yield fullPath;
    }
  }
}

/** Upload items in argument order; folders expand in place. */
export async function* enumerateItems(args: readonly string[]): AsyncGenerator<UploadItem> {
  for (const arg of args) {
    switch (await classifySource(arg)) {
      case "url":
        yield { kind: "url", url: arg };
        break;
      case "folder":
        for await (const filePath of walkImages(arg)) {
          yield { kind: "file", path: filePath };
        }
        break;
      case "file":
        yield { kind: "file", path: arg };
        break;
    }
  }
}

export function describeItem(item: UploadItem): string {
  return item.kind === "url" ? item.url : item.path;
}
