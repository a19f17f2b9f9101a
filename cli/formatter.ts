import { formatNameSchema, type FormatName, type SuccessfulUpload } from "../shared/schema.js";

export interface FormatSpec {
  name: FormatName;
  description: string;
  template: string;
}

export const FORMATS: Record<FormatName, FormatSpec> = {
  plain: { name: "plain", description: "Direct link", template: "{url}" },
  bbcode: { name: "bbcode", description: "BBCode image", template: "[img]{url}[/img]" },
  bbthumbs: {
    name: "bbthumbs",
    description: "BBCode thumbnail linking to the viewer page",
    template: "[url={viewer}][img]{thumb}[/img][/url]",
  },
  imgnm: { name: "imgnm", description: "BBCode imgnm (not resized)", template: "[imgnm]{url}[/imgnm]" },
  medium: { name: "medium", description: "Medium-size link", template: "{medium}" },
  thumbs: { name: "thumbs", description: "Thumbnail link", template: "{thumb}" },
  "medium-thumbs": {
    name: "medium-thumbs",
    description: "BBCode medium image linking to the viewer page",
    template: "[url={viewer}][img]{medium}[/img][/url]",
  },
};

export const DEFAULT_FORMAT = FORMATS.plain;

export function parseFormatName(value: string): FormatName {
  return formatNameSchema.parse(value.trim().toLowerCase());
}

/** Variants the host did not return fall back to the canonical URL. */
export function formatLink(result: SuccessfulUpload, spec: FormatSpec): string {
  const values: Record<string, string> = {
    url: result.url,
    viewer: result.viewerUrl ?? result.url,
    medium: result.mediumUrl ?? result.url,
    thumb: result.thumbUrl ?? result.url,
  };

  return spec.template.replace(/\{(url|viewer|medium|thumb)\}/g, (_match, key: string) => values[key] ?? result.url);
}

export function formatLinks(results: SuccessfulUpload[], spec: FormatSpec): string[] {
  return results.map((result) => formatLink(result, spec));
}

export function joinLinks(lines: string[], single = false): string {
  return lines.join(single ? "" : "\n");
}
