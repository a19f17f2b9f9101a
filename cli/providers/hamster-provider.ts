import { hostingErrorSchema, hostingResponseSchema, type HostedImage } from "../../shared/schema.js";
import { AuthFailureError, ServiceRejectionError, TransportError, errorMessage } from "../errors.js";
import { UNIQUE_TAIL_BYTES, randomTail } from "../utils/id-generator.js";
import { Logger } from "../utils/logger.js";
import type { HostingProvider, UploadInput } from "./hosting-provider.js";

export const DEFAULT_ENDPOINT = "https://hamster.is/api/1/upload";

const AUTH_MESSAGE = /api[\s_-]*(v1\s*)?key/i;

export interface HamsterProviderOptions {
  apiKey: string;
  endpoint?: string;
  /** Append random bytes to file uploads (default true). */
  uniqueTail?: boolean;
  fetch?: typeof fetch;
}

/** Uploads to hamster.is through its Chevereto v1 API. */
export class HamsterProvider implements HostingProvider {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HamsterProviderOptions) {
    this.endpoint = options.endpoint ?? DEFAULT_ENDPOINT;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get uploadOverhead(): number {
    return this.options.uniqueTail === false ? 0 : UNIQUE_TAIL_BYTES;
  }

  async uploadImage(input: UploadInput): Promise<HostedImage> {
    const formData = new FormData();

    if ("url" in input) {
      formData.append("source", input.url);
    } else {
      const bytes = this.options.uniqueTail === false ? input.file : Buffer.concat([input.file, randomTail()]);
      formData.append("source", new Blob([bytes], { type: input.mime }), input.filename);
    }

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: { "X-API-Key": this.options.apiKey },
        body: formData,
      });
      body = await response.text();
    } catch (error) {
      throw new TransportError(`Network error during upload: ${errorMessage(error)}`);
    }

    Logger.debug(`Upload response ${response.status}`, body);

    if (!response.ok) {
      throw this.toError(response.status, body);
    }

    const json = parseJson(body);
    if (json === undefined) {
      throw new ServiceRejectionError("Invalid response format", response.status);
    }

    const parsed = hostingResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ServiceRejectionError("Response carries no image URL", response.status);
    }

    const { image } = parsed.data;
    return {
      url: image.url,
      viewerUrl: image.url_viewer ?? this.viewerUrl(image.id_encoded),
      mediumUrl: image.medium?.url ?? undefined,
      thumbUrl: image.thumb?.url ?? undefined,
      imageId: image.id_encoded,
      width: image.width,
      height: image.height,
    };
  }

  /** The host serves viewer pages at /image/<id> beside the API. */
  private viewerUrl(imageId: string | undefined): string | undefined {
    return imageId ? new URL(`/image/${encodeURIComponent(imageId)}`, this.endpoint).href : undefined;
  }

  private toError(status: number, body: string): Error {
    const parsed = hostingErrorSchema.safeParse(parseJson(body));
    const message =
      (parsed.success ? parsed.data.error?.message : undefined) ||
      body.trim() ||
      `Upload failed with status ${status}`;

    if (status === 401 || status === 403 || AUTH_MESSAGE.test(message)) {
      return new AuthFailureError(`API key rejected: ${message}`);
    }

    return new ServiceRejectionError(message, status);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
