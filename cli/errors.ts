export class HamlinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends HamlinkError {
  constructor(
    message: string,
    readonly configPath: string,
  ) {
    super(message);
  }
}

export class ConfigMissingError extends ConfigError {}

/** The host rejected the API key. Every later upload would fail the same way. */
export class AuthFailureError extends HamlinkError {}

export class TransportError extends HamlinkError {}

export class ServiceRejectionError extends HamlinkError {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class ResizeError extends HamlinkError {}

/** A local file or remote source could not be read. */
export class SourceReadError extends HamlinkError {}

export class ImageTooLargeError extends HamlinkError {
  constructor(
    readonly size: number,
    readonly limit: number,
    readonly width?: number,
  ) {
    super(`Image is too large (${size} bytes, limit ${limit} bytes)`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
