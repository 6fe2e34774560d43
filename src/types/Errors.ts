/**
 * Missing or invalid client input (no file, unsupported format token).
 */
export class InputError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, InputError.prototype);
  }
}

/**
 * The uploaded bytes could not be read as an image.
 */
export class DecodeError extends Error {
  readonly status = 500;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * The image could not be serialized to the requested format.
 */
export class EncodeError extends Error {
  readonly status = 500;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, EncodeError.prototype);
  }
}

/**
 * An optional collaborator (e.g. AI analysis) is not configured for this process.
 */
export class UpstreamUnavailableError extends Error {
  readonly status = 503;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, UpstreamUnavailableError.prototype);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
