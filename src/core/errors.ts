export type GeoLookupErrorKind = 'network' | 'parse' | 'file-write';

/**
 * Base class for failures returned by the lookup client
 */
export abstract class GeoLookupError extends Error {
  abstract readonly kind: GeoLookupErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Connection failure, timeout or non-2xx response
 */
export class NetworkError extends GeoLookupError {
  readonly kind = 'network';

  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Response body is not a JSON object
 */
export class ParseError extends GeoLookupError {
  readonly kind = 'parse';

  constructor(
    message: string,
    public readonly body: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class FileWriteError extends GeoLookupError {
  readonly kind = 'file-write';

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
