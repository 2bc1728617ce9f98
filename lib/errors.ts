export type PriceErrorKind = "network" | "upstream" | "parse" | "normalize" | "empty-series" | "config";

export abstract class PriceError extends Error {
  abstract readonly kind: PriceErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No response from the upstream: DNS, connection reset, timeout or abort. */
export class NetworkError extends PriceError {
  readonly kind = "network";
}

export class UpstreamError extends PriceError {
  readonly kind = "upstream";
  readonly status?: number;
  readonly notPublished: boolean;

  constructor(message: string, options: { status?: number; notPublished?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.notPublished = options.notPublished ?? false;
  }
}

export class ParseError extends PriceError {
  readonly kind = "parse";
}

export class NormalizeError extends PriceError {
  readonly kind = "normalize";
}

export class EmptySeriesError extends PriceError {
  readonly kind = "empty-series";

  constructor(message = "Cannot compute statistics of an empty price series") {
    super(message);
  }
}

export class ConfigError extends PriceError {
  readonly kind = "config";
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export type FetchError = NetworkError | UpstreamError | ParseError;

/** Same shape as zod's SafeParseReturnType, so callers branch on `success` everywhere. */
export type Result<T, E extends Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends Error>(error: E): { success: false; error: E } {
  return { success: false, error };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
