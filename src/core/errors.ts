export type ErrorCode =
  | "TRANSPORT_FAILURE"
  | "SITEMAP_PARSE_FAILURE"
  | "NO_CANDIDATES"
  | "VALIDATION_ERROR";

export class RecipeRouletteError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RecipeRouletteError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface TransportErrorDetails {
  url: string;
  status?: number;
  retryAfterMs?: number;
  timedOut?: boolean;
  cause?: unknown;
}

/** Network failure, timeout or non-2xx response */
export class TransportError extends RecipeRouletteError {
  readonly url: string;
  readonly status?: number;
  readonly retryAfterMs?: number;
  readonly timedOut: boolean;

  constructor(message: string, details: TransportErrorDetails) {
    super(message, "TRANSPORT_FAILURE", { cause: details.cause });
    this.name = "TransportError";
    this.url = details.url;
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
    this.timedOut = details.timedOut ?? false;
  }
}

export class SitemapParseError extends RecipeRouletteError {
  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown,
  ) {
    super(message, "SITEMAP_PARSE_FAILURE", { cause });
    this.name = "SitemapParseError";
  }
}

export class NoCandidatesError extends RecipeRouletteError {
  constructor(
    message = "No recipes found within the attempt budget. Raise the attempt count or loosen the keywords.",
  ) {
    super(message, "NO_CANDIDATES");
    this.name = "NoCandidatesError";
  }
}

export class ValidationError extends RecipeRouletteError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}
