// Custom error types for the generation pipeline

export class OverloadedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OverloadedError";
  }
}

/** A provider answered, but not with anything usable (no content, no text blocks). */
export class ProviderResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProviderResponseError";
  }
}

export class ContentStoreError extends Error {
  constructor(message: string, readonly path?: string) {
    super(message);
    this.name = "ContentStoreError";
  }
}

export class GenerationInProgressError extends Error {
  constructor() {
    super("Generation already in progress");
    this.name = "GenerationInProgressError";
  }
}

/** The caller's world config is missing or does not match its schema. */
export class WorldConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = "WorldConfigError";
  }
}

/**
 * Normalizes an error thrown by a provider SDK into a single line of text,
 * prefixed with the HTTP status when the SDK exposes one. Anthropic's
 * overload responses become OverloadedError so callers can tell them apart.
 */
export function describeProviderError(error: unknown): string {
  if (error instanceof Error) {
    const status =
      "status" in error && typeof error.status === "number" ? `${error.status}: ` : "";
    return `${status}${error.message}`;
  }
  return String(error);
}

export function toProviderError(error: unknown): Error {
  if (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "overloaded_error"
  ) {
    return new OverloadedError(describeProviderError(error));
  }
  return error instanceof Error ? error : new Error(String(error));
}
