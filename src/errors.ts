export type FetchErrorKind = "network" | "malformed" | "not_found";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;

  constructor(kind: FetchErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FetchError";
    this.kind = kind;
  }
}

/**
 * Anything the transport throws that isn't already a FetchError is a
 * connectivity problem (DNS, reset, abort on timeout).
 */
export function toFetchError(error: unknown): FetchError {
  if (error instanceof FetchError) return error;
  if (error instanceof Error) {
    const message = error.name === "AbortError" ? "Request timed out" : error.message;
    return new FetchError("network", message, { cause: error });
  }
  return new FetchError("network", String(error));
}

export function describeFetchError(error: FetchError): string {
  switch (error.kind) {
    case "network":
      return `Network error: ${error.message}`;
    case "malformed":
      return `Unexpected response: ${error.message}`;
    case "not_found":
      return "Not found";
  }
}
