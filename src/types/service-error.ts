/**
 * Error detail extracted from a signing service response.
 *
 * Resolved once at the HTTP boundary: a JSON body carrying an `error` or
 * `message` string is structured, anything else is kept as raw text.
 */
export type ServiceError =
  | { kind: "structured"; message: string }
  | { kind: "raw"; text: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON text, returning undefined when it is not JSON
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Resolve a response body into a ServiceError
 */
export function parseServiceError(status: number, body: string): ServiceError {
  const text = body.trim();

  if (text.length > 0) {
    const data = parseJson(text);
    if (isRecord(data)) {
      if (typeof data.error === "string" && data.error.length > 0) {
        return { kind: "structured", message: data.error };
      }
      if (typeof data.message === "string" && data.message.length > 0) {
        return { kind: "structured", message: data.message };
      }
    }
    return { kind: "raw", text };
  }

  return { kind: "raw", text: `HTTP ${status}` };
}

/**
 * Wrap a transport-level failure (no response at all)
 */
export function transportError(error: unknown): ServiceError {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return { kind: "raw", text: "request timed out" };
    }
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message) {
      return { kind: "raw", text: `${error.message} (${cause.message})` };
    }
    return { kind: "raw", text: error.message };
  }
  return { kind: "raw", text: String(error) };
}

export function describeServiceError(error: ServiceError): string {
  return error.kind === "structured" ? error.message : error.text;
}
