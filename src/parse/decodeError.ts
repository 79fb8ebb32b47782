export type DecodeError =
  /** The input was empty, either in the body or the url query. */
  | { kind: "EMPTY_QUERY" }
  /** The input did not percent-decode to valid UTF-8. */
  | { kind: "MALFORMED_QUERY" }
  /** Reading the request body failed before decoding could start. */
  | { kind: "BODY_ERROR"; cause: unknown };

export function emptyQuery(): DecodeError {
  return { kind: "EMPTY_QUERY" };
}

export function malformedQuery(): DecodeError {
  return { kind: "MALFORMED_QUERY" };
}

export function bodyError(cause: unknown): DecodeError {
  return { kind: "BODY_ERROR", cause };
}

export function describeDecodeError(error: DecodeError): string {
  switch (error.kind) {
    case "EMPTY_QUERY":
      return "Expected query, found empty string.";
    case "MALFORMED_QUERY":
      return "Malformed query string";
    case "BODY_ERROR":
      return error.cause instanceof Error
        ? error.cause.message
        : String(error.cause);
  }
}

export function decodeErrorCause(error: DecodeError): unknown | null {
  return error.kind === "BODY_ERROR" ? error.cause : null;
}
