import {
  type DecodeError,
  bodyError,
  emptyQuery,
  malformedQuery,
} from "./decodeError";
import {
  type RawInput,
  decodeUtf8Lossy,
  decodeUtf8Strict,
  percentDecode,
} from "./percentDecode";

/**
 * Maps every parameter name to its values, in the order they were supplied.
 */
export type QueryMap = Map<string, string[]>;

export type DecodeResult =
  | { type: "SUCCESS"; values: QueryMap }
  | { type: "FAILURE"; error: DecodeError };

/**
 * Decodes the query component of a url. A missing query (as opposed to an
 * empty one) is passed as null or undefined.
 */
export function decodeQuery(raw: RawInput | null | undefined): DecodeResult {
  if (raw === null || raw === undefined) {
    return failure(emptyQuery());
  }

  return parse(raw);
}

/**
 * Decodes a request body that has already been read. When reading it failed,
 * the failure is passed as `acquisitionError` and is wrapped without decoding
 * anything.
 */
export function decodeBody(
  raw: RawInput | null | undefined,
  acquisitionError?: unknown,
): DecodeResult {
  if (acquisitionError !== undefined) {
    return failure(bodyError(acquisitionError));
  }

  return parse(raw ?? "");
}

export function parse(raw: RawInput): DecodeResult {
  if (raw.length === 0) {
    return failure(emptyQuery());
  }

  const text = decodeUtf8Strict(percentDecode(raw));
  if (text === null) {
    return failure(malformedQuery());
  }

  return {
    type: "SUCCESS",
    values: groupPairs(parsePairs(text)),
  };
}

export function* parsePairs(text: string): Generator<[string, string]> {
  for (const segment of text.split("&")) {
    if (!segment) {
      continue;
    }

    const separator = segment.indexOf("=");
    if (separator === -1) {
      yield [decodeFormComponent(segment), ""];
    } else {
      yield [
        decodeFormComponent(segment.slice(0, separator)),
        decodeFormComponent(segment.slice(separator + 1)),
      ];
    }
  }
}

function decodeFormComponent(component: string): string {
  return decodeUtf8Lossy(percentDecode(component.replace(/\+/g, " ")));
}

export function groupPairs(pairs: Iterable<[string, string]>): QueryMap {
  const grouped: QueryMap = new Map();

  for (const [key, value] of pairs) {
    const existing = grouped.get(key);
    if (existing) {
      existing.push(value);
    } else {
      grouped.set(key, [value]);
    }
  }

  return grouped;
}

function failure(error: DecodeError): DecodeResult {
  return { type: "FAILURE", error };
}
