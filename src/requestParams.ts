import {
  type DecodeResult,
  decodeBody,
  decodeQuery,
} from "./parse/decodeUrlEncoded";
import type { RawInput } from "./parse/percentDecode";

export interface RequestSource {
  // The query component without its leading "?", or null when the url has
  // none.
  search: string | null;

  // Reads the whole request body. Size limits and buffering are up to the
  // implementation.
  readBody: () => Promise<RawInput | null>;
}

/**
 * Decoded url-encoded parameters of a single request. The query string and
 * the body are each decoded once, on first access, and kept apart.
 */
export class RequestParams {
  private queryResult: DecodeResult | null = null;
  private bodyResult: Promise<DecodeResult> | null = null;

  constructor(private source: RequestSource) {}

  query(): DecodeResult {
    if (!this.queryResult) {
      this.queryResult = decodeQuery(this.source.search);
    }

    return this.queryResult;
  }

  body(): Promise<DecodeResult> {
    if (!this.bodyResult) {
      this.bodyResult = this.source.readBody().then(
        (raw) => decodeBody(raw),
        (error: unknown) =>
          decodeBody(null, error ?? new Error("failed to read request body")),
      );
    }

    return this.bodyResult;
  }
}
