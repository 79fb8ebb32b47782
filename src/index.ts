export {
  decodeBody,
  decodeQuery,
  groupPairs,
  parse,
  parsePairs,
} from "./parse/decodeUrlEncoded";
export type { DecodeResult, QueryMap } from "./parse/decodeUrlEncoded";
export {
  bodyError,
  decodeErrorCause,
  describeDecodeError,
  emptyQuery,
  malformedQuery,
} from "./parse/decodeError";
export type { DecodeError } from "./parse/decodeError";
export {
  decodeUtf8Lossy,
  decodeUtf8Strict,
  encodeUtf8,
  percentDecode,
} from "./parse/percentDecode";
export type { RawInput } from "./parse/percentDecode";
export { getAll, getFirst, toJSON } from "./parse/queryMap";
export { RequestParams } from "./requestParams";
export type { RequestSource } from "./requestParams";
