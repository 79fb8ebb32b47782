import * as p from "./combinator";

export type RawInput = string | Uint8Array;

const PERCENT = 0x25;

function isHexDigit(byte: number) {
  return (
    (byte >= 0x30 && byte <= 0x39) ||
    (byte >= 0x41 && byte <= 0x46) ||
    (byte >= 0x61 && byte <= 0x66)
  );
}

const escapedByte = p.map(
  p.sequence(p.tag(PERCENT), p.takeExactly(2, p.parseMatching(isHexDigit))),
  ([_, digits]) => parseInt(String.fromCharCode(...digits), 16),
);

// Anything that is not a complete escape, a stray "%" included, is kept as is.
const literalByte = p.parseMatching(() => true);

const percentEncoded = p.parseRepeated(p.alt(escapedByte, literalByte));

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder("utf-8", {
  fatal: true,
  ignoreBOM: true,
});
const lossyDecoder = new TextDecoder("utf-8", { ignoreBOM: true });

export function encodeUtf8(raw: RawInput): Uint8Array {
  return typeof raw === "string" ? encoder.encode(raw) : raw;
}

export function percentDecode(raw: RawInput): Uint8Array {
  const result = percentEncoded(encodeUtf8(raw));
  if (!result) {
    return new Uint8Array(0);
  }

  return new Uint8Array(result.value);
}

/**
 * Decodes UTF-8, returning null when the bytes are not valid UTF-8.
 */
export function decodeUtf8Strict(bytes: Uint8Array): string | null {
  try {
    return strictDecoder.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

export function decodeUtf8Lossy(bytes: Uint8Array): string {
  return lossyDecoder.decode(bytes);
}
