import { it, expect } from "vitest";
import {
  decodeUtf8Lossy,
  decodeUtf8Strict,
  encodeUtf8,
  percentDecode,
} from "../src/parse/percentDecode";

it("decodes escapes into raw bytes", () => {
  expect(Array.from(percentDecode("%E1%B8m"))).toEqual([0xe1, 0xb8, 0x6d]);
});

it("accepts lowercase hex digits", () => {
  expect(Array.from(percentDecode("%e2%82%ac"))).toEqual([0xe2, 0x82, 0xac]);
});

it("passes incomplete escapes through literally", () => {
  expect(Array.from(percentDecode("100%"))).toEqual([0x31, 0x30, 0x30, 0x25]);
  expect(Array.from(percentDecode("%zz"))).toEqual([0x25, 0x7a, 0x7a]);
  expect(Array.from(percentDecode("%4"))).toEqual([0x25, 0x34]);
});

it("leaves plus signs alone", () => {
  expect(Array.from(percentDecode("a+b"))).toEqual([0x61, 0x2b, 0x62]);
});

it("takes strings as their utf-8 bytes", () => {
  expect(Array.from(percentDecode("é"))).toEqual([0xc3, 0xa9]);
  expect(Array.from(encodeUtf8("é"))).toEqual([0xc3, 0xa9]);
});

it("decodes byte input without re-encoding it", () => {
  const input = new Uint8Array([0x25, 0x34, 0x31, 0xff]);
  expect(Array.from(percentDecode(input))).toEqual([0x41, 0xff]);
});

it("rejects invalid utf-8 when decoding strictly", () => {
  expect(decodeUtf8Strict(new Uint8Array([0xff]))).toBeNull();
  expect(decodeUtf8Strict(new Uint8Array([0xc3, 0xa9]))).toBe("é");
});

it("keeps a leading byte order mark", () => {
  const input = new Uint8Array([0xef, 0xbb, 0xbf, 0x61]);
  expect(decodeUtf8Strict(input)).toBe("\uFEFFa");
});

it("replaces invalid utf-8 when decoding lossily", () => {
  expect(decodeUtf8Lossy(new Uint8Array([0x61, 0xff]))).toBe("a\uFFFD");
});
