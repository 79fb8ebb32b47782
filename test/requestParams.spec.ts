import { it, expect, vi } from "vitest";
import { RequestParams } from "../src/requestParams";
import type { RawInput } from "../src/parse/percentDecode";

it("decodes the query once", () => {
  const params = new RequestParams({
    search: "a=1&a=2",
    readBody: vi.fn(),
  });

  const first = params.query();
  expect(params.query()).toBe(first);
  expect(first).toEqual({
    type: "SUCCESS",
    values: new Map([["a", ["1", "2"]]]),
  });
});

it("reports a missing query as empty", () => {
  const params = new RequestParams({ search: null, readBody: vi.fn() });
  expect(params.query()).toEqual({
    type: "FAILURE",
    error: { kind: "EMPTY_QUERY" },
  });
});

it("reads and decodes the body once", async () => {
  const readBody = vi.fn(async (): Promise<RawInput | null> => "b=2");
  const params = new RequestParams({ search: "a=1", readBody });

  const first = params.body();
  expect(params.body()).toBe(first);
  expect(await first).toEqual({
    type: "SUCCESS",
    values: new Map([["b", ["2"]]]),
  });
  expect(readBody).toHaveBeenCalledTimes(1);
});

it("keeps query and body results apart", async () => {
  const params = new RequestParams({
    search: "source=query",
    readBody: async () => "source=body",
  });

  expect(params.query()).toEqual({
    type: "SUCCESS",
    values: new Map([["source", ["query"]]]),
  });
  expect(await params.body()).toEqual({
    type: "SUCCESS",
    values: new Map([["source", ["body"]]]),
  });
});

it("reports a missing body as empty", async () => {
  const params = new RequestParams({
    search: null,
    readBody: async () => null,
  });
  expect(await params.body()).toEqual({
    type: "FAILURE",
    error: { kind: "EMPTY_QUERY" },
  });
});

it("wraps a failed body read", async () => {
  const cause = new Error("Body exceeded 1mb limit");
  const params = new RequestParams({
    search: null,
    readBody: () => Promise.reject(cause),
  });

  const result = await params.body();
  expect(result.type).toBe("FAILURE");
  if (result.type === "FAILURE" && result.error.kind === "BODY_ERROR") {
    expect(result.error.cause).toBe(cause);
  } else {
    throw new Error("expected a body error");
  }
});

it("wraps a body read rejected without a reason", async () => {
  const params = new RequestParams({
    search: null,
    readBody: () => Promise.reject(undefined),
  });

  const result = await params.body();
  if (result.type === "FAILURE" && result.error.kind === "BODY_ERROR") {
    expect(result.error.cause).toEqual(
      new Error("failed to read request body"),
    );
  } else {
    throw new Error("expected a body error");
  }
});
