import URL from "node:url";
import type { Datadog } from "../datadog";
import type { DecodeResult } from "../parse/decodeUrlEncoded";
import { describeDecodeError } from "../parse/decodeError";
import type { RawInput } from "../parse/percentDecode";
import { toJSON } from "../parse/queryMap";
import { RequestParams } from "../requestParams";
import type { Env } from "./env";

export type DecodeRequest = {
  url?: string;
};

export type HandlerResponse = {
  status: number;
  body: unknown;
};

export type HandlerOptions = {
  env: Pick<Env, "PATH_KEY">;
  logger?: Datadog | null;
};

type ParamsSource = "query" | "body";

type Settled =
  | { type: "SUCCESS"; values: Record<string, string[]> }
  | { type: "FAILURE"; response: HandlerResponse };

export async function handleDecodeRequest(
  request: DecodeRequest,
  readBody: () => Promise<RawInput | null>,
  { env, logger }: HandlerOptions,
): Promise<HandlerResponse> {
  const url = URL.parse(request.url ?? "/");
  const pathname = url.pathname ?? "/";

  if (env.PATH_KEY && !pathname.startsWith("/" + env.PATH_KEY)) {
    return notFound();
  }

  const route = env.PATH_KEY
    ? pathname.slice(1 + env.PATH_KEY.length)
    : pathname;
  if (route !== "/decode") {
    return notFound();
  }

  const params = new RequestParams({
    search: url.search === null ? null : url.search.slice(1),
    readBody,
  });

  const query = settle("query", params.query(), logger);
  if (query.type === "FAILURE") {
    return query.response;
  }

  const body = settle("body", await params.body(), logger);
  if (body.type === "FAILURE") {
    return body.response;
  }

  return {
    status: 200,
    body: {
      query: query.values,
      body: body.values,
    },
  };
}

function settle(
  source: ParamsSource,
  result: DecodeResult,
  logger: Datadog | null | undefined,
): Settled {
  if (result.type === "SUCCESS") {
    return { type: "SUCCESS", values: toJSON(result.values) };
  }

  const { error } = result;
  if (error.kind === "EMPTY_QUERY") {
    return { type: "SUCCESS", values: {} };
  }

  const reason = describeDecodeError(error);

  if (logger) {
    logger
      .log([{ type: "decode_failure", source, kind: error.kind, reason }])
      .catch((logError: unknown) => {
        console.error("failed to ship logs to datadog", logError);
      });
  }

  return {
    type: "FAILURE",
    response: {
      status:
        error.kind === "BODY_ERROR" ? statusCodeOf(error.cause) ?? 400 : 400,
      body: { error: reason, source },
    },
  };
}

function statusCodeOf(cause: unknown): number | null {
  if (typeof cause === "object" && cause !== null && "statusCode" in cause) {
    const { statusCode } = cause;
    if (typeof statusCode === "number") {
      return statusCode;
    }
  }

  return null;
}

function notFound(): HandlerResponse {
  return { status: 404, body: "not found" };
}
