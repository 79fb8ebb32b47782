export interface Env {
  // Port the http server listens on.
  PORT: number;

  // Optional path prefix for requests. When specified the decode URL becomes
  // http://localhost:3030/$PATH_KEY/decode instead of the default
  // http://localhost:3030/decode
  PATH_KEY?: string;

  // Largest request body that is read before decoding, in any format accepted
  // by micro (e.g. "1mb" or a number of bytes).
  BODY_LIMIT: string;

  // Optional Datadog API Key. When provided, logs decode failures to DataDog.
  DD_API_KEY?: string;

  DD_SERVICE: string;
  DD_ENV: string;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    PORT: parsePort(source.PORT),
    PATH_KEY: source.PATH_KEY || undefined,
    BODY_LIMIT: source.BODY_LIMIT || "1mb",
    DD_API_KEY: source.DD_API_KEY || undefined,
    DD_SERVICE: source.DD_SERVICE || "urlencoded-params",
    DD_ENV: source.DD_ENV || "prod",
  };
}

function parsePort(value: string | undefined): number {
  if (!value) {
    return 3030;
  }

  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`invalid PORT: ${value}`);
  }

  return port;
}
