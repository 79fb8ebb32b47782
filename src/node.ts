import * as http from "node:http";
import { run, send, text } from "micro";
import { Datadog } from "./datadog";
import { loadEnv } from "./node/env";
import { handleDecodeRequest } from "./node/handler";

export async function main() {
  const env = loadEnv();
  const logger = env.DD_API_KEY
    ? new Datadog(env.DD_API_KEY, {
        service: env.DD_SERVICE,
        env: env.DD_ENV,
      })
    : null;

  const server = http.createServer((req, res) => {
    void run(req, res, async () => {
      const response = await handleDecodeRequest(
        req,
        () => text(req, { limit: env.BODY_LIMIT }),
        { env, logger },
      );
      send(res, response.status, response.body);
    });
  });

  await new Promise<void>((resolve) => server.listen(env.PORT, resolve));
  console.log(`listening on port ${env.PORT}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
