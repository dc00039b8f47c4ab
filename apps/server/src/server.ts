import http from "node:http";
import { bootstrapServerRuntime } from "./bootstrap";
import { createRequestHandler } from "./routes";
import type { ServerConfig } from "./server-config";

export async function startServer(config: ServerConfig): Promise<http.Server> {
  const runtime = bootstrapServerRuntime(config);

  const server = http.createServer(
    createRequestHandler(runtime, {
      authToken: config.authToken
    })
  );

  await new Promise<void>((resolve) => {
    server.listen(config.port, () => resolve());
  });

  process.stdout.write(`server: http://localhost:${config.port}\n`);
  return server;
}
