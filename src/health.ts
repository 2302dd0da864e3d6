import { createServer } from "node:http";
import { createChildLogger } from "./utils/logger.js";

const log = createChildLogger("health");

export const HEALTH_BODY = "Bot is running";

export interface HealthServer {
  readonly port: number;
  close(): Promise<void>;
}

/**
 * Static liveness probe: any GET on any path answers 200.
 * Shares nothing with the relay.
 */
export function startHealthServer(port: number, host = "0.0.0.0"): Promise<HealthServer> {
  const server = createServer((req, res) => {
    if (req.method !== "GET") {
      res.writeHead(405, { Allow: "GET" });
      res.end();
      return;
    }
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end(HEALTH_BODY);
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("Failed to get health server address"));
        return;
      }
      const bound = address.port;
      log.info({ port: bound }, "Health server listening");
      resolve({
        port: bound,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}
