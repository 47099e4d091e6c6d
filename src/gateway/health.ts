/**
 * Health endpoint.
 *
 * A bare node:http listener that answers every request with 200 and a fixed
 * JSON status so hosting platforms see an open port while the gateway runs.
 * Requests are not logged.
 */
import http from "node:http";
import type { Logger } from "../shared/logger.js";
import { GATEWAY_HOST } from "./config.js";

export const HEALTH_PAYLOAD = { status: "ok", service: "nanobot" } as const;

const HEALTH_BODY = JSON.stringify(HEALTH_PAYLOAD);

export interface HealthServerOptions {
  port: number;
  /** Bind address. Defaults to 0.0.0.0. */
  host?: string;
  logger?: Logger;
}

export interface HealthServerHandle {
  /** Port actually bound (differs from the requested one when 0 was asked for). */
  port: number;
  host: string;
  close(): Promise<void>;
}

function handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
  res.writeHead(200, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(HEALTH_BODY),
  });
  if (req.method === "HEAD") {
    res.end();
    return;
  }
  res.end(HEALTH_BODY);
}

/**
 * Start the health listener. Resolves once the port is bound and rejects
 * if binding fails (e.g. EADDRINUSE).
 */
export function startHealthServer(options: HealthServerOptions): Promise<HealthServerHandle> {
  const host = options.host ?? GATEWAY_HOST;
  const server = http.createServer(handleRequest);

  return new Promise((resolve, reject) => {
    const onStartupError = (error: Error) => {
      reject(error);
    };
    server.once("error", onStartupError);

    server.listen(options.port, host, () => {
      server.off("error", onStartupError);
      server.on("error", (error) => {
        options.logger?.error(`Health server error: ${error.message}`);
      });

      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : options.port;
      options.logger?.info(`Health check listening on ${host}:${port}`);

      resolve({
        port,
        host,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((error) => (error ? rejectClose(error) : resolveClose()));
            server.closeAllConnections();
          }),
      });
    });
  });
}
