import { serve } from "@hono/node-server";
import type { Services } from "../main.js";
import { createLogger, type Logger } from "../log.js";
import { createApp } from "./routes.js";

export interface ServerOptions {
  services: Services;
  port: number;
  logger?: Logger;
}

export interface RunningServer {
  close(): Promise<void>;
}

export function startServer({ services, port, logger }: ServerOptions): RunningServer {
  const log = logger ?? createLogger("http");
  const app = createApp(services, log);

  const server = serve({ fetch: app.fetch, port }, (info) => {
    log.info(`server listening on http://localhost:${info.port}`);
  });

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/** Resolves with the signal once the process is asked to stop. */
export function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}
