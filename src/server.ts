/**
 * Node entry point: serves the example app behind a Dispatcher
 */

import { createServer } from "node:http";
import { serve } from "@hono/node-server";
import { loadConfig } from "./config";
import { createApp, helloHandler, wrapApp } from "./app";
import { Dispatcher } from "./middleware/dispatcher";
import { Logger } from "./utils/logger";

const config = loadConfig();
const logger = new Logger({ component: "server" }, config.logging.level);
const dispatcherOptions = {
  defaultSink: config.logging.defaultSink,
  logger: logger.child({ component: "dispatcher" }),
};

function start(): { dispatcher: Dispatcher; close: () => void } {
  if (config.server.mode === "node") {
    const dispatcher = new Dispatcher(helloHandler, dispatcherOptions);
    const server = createServer(dispatcher.listener);
    server.listen(config.server.port, config.server.host, () => {
      logger.info("Listening", { mode: "node", host: config.server.host, port: config.server.port });
    });
    return { dispatcher, close: () => server.close() };
  }

  const { app, dispatcher } = wrapApp(createApp(), dispatcherOptions);
  const server = serve(
    { fetch: app.fetch, port: config.server.port, hostname: config.server.host },
    (info) => {
      logger.info("Listening", { mode: "hono", host: info.address, port: info.port });
    },
  );
  return { dispatcher, close: () => server.close() };
}

const { dispatcher, close } = start();

const shutdown = (signal: string) => {
  logger.info("Shutting down", { signal });
  close();
  dispatcher
    .drain(config.server.shutdownTimeoutMs)
    .then((settled) => {
      if (!settled) {
        logger.warn("Shutdown timeout reached with log deliveries pending", {
          timeoutMs: config.server.shutdownTimeoutMs,
        });
      }
      process.exit(0);
    })
    .catch((err: unknown) => {
      logger.error("Drain failed", { error: err });
      process.exit(1);
    });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
