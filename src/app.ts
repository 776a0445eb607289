/**
 * Example application wrapped by the server entry point
 */

import { Hono } from "hono";
import { z } from "zod";
import type { TransportEnv } from "./types/env";
import { Dispatcher } from "./middleware/dispatcher";
import type { DirectHandler, DispatcherOptions, TransportHandler } from "./middleware/dispatcher";
import { NotFoundError, errorHandler } from "./middleware/errorHandler";

const echoSchema = z.object({
  message: z.string().min(1).max(1000),
});

export const HELLO_BODY = "hello, world!";

export function createApp() {
  const app = new Hono<TransportEnv>();
  const onError = errorHandler();

  app.onError(onError);

  app.get("/hello", (c) => c.text(HELLO_BODY));

  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  app.post("/echo", async (c) => {
    const { message } = echoSchema.parse(await c.req.json());
    return c.json({ message });
  });

  app.notFound((c) => onError(new NotFoundError(`No route for ${c.req.path}`), c));

  return app;
}

/**
 * Direct-handler flavour of GET /hello, for SERVER_MODE=node
 */
export const helloHandler: DirectHandler = {
  serve(req, res) {
    const { pathname } = new URL(req.url, "http://localhost");
    if (pathname !== "/" && pathname !== "/hello") {
      const err = new NotFoundError(`No route for ${pathname}`);
      res.headers.set("Content-Type", "application/json");
      res.writeHead(err.statusCode);
      res.write(JSON.stringify({ error: err.message, code: err.code }));
      return;
    }
    res.headers.set("Content-Type", "text/plain; charset=UTF-8");
    res.write(HELLO_BODY);
  },
};

/**
 * Put `api` behind a Dispatcher: every request goes through the
 * interception pipeline, and handler faults reach the outer onError.
 */
export function wrapApp(api: Hono<TransportEnv>, options?: DispatcherOptions) {
  const wrapped: TransportHandler = {
    handle: (c) => api.fetch(c.req.raw, c.env),
  };
  const dispatcher = new Dispatcher(wrapped, options);

  const app = new Hono<TransportEnv>();
  app.onError(errorHandler());
  app.all("*", dispatcher.handle);

  return { app, dispatcher };
}
