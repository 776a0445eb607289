/**
 * Hono environment for the transport-specific handler path.
 * Bindings come from @hono/node-server and are absent when an app is
 * exercised in process (app.request / app.fetch).
 */

import type { HttpBindings } from "@hono/node-server";

export interface DispatchVariables {
  requestId: string;
}

export interface TransportEnv {
  Bindings: Partial<HttpBindings>;
  Variables: DispatchVariables;
}

/**
 * Request value handed to a direct handler
 */
export interface InboundRequest {
  method: string;
  // As received: a path for server traffic, possibly an absolute URL
  url: string;
  headers: Headers;
  remoteAddress: string;
  body?: Uint8Array;
}
