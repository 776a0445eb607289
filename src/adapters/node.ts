/**
 * node:http glue for the direct handler path
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import type { InboundRequest } from "../types/env";
import type { ResponseWriter } from "../recorder/responseRecorder";
import { assertStatusCode } from "../recorder/responseRecorder";

export const toHeaders = (raw: IncomingMessage["headers"]): Headers => {
  const headers = new Headers();
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }
  return headers;
};

/**
 * Buffer an incoming request into an InboundRequest
 */
export const toInboundRequest = async (req: IncomingMessage): Promise<InboundRequest> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }

  return {
    method: req.method ?? "GET",
    url: req.url ?? "/",
    headers: toHeaders(req.headers),
    remoteAddress: req.socket.remoteAddress ?? "",
    body: chunks.length > 0 ? Buffer.concat(chunks) : undefined,
  };
};

/**
 * ResponseWriter over a live ServerResponse; headers are flushed on writeHead
 */
export class NodeResponseWriter implements ResponseWriter {
  readonly headers = new Headers();

  constructor(private readonly res: ServerResponse) {}

  writeHead(status: number): void {
    if (this.res.headersSent) {
      return;
    }
    assertStatusCode(status);

    this.headers.forEach((value, name) => {
      if (name !== "set-cookie") {
        this.res.setHeader(name, value);
      }
    });
    const cookies = this.headers.getSetCookie();
    if (cookies.length > 0) {
      this.res.setHeader("set-cookie", cookies);
    }

    this.res.writeHead(status);
  }

  write(chunk: string | Uint8Array): void {
    this.writeHead(200);
    this.res.write(chunk);
  }

  end(): void {
    this.writeHead(200);
    this.res.end();
  }
}
