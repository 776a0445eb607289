/**
 * Request interception middleware.
 *
 * Wraps either a direct handler (request + ResponseWriter) or a Hono
 * transport handler, and for every request:
 *   1. mints a request ID and starts a timer
 *   2. runs the wrapped handler
 *   3. responds with the handler's output plus X-Request-ID
 *   4. afterwards, off the response path, logs to every sink and bumps
 *      the hit counter for the sanitized URL
 *
 * Log lines from the default sink look like:
 *   {"duration":"394.823µs","duration_ms":0,"ip_address":"::1","request_id":"80d1b249-0b43-4adc-9456-e42e0b942ec0","status":200,"time":"2024-05-27T13:57:48.750Z","url":"/"}
 */

import type { Context } from "hono";
import type { RequestListener } from "node:http";
import type { InboundRequest, TransportEnv } from "../types/env";
import type { LogEntry, LogSink } from "../types/logEntry";
import type { ResponseWriter } from "../recorder/responseRecorder";
import { ResponseRecorder, copyHeaders } from "../recorder/responseRecorder";
import { NodeResponseWriter, toInboundRequest } from "../adapters/node";
import { CounterTable } from "../stats/counterTable";
import { StdoutSink } from "../sinks/stdoutSink";
import { generateRequestId, isBrokenRequestId } from "../utils/requestId";
import type { IdSource } from "../utils/requestId";
import { sanitizeUrl } from "../utils/sanitize";
import { formatDuration, toMilliseconds } from "../utils/duration";
import { Logger } from "../utils/logger";
import { ConfigurationError } from "./errorHandler";

export const REQUEST_ID_HEADER = "X-Request-ID";
export const COUNTERS_PATH_SUFFIX = "/__/counters";

/**
 * Handler driven with a request value and a buffering ResponseWriter
 */
export interface DirectHandler {
  serve(req: InboundRequest, res: ResponseWriter): void | Promise<void>;
}

/**
 * Handler driven with a Hono context; returns the response to relay
 */
export interface TransportHandler {
  handle(c: Context<TransportEnv>): Response | Promise<Response>;
}

export type WrappedHandler = DirectHandler | TransportHandler;

type ResolvedHandler =
  | { kind: "direct"; handler: DirectHandler }
  | { kind: "transport"; handler: TransportHandler };

export interface DispatcherOptions {
  // Install the stdout sink at index 0 (default true)
  defaultSink?: boolean;
  idSource?: IdSource;
  logger?: Logger;
}

interface Observation {
  requestId: string;
  startedAt: Date;
  startedNs: bigint;
  remoteAddress: string;
  status: number;
  url: string;
  userAgent?: string;
}

const hasMethod = (value: unknown, name: string): boolean =>
  typeof value === "object" &&
  value !== null &&
  typeof Reflect.get(value, name) === "function";

const isDirectHandler = (value: unknown): value is DirectHandler => hasMethod(value, "serve");

const isTransportHandler = (value: unknown): value is TransportHandler => hasMethod(value, "handle");

const resolveHandler = (handler: unknown): ResolvedHandler => {
  if (isDirectHandler(handler) && isTransportHandler(handler)) {
    throw new ConfigurationError("Ambiguous handler: implements both serve() and handle()");
  }
  if (isDirectHandler(handler)) {
    return { kind: "direct", handler };
  }
  if (isTransportHandler(handler)) {
    return { kind: "transport", handler };
  }
  throw new ConfigurationError(`Unrecognised handler type: ${typeof handler}`);
};

// Query and fragment are ignored
const isCountersPath = (url: string): boolean => {
  const [path] = url.split(/[?#]/, 1);
  return path.endsWith(COUNTERS_PATH_SUFFIX);
};

export class Dispatcher {
  /**
   * Hit counts per sanitized URL, for telemetry and monitoring
   */
  readonly counters = new CounterTable();

  private readonly target: ResolvedHandler;
  private readonly registered: LogSink[] = [];
  private readonly pending = new Set<Promise<void>>();
  private readonly idSource?: IdSource;
  private readonly logger: Logger;

  constructor(handler: WrappedHandler, options: DispatcherOptions = {}) {
    this.target = resolveHandler(handler);
    this.idSource = options.idSource;
    this.logger = options.logger ?? new Logger({ component: "dispatcher" });

    if (options.defaultSink !== false) {
      this.registered.push(new StdoutSink());
    }
  }

  get kind(): ResolvedHandler["kind"] {
    return this.target.kind;
  }

  get sinks(): readonly LogSink[] {
    return this.registered;
  }

  /**
   * Register a sink. Do this before serving traffic.
   */
  addSink(sink: LogSink): void {
    this.registered.push(sink);
  }

  /**
   * Direct path: run the handler against a recorder, then relay to `res`
   */
  async dispatch(req: InboundRequest, res: ResponseWriter): Promise<void> {
    const requestId = this.mintRequestId();
    const startedAt = new Date();
    const startedNs = process.hrtime.bigint();

    if (isCountersPath(req.url)) {
      res.headers.set("Content-Type", "application/json");
      res.headers.set(REQUEST_ID_HEADER, requestId);
      res.writeHead(200);
      res.write(this.serializeCounters());
      res.end();
      return;
    }

    const handler = this.directHandler();
    const recorder = new ResponseRecorder();
    await handler.serve(req, recorder);

    const url = sanitizeUrl(req.url);

    copyHeaders(recorder.headers, res.headers);
    res.headers.set(REQUEST_ID_HEADER, requestId);
    res.writeHead(recorder.statusCode);
    res.write(recorder.body);
    res.end();

    this.schedule({
      requestId,
      startedAt,
      startedNs,
      remoteAddress: req.remoteAddress,
      status: recorder.statusCode,
      url,
      userAgent: req.headers.get("User-Agent") ?? undefined,
    });
  }

  /**
   * Transport path, mountable as `app.all("*", dispatcher.handle)`
   */
  readonly handle = async (c: Context<TransportEnv>): Promise<Response> => {
    const requestId = this.mintRequestId();
    const startedAt = new Date();
    const startedNs = process.hrtime.bigint();
    c.set("requestId", requestId);

    if (isCountersPath(c.req.url)) {
      c.header("Content-Type", "application/json");
      c.header(REQUEST_ID_HEADER, requestId);
      return c.body(this.serializeCounters());
    }

    const handler = this.transportHandler();
    const produced = await handler.handle(c);

    // Responses from fetch() carry immutable headers
    const response = new Response(produced.body, produced);
    response.headers.set(REQUEST_ID_HEADER, requestId);

    this.schedule({
      requestId,
      startedAt,
      startedNs,
      remoteAddress: c.env?.incoming?.socket.remoteAddress ?? "",
      status: response.status,
      url: sanitizeUrl(c.req.url),
      userAgent: c.req.header("User-Agent"),
    });

    return response;
  };

  /**
   * node:http listener for the direct path. Handler faults stop here:
   * logged, and answered with a bare 500 if nothing was sent yet.
   */
  readonly listener: RequestListener = (req, res) => {
    void toInboundRequest(req)
      .then((inbound) => this.dispatch(inbound, new NodeResponseWriter(res)))
      .catch((err: unknown) => {
        this.logger.error("Handler fault", { error: err, url: req.url });
        if (!res.headersSent) {
          res.writeHead(500);
        }
        res.end();
      });
  };

  /**
   * Resolves once every scheduled log/count task has settled: `true`, or
   * `false` if `timeoutMs` ran out first. Tasks still running are left
   * to finish on their own.
   */
  async drain(timeoutMs?: number): Promise<boolean> {
    const settled = this.settlePending().then(() => true);
    if (timeoutMs === undefined) {
      return settled;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([settled, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async settlePending(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  private directHandler(): DirectHandler {
    if (this.target.kind !== "direct") {
      throw new ConfigurationError("dispatch() needs a direct handler; use handle() for transport handlers");
    }
    return this.target.handler;
  }

  private transportHandler(): TransportHandler {
    if (this.target.kind !== "transport") {
      throw new ConfigurationError("handle() needs a transport handler; use dispatch() for direct handlers");
    }
    return this.target.handler;
  }

  private mintRequestId(): string {
    const requestId = generateRequestId(this.idSource);
    if (isBrokenRequestId(requestId)) {
      this.logger.error("Request ID source failed, using sentinel", { requestId });
    }
    return requestId;
  }

  private serializeCounters(): string {
    try {
      return JSON.stringify(this.counters.snapshot());
    } catch (err) {
      this.logger.error("Failed to serialize counters", { error: err });
      return "{}";
    }
  }

  private schedule(observation: Observation): void {
    const task = new Promise<void>((resolve) => setImmediate(() => resolve()))
      .then(() => this.record(observation))
      .catch((err: unknown) => {
        this.logger.error("Failed to record request", { error: err, requestId: observation.requestId });
      });

    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
  }

  private async record(observation: Observation): Promise<void> {
    const elapsed = process.hrtime.bigint() - observation.startedNs;

    const entry: LogEntry = Object.freeze({
      duration: formatDuration(elapsed),
      duration_ms: toMilliseconds(elapsed),
      ip_address: observation.remoteAddress,
      request_id: observation.requestId,
      status: observation.status,
      time: observation.startedAt.toISOString(),
      url: observation.url,
      ...(observation.userAgent ? { useragent: observation.userAgent } : {}),
    });

    const deliveries = this.registered.map((sink) => this.deliver(sink, entry));
    this.counters.increment(observation.url);

    await Promise.all(deliveries);
  }

  // Each sink runs in its own microtask; a failure stays with that sink
  private deliver(sink: LogSink, entry: LogEntry): Promise<void> {
    return Promise.resolve()
      .then(() => sink.log(entry))
      .catch((err: unknown) => {
        this.logger.error("Log sink failed", { error: err, requestId: entry.request_id });
      });
  }
}

/**
 * Shorthand for `new Dispatcher(handler, options)`
 */
export const intercept = (handler: WrappedHandler, options?: DispatcherOptions): Dispatcher =>
  new Dispatcher(handler, options);
