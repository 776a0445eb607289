/**
 * Structured record emitted once per proxied request.
 * Field names are the wire format written by the default sink.
 */
export interface LogEntry {
  readonly duration: string;
  readonly duration_ms: number;
  readonly ip_address: string;
  readonly request_id: string;
  readonly status: number;
  readonly time: string;
  readonly url: string;
  readonly useragent?: string;
}

/**
 * Consumer of log entries. Sinks may be invoked concurrently, for the same
 * request and across requests. Whatever they return is only awaited to
 * catch failures.
 */
export interface LogSink {
  log(entry: LogEntry): void | Promise<void>;
}
