/**
 * Request interception middleware: request IDs, response relay,
 * per-request log entries and per-route hit counters
 */

export {
  Dispatcher,
  intercept,
  REQUEST_ID_HEADER,
  COUNTERS_PATH_SUFFIX,
} from "./middleware/dispatcher";
export type {
  DirectHandler,
  TransportHandler,
  WrappedHandler,
  DispatcherOptions,
} from "./middleware/dispatcher";
export { AppError, ConfigurationError, NotFoundError, errorHandler } from "./middleware/errorHandler";
export { ResponseRecorder, copyHeaders } from "./recorder/responseRecorder";
export type { ResponseWriter } from "./recorder/responseRecorder";
export { NodeResponseWriter, toInboundRequest } from "./adapters/node";
export { CounterTable } from "./stats/counterTable";
export { StdoutSink } from "./sinks/stdoutSink";
export { BROKEN_REQUEST_ID, generateRequestId } from "./utils/requestId";
export { sanitizeUrl } from "./utils/sanitize";
export { formatDuration } from "./utils/duration";
export { createApp, wrapApp, helloHandler } from "./app";
export { Logger, createLogger } from "./utils/logger";
export type { LogLevel } from "./utils/logger";
export { loadConfig } from "./config";
export type { ServerConfig } from "./config";
export type { InboundRequest, TransportEnv, DispatchVariables } from "./types/env";
export type { LogEntry, LogSink } from "./types/logEntry";
