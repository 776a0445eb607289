/**
 * Default sink: one JSON line per request on stdout
 */

import type { LogEntry, LogSink } from "../types/logEntry";

export class StdoutSink implements LogSink {
  log(entry: LogEntry): void {
    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`error serializing log entry: ${message}`);
      return;
    }
    console.log(line);
  }
}
