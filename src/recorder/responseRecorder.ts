/**
 * Buffering response writer handed to direct handlers in place of the live response
 */

export interface ResponseWriter {
  readonly headers: Headers;
  writeHead(status: number): void;
  write(chunk: string | Uint8Array): void;
  end(): void;
}

export const assertStatusCode = (status: number): void => {
  if (!Number.isInteger(status) || status < 100 || status > 999) {
    throw new RangeError(`Invalid status code: ${status}`);
  }
};

export class ResponseRecorder implements ResponseWriter {
  readonly headers = new Headers();
  private status = 200;
  private wroteHeader = false;
  private readonly chunks: Uint8Array[] = [];

  get statusCode(): number {
    return this.status;
  }

  get body(): Uint8Array {
    return Buffer.concat(this.chunks);
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }

  // First call wins, as on a real connection
  writeHead(status: number): void {
    if (this.wroteHeader) {
      return;
    }
    assertStatusCode(status);
    this.status = status;
    this.wroteHeader = true;
  }

  write(chunk: string | Uint8Array): void {
    this.writeHead(200);
    this.chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }

  end(): void {
    this.writeHead(200);
  }
}

/**
 * Replace every header named in `from` on `to`. Set-Cookie keeps all its values.
 */
export const copyHeaders = (from: Headers, to: Headers): void => {
  for (const name of new Set(from.keys())) {
    to.delete(name);
  }
  from.forEach((value, name) => {
    if (name !== "set-cookie") {
      to.set(name, value);
    }
  });
  for (const cookie of from.getSetCookie()) {
    to.append("set-cookie", cookie);
  }
};
