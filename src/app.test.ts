/**
 * End-to-end: example app wrapped by the Dispatcher
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createApp, helloHandler, wrapApp, HELLO_BODY } from "./app";
import { Dispatcher, REQUEST_ID_HEADER } from "./middleware/dispatcher";
import { ResponseRecorder } from "./recorder/responseRecorder";
import type { LogEntry } from "./types/logEntry";

describe("wrapped example app", () => {
  let entries: LogEntry[];

  const setup = () => {
    entries = [];
    const { app, dispatcher } = wrapApp(createApp(), { defaultSink: false });
    dispatcher.addSink({ log: (entry) => void entries.push(entry) });
    return { app, dispatcher };
  };

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should answer hello, log it and count it", async () => {
    const { app, dispatcher } = setup();

    const res = await app.request("/hello");
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("hello, world!");
    expect(res.headers.get(REQUEST_ID_HEADER)).toBeTruthy();

    await dispatcher.drain();
    expect(entries).toHaveLength(1);
    expect(entries[0].status).toBe(200);
    expect(entries[0].url).toBe("http://localhost/hello");
    expect(dispatcher.counters.get("http://localhost/hello")).toBe(1);
  });

  it("should relay validation failures from the inner app", async () => {
    const { app, dispatcher } = setup();

    const res = await app.request("/echo", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ message: "" }),
    });
    await dispatcher.drain();

    expect(res.status).toBe(400);
    expect(((await res.json()) as { code: string }).code).toBe("VALIDATION_ERROR");
    expect(entries[0].status).toBe(400);
  });

  it("should echo valid bodies", async () => {
    const { app } = setup();

    const res = await app.request("/echo", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ message: "hi" }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: "hi" });
  });

  it("should log unknown routes as 404", async () => {
    const { app, dispatcher } = setup();

    const res = await app.request("/nope");
    await dispatcher.drain();

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "No route for /nope", code: "NOT_FOUND" });
    expect(entries[0].status).toBe(404);
  });

  it("should report counters for the routes served so far", async () => {
    const { app, dispatcher } = setup();

    await app.request("/hello");
    await app.request("/health");
    await app.request("/hello");
    await dispatcher.drain();

    const res = await app.request("/__/counters");
    expect(await res.json()).toEqual({
      "http://localhost/hello": 2,
      "http://localhost/health": 1,
    });
  });
});

describe("helloHandler", () => {
  const request = (url: string) => ({
    method: "GET",
    url,
    headers: new Headers(),
    remoteAddress: "127.0.0.1",
  });

  it("should greet on / and /hello through a Dispatcher", async () => {
    const dispatcher = new Dispatcher(helloHandler, { defaultSink: false });
    const res = new ResponseRecorder();

    await dispatcher.dispatch(request("/hello?name=x"), res);

    expect(res.statusCode).toBe(200);
    expect(res.text()).toBe(HELLO_BODY);
    expect(res.headers.get("content-type")).toBe("text/plain; charset=UTF-8");
  });

  it("should answer 404 elsewhere", async () => {
    const dispatcher = new Dispatcher(helloHandler, { defaultSink: false });
    const res = new ResponseRecorder();

    await dispatcher.dispatch(request("/missing"), res);
    await dispatcher.drain();

    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.text())).toEqual({ error: "No route for /missing", code: "NOT_FOUND" });
    expect(dispatcher.counters.get("/missing")).toBe(1);
  });
});
