import { describe, it, expect } from "vitest";
import { ResponseRecorder, copyHeaders } from "./responseRecorder";

describe("ResponseRecorder", () => {
  it("should default to 200 with an empty body", () => {
    const rec = new ResponseRecorder();
    expect(rec.statusCode).toBe(200);
    expect(rec.body.length).toBe(0);
    expect(rec.text()).toBe("");
  });

  it("should record an explicit status", () => {
    const rec = new ResponseRecorder();
    rec.writeHead(404);
    expect(rec.statusCode).toBe(404);
  });

  it("should keep the first status written", () => {
    const rec = new ResponseRecorder();
    rec.writeHead(201);
    rec.writeHead(500);
    expect(rec.statusCode).toBe(201);
  });

  it("should imply 200 when the body is written first", () => {
    const rec = new ResponseRecorder();
    rec.write("hello");
    rec.writeHead(404);
    expect(rec.statusCode).toBe(200);
  });

  it("should concatenate string and byte chunks", () => {
    const rec = new ResponseRecorder();
    rec.write("hello, ");
    rec.write(new TextEncoder().encode("world!"));
    rec.end();
    expect(rec.text()).toBe("hello, world!");
  });

  it("should reject invalid status codes", () => {
    const rec = new ResponseRecorder();
    expect(() => rec.writeHead(42)).toThrow(RangeError);
    expect(() => rec.writeHead(1000)).toThrow(RangeError);
  });
});

describe("copyHeaders", () => {
  it("should overwrite headers present on both sides", () => {
    const from = new Headers({ "Content-Type": "application/json" });
    const to = new Headers({ "Content-Type": "text/html", "X-Kept": "1" });

    copyHeaders(from, to);

    expect(to.get("content-type")).toBe("application/json");
    expect(to.get("x-kept")).toBe("1");
  });

  it("should replace multi-valued headers rather than merge them", () => {
    const from = new Headers();
    from.append("Vary", "Accept");
    const to = new Headers({ Vary: "Origin" });

    copyHeaders(from, to);

    expect(to.get("vary")).toBe("Accept");
  });

  it("should keep every Set-Cookie value", () => {
    const from = new Headers();
    from.append("Set-Cookie", "a=1");
    from.append("Set-Cookie", "b=2");
    const to = new Headers();
    to.append("Set-Cookie", "stale=1");

    copyHeaders(from, to);

    expect(to.getSetCookie()).toEqual(["a=1", "b=2"]);
  });
});
