import { describe, expect, test } from "vitest";
import { CONTENT_TYPE, RequestContext, newContext } from "../src/context";

describe("RequestContext", () => {
  test("applies defaults", () => {
    const context = new RequestContext({ host: "example.com" });

    expect(context.path).toBe("/");
    expect(context.port).toBe(80);
    expect(context.userAgent).toBe("Mozilla/5.0");
    expect(context.useTLS).toBe(false);
    expect(context.scheme).toBe("http");
    expect(context.url).toBe("http://example.com/");
    expect(context.request).toBeUndefined();
  });

  test("uses a fixed form content type", () => {
    const context = new RequestContext({ host: "example.com" });
    expect(context.contentType).toBe(CONTENT_TYPE);
    expect(CONTENT_TYPE).toBe("application/x-www-form-urlencoded");
  });

  test("forces TLS on port 443", () => {
    const context = newContext("example.com", "/login", 443, "agent", false);

    expect(context.useTLS).toBe(true);
    expect(context.scheme).toBe("https");
    expect(context.url).toBe("https://example.com/login");
  });

  test("keeps the port out of the URL", () => {
    const context = newContext("example.com", "/a", 8443, "agent", true);

    expect(context.useTLS).toBe(true);
    expect(context.url).toBe("https://example.com/a");
  });

  test("positional helper maps every argument", () => {
    const context = newContext("10.0.0.5", "/x", 8080, "curl/8.0");

    expect(context.host).toBe("10.0.0.5");
    expect(context.path).toBe("/x");
    expect(context.port).toBe(8080);
    expect(context.userAgent).toBe("curl/8.0");
    expect(context.url).toBe("http://10.0.0.5/x");
  });

  test("rejects ports outside 1-65535", () => {
    expect(() => newContext("example.com", "/", 0)).toThrow(RangeError);
    expect(() => newContext("example.com", "/", 70000)).toThrow(
      "Invalid port: 70000"
    );
    expect(() => newContext("example.com", "/", 80.5)).toThrow(RangeError);
  });
});
