import { describe, expect, test } from "vitest";
import { Encoder } from "../src/encoder";

describe("Encoder", () => {
  describe("URL encoding", () => {
    test("encodes special characters", () => {
      expect(Encoder.urlEncode("hello world")).toBe("hello%20world");
      expect(Encoder.urlEncode("a=b&c=d")).toBe("a%3Db%26c%3Dd");
      expect(Encoder.urlEncode("../etc/passwd")).toBe("..%2Fetc%2Fpasswd");
    });

    test("encodes characters encodeURIComponent leaves alone", () => {
      expect(Encoder.urlEncode("!'()*")).toBe("%21%27%28%29%2A");
    });
  });

  describe("form encoding", () => {
    test("turns spaces into plus signs", () => {
      expect(Encoder.formEncode("hello world")).toBe("hello+world");
      expect(Encoder.formEncode("it's (ok)!*")).toBe("it%27s+%28ok%29%21%2A");
    });

    test("escapes slashes and literal plus signs", () => {
      expect(Encoder.formEncode("a/b?c")).toBe("a%2Fb%3Fc");
      expect(Encoder.formEncode("a+b")).toBe("a%2Bb");
    });

    test("leaves unreserved characters alone", () => {
      expect(Encoder.formEncode("AZaz09~_.-")).toBe("AZaz09~_.-");
    });

    test("percent-encodes UTF-8 bytes", () => {
      expect(Encoder.formEncode("é")).toBe("%C3%A9");
    });

    test("encodes CR and LF", () => {
      expect(Encoder.formEncode("a\r\nb")).toBe("a%0D%0Ab");
    });
  });
});
