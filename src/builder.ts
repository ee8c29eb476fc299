/**
 * wireline - Request Builder
 * Produces the literal HTTP/1.1 request sent on the wire
 */

import type { RequestContext } from "./context";
import { Encoder } from "./encoder";
import type { BuildOptions } from "./types";

const LINE_ENDING = "\r\n";

export class RequestBuilder {
  /**
   * Build the raw request string for a context and remember it on the
   * context as `context.request`.
   *
   * Nothing is validated: method, path and connection go out exactly as
   * given, CR/LF included.
   */
  static build(context: RequestContext, options: BuildOptions = {}): string {
    const { method = "GET", path = "", connection = "close", body = "" } =
      options;

    // An empty path puts the absolute URL in the request line
    const target = path === "" ? context.url : path;
    const encodedBody = Encoder.formEncode(body);

    const lines = [
      `${method} ${target} HTTP/1.1`,
      `Host: ${context.host}:${context.port}`,
      "Accept: */*",
      "Accept-Language: en-US",
      `User-Agent: ${context.userAgent}`,
      `Connection: ${connection}`,
      `Content-Type: ${context.contentType}`,
      // encodedBody is ASCII, so its length is its byte count
      `Content-Length: ${encodedBody.length}`,
      "",
      encodedBody,
    ];

    const request = lines.join(LINE_ENDING);
    context.request = request;
    return request;
  }
}

/**
 * Positional shorthand for `RequestBuilder.build`
 */
export function buildRequest(
  context: RequestContext,
  method = "GET",
  path = "",
  connection = "close",
  body = ""
): string {
  return RequestBuilder.build(context, { method, path, connection, body });
}
