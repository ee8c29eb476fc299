/**
 * wireline - Response Inspection
 * Text-level checks on a raw response; no header parsing
 */

import { MalformedResponseError } from "./errors";
import type { RedirectResult, ResponseInput } from "./types";

/** Known status codes. Anything else is still a valid status. */
export const HTTP_STATUS_TABLE: ReadonlyMap<number, string> = new Map([
  [200, "OK"],
  [301, "Moved Permanently"],
  [302, "Found"],
  [400, "Bad Request"],
  [403, "Forbidden"],
  [404, "Not Found"],
]);

export class ResponseInspector {
  /**
   * Get the response as text. Undecoded bytes map one byte to one char.
   */
  static toText(response: ResponseInput): string {
    if (typeof response === "string") return response;
    if (Buffer.isBuffer(response)) return response.toString("latin1");
    if (response.kind === "text") return response.text;
    return response.bytes.toString("latin1");
  }

  /**
   * Status code taken from the second whitespace-separated token.
   * Throws MalformedResponseError when that token is missing, not a
   * number, or longer than 15 digits (beyond exact float precision).
   */
  static statusLine(response: ResponseInput): number {
    const text = this.toText(response);
    const token = text.trim().split(/\s+/)[1];

    if (token === undefined || !/^[+-]?\d{1,15}$/.test(token)) {
      throw new MalformedResponseError(
        `Expected a status code as the second token, got ${
          token === undefined ? "nothing" : JSON.stringify(token)
        }`,
        text
      );
    }
    return parseInt(token, 10);
  }

  /**
   * e.g. "<HTTP Response: 404 Not Found>", or "<HTTP Response: 418>" for
   * codes outside the status table
   */
  static describe(response: ResponseInput): string {
    const code = this.statusLine(response);
    const reason = HTTP_STATUS_TABLE.get(code);
    return reason === undefined
      ? `<HTTP Response: ${code}>`
      : `<HTTP Response: ${code} ${reason}>`;
  }

  /**
   * Substring search for a status such as "404 Not Found" anywhere in the
   * response, body included
   */
  static containsStatus(response: ResponseInput, code = "200 OK"): boolean {
    return this.toText(response).includes(code);
  }

  /**
   * Find the redirect target of a 301/302 response: the token that
   * follows the first token containing "Location:".
   */
  static redirectLocation(response: ResponseInput): RedirectResult {
    const text = this.toText(response);
    if (
      !text.includes("301 Moved Permanently") &&
      !text.includes("302 Found")
    ) {
      return { status: "not-redirect" };
    }

    const tokens = text.split(/\s+/).filter((t) => t !== "");
    const index = tokens.findIndex((t) => t.includes("Location:"));
    const location = index === -1 ? undefined : tokens[index + 1];

    if (location === undefined) {
      return { status: "missing-location" };
    }
    return { status: "redirect", location };
  }
}
