/**
 * wireline - URL Encoding Utilities
 */

export class Encoder {
  /**
   * URL encode a string (RFC 3986 unreserved characters stay as-is)
   */
  static urlEncode(str: string): string {
    return encodeURIComponent(str).replace(
      /[!'()*]/g,
      (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
    );
  }

  /**
   * application/x-www-form-urlencoded encoding: like urlEncode, but
   * spaces become "+"
   */
  static formEncode(str: string): string {
    return this.urlEncode(str).replace(/%20/g, "+");
  }
}
