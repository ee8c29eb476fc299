/**
 * wireline - Request Context
 * Target parameters shared by the builder and the transceiver
 */

import type { ContextOptions, Scheme } from "./types";

export const CONTENT_TYPE = "application/x-www-form-urlencoded";

export class RequestContext {
  readonly host: string;
  readonly path: string;
  readonly port: number;
  readonly userAgent: string;
  /** Always true on port 443, whatever the caller asked for */
  readonly useTLS: boolean;
  readonly contentType: string = CONTENT_TYPE;
  /** Absolute URL of the target, without the port */
  readonly url: string;

  /** Last request built for this context */
  request?: string;

  constructor(options: ContextOptions) {
    const {
      host,
      path = "/",
      port = 80,
      userAgent = "Mozilla/5.0",
      useTLS = false,
    } = options;

    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new RangeError(`Invalid port: ${port}`);
    }

    this.host = host;
    this.path = path;
    this.port = port;
    this.userAgent = userAgent;
    this.useTLS = useTLS || port === 443;
    this.url = `${this.scheme}://${host}${path}`;
  }

  get scheme(): Scheme {
    return this.useTLS ? "https" : "http";
  }
}

/**
 * Positional shorthand for `new RequestContext(...)`
 */
export function newContext(
  host: string,
  path = "/",
  port = 80,
  userAgent = "Mozilla/5.0",
  useTLS = false
): RequestContext {
  return new RequestContext({ host, path, port, userAgent, useTLS });
}
