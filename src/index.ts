/**
 * wireline - Send literal HTTP/1.1 requests over raw TCP/TLS sockets
 * Requests go out exactly as built, responses come back exactly as received
 *
 * WARNING: This library is intended for authorized security testing only.
 * Do not use against systems without explicit permission.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  ContextOptions,
  Scheme,
  BuildOptions,
  TextEncodingName,
  ExecuteOptions,
  TransceiverOptions,
  RawResponse,
  ExchangeResult,
  ConnectionErrorKind,
  ResponseInput,
  RedirectResult,
} from "./types";
export type { LoggerOptions } from "./logger";

// =============================================================================
// Core Classes
// =============================================================================

export { RequestContext, CONTENT_TYPE } from "./context";
export { RequestBuilder } from "./builder";
export { Transceiver } from "./client";
export { ResponseInspector, HTTP_STATUS_TABLE } from "./response";
export { UrlUtils } from "./url";
export { Encoder } from "./encoder";
export { ConnectionError, DecodeError, MalformedResponseError } from "./errors";
export { createLogger, logger } from "./logger";

// =============================================================================
// Convenience Exports
// =============================================================================

import { Transceiver } from "./client";
import { ResponseInspector } from "./response";
import { UrlUtils } from "./url";
import type { RequestContext } from "./context";
import type { ExchangeResult, TextEncodingName } from "./types";

export { newContext } from "./context";
export { buildRequest } from "./builder";

/** Transceiver with the default logger and system DNS */
export const transceiver = new Transceiver();

/** Send the context's last built request; timeout is in seconds */
export function execute(
  context: RequestContext,
  timeout = 0,
  encoding: TextEncodingName = "utf-8",
  decode = true
): Promise<ExchangeResult> {
  return transceiver.execute(context, { timeout, encoding, decode });
}

export const statusLine = ResponseInspector.statusLine.bind(ResponseInspector);
export const describe = ResponseInspector.describe.bind(ResponseInspector);
export const containsStatus =
  ResponseInspector.containsStatus.bind(ResponseInspector);
export const redirectLocation =
  ResponseInspector.redirectLocation.bind(ResponseInspector);
export const depth = UrlUtils.depth.bind(UrlUtils);
export const inDomain = UrlUtils.inDomain.bind(UrlUtils);

// =============================================================================
// Default Export
// =============================================================================

export default Transceiver;
