/**
 * wireline - Type definitions
 */

import type { LookupFunction } from "net";
import type { Logger } from "winston";
import type { ConnectionError, DecodeError } from "./errors";

// ============================================================================
// Request Context
// ============================================================================

export interface ContextOptions {
  host: string;
  /** Defaults to "/" */
  path?: string;
  /** Defaults to 80; 443 always turns TLS on */
  port?: number;
  /** Defaults to "Mozilla/5.0" */
  userAgent?: string;
  useTLS?: boolean;
}

export type Scheme = "http" | "https";

// ============================================================================
// Request Building
// ============================================================================

export interface BuildOptions {
  method?: string;
  /** Request-line target; empty means the context's absolute URL */
  path?: string;
  connection?: string;
  /** Raw body, form-encoded before sending */
  body?: string;
}

// ============================================================================
// Exchange
// ============================================================================

/**
 * Encoding names understood both by Buffer (when sending) and by
 * TextDecoder (when decoding the response).
 */
export type TextEncodingName = "utf-8" | "utf8" | "latin1" | "ascii" | "utf-16le";

export interface ExecuteOptions {
  /** Inactivity deadline in seconds; 0 waits forever */
  timeout?: number;
  encoding?: TextEncodingName;
  decode?: boolean;
  /** Literal request to send instead of the context's last built one */
  request?: string;
}

export interface TransceiverOptions {
  logger?: Logger;
  /** DNS lookup used for the connection; defaults to the system resolver */
  lookup?: LookupFunction;
}

export type RawResponse =
  | { kind: "text"; text: string; bytes: Buffer }
  | { kind: "bytes"; bytes: Buffer; decodeError?: DecodeError };

export type ExchangeResult =
  | { ok: true; response: RawResponse }
  | { ok: false; error: ConnectionError };

export type ConnectionErrorKind =
  | "ConnectionRefused"
  | "NameResolutionFailure"
  | "Timeout"
  | "SocketError";

// ============================================================================
// Response Inspection
// ============================================================================

export type ResponseInput = string | Buffer | RawResponse;

export type RedirectResult =
  | { status: "redirect"; location: string }
  | { status: "not-redirect" }
  | { status: "missing-location" };
