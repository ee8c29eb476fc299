/**
 * wireline - Error types
 */

import type { ConnectionErrorKind, TextEncodingName } from "./types";

/**
 * A connection-layer failure for one exchange. Returned inside an
 * ExchangeResult, never thrown by Transceiver.execute.
 */
export class ConnectionError extends Error {
  readonly kind: ConnectionErrorKind;
  readonly host: string;
  readonly port: number;
  /** System error code such as ECONNREFUSED, when there is one */
  readonly code?: string;

  constructor(options: {
    kind: ConnectionErrorKind;
    host: string;
    port: number;
    code?: string;
    cause?: unknown;
  }) {
    const { kind, host, port, code, cause } = options;
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`${kind} while talking to ${host}:${port}${detail}`, { cause });
    this.name = "ConnectionError";
    this.kind = kind;
    this.host = host;
    this.port = port;
    this.code = code;
  }
}

export class DecodeError extends Error {
  readonly encoding: TextEncodingName;

  constructor(encoding: TextEncodingName, cause: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Response is not valid ${encoding}${detail}`, { cause });
    this.name = "DecodeError";
    this.encoding = encoding;
  }
}

/**
 * Thrown by the status parsing helpers when the input does not start
 * like an HTTP status line.
 */
export class MalformedResponseError extends Error {
  /** Leading part of the offending input */
  readonly input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = "MalformedResponseError";
    this.input = input.slice(0, 64);
  }
}

/**
 * Map a socket error to the failure kind reported to callers.
 */
export function classifySocketError(error: Error): ConnectionErrorKind {
  const code = errorCode(error);
  switch (code) {
    case "ECONNREFUSED":
      return "ConnectionRefused";
    case "ENOTFOUND":
    case "EAI_AGAIN":
    case "EAI_FAIL":
    case "EAI_NONAME":
      return "NameResolutionFailure";
    case "ETIMEDOUT":
      return "Timeout";
    default:
      return "SocketError";
  }
}

export function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
