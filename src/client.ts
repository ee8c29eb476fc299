/**
 * wireline - Transceiver
 * One socket per exchange: connect, send, read until the peer closes, close
 */

import * as net from "net";
import * as tls from "tls";
import type { Logger } from "winston";
import { RequestBuilder } from "./builder";
import type { RequestContext } from "./context";
import {
  ConnectionError,
  DecodeError,
  classifySocketError,
  errorCode,
} from "./errors";
import { logger as defaultLogger } from "./logger";
import type {
  ExchangeResult,
  ExecuteOptions,
  RawResponse,
  TextEncodingName,
  TransceiverOptions,
} from "./types";

export class Transceiver {
  private readonly logger: Logger;
  private readonly lookup?: net.LookupFunction;

  constructor(options: TransceiverOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.lookup = options.lookup;
  }

  /**
   * Send a request over a fresh connection and collect everything the
   * peer sends until it closes the connection.
   *
   * Sends `options.request` when given, otherwise the last request built
   * for the context, otherwise a default GET of `context.url`.
   * Connection failures resolve to `{ ok: false }`; the returned promise
   * does not reject for them.
   */
  execute(
    context: RequestContext,
    options: ExecuteOptions = {}
  ): Promise<ExchangeResult> {
    const { timeout = 0, encoding = "utf-8", decode = true } = options;
    const { host, port } = context;
    const request =
      options.request ?? context.request ?? RequestBuilder.build(context);
    const payload = Buffer.from(request, encoding);

    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      let failure: ConnectionError | undefined;

      const socket = this.connect(context);

      const fail = (error: ConnectionError) => {
        // The first failure wins; later errors come from tearing down
        failure ??= error;
        socket.destroy();
      };

      if (timeout > 0) {
        socket.setTimeout(timeout * 1000);
        socket.on("timeout", () => {
          fail(
            new ConnectionError({
              kind: "Timeout",
              host,
              port,
              cause: new Error(`No activity for ${timeout}s`),
            })
          );
        });
      }

      socket.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
      });

      socket.on("error", (error: Error) => {
        fail(
          new ConnectionError({
            kind: classifySocketError(error),
            host,
            port,
            code: errorCode(error),
            cause: error,
          })
        );
      });

      // Settle only once the handle is gone so nothing outlives the call
      socket.on("close", () => {
        if (failure) {
          this.logger.warn(`Could not connect to ${host}`, {
            kind: failure.kind,
            port,
            code: failure.code,
            error: failure.message,
          });
          resolve({ ok: false, error: failure });
          return;
        }

        const bytes = Buffer.concat(chunks);
        this.logger.debug("Connection closed by peer", {
          host,
          port,
          received: bytes.length,
        });
        resolve({
          ok: true,
          response: decode ? this.decode(bytes, encoding) : { kind: "bytes", bytes },
        });
      });

      this.logger.debug("Sending request", { host, port, bytes: payload.length });
      socket.write(payload);
    });
  }

  private connect(context: RequestContext): net.Socket {
    const { host, port } = context;

    if (context.useTLS) {
      return tls.connect({ host, port, lookup: this.lookup });
    }
    return net.connect({ host, port, lookup: this.lookup });
  }

  /**
   * Decode the response, falling back to the raw bytes when they are
   * not valid in the requested encoding
   */
  private decode(bytes: Buffer, encoding: TextEncodingName): RawResponse {
    try {
      // TextDecoder reads "ascii" as windows-1252, which accepts every byte
      if (encoding === "ascii") {
        const offset = bytes.findIndex((byte) => byte > 0x7f);
        if (offset !== -1) {
          throw new TypeError(
            `Byte 0x${bytes[offset]?.toString(16)} at offset ${offset} is not ASCII`
          );
        }
      }
      const decoder = new TextDecoder(encoding, {
        fatal: true,
        ignoreBOM: true,
      });
      return { kind: "text", text: decoder.decode(bytes), bytes };
    } catch (error) {
      const decodeError = new DecodeError(encoding, error);
      this.logger.warn("Could not decode the response", {
        encoding,
        error: decodeError.message,
      });
      return { kind: "bytes", bytes, decodeError };
    }
  }
}
